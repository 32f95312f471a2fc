import type {IncomingHttpHeaders} from 'node:http';
import {isIP} from 'node:net';

export type RequestLike = {
  method?: string;
  url?: string;
  httpVersion: string;
  httpVersionMajor: number;
  headers: IncomingHttpHeaders;
  socket?: {remoteAddress?: string};
};

export type RequestTarget = {
  path: string;
  rawQuery: string;
  authority: string;
};

const ABSOLUTE_FORM_PREFIX = /^[a-z][a-z0-9+.-]*:\/\/[^/?#]*/iu;

export const headerValue = (req: RequestLike, name: string) => {
  const value = req.headers[name.toLowerCase()];
  if (Array.isArray(value)) {
    return value[0] ?? '';
  }

  return value ?? '';
};

export const isProtocolUpgradeConnect = (req: RequestLike) =>
  req.httpVersionMajor === 2 && req.method === 'CONNECT';

/** HTTP/2 carries the host in the `:authority` pseudo header and usually sends no `host`. */
export const requestHost = (req: RequestLike) => {
  const pseudoAuthority = headerValue(req, ':authority');
  return pseudoAuthority.length > 0 ? pseudoAuthority : headerValue(req, 'host');
};

const connectAuthority = (req: RequestLike) => {
  const pseudoAuthority = headerValue(req, ':authority');
  if (pseudoAuthority.length > 0) {
    return pseudoAuthority;
  }

  return req.url && req.url.length > 0 ? req.url : requestHost(req);
};

export const parseRequestTarget = (req: RequestLike): RequestTarget => {
  if (req.method === 'CONNECT') {
    return {path: '', rawQuery: '', authority: connectAuthority(req)};
  }

  const rawUrl = req.url ?? '';
  const prefix = ABSOLUTE_FORM_PREFIX.exec(rawUrl)?.[0];
  const authority = prefix ? prefix.replace(/^[^:]+:\/\//u, '') : requestHost(req);
  const withoutPrefix = prefix ? rawUrl.slice(prefix.length) : rawUrl;
  const withoutFragment = withoutPrefix.split('#', 1)[0] ?? '';

  const queryIndex = withoutFragment.indexOf('?');
  if (queryIndex === -1) {
    return {path: withoutFragment, rawQuery: '', authority};
  }

  return {
    path: withoutFragment.slice(0, queryIndex),
    rawQuery: withoutFragment.slice(queryIndex + 1),
    authority
  };
};

export const path = (req: RequestLike, target: RequestTarget) => {
  if (isProtocolUpgradeConnect(req)) {
    return target.authority;
  }

  return target.path.length > 0 ? target.path : '/';
};

export const uri = (req: RequestLike, target: RequestTarget) => {
  if (isProtocolUpgradeConnect(req)) {
    return target.authority;
  }

  const requestPath = path(req, target);
  return target.rawQuery.length > 0 ? `${requestPath}?${target.rawQuery}` : requestPath;
};

export const protocol = (req: RequestLike) => `HTTP/${req.httpVersion}`;

export const getUserIp = (req: RequestLike) => {
  const remoteAddress = req.socket?.remoteAddress;
  if (!remoteAddress) {
    return null;
  }

  if (remoteAddress.startsWith('::ffff:') && isIP(remoteAddress.slice(7)) === 4) {
    return remoteAddress.slice(7);
  }

  return isIP(remoteAddress) === 0 ? null : remoteAddress;
};

import type {IncomingHttpHeaders} from 'node:http';

import {z} from 'zod';

import {API_KEY_HEADER_FORMAT, describeApiKeyAuthError, toError, type ApiKeyAuthError} from './errors';

export type ApiKeyRequest = {
  headers: IncomingHttpHeaders;
};

export type FinderResult<Identity> = {ok: true; value: Identity} | {ok: false; error: Error};

export type ApiKeyFinder<Request, Identity> = (input: {
  key: string;
  req: Request;
}) => FinderResult<Identity> | Promise<FinderResult<Identity>>;

export type ApiKeyErrorHandler<Request, Response> = (input: {
  req: Request;
  res: Response;
  error: ApiKeyAuthError;
  statusCode: number;
}) => void;

export type IdentityStore<Request extends object, Identity> = {
  set: (input: {req: Request; identity: Identity}) => void;
  get: (req: Request) => Identity | undefined;
};

export type ApiKeyMiddlewareDeps<Request extends object, Response, Identity> = {
  provider: string;
  finder: ApiKeyFinder<Request, Identity>;
  onError: ApiKeyErrorHandler<Request, Response>;
  identities?: IdentityStore<Request, Identity>;
};

export type ApiKeyNext = () => void | Promise<void>;

export type ApiKeyMiddleware<Request, Response, Identity> = ((
  req: Request,
  res: Response,
  next: ApiKeyNext
) => Promise<void>) & {
  getIdentity: (req: Request) => Identity | undefined;
};

type AuthenticationResult<Identity> = {ok: true; value: Identity} | {ok: false; error: ApiKeyAuthError};

const UNAUTHORIZED = 401;

const providerSchema = z
  .string()
  .min(1)
  .regex(/^\S+$/u, 'provider must not contain whitespace');

export const createIdentityStore = <Request extends object, Identity>(): IdentityStore<Request, Identity> => {
  const identities = new WeakMap<Request, Identity>();
  return {
    set: ({req, identity}) => {
      identities.set(req, identity);
    },
    get: req => identities.get(req)
  };
};

const findIdentity = async <Request, Identity>({
  finder,
  key,
  req
}: {
  finder: ApiKeyFinder<Request, Identity>;
  key: string;
  req: Request;
}): Promise<FinderResult<Identity>> => {
  try {
    return await finder({key, req});
  } catch (error) {
    return {ok: false, error: toError(error)};
  }
};

const createAuthenticator = <Request extends ApiKeyRequest, Identity>({
  provider,
  finder
}: {
  provider: string;
  finder: ApiKeyFinder<Request, Identity>;
}) => {
  const expectedProvider = providerSchema.parse(provider);

  return async (req: Request): Promise<AuthenticationResult<Identity>> => {
    const header = req.headers.authorization;
    if (header === undefined) {
      return {ok: false, error: {code: 'no_header'}};
    }

    const parts = header.split(' ');
    if (parts.length !== 2) {
      return {ok: false, error: {code: 'invalid_format', format: API_KEY_HEADER_FORMAT, header}};
    }

    const [candidate, key] = parts;
    if (candidate !== expectedProvider) {
      return {ok: false, error: {code: 'bad_provider', provider: candidate, expected: expectedProvider}};
    }

    const found = await findIdentity({finder, key, req});
    if (!found.ok) {
      return {ok: false, error: {code: 'invalid_key', key, cause: found.error}};
    }

    return found;
  };
};

/**
 * Connect-style middleware checking `Authorization: <provider> <apiKey>`. Every failure is
 * handed to `onError` with status 401; on success the identity is stored and `next` runs.
 */
export const createApiKeyMiddleware = <Request extends ApiKeyRequest, Response, Identity>({
  provider,
  finder,
  onError,
  identities = createIdentityStore<Request, Identity>()
}: ApiKeyMiddlewareDeps<Request, Response, Identity>): ApiKeyMiddleware<Request, Response, Identity> => {
  const authenticate = createAuthenticator({provider, finder});

  const middleware = async (req: Request, res: Response, next: ApiKeyNext) => {
    const result = await authenticate(req);
    if (!result.ok) {
      onError({req, res, error: result.error, statusCode: UNAUTHORIZED});
      return;
    }

    identities.set({req, identity: result.value});
    await next();
  };

  return Object.assign(middleware, {getIdentity: identities.get});
};

export const withApiKeyAuth = <Request extends ApiKeyRequest, Response, Identity>(
  deps: ApiKeyMiddlewareDeps<Request, Response, Identity>,
  handler: (req: Request, res: Response, identity: Identity) => void | Promise<void>
) => {
  const {onError, identities} = deps;
  const authenticate = createAuthenticator(deps);

  return async (req: Request, res: Response) => {
    const result = await authenticate(req);
    if (!result.ok) {
      onError({req, res, error: result.error, statusCode: UNAUTHORIZED});
      return;
    }

    identities?.set({req, identity: result.value});
    await handler(req, res, result.value);
  };
};

export type TextResponse = {
  writeHead(statusCode: number, headers?: Record<string, string>): unknown;
  end(chunk?: string): unknown;
};

/** Writes the status and a plain-text description of the failure. */
export const createTextErrorHandler =
  <Request, Response extends TextResponse>(): ApiKeyErrorHandler<Request, Response> =>
  ({res, error, statusCode}) => {
    res.writeHead(statusCode, {'content-type': 'text/plain; charset=utf-8'});
    res.end(describeApiKeyAuthError(error));
  };

export const createMapFinder =
  <Request, Identity>(keys: ReadonlyMap<string, Identity>): ApiKeyFinder<Request, Identity> =>
  ({key}) => {
    const identity = keys.get(key);
    if (identity === undefined) {
      return {ok: false, error: new Error('No identity found for key')};
    }

    return {ok: true, value: identity};
  };

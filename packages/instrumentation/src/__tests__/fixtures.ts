import type {OutgoingHttpHeader, OutgoingHttpHeaders} from 'node:http';

import type {RequestLogEvent} from '../dispatcher';
import {
  CapturingResponseWriter,
  type EndCallback,
  type HeaderValue,
  type ResponseChunk,
  type ResponseWriter,
  type WriteCallback
} from '../responseCapture';
import {parseRequestTarget, path, uri, type RequestLike} from '../uri';

export const createRequest = (overrides: Partial<RequestLike> = {}): RequestLike => ({
  method: 'GET',
  url: '/',
  httpVersion: '1.1',
  httpVersionMajor: 1,
  headers: {host: 'example.com'},
  ...overrides
});

export type RecordedCall =
  | {kind: 'setHeader'; name: string; value: HeaderValue}
  | {kind: 'writeHead'; statusCode: number; headers?: OutgoingHttpHeaders | OutgoingHttpHeader[]}
  | {kind: 'flushHeaders'}
  | {kind: 'write'; chunk: ResponseChunk; encoding?: BufferEncoding}
  | {kind: 'end'; chunk?: ResponseChunk; encoding?: BufferEncoding};

export const createRecordingResponse = () => {
  const calls: RecordedCall[] = [];
  const headers = new Map<string, number | string | string[]>();

  const write = (chunk: ResponseChunk, encodingOrCallback?: BufferEncoding | WriteCallback, callback?: WriteCallback) => {
    if (typeof encodingOrCallback === 'string') {
      calls.push({kind: 'write', chunk, encoding: encodingOrCallback});
      callback?.(null);
    } else {
      calls.push({kind: 'write', chunk});
      encodingOrCallback?.(null);
    }
    return true;
  };

  const end = (
    chunkOrCallback?: ResponseChunk | EndCallback,
    encodingOrCallback?: BufferEncoding | EndCallback,
    callback?: EndCallback
  ) => {
    if (chunkOrCallback === undefined || typeof chunkOrCallback === 'function') {
      calls.push({kind: 'end'});
      chunkOrCallback?.();
    } else if (typeof encodingOrCallback === 'string') {
      calls.push({kind: 'end', chunk: chunkOrCallback, encoding: encodingOrCallback});
      callback?.();
    } else {
      calls.push({kind: 'end', chunk: chunkOrCallback});
      encodingOrCallback?.();
    }
  };

  const response: ResponseWriter = {
    statusCode: 200,
    setHeader: (name, value) => {
      calls.push({kind: 'setHeader', name, value});
      headers.set(name.toLowerCase(), typeof value === 'object' ? [...value] : value);
    },
    getHeader: name => headers.get(name.toLowerCase()),
    writeHead: (statusCode, outgoing) => {
      calls.push(
        outgoing === undefined ? {kind: 'writeHead', statusCode} : {kind: 'writeHead', statusCode, headers: outgoing}
      );
    },
    flushHeaders: () => {
      calls.push({kind: 'flushHeaders'});
    },
    write,
    end
  };

  return {calls, response};
};

export const createEvent = ({
  request = createRequest(),
  status = 200,
  size = 0,
  durationNs = 0n,
  startedAt = new Date('2026-03-04T05:06:07.890Z')
}: {
  request?: RequestLike;
  status?: number;
  size?: number;
  durationNs?: bigint;
  startedAt?: Date;
} = {}): RequestLogEvent => {
  const target = parseRequestTarget(request);
  return {
    request,
    response: new CapturingResponseWriter(createRecordingResponse().response),
    target,
    uri: uri(request, target),
    path: path(request, target),
    startedAt,
    durationNs,
    status,
    size
  };
};

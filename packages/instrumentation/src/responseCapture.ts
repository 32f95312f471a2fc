import type {OutgoingHttpHeader, OutgoingHttpHeaders} from 'node:http';

export type ResponseChunk = string | Uint8Array;

export type HeaderValue = number | string | readonly string[];

export type WriteCallback = (error: Error | null | undefined) => void;

export type EndCallback = () => void;

/** The subset of `ServerResponse` a handler may use on an instrumented response. */
export type ResponseWriter = {
  statusCode: number;
  setHeader(name: string, value: HeaderValue): unknown;
  getHeader(name: string): number | string | string[] | undefined;
  writeHead(statusCode: number, headers?: OutgoingHttpHeaders | OutgoingHttpHeader[]): unknown;
  flushHeaders(): void;
  write(chunk: ResponseChunk, callback?: WriteCallback): boolean;
  write(chunk: ResponseChunk, encoding: BufferEncoding, callback?: WriteCallback): boolean;
  end(callback?: EndCallback): unknown;
  end(chunk: ResponseChunk, callback?: EndCallback): unknown;
  end(chunk: ResponseChunk, encoding: BufferEncoding, callback?: EndCallback): unknown;
};

const DEFAULT_STATUS = 200;

const chunkByteLength = (chunk: ResponseChunk, encoding?: BufferEncoding) =>
  typeof chunk === 'string' ? Buffer.byteLength(chunk, encoding ?? 'utf8') : chunk.byteLength;

/**
 * Decorates a response writer, recording the status code and the number of body bytes
 * written while forwarding every call unchanged.
 *
 * The status is fixed by the first `writeHead`, `flushHeaders` or body write. Until then an
 * assignment to `statusCode` is the pending status, as it is on `ServerResponse`.
 */
export class CapturingResponseWriter implements ResponseWriter {
  private readonly inner: ResponseWriter;
  private capturedStatus: number | undefined;
  private pendingStatus: number | undefined;
  private capturedSize = 0;

  public constructor(inner: ResponseWriter) {
    this.inner = inner;
  }

  public get status() {
    return this.capturedStatus ?? this.pendingStatus ?? DEFAULT_STATUS;
  }

  public get size() {
    return this.capturedSize;
  }

  public get statusWritten() {
    return this.capturedStatus !== undefined;
  }

  public get statusCode() {
    return this.inner.statusCode;
  }

  public set statusCode(value: number) {
    this.inner.statusCode = value;
    if (this.capturedStatus === undefined) {
      this.pendingStatus = value;
    }
  }

  public setHeader(name: string, value: HeaderValue) {
    this.inner.setHeader(name, value);
    return this;
  }

  public getHeader(name: string) {
    return this.inner.getHeader(name);
  }

  public writeHead(statusCode: number, headers?: OutgoingHttpHeaders | OutgoingHttpHeader[]) {
    this.inner.writeHead(statusCode, headers);
    if (this.capturedStatus === undefined) {
      this.capturedStatus = statusCode;
    }
    return this;
  }

  public flushHeaders() {
    this.inner.flushHeaders();
    this.fixStatus();
  }

  public write(chunk: ResponseChunk, callback?: WriteCallback): boolean;
  public write(chunk: ResponseChunk, encoding: BufferEncoding, callback?: WriteCallback): boolean;
  public write(chunk: ResponseChunk, encodingOrCallback?: BufferEncoding | WriteCallback, callback?: WriteCallback) {
    let accepted: boolean;
    let encoding: BufferEncoding | undefined;
    if (typeof encodingOrCallback === 'string') {
      encoding = encodingOrCallback;
      accepted = this.inner.write(chunk, encodingOrCallback, callback);
    } else {
      accepted = this.inner.write(chunk, encodingOrCallback);
    }

    this.recordBody(chunk, encoding);
    return accepted;
  }

  public end(callback?: EndCallback): this;
  public end(chunk: ResponseChunk, callback?: EndCallback): this;
  public end(chunk: ResponseChunk, encoding: BufferEncoding, callback?: EndCallback): this;
  public end(
    chunkOrCallback?: ResponseChunk | EndCallback,
    encodingOrCallback?: BufferEncoding | EndCallback,
    callback?: EndCallback
  ) {
    if (chunkOrCallback === undefined || typeof chunkOrCallback === 'function') {
      this.inner.end(chunkOrCallback);
      this.fixStatus();
      return this;
    }

    if (typeof encodingOrCallback === 'string') {
      this.inner.end(chunkOrCallback, encodingOrCallback, callback);
      this.recordBody(chunkOrCallback, encodingOrCallback);
    } else {
      this.inner.end(chunkOrCallback, encodingOrCallback);
      this.recordBody(chunkOrCallback);
    }

    return this;
  }

  private fixStatus() {
    if (this.capturedStatus === undefined) {
      this.capturedStatus = this.pendingStatus ?? DEFAULT_STATUS;
    }
  }

  private recordBody(chunk: ResponseChunk, encoding?: BufferEncoding) {
    this.fixStatus();
    this.capturedSize += chunkByteLength(chunk, encoding);
  }
}

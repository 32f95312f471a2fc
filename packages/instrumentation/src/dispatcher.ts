import type {IncomingMessage} from 'node:http';

import {createNoopLogger, type StructuredLogger} from '@service-middleware/logging';

import {CapturingResponseWriter, type ResponseWriter} from './responseCapture';
import {parseRequestTarget, path, uri, type RequestLike, type RequestTarget} from './uri';

export type Handler<Req extends RequestLike = IncomingMessage> = (
  req: Req,
  res: ResponseWriter
) => void | Promise<void>;

export type RequestLogEvent = {
  request: RequestLike;
  response: CapturingResponseWriter;
  target: RequestTarget;
  uri: string;
  path: string;
  startedAt: Date;
  durationNs: bigint;
  status: number;
  size: number;
};

export type LogSink = {
  write: (event: RequestLogEvent) => void;
};

export type Clock = {
  now: () => Date;
  monotonicNs: () => bigint;
};

const systemClock: Clock = {
  now: () => new Date(),
  monotonicNs: () => process.hrtime.bigint()
};

const emitToSinks = ({
  sinks,
  event,
  logger
}: {
  sinks: LogSink[];
  event: RequestLogEvent;
  logger: StructuredLogger;
}) => {
  sinks.forEach((sink, index) => {
    try {
      sink.write(event);
    } catch (error) {
      logger.warn('request log sink failed', {sink_index: index, cause: error});
    }
  });
};

export const combineSinks = (...sinks: LogSink[]): LogSink => ({
  write: event => {
    for (const sink of sinks) {
      sink.write(event);
    }
  }
});

export const createInstrumentedHandler = <Req extends RequestLike = IncomingMessage>({
  handler,
  sinks,
  logger = createNoopLogger(),
  clock = systemClock
}: {
  handler: Handler<Req>;
  sinks: LogSink[];
  logger?: StructuredLogger;
  clock?: Clock;
}): Handler<Req> => {
  return async (req, res) => {
    const startedAt = clock.now();
    const startedNs = clock.monotonicNs();
    const target = parseRequestTarget(req);
    const normalizedUri = uri(req, target);
    const normalizedPath = path(req, target);
    const response = new CapturingResponseWriter(res);

    try {
      await handler(req, response);
    } finally {
      emitToSinks({
        sinks,
        logger,
        event: {
          request: req,
          response,
          target,
          uri: normalizedUri,
          path: normalizedPath,
          startedAt,
          durationNs: clock.monotonicNs() - startedNs,
          status: response.status,
          size: response.size
        }
      });
    }
  };
};

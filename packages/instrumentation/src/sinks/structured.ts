import type {LogFields, StructuredLogger} from '@service-middleware/logging';

import type {LogSink, RequestLogEvent} from '../dispatcher';
import {getUserIp, headerValue, protocol, requestHost} from '../uri';

const NANOSECONDS_PER_SECOND = 1e9;

export const DEFAULT_REQUEST_LOG_CONTEXT: LogFields = {module: 'request.handler'};

export const durationSeconds = (durationNs: bigint) => Number(durationNs) / NANOSECONDS_PER_SECOND;

export const buildRequestLogFields = (event: RequestLogEvent): LogFields => {
  const {request} = event;
  const userIp = getUserIp(request);

  return {
    tag: 'request_handled',
    'http.method': request.method ?? '',
    'http.protocol': protocol(request),
    'http.uri': event.uri,
    'http.path': event.path,
    'http.host': requestHost(request),
    'http.status': event.status,
    'http.bytes': event.size,
    dur: durationSeconds(event.durationNs),
    ts: event.startedAt.toISOString(),
    'http.ref': headerValue(request, 'referer'),
    'http.user': headerValue(request, 'x-forwarded-for'),
    ...(userIp ? {'http.remote': userIp} : {})
  };
};

export const createStructuredLogSink = ({
  logger,
  context = DEFAULT_REQUEST_LOG_CONTEXT
}: {
  logger: StructuredLogger;
  context?: LogFields;
}): LogSink => ({
  write: event => {
    const {method = ''} = event.request;
    logger.info(`${method} ${event.uri} ${protocol(event.request)}`, {
      ...context,
      ...buildRequestLogFields(event)
    });
  }
});

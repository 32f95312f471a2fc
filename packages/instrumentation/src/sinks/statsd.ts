import {createNoopLogger, type StructuredLogger} from '@service-middleware/logging';
import type {MetricLine, MetricsTransport} from '@service-middleware/metrics';

import type {LogSink, RequestLogEvent} from '../dispatcher';

const NANOSECONDS_PER_MILLISECOND = 1e6;

export const RESPONSE_TIME_METRIC = 'request.response_time';
export const REQUEST_COUNT_METRIC = 'request.count';

export const durationMilliseconds = (durationNs: bigint) => (Number(durationNs) / NANOSECONDS_PER_MILLISECOND).toFixed(6);

// Characters that delimit tags or fields in a DogStatsD line.
const TAG_DELIMITERS = /[,|#\s]/gu;

export const sanitizeTagValue = (value: string) => value.replace(TAG_DELIMITERS, '_');

export const buildRequestMetricLines = (event: RequestLogEvent): [MetricLine, MetricLine] => {
  // Tagged by path only; the query string never reaches a tag.
  const tags = [
    `endpoint:${sanitizeTagValue(event.path)}`,
    `statusCode:${event.status}`,
    `method:${sanitizeTagValue(event.request.method ?? '')}`
  ];

  return [
    {name: RESPONSE_TIME_METRIC, value: durationMilliseconds(event.durationNs), type: 'ms', tags},
    {name: REQUEST_COUNT_METRIC, value: '1', type: 'c', tags: [...tags]}
  ];
};

export const createStatsdLogSink = ({
  transport,
  logger = createNoopLogger()
}: {
  transport: MetricsTransport;
  logger?: StructuredLogger;
}): LogSink => ({
  write: event => {
    for (const line of buildRequestMetricLines(event)) {
      try {
        transport.send(line);
      } catch (error) {
        logger.warn('statsd metric dropped', {metric: line.name, cause: error});
      }
    }
  }
});

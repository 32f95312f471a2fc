import type {StructuredLogger} from '@service-middleware/logging';
import {createDatagramTransport, type MetricsTransport} from '@service-middleware/metrics';

import type {TelemetryConfig} from './config';
import type {LogSink} from './dispatcher';
import {createHealthdFileWriter, createHealthdLogSink, type HealthdLineWriter} from './sinks/healthd';
import {createStatsdLogSink} from './sinks/statsd';
import {createStructuredLogSink} from './sinks/structured';

export type TelemetrySinks = {
  sinks: LogSink[];
  close: () => Promise<void>;
};

export const createTelemetrySinks = ({
  config,
  logger,
  transport,
  healthdWriter
}: {
  config: TelemetryConfig;
  logger: StructuredLogger;
  transport?: MetricsTransport;
  healthdWriter?: HealthdLineWriter;
}): TelemetrySinks => {
  const sinks: LogSink[] = [createStructuredLogSink({logger})];
  const closers: Array<() => void | Promise<void>> = [];

  if (config.statsd.enabled) {
    let statsdTransport = transport;
    if (!statsdTransport) {
      const datagramTransport = createDatagramTransport({
        host: config.statsd.host,
        port: config.statsd.port,
        namespace: config.statsd.namespace,
        tags: config.statsd.tags,
        logger
      });
      closers.push(datagramTransport.close);
      statsdTransport = datagramTransport;
    }

    sinks.push(createStatsdLogSink({transport: statsdTransport, logger}));
  }

  if (config.healthd.enabled) {
    let writer = healthdWriter;
    if (!writer) {
      const fileWriter = createHealthdFileWriter({directory: config.healthd.logDir, logger});
      closers.push(fileWriter.close);
      writer = fileWriter;
    }

    sinks.push(createHealthdLogSink({writer}));
  }

  return {
    sinks,
    close: async () => {
      await Promise.all(closers.map(close => close()));
    }
  };
};

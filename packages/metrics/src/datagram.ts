import {createSocket} from 'node:dgram';

import {createNoopLogger, type StructuredLogger} from '@service-middleware/logging';
import {z} from 'zod';

import {formatMetricLine, type MetricLine, type MetricsTransport} from './line';

export type DatagramSocket = {
  send(message: string, port: number, address: string, callback: (error: Error | null) => void): void;
  close(): void;
};

export type DatagramTransportOptions = {
  host: string;
  port: number;
  namespace?: string;
  tags?: string[];
  logger?: StructuredLogger;
  socket?: DatagramSocket;
};

export type DatagramTransport = MetricsTransport & {
  close: () => void;
};

const DatagramTransportOptionsSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().positive().lte(65535),
  namespace: z.string().default(''),
  tags: z.array(z.string().min(1).regex(/^[^,|#\s]+$/u)).default([])
});

const createUnrefSocket = (): DatagramSocket => {
  const socket = createSocket('udp4');
  socket.unref();
  return socket;
};

export const createDatagramTransport = (options: DatagramTransportOptions): DatagramTransport => {
  const {host, port, namespace, tags} = DatagramTransportOptionsSchema.parse({
    host: options.host,
    port: options.port,
    namespace: options.namespace,
    tags: options.tags
  });
  const logger = options.logger ?? createNoopLogger();
  const socket = options.socket ?? createUnrefSocket();

  const send = (line: MetricLine) => {
    const message = formatMetricLine({namespace, staticTags: tags, line});
    try {
      socket.send(message, port, host, error => {
        if (error) {
          logger.warn('statsd datagram send failed', {metric: line.name, cause: error});
        }
      });
    } catch (error) {
      logger.warn('statsd datagram send failed', {metric: line.name, cause: error});
    }
  };

  return {
    send,
    close: () => socket.close()
  };
};

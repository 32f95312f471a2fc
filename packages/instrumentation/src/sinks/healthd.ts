import {createWriteStream, mkdirSync} from 'node:fs';
import {join} from 'node:path';
import type {Writable} from 'node:stream';

import {createNoopLogger, type StructuredLogger} from '@service-middleware/logging';

import type {LogSink, RequestLogEvent} from '../dispatcher';
import {headerValue} from '../uri';
import {durationSeconds} from './structured';

export const DEFAULT_HEALTHD_LOG_DIR = '/var/log/nginx/healthd';

export type HealthdLineWriter = {
  write: (line: string) => void;
};

const pad = (value: number) => String(value).padStart(2, '0');

/**
 * Elastic Beanstalk enhanced health format, fields separated by `"`:
 * `$msec"$uri"$status"$request_time"$upstream_response_time"$http_x_forwarded_for`.
 */
export const formatHealthdLine = (event: RequestLogEvent) => {
  const msec = (event.startedAt.getTime() / 1000).toFixed(3);
  const elapsed = durationSeconds(event.durationNs).toFixed(3);
  const forwardedFor = headerValue(event.request, 'x-forwarded-for');

  return `${[msec, event.path, String(event.status), elapsed, elapsed, forwardedFor].join('"')}\n`;
};

export const healthdLogFileName = (date: Date) =>
  `application.log.${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}-${pad(
    date.getUTCHours()
  )}`;

export const createHealthdLogSink = ({writer}: {writer: HealthdLineWriter}): LogSink => ({
  write: event => writer.write(formatHealthdLine(event))
});

export type HealthdFileWriter = HealthdLineWriter & {
  close: () => Promise<void>;
  /** Rotated-out streams still flushing. */
  pendingCloses: () => number;
};

const appendStream = (filePath: string): Writable => createWriteStream(filePath, {flags: 'a'});

export const createHealthdFileWriter = ({
  directory = DEFAULT_HEALTHD_LOG_DIR,
  now = () => new Date(),
  logger = createNoopLogger(),
  createStream = appendStream
}: {
  directory?: string;
  now?: () => Date;
  logger?: StructuredLogger;
  createStream?: (filePath: string) => Writable;
} = {}): HealthdFileWriter => {
  let current: {fileName: string; stream: Writable} | undefined;
  const closing = new Set<Promise<void>>();

  const endStream = (stream: Writable) => {
    if (stream.destroyed) {
      return;
    }

    const ended: Promise<void> = new Promise(resolve => {
      stream.end(() => {
        closing.delete(ended);
        resolve();
      });
    });
    closing.add(ended);
  };

  const open = (fileName: string) => {
    mkdirSync(directory, {recursive: true});
    const stream = createStream(join(directory, fileName));
    stream.on('error', error => {
      logger.warn('healthd log write failed', {file: fileName, cause: error});
    });
    return {fileName, stream};
  };

  return {
    write: line => {
      const fileName = healthdLogFileName(now());
      try {
        let target = current;
        // A stream that failed is destroyed; the next line reopens the file.
        if (!target || target.fileName !== fileName || target.stream.destroyed) {
          if (current) {
            endStream(current.stream);
          }
          target = open(fileName);
          current = target;
        }

        target.stream.write(line);
      } catch (error) {
        logger.warn('healthd log write failed', {file: fileName, cause: error});
      }
    },
    close: async () => {
      if (current) {
        endStream(current.stream);
        current = undefined;
      }

      await Promise.all([...closing]);
    },
    pendingCloses: () => closing.size
  };
};

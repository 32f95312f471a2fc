import {LogLevelSchema, type LogLevel} from '@service-middleware/logging';
import {z} from 'zod';

import {DEFAULT_HEALTHD_LOG_DIR} from './sinks/healthd';

const portFromEnv = z.preprocess(value => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? value : parsed;
}, z.number().int().positive().lte(65535));

const booleanFromEnv = z.preprocess(value => {
  if (typeof value !== 'string') {
    return value;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') {
    return true;
  }
  if (normalized === 'false' || normalized === '0') {
    return false;
  }

  return value;
}, z.boolean());

const optionalString = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}, z.string().optional());

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    SERVICE_NAME: z.string().trim().min(1).default('service'),
    LOG_LEVEL: LogLevelSchema.default('info'),
    STATSD_ENABLED: booleanFromEnv.default(false),
    STATSD_HOST: z.string().trim().min(1).default('127.0.0.1'),
    STATSD_PORT: portFromEnv.default(8125),
    STATSD_NAMESPACE: optionalString,
    STATSD_TAGS: optionalString,
    HEALTHD_ENABLED: booleanFromEnv.default(false),
    HEALTHD_LOG_DIR: optionalString
  })
  .strict();

export type TelemetryConfig = {
  nodeEnv: 'development' | 'test' | 'production';
  serviceName: string;
  logLevel: LogLevel;
  statsd: {
    enabled: boolean;
    host: string;
    port: number;
    namespace: string;
    tags: string[];
  };
  healthd: {
    enabled: boolean;
    logDir: string;
  };
};

const toEnvInput = (env: NodeJS.ProcessEnv) => ({
  NODE_ENV: env.NODE_ENV,
  SERVICE_NAME: env.SERVICE_NAME,
  LOG_LEVEL: env.LOG_LEVEL,
  STATSD_ENABLED: env.STATSD_ENABLED,
  STATSD_HOST: env.STATSD_HOST,
  STATSD_PORT: env.STATSD_PORT,
  STATSD_NAMESPACE: env.STATSD_NAMESPACE,
  STATSD_TAGS: env.STATSD_TAGS,
  HEALTHD_ENABLED: env.HEALTHD_ENABLED,
  HEALTHD_LOG_DIR: env.HEALTHD_LOG_DIR
});

const parseTags = (raw: string | undefined) =>
  (raw ?? '')
    .split(',')
    .map(tag => tag.trim())
    .filter(tag => tag.length > 0);

export const loadTelemetryConfig = (env: NodeJS.ProcessEnv = process.env): TelemetryConfig => {
  const result = envSchema.safeParse(toEnvInput(env));
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid telemetry configuration: ${issues}`);
  }

  const parsed = result.data;
  return {
    nodeEnv: parsed.NODE_ENV,
    serviceName: parsed.SERVICE_NAME,
    logLevel: parsed.LOG_LEVEL,
    statsd: {
      enabled: parsed.STATSD_ENABLED,
      host: parsed.STATSD_HOST,
      port: parsed.STATSD_PORT,
      namespace: parsed.STATSD_NAMESPACE ?? '',
      tags: parseTags(parsed.STATSD_TAGS)
    },
    healthd: {
      enabled: parsed.HEALTHD_ENABLED,
      logDir: parsed.HEALTHD_LOG_DIR ?? DEFAULT_HEALTHD_LOG_DIR
    }
  };
};

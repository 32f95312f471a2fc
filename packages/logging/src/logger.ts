import type {Writable} from 'node:stream';

import {z} from 'zod';

import {sanitizeForLog} from './redaction';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const EmittableLogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);
export type EmittableLogLevel = z.infer<typeof EmittableLogLevelSchema>;

export type LogFields = Record<string, unknown>;

export const LogRecordInputSchema = z
  .object({
    level: EmittableLogLevelSchema,
    message: z.string(),
    fields: z.record(z.string(), z.unknown()).default({})
  })
  .strict();

export type LogRecordInput = z.input<typeof LogRecordInputSchema>;

const toLevelOrder = (level: LogLevel) => {
  switch (level) {
    case 'debug':
      return 10;
    case 'info':
      return 20;
    case 'warn':
      return 30;
    case 'error':
      return 40;
    case 'fatal':
      return 50;
    case 'silent':
      return 90;
  }
};

export type LogStream = Pick<Writable, 'write'>;

export type StructuredLogWriter = {
  stdout: LogStream;
  stderr: LogStream;
};

export type StructuredLoggerOptions = {
  service: string;
  env: string;
  level: LogLevel;
  now?: () => Date;
  writer?: StructuredLogWriter;
  extraSensitiveKeys?: string[];
};

type LevelMethod = (message: string, fields?: LogFields) => void;

export type StructuredLogger = {
  log: (input: LogRecordInput) => void;
  debug: LevelMethod;
  info: LevelMethod;
  warn: LevelMethod;
  error: LevelMethod;
  fatal: LevelMethod;
};

const defaultWriter: StructuredLogWriter = {
  stdout: process.stdout,
  stderr: process.stderr
};

const shouldEmit = ({configuredLevel, eventLevel}: {configuredLevel: LogLevel; eventLevel: EmittableLogLevel}) =>
  toLevelOrder(eventLevel) >= toLevelOrder(configuredLevel);

const chooseStream = ({
  level,
  writer
}: {
  level: EmittableLogLevel;
  writer: StructuredLogWriter;
}) => (level === 'error' || level === 'fatal' ? writer.stderr : writer.stdout);

const toSanitizedFields = (value: unknown): LogFields => {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return {};
  }

  return Object.fromEntries(Object.entries(value));
};

const createEnvelope = ({
  input,
  options
}: {
  input: z.output<typeof LogRecordInputSchema>;
  options: {service: string; env: string; now: () => Date; extraSensitiveKeys: string[]};
}) => {
  const sanitizedFields = toSanitizedFields(
    sanitizeForLog({
      value: input.fields,
      extraSensitiveKeys: options.extraSensitiveKeys
    })
  );

  return {
    ...sanitizedFields,
    time: options.now().toISOString(),
    level: input.level,
    service: options.service,
    env: options.env,
    msg: input.message
  };
};

export const createStructuredLogger = (options: StructuredLoggerOptions): StructuredLogger => {
  const parsedOptions = {
    level: LogLevelSchema.parse(options.level),
    service: z.string().min(1).parse(options.service),
    env: z.string().min(1).parse(options.env),
    now: options.now ?? (() => new Date()),
    writer: options.writer ?? defaultWriter,
    extraSensitiveKeys: options.extraSensitiveKeys ?? []
  };

  const log = (rawInput: LogRecordInput) => {
    const input = LogRecordInputSchema.parse(rawInput);
    if (!shouldEmit({configuredLevel: parsedOptions.level, eventLevel: input.level})) {
      return;
    }

    try {
      const envelope = createEnvelope({input, options: parsedOptions});
      chooseStream({level: input.level, writer: parsedOptions.writer}).write(`${JSON.stringify(envelope)}\n`);
    } catch {
      // Logging failures must never break request handling.
    }
  };

  return {
    log,
    debug: (message, fields = {}) => log({level: 'debug', message, fields}),
    info: (message, fields = {}) => log({level: 'info', message, fields}),
    warn: (message, fields = {}) => log({level: 'warn', message, fields}),
    error: (message, fields = {}) => log({level: 'error', message, fields}),
    fatal: (message, fields = {}) => log({level: 'fatal', message, fields})
  };
};

export const createNoopLogger = (): StructuredLogger => ({
  log: () => undefined,
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  fatal: () => undefined
});

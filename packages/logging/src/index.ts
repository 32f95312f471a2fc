export {
  createNoopLogger,
  createStructuredLogger,
  LogLevelSchema,
  LogRecordInputSchema,
  type EmittableLogLevel,
  type LogFields,
  type LogLevel,
  type LogRecordInput,
  type LogStream,
  type StructuredLogger,
  type StructuredLoggerOptions,
  type StructuredLogWriter
} from './logger';
export {sanitizeForLog} from './redaction';

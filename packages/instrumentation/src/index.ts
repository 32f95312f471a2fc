export {loadTelemetryConfig, type TelemetryConfig} from './config';
export {
  combineSinks,
  createInstrumentedHandler,
  type Clock,
  type Handler,
  type LogSink,
  type RequestLogEvent
} from './dispatcher';
export {
  CapturingResponseWriter,
  type EndCallback,
  type HeaderValue,
  type ResponseChunk,
  type ResponseWriter,
  type WriteCallback
} from './responseCapture';
export {
  createHealthdFileWriter,
  createHealthdLogSink,
  DEFAULT_HEALTHD_LOG_DIR,
  formatHealthdLine,
  healthdLogFileName,
  type HealthdFileWriter,
  type HealthdLineWriter
} from './sinks/healthd';
export {
  buildRequestMetricLines,
  createStatsdLogSink,
  durationMilliseconds,
  REQUEST_COUNT_METRIC,
  RESPONSE_TIME_METRIC,
  sanitizeTagValue
} from './sinks/statsd';
export {
  buildRequestLogFields,
  createStructuredLogSink,
  DEFAULT_REQUEST_LOG_CONTEXT,
  durationSeconds
} from './sinks/structured';
export {createTelemetrySinks, type TelemetrySinks} from './telemetry';
export {
  getUserIp,
  headerValue,
  isProtocolUpgradeConnect,
  parseRequestTarget,
  path,
  protocol,
  requestHost,
  uri,
  type RequestLike,
  type RequestTarget
} from './uri';

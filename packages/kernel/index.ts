/**
 * Kernel Package
 * Logging, request context, metrics, redaction and cancellation primitives
 * shared by the router packages.
 */
// Request context
export {
  getRequestContext, runWithContext, runWithSubject, createRequestContext, getRequestId,
  type RequestContext,
} from './request-context';
// Structured logger
export {
  addLogHandler, clearLogHandlers, resetLogHandlers, Logger, getLogger, toError,
  type LogEntry, type LogHandler, type LogLevel, type LoggerOptions,
} from './logger';
// Metrics
export {
  emitMetric, emitTimer, emitCounter, addMetricHandler, clearMetricHandlers, resetMetricHandlers,
  type Metric, type MetricHandler,
} from './metrics';
// Timeouts and cancellation
export { withTimeout, createLinkedAbortController, type TimeoutOptions } from './timeout';
// Redaction engine
export {
  sanitizeForLogging, sanitizeErrorMessage, isSensitiveField, isSensitiveValue, maskValue,
  type SanitizedData, type SanitizeOptions,
} from './redaction';
// Redis
export { getRedis, closeRedis, type RedisConnectionOptions } from './redis';

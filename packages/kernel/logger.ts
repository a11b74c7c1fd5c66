import { getRequestContext } from './request-context';
import { sanitizeErrorMessage, sanitizeForLogging } from './redaction';

/**
* Structured Logger
*
* JSON-per-line logging with level filtering, pluggable handlers and
* correlation through the ambient request context.
*/

export { getRequestContext };

// ============================================================================
// Type Definitions
// ============================================================================

/** Available log levels */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
* Log entry structure
*/
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Component that produced the entry */
  service?: string | undefined;
  /** Request ID / Correlation ID */
  requestId?: string | undefined;
  traceId?: string | undefined;
  /** Routing subject of the current request */
  subjectId?: string | undefined;
  error?: Error | undefined;
  errorMessage?: string | undefined;
  errorStack?: string | undefined;
  metadata?: Record<string, unknown> | undefined;
}

export type LogHandler = (entry: LogEntry) => void;

export interface LoggerOptions {
  service: string;
  /** Correlation ID (overrides request context) */
  correlationId?: string | undefined;
  /** Additional context to include in every log */
  context?: Record<string, unknown> | undefined;
}

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

// ============================================================================
// Handler Registry
// ============================================================================

let handlers: LogHandler[] = [];

const getHandlers = (): readonly LogHandler[] => [...handlers];

/**
* Add a log handler
* @returns Function that removes the handler again
*/
export function addLogHandler(handler: LogHandler): () => void {
  handlers = [...handlers, handler];

  return () => {
    handlers = handlers.filter(h => h !== handler);
  };
}

/**
* Remove all log handlers, including the default console handler
*/
export function clearLogHandlers(): void {
  handlers = [];
}

/**
* Restore the default console handler as the only handler
*/
export function resetLogHandlers(): void {
  handlers = [consoleHandler];
}

// ============================================================================
// Log Level Configuration
// ============================================================================

function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some(level => level === value);
}

/**
* Configured log level from LOG_LEVEL.
* Defaults to 'info' in production, 'debug' elsewhere. Read on every call so
* tests and operators can change it without reloading modules.
*/
function getConfiguredLogLevel(): LogLevel {
  const envLevel = process.env['LOG_LEVEL']?.toLowerCase();
  if (isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env['NODE_ENV'] === 'production' ? 'info' : 'debug';
}

function shouldLog(level: LogLevel): boolean {
  return LEVELS.indexOf(level) >= LEVELS.indexOf(getConfiguredLogLevel());
}

function redactMetadata(metadata: Record<string, unknown>): Record<string, unknown> {
  const result = sanitizeForLogging(metadata);
  return (typeof result === 'object' && result !== null && !Array.isArray(result))
    ? result
    : { _redacted: result };
}

// ============================================================================
// Default Handler
// ============================================================================

/**
* Default console handler.
* Everything goes to stderr so that CLIs embedding the router keep stdout clean.
*/
function consoleHandler(entry: LogEntry): void {
  const { level, message, service, requestId, traceId, subjectId, errorMessage, errorStack, metadata } = entry;

  const logOutput: Record<string, unknown> = {
    timestamp: entry.timestamp,
    level: level.toUpperCase(),
    message,
  };

  if (service) logOutput['service'] = service;
  if (requestId) logOutput['correlationId'] = requestId;
  if (traceId) logOutput['traceId'] = traceId;
  if (subjectId) logOutput['subjectId'] = subjectId;
  if (errorMessage) logOutput['error'] = sanitizeErrorMessage(errorMessage);
  if (errorStack && getConfiguredLogLevel() === 'debug') logOutput['stack'] = errorStack;
  if (metadata && Object.keys(metadata).length > 0) {
    logOutput['metadata'] = redactMetadata(metadata);
  }

  console.error(JSON.stringify(logOutput));
}

handlers = [consoleHandler];

function dispatch(entry: LogEntry): void {
  for (const handler of getHandlers()) {
    try {
      handler(entry);
    } catch (handlerError) {
      // A broken handler must not take logging down for the others
      console.error('Log handler failed', handlerError);
    }
  }
}

// ============================================================================
// Logger Class
// ============================================================================

/**
* Logger instance with bound component name and context
*/
export class Logger {
  private readonly context: Record<string, unknown>;

  constructor(
    private readonly service: string,
    private readonly correlationId?: string,
    context?: Record<string, unknown>
  ) {
    this.context = context || {};
  }

  private createEntry(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    err?: Error
  ): LogEntry {
    const requestContext = getRequestContext();

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: `[${this.service}] ${message}`,
      service: this.service,
      metadata: { ...this.context, ...metadata },
    };

    const correlationId = this.correlationId || requestContext?.requestId;
    if (correlationId) entry.requestId = correlationId;
    if (requestContext?.traceId) entry.traceId = requestContext.traceId;
    if (requestContext?.subjectId) entry.subjectId = requestContext.subjectId;

    if (err) {
      entry.error = err;
      entry.errorMessage = err.message;
      entry.errorStack = err.stack;
    }

    return entry;
  }

  private log(level: LogLevel, message: string, metadata?: Record<string, unknown>, err?: Error): void {
    if (shouldLog(level)) {
      dispatch(this.createEntry(level, message, metadata, err));
    }
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log('warn', message, metadata);
  }

  error(message: string, err?: Error | undefined, metadata?: Record<string, unknown>): void {
    this.log('error', message, metadata, err);
  }

  fatal(message: string, err?: Error | undefined, metadata?: Record<string, unknown>): void {
    this.log('fatal', message, metadata, err);
  }

  /**
  * Create a child logger with additional context
  */
  child(additionalContext: Record<string, unknown>): Logger {
    return new Logger(this.service, this.correlationId, { ...this.context, ...additionalContext });
  }
}

/**
* Get logger for a component
*/
export function getLogger(serviceOrOptions: string | LoggerOptions): Logger {
  if (typeof serviceOrOptions === 'string') {
    return new Logger(serviceOrOptions);
  }
  return new Logger(serviceOrOptions.service, serviceOrOptions.correlationId, serviceOrOptions.context);
}

/**
* Normalize an unknown thrown value into an Error for logging
*/
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

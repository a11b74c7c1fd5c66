import { getLogger, toError } from './logger';

/**
* Metrics utilities for kernel package
*
* Backend-agnostic metric emission. Exporters (Prometheus, StatsD, OTel
* meters) register a handler; without one, metrics are logged at debug level.
*/

// ============================================================================
// Type Definitions
// ============================================================================

export interface Metric {
  name: string;
  /** Labels/tags; values are strings to match exporter conventions */
  labels?: Record<string, string>;
  value?: number;
  /** Timestamp in milliseconds */
  timestamp?: number;
}

/** Handlers may be async; rejections are logged, never propagated */
export type MetricHandler = (metric: Metric) => void | Promise<void>;

// ============================================================================
// Internal State
// ============================================================================

const MAX_HANDLERS = 10;

const logger = getLogger('metrics');

function structuredLoggerHandler(metric: Metric): void {
  logger.debug('Metric emitted', {
    metricName: metric.name,
    labels: metric.labels,
    value: metric.value,
  });
}

let handlers: MetricHandler[] = [structuredLoggerHandler];

// ============================================================================
// Handler Management
// ============================================================================

/**
 * Add a metric handler.
 * @returns `false` when the handler cap was reached and the handler was dropped
 */
export function addMetricHandler(handler: MetricHandler): boolean {
  if (handlers.length >= MAX_HANDLERS) {
    logger.error('Cannot add metric handler: maximum limit reached', new Error(`Max handlers (${MAX_HANDLERS}) exceeded`));
    return false;
  }
  handlers = [...handlers, handler];
  return true;
}

/**
* Remove all metric handlers, including the default logging handler
*/
export function clearMetricHandlers(): void {
  handlers = [];
}

/**
* Restore the default logging handler as the only handler
*/
export function resetMetricHandlers(): void {
  handlers = [structuredLoggerHandler];
}

// ============================================================================
// Metric Emission
// ============================================================================

export function emitMetric(metric: Metric): void {
  const stamped: Metric = {
    ...metric,
    timestamp: metric.timestamp ?? Date.now(),
  };

  for (const handler of handlers) {
    try {
      const result = handler(stamped);
      if (result instanceof Promise) {
        result.catch((error: unknown) => {
          logger.error('Async metric handler failed', toError(error), { metricName: stamped.name });
        });
      }
    } catch (error) {
      logger.error('Metric handler failed', toError(error), { metricName: stamped.name });
    }
  }
}

/**
* Emit a duration metric, suffixed `_duration_ms`
*/
export function emitTimer(name: string, durationMs: number, labels?: Record<string, string>): void {
  emitMetric({
    name: `${name}_duration_ms`,
    value: durationMs,
    ...(labels != null ? { labels } : {}),
  });
}

/**
* Emit a counter increment, suffixed `_total`
*/
export function emitCounter(name: string, increment = 1, labels?: Record<string, string>): void {
  emitMetric({
    name: `${name}_total`,
    value: increment,
    ...(labels != null ? { labels } : {}),
  });
}

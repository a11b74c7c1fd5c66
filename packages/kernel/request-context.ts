import { randomUUID } from 'crypto';

import { AsyncLocalStorage } from 'async_hooks';
import { context as otelContext, trace } from '@opentelemetry/api';

/**
* Request Context Module
*
* Ambient per-request values that experiment dispatch reads without the caller
* threading them through every service method: the routing subject (for sticky
* assignment), free-form targeting attributes, the correlation ID used by the
* logger and an optional cancellation signal.
*/

export interface RequestContext {
  requestId: string;
  traceId?: string | undefined;
  spanId?: string | undefined;
  /** Stable subject identifier used for sticky routing (user, tenant, session) */
  subjectId?: string | undefined;
  /** Targeting attributes visible to activation predicates and custom selectors */
  attributes: Readonly<Record<string, unknown>>;
  /** Host cancellation signal, forwarded into every trial attempt */
  signal?: AbortSignal | undefined;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
* Get current request context
* @returns Current request context or undefined if not in a context
*/
export function getRequestContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
* Run function within a request context
* @returns Promise that resolves with the function result
*/
export function runWithContext<T>(context: RequestContext, fn: () => Promise<T>): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}

function activeOtelIds(): { traceId?: string; spanId?: string } {
  try {
    const activeSpan = trace.getSpan(otelContext.active());
    if (activeSpan) {
      const spanCtx = activeSpan.spanContext();
      if (spanCtx.traceId && spanCtx.traceId !== '00000000000000000000000000000000') {
        return { traceId: spanCtx.traceId, spanId: spanCtx.spanId };
      }
    }
  } catch {
    // OTel API present but no provider registered; fall back to random IDs
  }
  return {};
}

/**
* Generate new request context
* Bridges OTel trace context when available, falling back to random UUIDs.
*/
export function createRequestContext(options?: Partial<RequestContext>): RequestContext {
  const otel = activeOtelIds();

  return {
    requestId: options?.requestId || randomUUID(),
    traceId: options?.traceId || otel.traceId || randomUUID(),
    spanId: otel.spanId || randomUUID().slice(0, 16),
    subjectId: options?.subjectId,
    attributes: Object.freeze({ ...(options?.attributes ?? {}) }),
    signal: options?.signal,
  };
}

/**
* Run `fn` with a routing subject (and optional attributes) layered over the
* current context. Values not given are inherited from the enclosing context.
*/
export function runWithSubject<T>(
  subjectId: string,
  fn: () => Promise<T>,
  attributes?: Record<string, unknown>
): Promise<T> {
  const parent = getRequestContext();
  const context: RequestContext = parent
    ? {
        ...parent,
        subjectId,
        attributes: Object.freeze({ ...parent.attributes, ...(attributes ?? {}) }),
      }
    : createRequestContext({ subjectId, attributes: attributes ?? {} });
  return runWithContext(context, fn);
}

/**
* Get request ID from current context or generate new one
*/
export function getRequestId(): string {
  return getRequestContext()?.requestId || randomUUID();
}

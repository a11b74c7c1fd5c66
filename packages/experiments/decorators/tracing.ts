/**
 * Tracing decorator
 *
 * One OpenTelemetry span per attempt, parented to whatever span is active.
 * Without a registered SDK the API hands out no-op spans.
 */

import { trace, SpanKind, SpanStatusCode } from '@opentelemetry/api';

import type { InvocationContext } from '../types';
import type { Continuation, DecoratorFactory, ExperimentDecorator } from './types';

const TRACER_NAME = 'experiment-router';

export class TracingDecorator implements ExperimentDecorator {
  readonly name = 'tracing';

  async invoke<R>(context: InvocationContext, next: Continuation<R>): Promise<R> {
    const tracer = trace.getTracer(TRACER_NAME, '1.0.0');
    return tracer.startActiveSpan(
      `experiment.invoke ${context.service}.${context.methodName}`,
      {
        kind: SpanKind.INTERNAL,
        attributes: {
          'experiment.name': context.experiment,
          'experiment.service': context.service,
          'experiment.method': context.methodName,
          'experiment.trial': context.trialKey,
          'experiment.selected': context.selectedKey,
          'experiment.attempt': context.attempt,
          'experiment.fallback': context.isFallback,
        },
      },
      async span => {
        try {
          const result = await next();
          span.setStatus({ code: SpanStatusCode.OK });
          return result;
        } catch (error) {
          const err = error instanceof Error ? error : new Error(String(error));
          span.recordException(err);
          span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
          throw error;
        } finally {
          span.end();
        }
      }
    );
  }
}

export const tracingDecoratorFactory: DecoratorFactory = {
  name: 'tracing',
  create: () => new TracingDecorator(),
};

/**
 * Timeout decorator
 *
 * Bounds each attempt. On expiry the attempt's signal aborts and the attempt
 * fails with TrialTimeoutError, which the error policy treats like any other
 * trial failure.
 */

import { withTimeout } from '@kernel/timeout';
import { TrialTimeoutError } from '@errors';

import type { InvocationContext } from '../types';
import type { Continuation, DecoratorFactory, ExperimentDecorator } from './types';

export class TimeoutDecorator implements ExperimentDecorator {
  readonly name = 'timeout';

  constructor(private readonly timeoutMs: number) {
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new RangeError(`Trial timeout must be a positive number of milliseconds, got ${timeoutMs}`);
    }
  }

  invoke<R>(context: InvocationContext, next: Continuation<R>): Promise<R> {
    return withTimeout(
      signal => next(Object.freeze({ ...context, signal })),
      this.timeoutMs,
      {
        parentSignal: context.signal,
        onTimeout: ms => new TrialTimeoutError(context.service, context.trialKey, ms),
      }
    );
  }
}

export function timeoutDecoratorFactory(timeoutMs: number): DecoratorFactory {
  return {
    name: 'timeout',
    create: () => new TimeoutDecorator(timeoutMs),
  };
}

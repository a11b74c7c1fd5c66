/**
 * Benchmark decorator
 *
 * Times each attempt and reports it as a timer metric plus a debug log line.
 */

import { getLogger } from '@kernel/logger';
import { emitTimer } from '@kernel/metrics';

import type { InvocationContext } from '../types';
import type { Continuation, DecoratorFactory, ExperimentDecorator } from './types';

const logger = getLogger('ExperimentBenchmark');

export const benchmarkDecorator: ExperimentDecorator = {
  name: 'benchmark',
  async invoke<R>(context: InvocationContext, next: Continuation<R>): Promise<R> {
    const start = performance.now();
    let outcome = 'success';
    try {
      return await next();
    } catch (error) {
      outcome = 'failure';
      throw error;
    } finally {
      const elapsedMs = performance.now() - start;
      emitTimer('experiment_invocation', elapsedMs, {
        service: context.service,
        method: context.methodName,
        trial: context.trialKey,
        outcome,
      });
      logger.debug('Trial attempt timed', {
        experiment: context.experiment,
        method: context.methodName,
        trial: context.trialKey,
        attempt: context.attempt,
        elapsedMs: Math.round(elapsedMs * 100) / 100,
        outcome,
      });
    }
  },
};

export const benchmarkDecoratorFactory: DecoratorFactory = {
  name: 'benchmark',
  create: () => benchmarkDecorator,
};

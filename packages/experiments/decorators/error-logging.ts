/**
 * Error logging decorator
 *
 * Logs every failed attempt, including ones the error policy later recovers
 * from, then rethrows unchanged.
 */

import { getLogger, toError } from '@kernel/logger';
import { emitCounter } from '@kernel/metrics';

import type { InvocationContext } from '../types';
import type { Continuation, DecoratorFactory, ExperimentDecorator } from './types';

const logger = getLogger('ExperimentErrors');

export const errorLoggingDecorator: ExperimentDecorator = {
  name: 'error-logging',
  async invoke<R>(context: InvocationContext, next: Continuation<R>): Promise<R> {
    try {
      return await next();
    } catch (error) {
      logger.error('Trial attempt failed', toError(error), {
        experiment: context.experiment,
        service: context.service,
        method: context.methodName,
        trial: context.trialKey,
        selected: context.selectedKey,
        attempt: context.attempt,
        fallback: context.isFallback,
      });
      emitCounter('experiment_trial_failures', 1, {
        service: context.service,
        trial: context.trialKey,
      });
      throw error;
    }
  },
};

export const errorLoggingDecoratorFactory: DecoratorFactory = {
  name: 'error-logging',
  create: () => errorLoggingDecorator,
};

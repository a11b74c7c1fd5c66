/**
 * Built-in decorators
 */

import type { RouterSettings } from '@config';

import { benchmarkDecoratorFactory } from './benchmark';
import { errorLoggingDecoratorFactory } from './error-logging';
import { outcomeDecoratorFactory } from './outcome';
import { timeoutDecoratorFactory } from './timeout';
import { tracingDecoratorFactory } from './tracing';
import type { DecoratorFactory } from './types';

export { benchmarkDecorator, benchmarkDecoratorFactory } from './benchmark';
export { errorLoggingDecorator, errorLoggingDecoratorFactory } from './error-logging';
export { OutcomeDecorator, outcomeDecoratorFactory } from './outcome';
export { TimeoutDecorator, timeoutDecoratorFactory } from './timeout';
export { TracingDecorator, tracingDecoratorFactory } from './tracing';
export {
  composeDecorators,
  type Continuation,
  type DecoratorDependencies,
  type DecoratorFactory,
  type ExperimentDecorator,
} from './types';

/**
 * Factories for the built-ins enabled in `settings`, outermost first.
 * Timeout is always innermost.
 */
export function builtInDecoratorFactories(settings: RouterSettings): DecoratorFactory[] {
  const factories: DecoratorFactory[] = [];
  if (settings.decorators.tracing) factories.push(tracingDecoratorFactory);
  if (settings.decorators.benchmarks) factories.push(benchmarkDecoratorFactory);
  if (settings.decorators.errorLogging) factories.push(errorLoggingDecoratorFactory);
  if (settings.decorators.outcomes) factories.push(outcomeDecoratorFactory);
  if (settings.trialTimeoutMs > 0) factories.push(timeoutDecoratorFactory(settings.trialTimeoutMs));
  return factories;
}

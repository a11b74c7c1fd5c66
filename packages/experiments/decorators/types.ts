/**
 * Decorator pipeline
 *
 * Decorators wrap every individual trial attempt, fallbacks included, in
 * registration order: the first registered decorator is the outermost.
 */

import type { RouterSettings } from '@config';

import type { OutcomeRecorder } from '../outcomes';
import type { InvocationContext } from '../types';

/**
 * Continue the chain. Passing a context replaces the one seen by inner
 * decorators and the trial; only its `signal` reaches the trial instance.
 */
export type Continuation<R> = (context?: InvocationContext) => Promise<R>;

export interface ExperimentDecorator {
  readonly name: string;
  invoke<R>(context: InvocationContext, next: Continuation<R>): Promise<R>;
  /** Release held state; called once when the registry is disposed */
  dispose?(): void | Promise<void>;
}

export interface DecoratorDependencies {
  settings: RouterSettings;
  outcomes?: OutcomeRecorder | undefined;
}

/**
 * Creates a decorator once per registry build.
 */
export interface DecoratorFactory {
  readonly name: string;
  create(dependencies: DecoratorDependencies): ExperimentDecorator;
}

/**
 * Run `terminal` through `decorators`, outermost first
 */
export function composeDecorators<R>(
  decorators: readonly ExperimentDecorator[],
  context: InvocationContext,
  terminal: (context: InvocationContext) => Promise<R>
): Promise<R> {
  const run = (index: number, current: InvocationContext): Promise<R> => {
    const decorator = decorators[index];
    if (!decorator) {
      return terminal(current);
    }
    return decorator.invoke<R>(current, next => run(index + 1, next ?? current));
  };
  return run(0, context);
}

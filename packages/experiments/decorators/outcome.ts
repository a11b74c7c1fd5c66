/**
 * Outcome decorator
 *
 * Records one ExperimentOutcome per attempt through the OutcomeRecorder.
 */

import type { OutcomeRecorder } from '../outcomes';
import type { InvocationContext } from '../types';
import type { Continuation, DecoratorFactory, ExperimentDecorator } from './types';

export class OutcomeDecorator implements ExperimentDecorator {
  readonly name = 'outcome';

  constructor(private readonly recorder: OutcomeRecorder) {}

  async invoke<R>(context: InvocationContext, next: Continuation<R>): Promise<R> {
    const start = performance.now();
    try {
      const result = await next();
      this.report(context, start, true);
      return result;
    } catch (error) {
      this.report(context, start, false, error instanceof Error ? error.name : typeof error);
      throw error;
    }
  }

  dispose(): Promise<void> {
    return this.recorder.flush();
  }

  private report(context: InvocationContext, start: number, success: boolean, errorName?: string): void {
    this.recorder.record({
      experiment: context.experiment,
      service: context.service,
      methodName: context.methodName,
      trialKey: context.trialKey,
      selectedKey: context.selectedKey,
      success,
      durationMs: performance.now() - start,
      errorName,
      timestamp: new Date(),
    });
  }
}

/**
 * @throws Error at registry build when no recorder was supplied
 */
export const outcomeDecoratorFactory: DecoratorFactory = {
  name: 'outcome',
  create: ({ outcomes }) => {
    if (!outcomes) {
      throw new Error('Outcome decorator requires an OutcomeRecorder');
    }
    return new OutcomeDecorator(outcomes);
  },
};

/**
 * Outcome recording
 *
 * Per-attempt success, failure and latency, kept for comparing trials of a
 * running experiment. Recording never affects the call being recorded.
 */

import { getLogger, toError } from '@kernel/logger';
import { emitCounter } from '@kernel/metrics';

import type { MaybePromise } from './types';

const logger = getLogger('ExperimentOutcomes');

export interface ExperimentOutcome {
  readonly experiment: string;
  readonly service: string;
  readonly methodName: string;
  readonly trialKey: string;
  readonly selectedKey: string;
  readonly success: boolean;
  readonly durationMs: number;
  readonly errorName?: string | undefined;
  readonly timestamp: Date;
}

export interface OutcomeFilter {
  experiment?: string | undefined;
  trialKey?: string | undefined;
}

export interface OutcomeStore {
  append(outcome: ExperimentOutcome): MaybePromise<void>;
  query(filter: OutcomeFilter): MaybePromise<readonly ExperimentOutcome[]>;
}

/**
 * Bounded store; the oldest outcome is dropped once capacity is reached
 */
export class InMemoryOutcomeStore implements OutcomeStore {
  private readonly outcomes: ExperimentOutcome[] = [];

  constructor(private readonly capacity = 10000) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Outcome store capacity must be a positive integer, got ${capacity}`);
    }
  }

  append(outcome: ExperimentOutcome): void {
    this.outcomes.push(outcome);
    if (this.outcomes.length > this.capacity) {
      this.outcomes.shift();
    }
  }

  query(filter: OutcomeFilter): readonly ExperimentOutcome[] {
    return this.outcomes.filter(o =>
      (filter.experiment === undefined || o.experiment === filter.experiment) &&
      (filter.trialKey === undefined || o.trialKey === filter.trialKey)
    );
  }

  get size(): number {
    return this.outcomes.length;
  }

  clear(): void {
    this.outcomes.length = 0;
  }
}

export interface TrialOutcomeSummary {
  trialKey: string;
  attempts: number;
  successes: number;
  failures: number;
  /** 0..1 */
  successRate: number;
  meanDurationMs: number;
}

export class OutcomeRecorder {
  private readonly pending = new Set<Promise<void>>();

  constructor(private readonly store: OutcomeStore) {}

  /**
   * Queue an outcome for the store. Store failures are logged and counted.
   */
  record(outcome: ExperimentOutcome): void {
    const write = Promise.resolve()
      .then(() => this.store.append(outcome))
      .catch((error: unknown) => {
        logger.warn('Failed to record experiment outcome', {
          experiment: outcome.experiment,
          trial: outcome.trialKey,
          error: toError(error).message,
        });
        emitCounter('experiment_outcome_record_failures', 1, { service: outcome.service });
      })
      .finally(() => {
        this.pending.delete(write);
      });
    this.pending.add(write);
  }

  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  /**
   * Per-trial totals for an experiment, ordered by trial key
   */
  async summarize(experiment: string): Promise<TrialOutcomeSummary[]> {
    await this.flush();
    const outcomes = await this.store.query({ experiment });

    const byTrial = new Map<string, { attempts: number; successes: number; totalMs: number }>();
    for (const outcome of outcomes) {
      const entry = byTrial.get(outcome.trialKey) ?? { attempts: 0, successes: 0, totalMs: 0 };
      entry.attempts++;
      if (outcome.success) entry.successes++;
      entry.totalMs += outcome.durationMs;
      byTrial.set(outcome.trialKey, entry);
    }

    return [...byTrial.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([trialKey, entry]) => ({
        trialKey,
        attempts: entry.attempts,
        successes: entry.successes,
        failures: entry.attempts - entry.successes,
        successRate: entry.successes / entry.attempts,
        meanDurationMs: entry.totalMs / entry.attempts,
      }));
  }
}

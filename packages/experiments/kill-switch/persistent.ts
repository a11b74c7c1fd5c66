/**
 * Persistent kill switch
 *
 * Wraps the in-memory provider with a durable store. Toggles take effect in
 * memory immediately; the write to the store happens in the background,
 * serialized so the store always ends with the latest state. A failed write
 * is logged and counted, and the in-memory toggle stands.
 *
 * Toggles made while `load()` is in flight are journaled, replayed over the
 * loaded state and written once the load settles.
 */

import { Mutex } from 'async-mutex';

import { getLogger } from '@kernel/logger';
import { emitCounter } from '@kernel/metrics';
import { KillSwitchPersistenceError } from '@errors';

import type { ServiceRef } from '../types';
import { InMemoryKillSwitchProvider } from './in-memory';
import type { KillSwitchProvider, KillSwitchState, KillSwitchStore } from './types';

const logger = getLogger('KillSwitch');

type Mutation = (memory: InMemoryKillSwitchProvider) => boolean;

export class PersistentKillSwitchProvider implements KillSwitchProvider {
  private readonly memory: InMemoryKillSwitchProvider;
  private readonly writeMutex = new Mutex();
  private readonly pending = new Set<Promise<void>>();
  private journal: Mutation[] | undefined;
  private loading: Promise<boolean> | undefined;

  /**
   * @param seed - Experiments disabled before anything is loaded, e.g. from EXPERIMENTS_DISABLED
   */
  constructor(private readonly store: KillSwitchStore, seed: readonly string[] = []) {
    this.memory = new InMemoryKillSwitchProvider({ experiments: [...seed] });
  }

  /**
   * Load persisted state, merged with the startup seed.
   * A failing store leaves the current in-memory state in place.
   * Concurrent callers share one load.
   * @returns true when state was read from the store
   */
  load(): Promise<boolean> {
    if (!this.loading) {
      this.loading = this.loadOnce().finally(() => {
        this.loading = undefined;
      });
    }
    return this.loading;
  }

  private async loadOnce(): Promise<boolean> {
    const journal: Mutation[] = [];
    this.journal = journal;
    try {
      return await this.restoreFromStore(journal);
    } finally {
      this.journal = undefined;
      if (journal.length > 0) {
        this.persist();
      }
    }
  }

  private async restoreFromStore(journal: readonly Mutation[]): Promise<boolean> {
    let stored: KillSwitchState | undefined;
    try {
      stored = await this.store.load();
    } catch (error) {
      const failure = new KillSwitchPersistenceError('load', error);
      logger.error('Failed to load kill switch state', failure);
      emitCounter('experiment_killswitch_persist_failures', 1, { operation: 'load' });
      return false;
    }

    if (!stored) {
      return false;
    }

    const current = this.memory.snapshot();
    this.memory.restore({
      experiments: [...new Set([...stored.experiments, ...current.experiments])],
      trials: stored.trials,
    });
    for (const mutation of journal) {
      mutation(this.memory);
    }
    logger.info('Kill switch state loaded', {
      disabledExperiments: stored.experiments.length,
      servicesWithDisabledTrials: Object.keys(stored.trials).length,
      replayedToggles: journal.length,
    });
    return true;
  }

  isExperimentDisabled(service: ServiceRef): boolean {
    return this.memory.isExperimentDisabled(service);
  }

  isTrialDisabled(service: ServiceRef, trialKey: string): boolean {
    return this.memory.isTrialDisabled(service, trialKey);
  }

  disableExperiment(service: ServiceRef): boolean {
    return this.apply(memory => memory.disableExperiment(service));
  }

  enableExperiment(service: ServiceRef): boolean {
    return this.apply(memory => memory.enableExperiment(service));
  }

  disableTrial(service: ServiceRef, trialKey: string): boolean {
    return this.apply(memory => memory.disableTrial(service, trialKey));
  }

  enableTrial(service: ServiceRef, trialKey: string): boolean {
    return this.apply(memory => memory.enableTrial(service, trialKey));
  }

  snapshot(): KillSwitchState {
    return this.memory.snapshot();
  }

  /** Wait for every background write started so far */
  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  private apply(mutation: Mutation): boolean {
    if (!mutation(this.memory)) {
      return false;
    }
    if (this.journal) {
      this.journal.push(mutation);
    } else {
      this.persist();
    }
    return true;
  }

  private persist(): void {
    const write = this.writeMutex
      .runExclusive(() => this.store.save(this.memory.snapshot()))
      .catch((error: unknown) => {
        const failure = new KillSwitchPersistenceError('save', error);
        logger.error('Failed to persist kill switch state', failure);
        emitCounter('experiment_killswitch_persist_failures', 1, { operation: 'save' });
      })
      .finally(() => {
        this.pending.delete(write);
      });
    this.pending.add(write);
  }
}

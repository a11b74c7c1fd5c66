/**
 * In-memory kill switch
 *
 * Copy-on-write: every mutation replaces a frozen snapshot, so concurrent
 * readers see either the old state or the new one, never a partial update.
 */

import { serviceName, type ServiceRef } from '../types';
import type { KillSwitchProvider, KillSwitchState } from './types';

interface Snapshot {
  readonly experiments: ReadonlySet<string>;
  readonly trials: ReadonlyMap<string, ReadonlySet<string>>;
}

const EMPTY: Snapshot = Object.freeze({
  experiments: new Set<string>(),
  trials: new Map<string, ReadonlySet<string>>(),
});

export class InMemoryKillSwitchProvider implements KillSwitchProvider {
  private current: Snapshot = EMPTY;

  constructor(initial?: Partial<KillSwitchState>) {
    if (initial) {
      this.restore({ experiments: initial.experiments ?? [], trials: initial.trials ?? {} });
    }
  }

  isExperimentDisabled(service: ServiceRef): boolean {
    return this.current.experiments.has(serviceName(service));
  }

  isTrialDisabled(service: ServiceRef, trialKey: string): boolean {
    return this.current.trials.get(serviceName(service))?.has(trialKey) ?? false;
  }

  disableExperiment(service: ServiceRef): boolean {
    const name = serviceName(service);
    if (this.current.experiments.has(name)) return false;
    this.replace(new Set([...this.current.experiments, name]), this.current.trials);
    return true;
  }

  enableExperiment(service: ServiceRef): boolean {
    const name = serviceName(service);
    if (!this.current.experiments.has(name)) return false;
    const experiments = new Set(this.current.experiments);
    experiments.delete(name);
    this.replace(experiments, this.current.trials);
    return true;
  }

  disableTrial(service: ServiceRef, trialKey: string): boolean {
    const name = serviceName(service);
    const existing = this.current.trials.get(name);
    if (existing?.has(trialKey)) return false;
    const trials = new Map(this.current.trials);
    trials.set(name, new Set([...(existing ?? []), trialKey]));
    this.replace(this.current.experiments, trials);
    return true;
  }

  enableTrial(service: ServiceRef, trialKey: string): boolean {
    const name = serviceName(service);
    const existing = this.current.trials.get(name);
    if (!existing?.has(trialKey)) return false;
    const remaining = new Set(existing);
    remaining.delete(trialKey);
    const trials = new Map(this.current.trials);
    if (remaining.size === 0) {
      trials.delete(name);
    } else {
      trials.set(name, remaining);
    }
    this.replace(this.current.experiments, trials);
    return true;
  }

  snapshot(): KillSwitchState {
    const trials: Record<string, string[]> = {};
    for (const [service, keys] of this.current.trials) {
      trials[service] = [...keys].sort();
    }
    return { experiments: [...this.current.experiments].sort(), trials };
  }

  /** Replace the whole state, e.g. after loading from a store */
  restore(state: KillSwitchState): void {
    const trials = new Map<string, ReadonlySet<string>>();
    for (const [service, keys] of Object.entries(state.trials)) {
      if (keys.length > 0) trials.set(service, new Set(keys));
    }
    this.replace(new Set(state.experiments), trials);
  }

  private replace(experiments: ReadonlySet<string>, trials: ReadonlyMap<string, ReadonlySet<string>>): void {
    this.current = Object.freeze({ experiments, trials });
  }
}

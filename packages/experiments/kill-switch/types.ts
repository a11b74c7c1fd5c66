/**
 * Kill switch contracts
 *
 * Reads are synchronous and sit on the hot path of every dispatch; writes
 * come from operators and are rare.
 */

import { z } from 'zod';

import type { ServiceRef } from '../types';

export interface KillSwitchProvider {
  isExperimentDisabled(service: ServiceRef): boolean;
  /** The default trial is never reported disabled by callers of this check */
  isTrialDisabled(service: ServiceRef, trialKey: string): boolean;
  /** @returns true when the state changed */
  disableExperiment(service: ServiceRef): boolean;
  enableExperiment(service: ServiceRef): boolean;
  disableTrial(service: ServiceRef, trialKey: string): boolean;
  enableTrial(service: ServiceRef, trialKey: string): boolean;
  snapshot(): KillSwitchState;
}

/** Serializable kill switch state */
export interface KillSwitchState {
  experiments: string[];
  trials: Record<string, string[]>;
}

export const killSwitchStateSchema = z.object({
  experiments: z.array(z.string().min(1)).default([]),
  trials: z.record(z.array(z.string().min(1))).default({}),
});

/** Durable backing store for PersistentKillSwitchProvider */
export interface KillSwitchStore {
  /** Undefined when nothing has been persisted yet */
  load(): Promise<KillSwitchState | undefined>;
  save(state: KillSwitchState): Promise<void>;
}

/**
 * Error policy
 *
 * Decides which trials to try, and in what order, when the selected trial
 * fails. Candidate lists are computed once per registration; execution walks
 * them until one succeeds.
 */

import { getLogger } from '@kernel/logger';

import type { ErrorPolicySpec } from './types';

const logger = getLogger('ErrorPolicy');

/**
 * Ordered trials to attempt for `selectedKey`. Selected first, no key twice.
 */
export function buildCandidateKeys(
  policy: ErrorPolicySpec,
  selectedKey: string,
  declaredKeys: readonly string[],
  defaultKey: string
): string[] {
  switch (policy.kind) {
    case 'throw':
      return [selectedKey];

    case 'redirectAndReplayDefault': {
      const fallback = policy.fallbackKey ?? defaultKey;
      return fallback === selectedKey ? [selectedKey] : [selectedKey, fallback];
    }

    case 'redirectAndReplayAny': {
      const order = policy.fallbackKeys ?? declaredKeys;
      const candidates = [selectedKey];
      for (const key of order) {
        if (!candidates.includes(key)) {
          candidates.push(key);
        }
      }
      return candidates;
    }
  }
}

export interface AttemptRequest {
  trialKey: string;
  /** 1-based */
  attempt: number;
  isFallback: boolean;
}

export type PolicyOutcome<R> =
  | { ok: true; value: R; executedKey: string; attemptedKeys: string[] }
  | { ok: false; error: unknown; executedKey: string; attemptedKeys: string[] };

export interface PolicyExecution<R> {
  experiment: string;
  candidates: readonly string[];
  defaultKey: string;
  /** Kill switch check for fallback candidates */
  isTrialDisabled: (trialKey: string) => boolean;
  attempt: (request: AttemptRequest) => Promise<R>;
}

/**
 * Run candidates in order until one succeeds.
 *
 * The first candidate always runs. Later candidates that are kill-switched
 * are skipped, except the default trial. Failure carries the error of the
 * last attempt, unwrapped.
 */
export async function executeWithPolicy<R>(execution: PolicyExecution<R>): Promise<PolicyOutcome<R>> {
  const { candidates, defaultKey } = execution;
  const attemptedKeys: string[] = [];
  let lastError: unknown;

  for (const [index, trialKey] of candidates.entries()) {
    const isFallback = index > 0;
    if (isFallback && trialKey !== defaultKey && execution.isTrialDisabled(trialKey)) {
      logger.debug('Skipping disabled fallback trial', { experiment: execution.experiment, trial: trialKey });
      continue;
    }

    attemptedKeys.push(trialKey);
    try {
      const value = await execution.attempt({ trialKey, attempt: attemptedKeys.length, isFallback });
      return { ok: true, value, executedKey: trialKey, attemptedKeys };
    } catch (error) {
      lastError = error;
    }
  }

  return {
    ok: false,
    error: lastError,
    executedKey: attemptedKeys[attemptedKeys.length - 1] ?? candidates[0] ?? defaultKey,
    attemptedKeys,
  };
}

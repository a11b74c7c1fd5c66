/**
 * Error Policy Tests
 */

import { describe, it, expect, vi } from 'vitest';

import { buildCandidateKeys, executeWithPolicy } from '../error-policy';

const declared = ['control', 'b', 'c'] as const;

describe('buildCandidateKeys', () => {
  it('should attempt only the selected trial under throw', () => {
    expect(buildCandidateKeys({ kind: 'throw' }, 'b', declared, 'control')).toEqual(['b']);
  });

  it('should append the default trial under redirectAndReplayDefault', () => {
    expect(buildCandidateKeys({ kind: 'redirectAndReplayDefault' }, 'b', declared, 'control')).toEqual(['b', 'control']);
  });

  it('should use an explicit fallback key', () => {
    expect(
      buildCandidateKeys({ kind: 'redirectAndReplayDefault', fallbackKey: 'c' }, 'b', declared, 'control')
    ).toEqual(['b', 'c']);
  });

  it('should not attempt the default twice when it was selected', () => {
    expect(buildCandidateKeys({ kind: 'redirectAndReplayDefault' }, 'control', declared, 'control')).toEqual(['control']);
  });

  it('should follow declared order without the selected trial under redirectAndReplayAny', () => {
    expect(buildCandidateKeys({ kind: 'redirectAndReplayAny' }, 'b', declared, 'control')).toEqual(['b', 'control', 'c']);
  });

  it('should follow an explicit fallback order', () => {
    expect(
      buildCandidateKeys({ kind: 'redirectAndReplayAny', fallbackKeys: ['c', 'b', 'control'] }, 'b', declared, 'control')
    ).toEqual(['b', 'c', 'control']);
  });
});

describe('executeWithPolicy', () => {
  it('should return the first success with the keys attempted', async () => {
    const attempt = vi.fn(async ({ trialKey }: { trialKey: string }) => {
      if (trialKey === 'b') throw new Error('b down');
      return `${trialKey}-result`;
    });

    const outcome = await executeWithPolicy({
      experiment: 'checkout',
      candidates: ['b', 'control', 'c'],
      defaultKey: 'control',
      isTrialDisabled: () => false,
      attempt,
    });

    expect(outcome).toEqual({ ok: true, value: 'control-result', executedKey: 'control', attemptedKeys: ['b', 'control'] });
    expect(attempt).toHaveBeenNthCalledWith(1, { trialKey: 'b', attempt: 1, isFallback: false });
    expect(attempt).toHaveBeenNthCalledWith(2, { trialKey: 'control', attempt: 2, isFallback: true });
  });

  it('should report the last error after exhausting every candidate', async () => {
    const last = new Error('c down');
    const outcome = await executeWithPolicy<string>({
      experiment: 'checkout',
      candidates: ['b', 'c'],
      defaultKey: 'control',
      isTrialDisabled: () => false,
      attempt: async ({ trialKey }) => {
        throw trialKey === 'c' ? last : new Error('b down');
      },
    });

    expect(outcome).toEqual({ ok: false, error: last, executedKey: 'c', attemptedKeys: ['b', 'c'] });
  });

  it('should skip disabled fallbacks but never the default or the first candidate', async () => {
    const attempted: string[] = [];
    const outcome = await executeWithPolicy<string>({
      experiment: 'checkout',
      candidates: ['b', 'c', 'control'],
      defaultKey: 'control',
      isTrialDisabled: () => true,
      attempt: async ({ trialKey }) => {
        attempted.push(trialKey);
        if (trialKey !== 'control') throw new Error(`${trialKey} down`);
        return 'ok';
      },
    });

    expect(attempted).toEqual(['b', 'control']);
    expect(outcome.ok).toBe(true);
  });
});

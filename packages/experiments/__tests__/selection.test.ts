/**
 * Selection Mode Tests
 */

import { describe, it, expect, vi } from 'vitest';

import { addMetricHandler, type Metric } from '@kernel/metrics';

import { defineExperiment } from '../builder';
import { ExperimentRegistry, type RegistryOptions } from '../registry';
import { evaluateSelection } from '../selection/evaluator';
import {
  EnvConfigurationProvider,
  InMemoryConfigurationProvider,
  InMemoryFeatureFlagProvider,
  type IdentityProvider,
} from '../selection/providers';
import type { ResolutionContext } from '../types';
import { CheckoutService, FixedCheckout, testSettings } from './fixtures';

const context: ResolutionContext = {
  service: 'Checkout',
  experiment: 'checkout',
  requestId: 'req-1',
  attributes: {},
};

function registration(
  configure: (builder: ReturnType<typeof baseBuilder>) => void,
  options: Partial<RegistryOptions> = {}
) {
  const builder = baseBuilder();
  configure(builder);
  return ExperimentRegistry.build({
    experiments: [builder.build()],
    configuration: new InMemoryConfigurationProvider(),
    settings: testSettings(),
    decorators: [],
    ...options,
  }).get(CheckoutService);
}

function baseBuilder() {
  return defineExperiment('checkout', CheckoutService)
    .defaultTrial('control', () => new FixedCheckout('control', 1))
    .trial('true', () => new FixedCheckout('true', 2))
    .trial('false', () => new FixedCheckout('false', 3))
    .trial('blue', () => new FixedCheckout('blue', 4));
}

describe('evaluateSelection', () => {
  describe('booleanFeatureFlag', () => {
    it('should map the flag state onto the "true" and "false" trials', async () => {
      const flags = new InMemoryFeatureFlagProvider().setFlag('UseV2', true);
      const reg = registration(b => b.usingFeatureFlag('UseV2'), { featureFlags: flags });

      expect(await evaluateSelection(reg, context)).toEqual({ key: 'true', requestedKey: 'true', fellBack: false });
      flags.setFlag('UseV2', false);
      expect(await evaluateSelection(reg, context)).toEqual({ key: 'false', requestedKey: 'false', fellBack: false });
    });

    it('should use the service name as the default flag', async () => {
      const flags = new InMemoryFeatureFlagProvider().setFlag('Checkout', true);
      const reg = registration(b => b.usingFeatureFlag(), { featureFlags: flags });

      expect((await evaluateSelection(reg, context)).key).toBe('true');
    });

    it('should fall back and count a provider failure', async () => {
      const metrics: Metric[] = [];
      addMetricHandler(metric => {
        metrics.push(metric);
      });
      const reg = registration(b => b.usingFeatureFlag('UseV2'), {
        featureFlags: { isEnabled: async () => Promise.reject(new Error('timeout')) },
      });

      expect(await evaluateSelection(reg, context)).toEqual({ key: 'control', fellBack: true, reason: 'provider-error' });
      expect(metrics.filter(m => m.name === 'experiment_selection_fallback_total')).toEqual([
        expect.objectContaining({ value: 1, labels: { service: 'Checkout', reason: 'provider-error' } }),
      ]);
    });
  });

  describe('configurationValue', () => {
    it('should use the configured value verbatim', async () => {
      const configuration = new InMemoryConfigurationProvider({ 'Experiments:Checkout': 'blue' });
      const reg = registration(b => b.usingConfigurationKey(), { configuration });

      expect((await evaluateSelection(reg, context)).key).toBe('blue');
    });

    it('should treat keys as case-sensitive', async () => {
      const configuration = new InMemoryConfigurationProvider({ 'Experiments:Checkout': 'Blue' });
      const reg = registration(b => b.usingConfigurationKey(), { configuration });

      expect(await evaluateSelection(reg, context)).toEqual({
        key: 'control',
        requestedKey: 'Blue',
        fellBack: true,
        reason: 'unknown-key',
      });
    });

    it('should fall back when no value is configured', async () => {
      const reg = registration(b => b.usingConfigurationKey('Missing'));

      expect(await evaluateSelection(reg, context)).toEqual({ key: 'control', fellBack: true, reason: 'no-value' });
    });
  });

  describe('variantFlag', () => {
    it('should use the variant name as the trial key', async () => {
      const flags = new InMemoryFeatureFlagProvider().setVariant('checkout-colour', 'blue');
      const reg = registration(b => b.usingVariantFlag('checkout-colour'), { featureFlags: flags });

      expect((await evaluateSelection(reg, context)).key).toBe('blue');
    });
  });

  describe('stickyRouting', () => {
    it('should prefer the identity provider over the context subject', async () => {
      const getSubjectId = vi.fn(() => 'from-identity');
      const identity: IdentityProvider = { getSubjectId };
      const reg = registration(b => b.usingStickyRouting('salt'), { identity });

      const result = await evaluateSelection(reg, { ...context, subjectId: 'from-context' });

      expect(getSubjectId).toHaveBeenCalledTimes(1);
      expect(result.fellBack).toBe(false);
      expect(['control', 'true', 'false', 'blue']).toContain(result.key);
    });
  });
});

describe('EnvConfigurationProvider', () => {
  it('should map colons to double underscores', () => {
    const provider = new EnvConfigurationProvider({ Experiments__Checkout: ' blue ' });
    expect(provider.get('Experiments:Checkout')).toBe('blue');
  });

  it('should fall back to the verbatim key and ignore blank values', () => {
    const provider = new EnvConfigurationProvider({ 'plain-key': 'x', Experiments__Empty: '  ' });
    expect(provider.get('plain-key')).toBe('x');
    expect(provider.get('Experiments:Empty')).toBeUndefined();
  });
});

/**
 * Selection mode evaluation
 *
 * Builds a strategy for each declared selection mode at registry build time,
 * then turns its raw answer into a registered trial key at dispatch time.
 * Provider failures never reach the caller: they route to the default trial.
 */

import { getLogger } from '@kernel/logger';
import { emitCounter } from '@kernel/metrics';
import { SelectionError } from '@errors';

import type { ExperimentRegistration, SelectionStrategy } from '../registration';
import type { ResolutionContext, SelectionModeSpec } from '../types';
import type {
  ConfigurationProvider,
  FeatureFlagProvider,
  IdentityProvider,
  SelectionModeProvider,
} from './providers';
import { selectStickyTrial } from './sticky-router';

const logger = getLogger('SelectionEvaluator');

export interface SelectionProviders {
  featureFlags?: FeatureFlagProvider | undefined;
  configuration: ConfigurationProvider;
  identity?: IdentityProvider | undefined;
  customModes: ReadonlyMap<string, SelectionModeProvider>;
}

export type StrategyResolution =
  | { ok: true; strategy: SelectionStrategy }
  | { ok: false; code: string; message: string };

/**
 * Bind a selection mode to its provider.
 * A mode whose provider is missing is reported, never deferred to dispatch.
 */
export function createSelectionStrategy(
  mode: SelectionModeSpec,
  selectorName: string,
  trialKeys: readonly string[],
  providers: SelectionProviders
): StrategyResolution {
  switch (mode.kind) {
    case 'booleanFeatureFlag': {
      const flags = providers.featureFlags;
      if (!flags) {
        return { ok: false, code: 'missing_provider', message: 'booleanFeatureFlag mode requires a feature flag provider' };
      }
      return {
        ok: true,
        strategy: async context => ((await flags.isEnabled(selectorName, context)) ? 'true' : 'false'),
      };
    }

    case 'configurationValue': {
      const configuration = providers.configuration;
      return { ok: true, strategy: async () => configuration.get(selectorName) };
    }

    case 'variantFlag': {
      const flags = providers.featureFlags;
      if (!flags || typeof flags.getVariant !== 'function') {
        return { ok: false, code: 'missing_provider', message: 'variantFlag mode requires a feature flag provider with getVariant()' };
      }
      return { ok: true, strategy: async context => flags.getVariant?.(selectorName, context) };
    }

    case 'stickyRouting': {
      const identity = providers.identity;
      return {
        ok: true,
        strategy: async context => {
          const subjectId = identity ? await identity.getSubjectId(context) : context.subjectId;
          if (subjectId === undefined || subjectId === '') {
            return undefined;
          }
          return selectStickyTrial(subjectId, selectorName, trialKeys);
        },
      };
    }

    case 'custom': {
      const provider = providers.customModes.get(mode.modeIdentifier);
      if (!provider) {
        return { ok: false, code: 'unknown_mode', message: `No selection mode provider registered for '${mode.modeIdentifier}'` };
      }
      return { ok: true, strategy: async context => provider.resolve(selectorName, context) };
    }
  }
}

// ============================================================================
// Evaluation
// ============================================================================

export type SelectionFallbackReason = 'no-value' | 'unknown-key' | 'provider-error';

export interface SelectionResult {
  /** Registered trial key to run */
  key: string;
  /** What the provider answered, when it answered anything */
  requestedKey?: string | undefined;
  fellBack: boolean;
  reason?: SelectionFallbackReason | undefined;
}

/**
 * Resolve the trial key for one call.
 * Always returns a registered key; the default trial when the provider is
 * silent, names an unknown trial, or throws.
 */
export async function evaluateSelection(
  registration: ExperimentRegistration,
  context: ResolutionContext
): Promise<SelectionResult> {
  const { selection, defaultKey } = registration;
  let requestedKey: string | undefined;

  try {
    requestedKey = await selection.strategy(context);
  } catch (error) {
    const failure = new SelectionError(registration.service, selection.kind, error);
    logger.warn('Selection provider failed, using default trial', {
      experiment: registration.name,
      service: registration.service,
      mode: selection.kind,
      selector: selection.selectorName,
      error: failure.message,
    });
    emitCounter('experiment_selection_fallback', 1, {
      service: registration.service,
      reason: 'provider-error',
    });
    return { key: defaultKey, fellBack: true, reason: 'provider-error' };
  }

  if (requestedKey === undefined || requestedKey === '') {
    return { key: defaultKey, fellBack: true, reason: 'no-value' };
  }

  if (!registration.trials.has(requestedKey)) {
    logger.debug('Selected key is not a registered trial, using default trial', {
      experiment: registration.name,
      requestedKey,
    });
    return { key: defaultKey, requestedKey, fellBack: true, reason: 'unknown-key' };
  }

  return { key: requestedKey, requestedKey, fellBack: false };
}

/**
 * Activation gate
 *
 * An experiment outside its time window, or whose predicate says no, routes
 * straight to its default trial without consulting any selection provider.
 */

import { getLogger } from '@kernel/logger';

import type { ExperimentRegistration } from './registration';
import type { ResolutionContext } from './types';

const logger = getLogger('ActivationGate');

/**
 * Named predicate, referenced from definitions by identifier so that
 * configuration-loaded experiments can share gating rules.
 */
export interface ActivationPredicateProvider {
  readonly identifier: string;
  isActive(context: ResolutionContext): boolean;
}

/**
 * Whether the experiment participates in routing at `now`.
 * Window bounds are inclusive. A predicate that throws counts as inactive.
 */
export function isExperimentActive(
  registration: Pick<ExperimentRegistration, 'name' | 'activeFrom' | 'activeUntil' | 'activation'>,
  now: Date,
  context: ResolutionContext
): boolean {
  const time = now.getTime();
  if (registration.activeFrom && time < registration.activeFrom.getTime()) {
    return false;
  }
  if (registration.activeUntil && time > registration.activeUntil.getTime()) {
    return false;
  }
  if (!registration.activation) {
    return true;
  }

  try {
    return registration.activation(context) === true;
  } catch (error) {
    logger.warn('Activation predicate failed, treating experiment as inactive', {
      experiment: registration.name,
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}

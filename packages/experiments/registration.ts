/**
 * Compiled experiment registrations
 *
 * What the registry produces from an ExperimentDefinition: providers resolved,
 * fallback candidates precomputed, every reference validated. Immutable once
 * built.
 */

import type {
  ActivationPredicate,
  ErrorPolicySpec,
  ResolutionContext,
  SelectionModeKind,
  TrialFactory,
} from './types';

/** Raw routing decision from a selection provider; undefined means "no opinion" */
export type SelectionStrategy = (context: ResolutionContext) => Promise<string | undefined>;

export interface RegisteredTrial {
  readonly key: string;
  readonly isDefault: boolean;
  /** Position in declaration order */
  readonly order: number;
  readonly factory: TrialFactory<object>;
}

export interface ResolvedSelection {
  readonly kind: SelectionModeKind;
  readonly selectorName: string;
  readonly modeIdentifier?: string | undefined;
  readonly strategy: SelectionStrategy;
}

export interface ExperimentRegistration {
  readonly name: string;
  readonly service: string;
  readonly trials: ReadonlyMap<string, RegisteredTrial>;
  /** Declaration order */
  readonly trialKeys: readonly string[];
  readonly defaultKey: string;
  readonly selection: ResolvedSelection;
  readonly errorPolicy: ErrorPolicySpec;
  /** Ordered trials to attempt, keyed by the selected trial */
  readonly candidates: ReadonlyMap<string, readonly string[]>;
  readonly activeFrom?: Date | undefined;
  readonly activeUntil?: Date | undefined;
  readonly activation?: ActivationPredicate | undefined;
  readonly metadata: Readonly<Record<string, unknown>>;
}

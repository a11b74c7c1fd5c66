/**
 * Fluent experiment definitions
 *
 * @example
 * const checkout = defineExperiment('checkout-v2', CheckoutService)
 *   .defaultTrial('control', () => new LegacyCheckout())
 *   .trial('true', () => new StreamlinedCheckout())
 *   .usingFeatureFlag('UseV2')
 *   .onErrorRedirectAndReplayDefault()
 *   .activeUntil(new Date('2026-12-31T00:00:00Z'))
 *   .build();
 *
 * The builder only collects; ExperimentRegistry.build validates.
 */

import type {
  ActivationCondition,
  ErrorPolicySpec,
  ExperimentDefinition,
  SelectionModeSpec,
  ServiceToken,
  TrialDefinition,
  TrialFactory,
} from './types';

export class ExperimentBuilder<T extends object> {
  private readonly trials: TrialDefinition<T>[] = [];
  private selection: SelectionModeSpec = { kind: 'booleanFeatureFlag' };
  private errorPolicy: ErrorPolicySpec = { kind: 'throw' };
  private from?: Date | undefined;
  private until?: Date | undefined;
  private activation?: ActivationCondition | undefined;
  private readonly metadata: Record<string, unknown> = {};

  constructor(private readonly name: string, private readonly service: ServiceToken<T>) {}

  /** The trial used whenever routing cannot or should not pick another */
  defaultTrial(key: string, factory: TrialFactory<T>): this {
    this.trials.push({ key, factory, isDefault: true });
    return this;
  }

  trial(key: string, factory: TrialFactory<T>): this {
    this.trials.push({ key, factory, isDefault: false });
    return this;
  }

  // -- Selection modes --

  /** Flag on selects trial `"true"`, off selects `"false"` */
  usingFeatureFlag(flagName?: string): this {
    this.selection = { kind: 'booleanFeatureFlag', selectorName: flagName };
    return this;
  }

  /** Configuration value is the trial key */
  usingConfigurationKey(configurationKey?: string): this {
    this.selection = { kind: 'configurationValue', selectorName: configurationKey };
    return this;
  }

  usingVariantFlag(flagName?: string): this {
    this.selection = { kind: 'variantFlag', selectorName: flagName };
    return this;
  }

  /** Hash of the subject id; the selector name salts the hash */
  usingStickyRouting(selectorName?: string): this {
    this.selection = { kind: 'stickyRouting', selectorName };
    return this;
  }

  usingCustomMode(modeIdentifier: string, selectorName?: string): this {
    this.selection = { kind: 'custom', modeIdentifier, selectorName };
    return this;
  }

  // -- Error policies --

  onErrorThrow(): this {
    this.errorPolicy = { kind: 'throw' };
    return this;
  }

  onErrorRedirectAndReplayDefault(fallbackKey?: string): this {
    this.errorPolicy = { kind: 'redirectAndReplayDefault', fallbackKey };
    return this;
  }

  onErrorRedirectAndReplayAny(...fallbackKeys: string[]): this {
    this.errorPolicy = {
      kind: 'redirectAndReplayAny',
      fallbackKeys: fallbackKeys.length > 0 ? fallbackKeys : undefined,
    };
    return this;
  }

  // -- Activation --

  activeFrom(from: Date): this {
    this.from = from;
    return this;
  }

  activeUntil(until: Date): this {
    this.until = until;
    return this;
  }

  activeDuring(from: Date, until: Date): this {
    return this.activeFrom(from).activeUntil(until);
  }

  /** Inline predicate, or the identifier of a registered predicate provider */
  activeWhen(condition: ActivationCondition): this {
    this.activation = condition;
    return this;
  }

  withMetadata(key: string, value: unknown): this {
    this.metadata[key] = value;
    return this;
  }

  build(): ExperimentDefinition<T> {
    return Object.freeze({
      name: this.name,
      service: this.service,
      trials: Object.freeze([...this.trials]),
      selection: this.selection,
      errorPolicy: this.errorPolicy,
      activeFrom: this.from,
      activeUntil: this.until,
      activation: this.activation,
      metadata: Object.freeze({ ...this.metadata }),
    });
  }
}

export function defineExperiment<T extends object>(name: string, service: ServiceToken<T>): ExperimentBuilder<T> {
  return new ExperimentBuilder(name, service);
}

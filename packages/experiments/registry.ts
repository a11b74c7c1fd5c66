/**
 * Experiment Registry
 *
 * Validates every definition up front and compiles it into an immutable
 * registration. A registry that builds can always dispatch: unknown modes,
 * missing providers and dangling fallback keys are reported here, together,
 * in one ExperimentConfigurationError.
 */

import { z } from 'zod';

import { loadRouterSettings, type RouterSettings } from '@config';
import { getLogger, toError } from '@kernel/logger';
import {
  ExperimentConfigurationError,
  ExperimentNotRegisteredError,
  type ConfigurationIssue,
} from '@errors';

import type { ActivationPredicateProvider } from './activation';
import { LoggerAuditSink, type AuditSink } from './audit';
import { builtInDecoratorFactories } from './decorators';
import type { DecoratorFactory, ExperimentDecorator } from './decorators/types';
import { ExperimentDispatcher, type InvocationOptions } from './dispatcher';
import { buildCandidateKeys } from './error-policy';
import { InMemoryKillSwitchProvider } from './kill-switch/in-memory';
import type { KillSwitchProvider } from './kill-switch/types';
import { defaultNamingConvention, type NamingConvention } from './naming';
import { InMemoryOutcomeStore, OutcomeRecorder } from './outcomes';
import { createExperimentProxy } from './proxy';
import type { ExperimentRegistration, RegisteredTrial } from './registration';
import { createSelectionStrategy, type SelectionProviders } from './selection/evaluator';
import {
  EnvConfigurationProvider,
  type ConfigurationProvider,
  type FeatureFlagProvider,
  type IdentityProvider,
  type SelectionModeProvider,
} from './selection/providers';
import {
  serviceName,
  type ActivationPredicate,
  type AsyncService,
  type ErrorPolicySpec,
  type ExperimentDefinition,
  type SelectionModeSpec,
  type ServiceRef,
  type ServiceToken,
} from './types';

const logger = getLogger('ExperimentRegistry');

export interface RegistryOptions {
  experiments: readonly ExperimentDefinition<object>[];
  featureFlags?: FeatureFlagProvider | undefined;
  /** Defaults to environment variables */
  configuration?: ConfigurationProvider | undefined;
  identity?: IdentityProvider | undefined;
  selectionModes?: readonly SelectionModeProvider[] | undefined;
  activationPredicates?: readonly ActivationPredicateProvider[] | undefined;
  /** Defaults to an in-memory switch seeded from EXPERIMENTS_DISABLED */
  killSwitch?: KillSwitchProvider | undefined;
  /** Defaults to the built-ins enabled in settings */
  decorators?: readonly DecoratorFactory[] | undefined;
  /** Defaults to an in-memory recorder when outcome recording is enabled */
  outcomes?: OutcomeRecorder | undefined;
  /** Defaults to structured logging */
  auditSink?: AuditSink | undefined;
  naming?: NamingConvention | undefined;
  /** Defaults to settings read from the environment */
  settings?: RouterSettings | undefined;
  clock?: (() => Date) | undefined;
}

export interface ExperimentSummary {
  name: string;
  service: string;
  trialKeys: readonly string[];
  defaultKey: string;
  selection: { kind: string; selectorName: string };
  errorPolicy: ErrorPolicySpec['kind'];
  activeFrom?: Date | undefined;
  activeUntil?: Date | undefined;
  metadata: Readonly<Record<string, unknown>>;
}

// ============================================================================
// Structural validation
// ============================================================================

const trialSchema = z.object({
  key: z.string().trim().min(1, 'Trial key must be a non-empty string'),
  isDefault: z.boolean(),
  factory: z.custom<unknown>(value => typeof value === 'function', { message: 'Trial factory must be a function' }),
});

const selectorName = z.string().optional();

const selectionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('booleanFeatureFlag'), selectorName }),
  z.object({ kind: z.literal('configurationValue'), selectorName }),
  z.object({ kind: z.literal('variantFlag'), selectorName }),
  z.object({ kind: z.literal('stickyRouting'), selectorName }),
  z.object({
    kind: z.literal('custom'),
    modeIdentifier: z.string().trim().min(1, 'Mode identifier must be a non-empty string'),
    selectorName,
  }),
]);

// Empty fallback keys pass here and are reported against the trial list
const errorPolicySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('throw') }),
  z.object({ kind: z.literal('redirectAndReplayDefault'), fallbackKey: z.string().optional() }),
  z.object({ kind: z.literal('redirectAndReplayAny'), fallbackKeys: z.array(z.string()).optional() }),
]);

const definitionSchema = z.object({
  name: z.string().trim().min(1, 'Experiment name must be a non-empty string'),
  service: z.object({
    name: z.string().trim().min(1, 'Service name must be a non-empty string'),
  }),
  trials: z.array(trialSchema).min(1, 'At least one trial is required'),
  selection: selectionSchema,
  errorPolicy: errorPolicySchema,
  activeFrom: z.date().optional(),
  activeUntil: z.date().optional(),
  activation: z
    .union([
      z.string(),
      z.custom<unknown>(value => typeof value === 'function', { message: 'Activation must be a function' }),
    ])
    .optional(),
  metadata: z.record(z.unknown()),
});

// ============================================================================
// Registry
// ============================================================================

export class ExperimentRegistry {
  private disposed = false;

  private constructor(
    private readonly registrations: ReadonlyMap<string, ExperimentRegistration>,
    private readonly decorators: readonly ExperimentDecorator[],
    readonly killSwitch: KillSwitchProvider,
    private readonly auditSink: AuditSink,
    readonly outcomes: OutcomeRecorder | undefined,
    private readonly clock: () => Date
  ) {}

  /**
   * Validate and compile `options.experiments`.
   * @throws ExperimentConfigurationError listing every problem found
   */
  static build(options: RegistryOptions): ExperimentRegistry {
    const settings = options.settings ?? loadRouterSettings();
    const naming = options.naming ?? defaultNamingConvention;
    const issues: ConfigurationIssue[] = [];

    const customModes = indexProviders(
      options.selectionModes ?? [],
      p => p.modeIdentifier,
      'selectionModes',
      issues
    );
    const predicates = indexProviders(
      options.activationPredicates ?? [],
      p => p.identifier,
      'activationPredicates',
      issues
    );
    const providers: SelectionProviders = {
      featureFlags: options.featureFlags,
      configuration: options.configuration ?? new EnvConfigurationProvider(),
      identity: options.identity,
      customModes,
    };

    const registrations = new Map<string, ExperimentRegistration>();
    const experimentNames = new Set<string>();

    options.experiments.forEach((definition, index) => {
      const prefix = typeof definition.name === 'string' && definition.name.trim() !== ''
        ? definition.name
        : `experiments[${index}]`;

      const structural = definitionSchema.safeParse(definition);
      if (!structural.success) {
        issues.push(...ExperimentConfigurationError.fromZodIssues(prefix, structural.error.issues));
        return;
      }

      if (experimentNames.has(definition.name)) {
        issues.push({ path: `${prefix}.name`, message: `Duplicate experiment name '${definition.name}'`, code: 'duplicate_experiment' });
      }
      experimentNames.add(definition.name);

      if (registrations.has(definition.service.name)) {
        issues.push({
          path: `${prefix}.service`,
          message: `Service '${definition.service.name}' already has an experiment`,
          code: 'duplicate_service',
        });
        return;
      }

      const registration = compileDefinition(definition, prefix, naming, providers, predicates, issues);
      if (registration) {
        registrations.set(registration.service, registration);
      }
    });

    let outcomes = options.outcomes;
    if (!outcomes && settings.decorators.outcomes) {
      outcomes = new OutcomeRecorder(new InMemoryOutcomeStore(settings.outcomeBufferSize));
    }

    const decorators: ExperimentDecorator[] = [];
    for (const factory of options.decorators ?? builtInDecoratorFactories(settings)) {
      try {
        decorators.push(factory.create({ settings, outcomes }));
      } catch (error) {
        issues.push({ path: `decorators.${factory.name}`, message: toError(error).message, code: 'decorator_failed' });
      }
    }

    if (issues.length > 0) {
      const error = new ExperimentConfigurationError(issues);
      logger.error('Experiment registry build failed', error, { issues: issues.length });
      throw error;
    }

    const killSwitch = options.killSwitch
      ?? new InMemoryKillSwitchProvider({ experiments: settings.killSwitch.disabledExperiments });

    logger.info('Experiment registry built', {
      experiments: [...registrations.values()].map(r => r.name),
      decorators: decorators.map(d => d.name),
    });

    return new ExperimentRegistry(
      registrations,
      Object.freeze(decorators),
      killSwitch,
      options.auditSink ?? new LoggerAuditSink(),
      outcomes,
      options.clock ?? (() => new Date())
    );
  }

  has(service: ServiceRef): boolean {
    return this.registrations.has(serviceName(service));
  }

  /**
   * @throws ExperimentNotRegisteredError
   */
  get(service: ServiceRef): ExperimentRegistration {
    const name = serviceName(service);
    const registration = this.registrations.get(name);
    if (!registration) {
      throw new ExperimentNotRegisteredError(name);
    }
    return registration;
  }

  list(): ExperimentSummary[] {
    return [...this.registrations.values()].map(r => ({
      name: r.name,
      service: r.service,
      trialKeys: r.trialKeys,
      defaultKey: r.defaultKey,
      selection: { kind: r.selection.kind, selectorName: r.selection.selectorName },
      errorPolicy: r.errorPolicy.kind,
      activeFrom: r.activeFrom,
      activeUntil: r.activeUntil,
      metadata: r.metadata,
    }));
  }

  /**
   * @throws ExperimentNotRegisteredError
   */
  dispatcher<T extends object>(service: ServiceToken<T>): ExperimentDispatcher<T> {
    if (this.disposed) {
      throw new Error('Experiment registry has been disposed');
    }
    return new ExperimentDispatcher<T>(this.get(service), {
      killSwitch: this.killSwitch,
      decorators: this.decorators,
      auditSink: this.auditSink,
      clock: this.clock,
    });
  }

  proxy<T extends object>(service: ServiceToken<T>, options?: InvocationOptions): AsyncService<T> {
    return createExperimentProxy(this.dispatcher(service), options);
  }

  /**
   * Release decorator state. Safe to call more than once.
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;

    const results = await Promise.allSettled(this.decorators.map(async d => d.dispose?.()));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        logger.error('Decorator dispose failed', toError(result.reason), { decorator: this.decorators[index]?.name });
      }
    });
  }
}

// ============================================================================
// Compilation
// ============================================================================

function indexProviders<P>(
  list: readonly P[],
  idOf: (provider: P) => string,
  path: string,
  issues: ConfigurationIssue[]
): Map<string, P> {
  const index = new Map<string, P>();
  list.forEach((provider, i) => {
    const id = idOf(provider);
    if (index.has(id)) {
      issues.push({ path: `${path}[${i}]`, message: `Duplicate identifier '${id}'`, code: 'duplicate_provider' });
      return;
    }
    index.set(id, provider);
  });
  return index;
}

function defaultSelectorName(mode: SelectionModeSpec, service: { readonly name: string }, naming: NamingConvention): string {
  switch (mode.kind) {
    case 'configurationValue':
      return naming.configurationKeyFor(service);
    case 'variantFlag':
      return naming.variantFlagNameFor(service);
    default:
      return naming.featureFlagNameFor(service);
  }
}

function compileDefinition(
  definition: ExperimentDefinition<object>,
  prefix: string,
  naming: NamingConvention,
  providers: SelectionProviders,
  predicates: ReadonlyMap<string, ActivationPredicateProvider>,
  issues: ConfigurationIssue[]
): ExperimentRegistration | undefined {
  const issueCount = issues.length;
  const trialKeys = definition.trials.map(t => t.key);

  // -- Trials --
  const seen = new Set<string>();
  definition.trials.forEach((trial, i) => {
    if (seen.has(trial.key)) {
      issues.push({ path: `${prefix}.trials[${i}].key`, message: `Duplicate trial key '${trial.key}'`, code: 'duplicate_trial_key' });
    }
    seen.add(trial.key);
  });

  const defaults = definition.trials.filter(t => t.isDefault);
  if (defaults.length !== 1) {
    issues.push({
      path: `${prefix}.trials`,
      message: defaults.length === 0
        ? 'Exactly one default trial is required, found none'
        : `Exactly one default trial is required, found ${defaults.length}`,
      code: defaults.length === 0 ? 'missing_default' : 'multiple_defaults',
    });
  }

  // -- Activation window --
  const { activeFrom, activeUntil } = definition;
  if (activeFrom && activeUntil && activeFrom.getTime() > activeUntil.getTime()) {
    issues.push({ path: `${prefix}.activeFrom`, message: 'activeFrom must not be later than activeUntil', code: 'invalid_window' });
  }

  let activation: ActivationPredicate | undefined;
  if (typeof definition.activation === 'string') {
    const provider = predicates.get(definition.activation);
    if (provider) {
      activation = context => provider.isActive(context);
    } else {
      issues.push({
        path: `${prefix}.activation`,
        message: `No activation predicate registered for '${definition.activation}'`,
        code: 'unknown_activation_predicate',
      });
    }
  } else {
    activation = definition.activation;
  }

  // -- Error policy --
  const policy = definition.errorPolicy;
  const fallbackKeys = policy.kind === 'redirectAndReplayDefault'
    ? (policy.fallbackKey !== undefined ? [policy.fallbackKey] : [])
    : policy.kind === 'redirectAndReplayAny' ? policy.fallbackKeys ?? [] : [];
  const fallbackPath = policy.kind === 'redirectAndReplayDefault' ? 'fallbackKey' : 'fallbackKeys';
  fallbackKeys.forEach((key, i) => {
    const path = policy.kind === 'redirectAndReplayAny' ? `${prefix}.errorPolicy.${fallbackPath}[${i}]` : `${prefix}.errorPolicy.${fallbackPath}`;
    if (key.trim() === '') {
      issues.push({ path, message: 'Fallback key must be a non-empty string', code: 'empty_fallback_key' });
    } else if (!seen.has(key)) {
      issues.push({ path, message: `Fallback key '${key}' is not a registered trial`, code: 'unknown_fallback_key' });
    }
  });
  if (policy.kind === 'redirectAndReplayAny' && policy.fallbackKeys?.length === 0) {
    issues.push({ path: `${prefix}.errorPolicy.fallbackKeys`, message: 'Fallback key list must not be empty', code: 'empty_fallback_key' });
  }

  // -- Selection --
  const mode = definition.selection;
  if (mode.selectorName !== undefined && mode.selectorName.trim() === '') {
    issues.push({ path: `${prefix}.selection.selectorName`, message: 'Selector name must be a non-empty string', code: 'empty_selector' });
  }
  const selectorName = mode.selectorName ?? defaultSelectorName(mode, definition.service, naming);
  const strategy = createSelectionStrategy(mode, selectorName, trialKeys, providers);
  if (!strategy.ok) {
    issues.push({ path: `${prefix}.selection`, message: strategy.message, code: strategy.code });
  }

  const defaultTrial = defaults[0];
  if (issues.length > issueCount || !strategy.ok || !defaultTrial) {
    return undefined;
  }

  const trials = new Map<string, RegisteredTrial>(
    definition.trials.map((trial, order) => [
      trial.key,
      Object.freeze({ key: trial.key, isDefault: trial.isDefault, order, factory: trial.factory }),
    ])
  );

  const candidates = new Map<string, readonly string[]>(
    trialKeys.map(key => [key, Object.freeze(buildCandidateKeys(policy, key, trialKeys, defaultTrial.key))])
  );

  return Object.freeze({
    name: definition.name,
    service: definition.service.name,
    trials,
    trialKeys: Object.freeze([...trialKeys]),
    defaultKey: defaultTrial.key,
    selection: Object.freeze({
      kind: mode.kind,
      selectorName,
      modeIdentifier: mode.kind === 'custom' ? mode.modeIdentifier : undefined,
      strategy: strategy.strategy,
    }),
    errorPolicy: policy,
    candidates,
    activeFrom,
    activeUntil,
    activation,
    metadata: definition.metadata,
  });
}

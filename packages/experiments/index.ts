/**
 * Experiment Router
 *
 * Per-call routing of a service interface to one of several registered
 * trial implementations.
 *
 * @example
 * ```typescript
 * import { defineExperiment, defineService, ExperimentRegistry } from '@experiments';
 *
 * const registry = ExperimentRegistry.build({ experiments: [checkout], featureFlags });
 * const service = registry.proxy(CheckoutService);
 * const total = await service.total('cart-1');
 * ```
 *
 * @module @experiments
 */

// ============================================================================
// Definitions
// ============================================================================
export { defineService, serviceName } from './types';
export type {
  ActivationCondition,
  ActivationPredicate,
  AsyncService,
  ErrorPolicyKind,
  ErrorPolicySpec,
  ExperimentDefinition,
  InvocationContext,
  MaybePromise,
  MethodArgs,
  MethodName,
  MethodResult,
  ResolutionContext,
  RoutingReason,
  SelectionModeKind,
  SelectionModeSpec,
  ServiceRef,
  ServiceToken,
  TrialAssignment,
  TrialDefinition,
  TrialFactory,
} from './types';
export { ExperimentBuilder, defineExperiment } from './builder';
export { defaultNamingConvention, kebabCaseNamingConvention, toKebabCase, type NamingConvention } from './naming';

// ============================================================================
// Registry & Dispatch
// ============================================================================
export { ExperimentRegistry, type ExperimentSummary, type RegistryOptions } from './registry';
export type { ExperimentRegistration, RegisteredTrial } from './registration';
export { ExperimentDispatcher, type DispatchRuntime, type InvocationOptions } from './dispatcher';
export { createExperimentProxy } from './proxy';
export { buildCandidateKeys, executeWithPolicy, type PolicyOutcome } from './error-policy';
export { isExperimentActive, type ActivationPredicateProvider } from './activation';
export { createRequestContext, runWithContext, runWithSubject, type RequestContext } from '@kernel';

// ============================================================================
// Selection
// ============================================================================
export {
  EnvConfigurationProvider,
  InMemoryConfigurationProvider,
  InMemoryFeatureFlagProvider,
  type ConfigurationProvider,
  type FeatureFlagProvider,
  type IdentityProvider,
  type SelectionModeProvider,
} from './selection/providers';
export { evaluateSelection, type SelectionResult } from './selection/evaluator';
export { selectStickyTrial, stickyBucket } from './selection/sticky-router';

// ============================================================================
// Kill Switch
// ============================================================================
export type { KillSwitchProvider, KillSwitchState, KillSwitchStore } from './kill-switch/types';
export { InMemoryKillSwitchProvider } from './kill-switch/in-memory';
export { PersistentKillSwitchProvider } from './kill-switch/persistent';
export { RedisKillSwitchStore, type KeyValueClient, type RedisKillSwitchStoreOptions } from './kill-switch/redis-store';

// ============================================================================
// Decorators, Audit & Outcomes
// ============================================================================
export * from './decorators';
export { CompositeAuditSink, InMemoryAuditSink, LoggerAuditSink, publishAssignment, type AuditSink } from './audit';
export {
  InMemoryOutcomeStore,
  OutcomeRecorder,
  type ExperimentOutcome,
  type OutcomeFilter,
  type OutcomeStore,
  type TrialOutcomeSummary,
} from './outcomes';

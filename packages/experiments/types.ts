/**
 * Experiment Router Types
 *
 * Author-time definitions, per-call contexts and audit records shared by
 * every part of the dispatch core.
 */

// ============================================================================
// Service Identity
// ============================================================================

/**
 * Identity of a routed service interface.
 *
 * `name` is the registry key. The type parameter is phantom: it ties trial
 * factories and proxies to the interface without any runtime reflection.
 *
 * @example
 * interface Checkout { total(cartId: string): Promise<number> }
 * const CheckoutService = defineService<Checkout>('Checkout');
 */
export interface ServiceToken<T extends object> {
  readonly name: string;
  /** Never set at runtime */
  readonly __service?: T;
}

/** Anything that names a service: its token or the bare name */
export type ServiceRef = string | { readonly name: string };

export function defineService<T extends object>(name: string): ServiceToken<T> {
  if (name.trim().length === 0) {
    throw new Error('Service name must be a non-empty string');
  }
  return Object.freeze({ name });
}

export function serviceName(ref: ServiceRef): string {
  return typeof ref === 'string' ? ref : ref.name;
}

// ============================================================================
// Method Typing
// ============================================================================

/** Keys of `T` whose values are callable */
export type MethodName<T> = {
  [K in keyof T]-?: T[K] extends (...args: never[]) => unknown ? K : never;
}[keyof T] & string;

export type MethodArgs<T, K extends PropertyKey> = K extends keyof T
  ? T[K] extends (...args: infer A extends unknown[]) => unknown ? A : never
  : never;

/** Settled return type of a method; dispatch is always asynchronous */
export type MethodResult<T, K extends PropertyKey> = K extends keyof T
  ? T[K] extends (...args: never[]) => infer R ? Awaited<R> : never
  : never;

/** `T` with every method returning a promise, as seen through a proxy */
export type AsyncService<T> = {
  [K in MethodName<T>]: (...args: MethodArgs<T, K>) => Promise<MethodResult<T, K>>;
};

export type MaybePromise<T> = T | Promise<T>;

// ============================================================================
// Contexts
// ============================================================================

/**
 * Per-call values visible to trial factories, activation predicates and
 * selection providers.
 */
export interface ResolutionContext {
  readonly service: string;
  readonly experiment: string;
  readonly requestId: string;
  /** Stable routing subject (user, tenant, session) for sticky routing */
  readonly subjectId?: string | undefined;
  readonly attributes: Readonly<Record<string, unknown>>;
  /** Host cancellation; forwarded into every attempted trial */
  readonly signal?: AbortSignal | undefined;
}

/**
 * One attempt at running a trial. Created fresh for every attempt and frozen.
 */
export interface InvocationContext {
  readonly service: string;
  readonly experiment: string;
  readonly methodName: string;
  /** Trial actually executed by this attempt */
  readonly trialKey: string;
  /** Trial chosen by selection, before kill switches and fallbacks */
  readonly selectedKey: string;
  /** 1-based attempt number within the call */
  readonly attempt: number;
  readonly isFallback: boolean;
  readonly arguments: readonly unknown[];
  readonly signal?: AbortSignal | undefined;
  readonly resolution: ResolutionContext;
}

// ============================================================================
// Definitions
// ============================================================================

/** Produces a trial instance scoped to one attempt */
export type TrialFactory<T extends object> = (context: ResolutionContext) => T;

export interface TrialDefinition<T extends object> {
  readonly key: string;
  readonly factory: TrialFactory<T>;
  readonly isDefault: boolean;
}

export type SelectionModeSpec =
  | { readonly kind: 'booleanFeatureFlag'; readonly selectorName?: string | undefined }
  | { readonly kind: 'configurationValue'; readonly selectorName?: string | undefined }
  | { readonly kind: 'variantFlag'; readonly selectorName?: string | undefined }
  | { readonly kind: 'stickyRouting'; readonly selectorName?: string | undefined }
  | { readonly kind: 'custom'; readonly modeIdentifier: string; readonly selectorName?: string | undefined };

export type SelectionModeKind = SelectionModeSpec['kind'];

export type ErrorPolicySpec =
  | { readonly kind: 'throw' }
  /** One retry against `fallbackKey`, or the default trial when omitted */
  | { readonly kind: 'redirectAndReplayDefault'; readonly fallbackKey?: string | undefined }
  /** Remaining trials in `fallbackKeys` order, or declared order when omitted */
  | { readonly kind: 'redirectAndReplayAny'; readonly fallbackKeys?: readonly string[] | undefined };

export type ErrorPolicyKind = ErrorPolicySpec['kind'];

export type ActivationPredicate = (context: ResolutionContext) => boolean;

/** Inline predicate, or the identifier of a registered ActivationPredicateProvider */
export type ActivationCondition = ActivationPredicate | string;

export interface ExperimentDefinition<T extends object> {
  readonly name: string;
  readonly service: ServiceToken<T>;
  /** Declared order; exactly one default */
  readonly trials: readonly TrialDefinition<T>[];
  readonly selection: SelectionModeSpec;
  readonly errorPolicy: ErrorPolicySpec;
  readonly activeFrom?: Date | undefined;
  readonly activeUntil?: Date | undefined;
  readonly activation?: ActivationCondition | undefined;
  /** Owner, ticket, rollback notes; not interpreted by the router */
  readonly metadata: Readonly<Record<string, unknown>>;
}

// ============================================================================
// Audit
// ============================================================================

/** Why the executed trial was chosen */
export type RoutingReason =
  | 'selected'
  | 'selection-fallback'
  | 'inactive'
  | 'experiment-disabled'
  | 'trial-disabled'
  | 'kill-switch-unavailable';

/**
 * One completed call, handed to the audit sink
 */
export interface TrialAssignment {
  readonly experiment: string;
  readonly service: string;
  readonly methodName: string;
  readonly selectedKey: string;
  readonly executedKey: string;
  readonly isFallback: boolean;
  readonly routing: RoutingReason;
  /** Trials attempted in order; the last one is `executedKey` */
  readonly attemptedKeys: readonly string[];
  readonly timestamp: Date;
  readonly durationMs: number;
  /** Terminal error, when the call failed */
  readonly error?: unknown;
}

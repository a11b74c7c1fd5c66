/**
 * Experiment Dispatcher
 *
 * Runs one call against the trial chosen for it:
 * activation gate, experiment kill switch, selection, trial kill switch,
 * then the error policy with every attempt wrapped by the decorator chain.
 * One audit event is published per call, success or failure.
 */

import { getLogger, toError } from '@kernel/logger';
import { emitCounter } from '@kernel/metrics';
import { getRequestContext, getRequestId } from '@kernel/request-context';
import { TrialMethodNotFoundError } from '@errors';

import { isExperimentActive } from './activation';
import { publishAssignment, type AuditSink } from './audit';
import { composeDecorators, type ExperimentDecorator } from './decorators/types';
import { executeWithPolicy } from './error-policy';
import type { KillSwitchProvider } from './kill-switch/types';
import type { ExperimentRegistration } from './registration';
import { evaluateSelection } from './selection/evaluator';
import type {
  InvocationContext,
  MethodArgs,
  MethodName,
  MethodResult,
  ResolutionContext,
  RoutingReason,
} from './types';

const logger = getLogger('ExperimentDispatcher');

export interface InvocationOptions {
  signal?: AbortSignal | undefined;
  /** Overrides the subject from the ambient request context */
  subjectId?: string | undefined;
  /** Merged over the ambient request context attributes */
  attributes?: Record<string, unknown> | undefined;
  requestId?: string | undefined;
}

export interface DispatchRuntime {
  killSwitch: KillSwitchProvider;
  decorators: readonly ExperimentDecorator[];
  auditSink: AuditSink;
  clock: () => Date;
}

interface RoutingDecision {
  selectedKey: string;
  executionKey: string;
  routing: RoutingReason;
}

export class ExperimentDispatcher<T extends object> {
  constructor(
    private readonly registration: ExperimentRegistration,
    private readonly runtime: DispatchRuntime
  ) {}

  get experiment(): string {
    return this.registration.name;
  }

  get service(): string {
    return this.registration.service;
  }

  invoke<K extends MethodName<T>>(method: K, ...args: MethodArgs<T, K>): Promise<MethodResult<T, K>> {
    return this.dispatch<MethodResult<T, K>>(method, args);
  }

  invokeWith<K extends MethodName<T>>(
    options: InvocationOptions,
    method: K,
    ...args: MethodArgs<T, K>
  ): Promise<MethodResult<T, K>> {
    return this.dispatch<MethodResult<T, K>>(method, args, options);
  }

  /**
   * Untyped entry point for dynamic callers such as proxies.
   * A method the chosen trial lacks fails with TrialMethodNotFoundError,
   * which the error policy handles like any trial failure.
   */
  async dispatch<R = unknown>(
    methodName: string,
    args: readonly unknown[],
    options: InvocationOptions = {}
  ): Promise<R> {
    const started = performance.now();
    const resolution = this.createResolutionContext(options);
    const decision = await this.route(resolution);
    const frozenArgs = Object.freeze([...args]);
    const { registration, runtime } = this;

    const outcome = await executeWithPolicy<R>({
      experiment: registration.name,
      candidates: registration.candidates.get(decision.executionKey) ?? [decision.executionKey],
      defaultKey: registration.defaultKey,
      isTrialDisabled: trialKey => this.isTrialDisabled(trialKey),
      attempt: ({ trialKey, attempt }) => {
        const context: InvocationContext = Object.freeze({
          service: registration.service,
          experiment: registration.name,
          methodName,
          trialKey,
          selectedKey: decision.selectedKey,
          attempt,
          isFallback: trialKey !== decision.selectedKey,
          arguments: frozenArgs,
          signal: resolution.signal,
          resolution,
        });
        return composeDecorators<R>(runtime.decorators, context, final =>
          this.invokeTrial<R>(final, resolution, trialKey, methodName, frozenArgs)
        );
      },
    });

    publishAssignment(runtime.auditSink, {
      experiment: registration.name,
      service: registration.service,
      methodName,
      selectedKey: decision.selectedKey,
      executedKey: outcome.executedKey,
      isFallback: outcome.executedKey !== decision.selectedKey,
      routing: decision.routing,
      attemptedKeys: outcome.attemptedKeys,
      timestamp: runtime.clock(),
      durationMs: performance.now() - started,
      ...(outcome.ok ? {} : { error: outcome.error }),
    });
    emitCounter('experiment_dispatch', 1, {
      service: registration.service,
      trial: outcome.executedKey,
      routing: decision.routing,
      outcome: outcome.ok ? 'success' : 'failure',
    });

    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.value;
  }

  private createResolutionContext(options: InvocationOptions): ResolutionContext {
    const ambient = getRequestContext();
    return Object.freeze({
      service: this.registration.service,
      experiment: this.registration.name,
      requestId: options.requestId ?? getRequestId(),
      subjectId: options.subjectId ?? ambient?.subjectId,
      attributes: Object.freeze({ ...ambient?.attributes, ...options.attributes }),
      signal: options.signal ?? ambient?.signal,
    });
  }

  private async route(resolution: ResolutionContext): Promise<RoutingDecision> {
    const { registration, runtime } = this;
    const defaultKey = registration.defaultKey;

    if (!isExperimentActive(registration, runtime.clock(), resolution)) {
      return { selectedKey: defaultKey, executionKey: defaultKey, routing: 'inactive' };
    }

    try {
      if (runtime.killSwitch.isExperimentDisabled(registration.service)) {
        return { selectedKey: defaultKey, executionKey: defaultKey, routing: 'experiment-disabled' };
      }
    } catch (error) {
      logger.error('Kill switch check failed, using default trial', toError(error), {
        experiment: registration.name,
      });
      return { selectedKey: defaultKey, executionKey: defaultKey, routing: 'kill-switch-unavailable' };
    }

    const selection = await evaluateSelection(registration, resolution);
    if (selection.key !== defaultKey && this.isTrialDisabled(selection.key)) {
      return { selectedKey: selection.key, executionKey: defaultKey, routing: 'trial-disabled' };
    }

    return {
      selectedKey: selection.key,
      executionKey: selection.key,
      routing: selection.fellBack ? 'selection-fallback' : 'selected',
    };
  }

  /** A kill switch that cannot answer counts as disabled */
  private isTrialDisabled(trialKey: string): boolean {
    try {
      return this.runtime.killSwitch.isTrialDisabled(this.registration.service, trialKey);
    } catch (error) {
      logger.error('Kill switch check failed', toError(error), {
        experiment: this.registration.name,
        trial: trialKey,
      });
      return true;
    }
  }

  private async invokeTrial<R>(
    context: InvocationContext,
    resolution: ResolutionContext,
    trialKey: string,
    methodName: string,
    args: readonly unknown[]
  ): Promise<R> {
    const trial = this.registration.trials.get(trialKey);
    if (!trial) {
      throw new TrialMethodNotFoundError(this.registration.service, trialKey, methodName);
    }

    const instance = trial.factory(
      context.signal === resolution.signal ? resolution : Object.freeze({ ...resolution, signal: context.signal })
    );
    const member: unknown = Reflect.get(instance, methodName);
    if (typeof member !== 'function') {
      throw new TrialMethodNotFoundError(this.registration.service, trialKey, methodName);
    }
    return await Reflect.apply(member, instance, [...args]);
  }
}

/**
 * Decorator Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';

import { addLogHandler, clearLogHandlers, type LogEntry } from '@kernel/logger';
import { addMetricHandler, type Metric } from '@kernel/metrics';
import { TrialTimeoutError } from '@errors';

import {
  benchmarkDecorator,
  builtInDecoratorFactories,
  errorLoggingDecorator,
  OutcomeDecorator,
  TimeoutDecorator,
  TracingDecorator,
} from '../decorators';
import { composeDecorators, type ExperimentDecorator } from '../decorators/types';
import { InMemoryOutcomeStore, OutcomeRecorder } from '../outcomes';
import type { InvocationContext } from '../types';
import { testSettings } from './fixtures';

const context: InvocationContext = Object.freeze({
  service: 'Checkout',
  experiment: 'checkout-v2',
  methodName: 'total',
  trialKey: 'v2',
  selectedKey: 'v2',
  attempt: 1,
  isFallback: false,
  arguments: ['cart-1'],
  resolution: { service: 'Checkout', experiment: 'checkout-v2', requestId: 'req-1', attributes: {} },
});

describe('composeDecorators', () => {
  it('should pass a derived context inward', async () => {
    const controller = new AbortController();
    const withSignal: ExperimentDecorator = {
      name: 'with-signal',
      invoke: <R>(ctx: InvocationContext, next: (ctx?: InvocationContext) => Promise<R>) =>
        next({ ...ctx, signal: controller.signal }),
    };

    const seen = await composeDecorators([withSignal], context, async ctx => ctx.signal);

    expect(seen).toBe(controller.signal);
  });

  it('should call the terminal directly without decorators', async () => {
    await expect(composeDecorators([], context, async ctx => ctx.trialKey)).resolves.toBe('v2');
  });
});

describe('built-in decorators', () => {
  afterEach(() => {
    process.env['LOG_LEVEL'] = 'fatal';
  });

  it('should emit a timer per attempt from the benchmark decorator', async () => {
    const metrics: Metric[] = [];
    addMetricHandler(metric => {
      metrics.push(metric);
    });

    await benchmarkDecorator.invoke(context, async () => 42);

    const timers = metrics.filter(m => m.name === 'experiment_invocation_duration_ms');
    expect(timers).toHaveLength(1);
    expect(timers[0]?.labels).toEqual({ service: 'Checkout', method: 'total', trial: 'v2', outcome: 'success' });
  });

  it('should log and rethrow from the error logging decorator', async () => {
    process.env['LOG_LEVEL'] = 'error';
    clearLogHandlers();
    const entries: LogEntry[] = [];
    addLogHandler(entry => entries.push(entry));
    const failure = new Error('v2 down');

    await expect(errorLoggingDecorator.invoke(context, async () => Promise.reject(failure))).rejects.toBe(failure);

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: 'error',
      message: '[ExperimentErrors] Trial attempt failed',
      errorMessage: 'v2 down',
      metadata: expect.objectContaining({ trial: 'v2', method: 'total', attempt: 1 }),
    });
  });

  it('should record outcomes for success and failure', async () => {
    const recorder = new OutcomeRecorder(new InMemoryOutcomeStore());
    const decorator = new OutcomeDecorator(recorder);

    await decorator.invoke(context, async () => 1);
    await expect(
      decorator.invoke({ ...context, trialKey: 'control' }, async () => Promise.reject(new TypeError('bad')))
    ).rejects.toBeInstanceOf(TypeError);

    const summary = await recorder.summarize('checkout-v2');
    expect(summary.map(({ meanDurationMs: _ignored, ...rest }) => rest)).toEqual([
      { trialKey: 'control', attempts: 1, successes: 0, failures: 1, successRate: 0 },
      { trialKey: 'v2', attempts: 1, successes: 1, failures: 0, successRate: 1 },
    ]);
  });

  it('should fail a slow attempt with TrialTimeoutError and abort its signal', async () => {
    vi.useFakeTimers();
    try {
      const seen: InvocationContext[] = [];
      const decorator = new TimeoutDecorator(25);
      const pending = decorator.invoke(context, ctx => {
        if (ctx) seen.push(ctx);
        return new Promise<number>(() => undefined);
      });
      const assertion = expect(pending).rejects.toThrow("Trial 'v2' of 'Checkout' timed out after 25ms");

      await vi.advanceTimersByTimeAsync(25);
      await assertion;
      expect(seen[0]?.signal?.aborted).toBe(true);
      expect(seen[0]?.signal?.reason).toBeInstanceOf(TrialTimeoutError);
      expect(Object.isFrozen(seen[0])).toBe(true);
      expect(seen[0]?.trialKey).toBe('v2');
    } finally {
      vi.useRealTimers();
    }
  });

  it('should reject a non-positive timeout', () => {
    expect(() => new TimeoutDecorator(0)).toThrow(RangeError);
  });

  it('should pass results through the tracing decorator without an SDK', async () => {
    await expect(new TracingDecorator().invoke(context, async () => 'traced')).resolves.toBe('traced');
  });
});

describe('builtInDecoratorFactories', () => {
  it('should include only error logging by default', () => {
    expect(builtInDecoratorFactories(testSettings({
      decorators: { benchmarks: false, errorLogging: true, outcomes: false, tracing: false },
    })).map(f => f.name)).toEqual(['error-logging']);
  });

  it('should order every enabled built-in with timeout innermost', () => {
    const factories = builtInDecoratorFactories(testSettings({
      decorators: { benchmarks: true, errorLogging: true, outcomes: true, tracing: true },
      trialTimeoutMs: 500,
    }));

    expect(factories.map(f => f.name)).toEqual(['tracing', 'benchmark', 'error-logging', 'outcome', 'timeout']);
  });
});

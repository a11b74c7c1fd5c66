/**
 * Shared test fixtures for the experiment router
 */

import type { RouterSettings } from '@config';

import { defineService } from '../types';

export interface Checkout {
  total(cartId: string): Promise<number>;
  label(): string;
}

export const CheckoutService = defineService<Checkout>('Checkout');

export class FixedCheckout implements Checkout {
  constructor(private readonly name: string, private readonly amount: number) {}

  async total(_cartId: string): Promise<number> {
    return this.amount;
  }

  label(): string {
    return this.name;
  }
}

export class FailingCheckout implements Checkout {
  constructor(private readonly error: Error) {}

  async total(_cartId: string): Promise<number> {
    throw this.error;
  }

  label(): string {
    throw this.error;
  }
}

/** Settings with every built-in decorator off */
export function testSettings(overrides: Partial<RouterSettings> = {}): RouterSettings {
  return {
    decorators: { benchmarks: false, errorLogging: false, outcomes: false, tracing: false },
    trialTimeoutMs: 0,
    outcomeBufferSize: 100,
    killSwitch: { key: 'experiments:kill-switch', disabledExperiments: [] },
    ...overrides,
  };
}

export const NOW = new Date('2026-06-01T12:00:00.000Z');
export const fixedClock = (): Date => NOW;

import { describe, it, expect } from 'vitest';

import { isExperimentActive } from '../activation';
import type { ResolutionContext } from '../types';

const context: ResolutionContext = {
  service: 'Checkout',
  experiment: 'checkout',
  requestId: 'req-1',
  attributes: { tier: 'gold' },
};

const from = new Date('2026-01-01T00:00:00.000Z');
const until = new Date('2026-02-01T00:00:00.000Z');

describe('isExperimentActive', () => {
  it('should be active without a window or predicate', () => {
    expect(isExperimentActive({ name: 'checkout' }, new Date(), context)).toBe(true);
  });

  it('should include both window bounds', () => {
    const registration = { name: 'checkout', activeFrom: from, activeUntil: until };

    expect(isExperimentActive(registration, from, context)).toBe(true);
    expect(isExperimentActive(registration, until, context)).toBe(true);
    expect(isExperimentActive(registration, new Date(from.getTime() - 1), context)).toBe(false);
    expect(isExperimentActive(registration, new Date(until.getTime() + 1), context)).toBe(false);
  });

  it('should consult the predicate inside the window', () => {
    const registration = {
      name: 'checkout',
      activation: (ctx: ResolutionContext) => ctx.attributes['tier'] === 'gold',
    };

    expect(isExperimentActive(registration, from, context)).toBe(true);
    expect(isExperimentActive(registration, from, { ...context, attributes: {} })).toBe(false);
  });

  it('should treat a throwing predicate as inactive', () => {
    const registration = {
      name: 'checkout',
      activation: (): boolean => {
        throw new Error('targeting service down');
      },
    };

    expect(isExperimentActive(registration, from, context)).toBe(false);
  });
});

/**
 * Sticky Routing Tests
 */

import { describe, it, expect } from 'vitest';

import { selectStickyTrial, stickyBucket } from '../selection/sticky-router';

describe('selectStickyTrial', () => {
  it('should return the same trial for the same subject every time', () => {
    const first = selectStickyTrial('user-1', 'checkout', ['a', 'b', 'c']);
    for (let i = 0; i < 20; i++) {
      expect(selectStickyTrial('user-1', 'checkout', ['a', 'b', 'c'])).toBe(first);
    }
  });

  it('should not depend on declaration order', () => {
    for (const subject of ['user-1', 'user-2', 'user-3', 'user-4']) {
      expect(selectStickyTrial(subject, 'checkout', ['c', 'a', 'b'])).toBe(
        selectStickyTrial(subject, 'checkout', ['a', 'b', 'c'])
      );
    }
  });

  it('should always pick the only trial', () => {
    expect(selectStickyTrial('anyone', 'checkout', ['only'])).toBe('only');
  });

  it('should reject an empty trial list', () => {
    expect(() => selectStickyTrial('user-1', 'checkout', [])).toThrow(RangeError);
  });

  it('should spread subjects across trials', () => {
    const picked = new Set<string>();
    for (let i = 0; i < 200; i++) {
      picked.add(selectStickyTrial(`user-${i}`, 'checkout', ['a', 'b']));
    }
    expect([...picked].sort()).toEqual(['a', 'b']);
  });

  it('should map the bucket onto ordinally sorted keys', () => {
    const keys = ['b', 'B', 'a'];
    const sorted = ['B', 'a', 'b'];
    for (const subject of ['s1', 's2', 's3', 's4', 's5']) {
      expect(selectStickyTrial(subject, 'salt', keys)).toBe(sorted[stickyBucket(subject, 'salt', 3)]);
    }
  });
});

describe('stickyBucket', () => {
  it('should stay within range', () => {
    for (let i = 0; i < 50; i++) {
      const bucket = stickyBucket(`subject-${i}`, 'selector', 7);
      expect(bucket).toBeGreaterThanOrEqual(0);
      expect(bucket).toBeLessThan(7);
    }
  });

  it('should reject a non-positive bucket count', () => {
    expect(() => stickyBucket('s', 'x', 0)).toThrow(RangeError);
  });
});

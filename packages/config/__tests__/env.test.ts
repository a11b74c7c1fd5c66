/**
 * Environment Variable Utilities Tests
 */

import { afterEach, describe, expect, it } from 'vitest';

import { getEnvVar, parseArrayEnv, parseBoolEnv, parseIntEnv } from '../env';

const VAR = 'ROUTER_ENV_TEST_VALUE';

describe('env helpers', () => {
  afterEach(() => {
    delete process.env[VAR];
  });

  describe('getEnvVar', () => {
    it('should return the raw value', () => {
      process.env[VAR] = ' spaced ';
      expect(getEnvVar(VAR)).toBe(' spaced ');
    });

    it('should return undefined when unset', () => {
      expect(getEnvVar(VAR)).toBeUndefined();
    });
  });

  describe('parseIntEnv', () => {
    it('should parse trimmed integers', () => {
      process.env[VAR] = ' 42 ';
      expect(parseIntEnv(VAR, 5)).toBe(42);
    });

    it('should use the default when unset or blank', () => {
      expect(parseIntEnv(VAR, 5)).toBe(5);
      process.env[VAR] = '   ';
      expect(parseIntEnv(VAR, 5)).toBe(5);
    });

    it('should use the default for non-integers', () => {
      process.env[VAR] = '1.5';
      expect(parseIntEnv(VAR, 5)).toBe(5);
      process.env[VAR] = 'ten';
      expect(parseIntEnv(VAR, 5)).toBe(5);
    });
  });

  describe('parseBoolEnv', () => {
    it('should recognize true and false spellings', () => {
      process.env[VAR] = 'TRUE';
      expect(parseBoolEnv(VAR, false)).toBe(true);
      process.env[VAR] = '1';
      expect(parseBoolEnv(VAR, false)).toBe(true);
      process.env[VAR] = 'false';
      expect(parseBoolEnv(VAR, true)).toBe(false);
      process.env[VAR] = '0';
      expect(parseBoolEnv(VAR, true)).toBe(false);
    });

    it('should keep the default for unrecognized values', () => {
      process.env[VAR] = 'yes';
      expect(parseBoolEnv(VAR, false)).toBe(false);
      expect(parseBoolEnv(VAR, true)).toBe(true);
    });
  });

  describe('parseArrayEnv', () => {
    it('should split, trim and drop empty entries', () => {
      process.env[VAR] = 'Checkout, Pricing,,Search ';
      expect(parseArrayEnv(VAR)).toEqual(['Checkout', 'Pricing', 'Search']);
    });

    it('should accept a custom separator', () => {
      process.env[VAR] = 'a|b';
      expect(parseArrayEnv(VAR, '|')).toEqual(['a', 'b']);
    });

    it('should return an empty list when unset', () => {
      expect(parseArrayEnv(VAR)).toEqual([]);
    });
  });
});

/**
 * Environment Variable Utilities
 *
 * Safe parsing of environment variables with explicit defaults.
 */

import { getLogger } from '@kernel/logger';

const logger = getLogger('config');

/**
 * Get environment variable value
 */
export function getEnvVar(name: string): string | undefined {
  return process.env[name];
}

/**
 * Parse integer environment variable with default.
 * Whitespace-only and non-integer values fall back to the default.
 */
export function parseIntEnv(name: string, defaultValue: number): number {
  const value = process.env[name];
  if (!value) return defaultValue;
  const trimmed = value.trim();
  if (!trimmed) return defaultValue;
  const parsed = Number(trimmed);
  if (!Number.isInteger(parsed)) {
    logger.warn('Unrecognized integer value, using default', { name, value, defaultValue });
    return defaultValue;
  }
  return parsed;
}

/**
 * Parse boolean environment variable with default.
 * Only `true`/`false`/`1`/`0` are recognized; anything else keeps the default
 * so that a typo cannot silently flip a toggle.
 */
export function parseBoolEnv(name: string, defaultValue: boolean): boolean {
  const value = process.env[name];
  if (!value) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  logger.warn('Unrecognized boolean value, using default', { name, value, defaultValue });
  return defaultValue;
}

/**
 * Parse a separated list environment variable
 */
export function parseArrayEnv(name: string, separator = ','): string[] {
  const value = process.env[name];
  if (!value) return [];
  return value.split(separator).map(s => s.trim()).filter(Boolean);
}

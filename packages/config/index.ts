/**
 * Shared Configuration Package
 *
 * Environment parsing and validation for the experiment router.
 *
 * @example
 * ```typescript
 * import { validateRouterSettings } from '@config';
 *
 * // Validate at startup, before building the registry
 * const settings = validateRouterSettings();
 * ```
 *
 * @module @config
 */

// ============================================================================
// Environment Utilities
// ============================================================================
export { getEnvVar, parseIntEnv, parseBoolEnv, parseArrayEnv } from './env';

// ============================================================================
// Environment Validation Schema
// ============================================================================
export {
  routerEnvSchema,
  validateRouterEnv,
  type RouterEnv,
  type RouterEnvIssue,
  type RouterEnvValidationResult,
} from './schema';

// ============================================================================
// Router Settings
// ============================================================================
export {
  DEFAULT_KILL_SWITCH_KEY,
  loadRouterSettings,
  validateRouterSettings,
  type RouterSettings,
} from './experiments';

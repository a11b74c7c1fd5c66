/**
 * Environment Validation Schema
 *
 * Zod schema for the variables the router reads. Used by validateRouterEnv()
 * for fail-fast boot validation; individual settings are still parsed through
 * the env helpers so that a process without validation keeps working defaults.
 *
 * @module @config/schema
 */

import { z } from 'zod';

const boolFlag = z.enum(['true', 'false', '1', '0']);

export const routerEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).optional(),

  // -- Decorator toggles --
  EXPERIMENTS_BENCHMARKS_ENABLED: boolFlag.optional(),
  EXPERIMENTS_ERROR_LOGGING_ENABLED: boolFlag.optional(),
  EXPERIMENTS_OUTCOMES_ENABLED: boolFlag.optional(),
  EXPERIMENTS_TRACING_ENABLED: boolFlag.optional(),

  // -- Limits --
  EXPERIMENTS_TRIAL_TIMEOUT_MS: z.coerce.number().int().min(0).max(300000).optional(),
  EXPERIMENTS_OUTCOME_BUFFER_SIZE: z.coerce.number().int().positive().max(1_000_000).optional(),

  // -- Kill switch --
  EXPERIMENTS_KILL_SWITCH_KEY: z.string().min(1).regex(/^[a-zA-Z0-9:_-]+$/, {
    message: 'EXPERIMENTS_KILL_SWITCH_KEY must contain only alphanumerics, colons, hyphens and underscores',
  }).optional(),
  EXPERIMENTS_DISABLED: z.string().optional(),
  REDIS_URL: z.string().url().optional(),
});

export type RouterEnv = z.infer<typeof routerEnvSchema>;

export interface RouterEnvIssue {
  key: string;
  reason: string;
}

export interface RouterEnvValidationResult {
  valid: boolean;
  issues: RouterEnvIssue[];
}

/**
 * Validate the router's environment variables.
 * Empty strings are treated as unset, matching the env parsing helpers.
 */
export function validateRouterEnv(env: NodeJS.ProcessEnv = process.env): RouterEnvValidationResult {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const result = routerEnvSchema.safeParse(present);
  if (result.success) {
    return { valid: true, issues: [] };
  }

  const issues: RouterEnvIssue[] = [];
  for (const issue of result.error.issues) {
    const key = String(issue.path[0] ?? '(root)');
    if (!issues.some(i => i.key === key)) {
      issues.push({ key, reason: issue.message });
    }
  }
  return { valid: false, issues };
}

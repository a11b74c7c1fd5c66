/**
 * Experiment Router Settings
 *
 * Runtime toggles for the built-in decorators and buffer sizes. Observability
 * decorators that add per-call overhead default to off; error logging defaults
 * to on.
 */

import { getLogger } from '@kernel/logger';

import { parseArrayEnv, parseBoolEnv, parseIntEnv, getEnvVar } from './env';
import { validateRouterEnv } from './schema';

const logger = getLogger('RouterSettings');

export const DEFAULT_KILL_SWITCH_KEY = 'experiments:kill-switch';

export interface RouterSettings {
  decorators: {
    /** Log and time every trial attempt */
    benchmarks: boolean;
    /** Log failed trial attempts before the error policy sees them */
    errorLogging: boolean;
    /** Record success/failure/latency per attempt */
    outcomes: boolean;
    /** OpenTelemetry span per attempt */
    tracing: boolean;
  };
  /** Per-attempt timeout in milliseconds; 0 disables the timeout decorator */
  trialTimeoutMs: number;
  outcomeBufferSize: number;
  killSwitch: {
    /** Redis key holding the persisted kill switch snapshot */
    key: string;
    /** Service names disabled at startup */
    disabledExperiments: string[];
    redisUrl?: string | undefined;
  };
}

/**
 * Read router settings from the environment.
 * Evaluated on every call; settings are captured once when a registry is built.
 */
export function loadRouterSettings(): RouterSettings {
  return {
    decorators: {
      benchmarks: parseBoolEnv('EXPERIMENTS_BENCHMARKS_ENABLED', false),
      errorLogging: parseBoolEnv('EXPERIMENTS_ERROR_LOGGING_ENABLED', true),
      outcomes: parseBoolEnv('EXPERIMENTS_OUTCOMES_ENABLED', false),
      tracing: parseBoolEnv('EXPERIMENTS_TRACING_ENABLED', false),
    },
    trialTimeoutMs: Math.max(0, parseIntEnv('EXPERIMENTS_TRIAL_TIMEOUT_MS', 0)),
    outcomeBufferSize: Math.max(1, parseIntEnv('EXPERIMENTS_OUTCOME_BUFFER_SIZE', 10000)),
    killSwitch: {
      key: getEnvVar('EXPERIMENTS_KILL_SWITCH_KEY')?.trim() || DEFAULT_KILL_SWITCH_KEY,
      disabledExperiments: parseArrayEnv('EXPERIMENTS_DISABLED'),
      redisUrl: getEnvVar('REDIS_URL'),
    },
  };
}

/**
 * Validate the environment and log the effective settings.
 * @throws Error listing every invalid variable
 */
export function validateRouterSettings(): RouterSettings {
  const result = validateRouterEnv();
  if (!result.valid) {
    const summary = result.issues.map(i => `${i.key}: ${i.reason}`).join('; ');
    logger.error('Invalid router configuration', undefined, { issues: result.issues });
    throw new Error(`Invalid router configuration: ${summary}`);
  }

  const settings = loadRouterSettings();
  const enabled = Object.entries(settings.decorators)
    .filter(([, on]) => on)
    .map(([name]) => name);
  logger.info('Router settings loaded', {
    decorators: enabled,
    trialTimeoutMs: settings.trialTimeoutMs,
    disabledExperiments: settings.killSwitch.disabledExperiments,
  });

  if (process.env['NODE_ENV'] === 'production' && settings.killSwitch.disabledExperiments.length > 0) {
    logger.warn('Experiments disabled from environment', { experiments: settings.killSwitch.disabledExperiments });
  }

  return settings;
}

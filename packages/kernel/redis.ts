/**
 * Redis Client
 *
 * Lazily created, shared Redis connection for state that must outlive a
 * process (persisted kill switches). Nothing on the dispatch hot path talks
 * to Redis; callers load state at startup and write through on change.
 */

import Redis from 'ioredis';
import { Mutex } from 'async-mutex';
import { getLogger, toError } from './logger';

let redis: Redis | null = null;
// Serializes creation and reset so concurrent cold-start callers share one connection
const redisMutex = new Mutex();

const logger = getLogger('RedisClient');

const FATAL_ERROR_PATTERNS = ['ECONNREFUSED', 'ENOTFOUND', 'ECONNRESET', 'ERR AUTH'];

export interface RedisConnectionOptions {
  /** Defaults to REDIS_URL */
  url?: string | undefined;
  /** Defaults to `<NODE_ENV>:experiments:` */
  keyPrefix?: string | undefined;
}

/**
 * Get the shared Redis connection, creating it on first use.
 * @throws Error when no URL is given and REDIS_URL is unset
 */
export async function getRedis(options: RedisConnectionOptions = {}): Promise<Redis> {
  if (redis) return redis;

  return redisMutex.runExclusive(async () => {
    if (redis) return redis;

    const redisUrl = options.url ?? process.env['REDIS_URL'];
    if (!redisUrl) {
      throw new Error('REDIS_URL environment variable is required');
    }

    const env = process.env['NODE_ENV'] || 'development';
    const newRedis = new Redis(redisUrl, {
      keyPrefix: options.keyPrefix ?? `${env}:experiments:`,
      retryStrategy: (times: number): number => Math.min(times * 50, 2000),
      maxRetriesPerRequest: 3,
    });

    newRedis.on('error', (err: Error) => {
      logger.error('Redis connection error', err);
      if (!FATAL_ERROR_PATTERNS.some(p => err.message.includes(p))) {
        return;
      }
      logger.warn('Fatal Redis error detected, resetting connection for recovery');
      redisMutex.runExclusive(async () => {
        // Another caller may already have replaced the instance
        if (redis === newRedis) {
          redis = null;
          newRedis.disconnect();
        }
      }).catch((mutexErr: unknown) => {
        logger.error('Failed to reset Redis connection', toError(mutexErr));
      });
    });

    redis = newRedis;
    return redis;
  });
}

/**
 * Quit the shared connection, waiting for pending replies
 */
export async function closeRedis(): Promise<void> {
  await redisMutex.runExclusive(async () => {
    if (!redis) return;
    const current = redis;
    redis = null;
    try {
      await current.quit();
    } catch (err) {
      logger.error('Error closing Redis connection', toError(err));
    }
  });
}

export { Redis };

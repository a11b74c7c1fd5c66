/**
 * Redis-backed kill switch store
 *
 * The whole state lives as one JSON document under a single key; it is small
 * and always written as a unit.
 */

import { loadRouterSettings } from '@config';
import { getRedis } from '@kernel/redis';
import { getLogger } from '@kernel/logger';
import { getErrorMessage } from '@errors';

import { killSwitchStateSchema, type KillSwitchState, type KillSwitchStore } from './types';

const logger = getLogger('RedisKillSwitchStore');

/** Subset of the ioredis client the store needs */
export interface KeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
}

export interface RedisKillSwitchStoreOptions {
  /** Defaults to EXPERIMENTS_KILL_SWITCH_KEY */
  key?: string | undefined;
  /** Client to use; defaults to the shared connection from @kernel/redis */
  client?: KeyValueClient | (() => Promise<KeyValueClient>);
  /** Defaults to REDIS_URL */
  redisUrl?: string | undefined;
}

function parseJson(raw: string): { ok: true; value: unknown } | { ok: false; message: string } {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch (error) {
    return { ok: false, message: getErrorMessage(error) };
  }
}

export class RedisKillSwitchStore implements KillSwitchStore {
  private readonly key: string;
  private readonly resolveClient: () => Promise<KeyValueClient>;

  constructor(options: RedisKillSwitchStoreOptions = {}) {
    const defaults = loadRouterSettings().killSwitch;
    this.key = options.key ?? defaults.key;
    const client = options.client;
    if (typeof client === 'function') {
      this.resolveClient = client;
    } else if (client) {
      this.resolveClient = async () => client;
    } else {
      const url = options.redisUrl ?? defaults.redisUrl;
      this.resolveClient = () => getRedis(url !== undefined ? { url } : {});
    }
  }

  async load(): Promise<KillSwitchState | undefined> {
    const client = await this.resolveClient();
    const raw = await client.get(this.key);
    if (raw === null) {
      return undefined;
    }

    const json = parseJson(raw);
    if (!json.ok) {
      logger.warn('Ignoring kill switch state that is not valid JSON', { key: this.key, reason: json.message });
      return undefined;
    }

    const parsed = killSwitchStateSchema.safeParse(json.value);
    if (!parsed.success) {
      logger.warn('Ignoring malformed kill switch state', {
        key: this.key,
        issues: parsed.error.issues.map(i => i.message),
      });
      return undefined;
    }
    return parsed.data;
  }

  async save(state: KillSwitchState): Promise<void> {
    const client = await this.resolveClient();
    await client.set(this.key, JSON.stringify(state));
  }
}

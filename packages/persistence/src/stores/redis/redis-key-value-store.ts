/**
 * Redis Key-Value Store
 *
 * One Redis hash per namespace, so a namespace's keys can be written or
 * removed with a single command.
 *
 * Key layout:
 * ```
 * <prefix>vault:<namespace>  ->  HASH { access_token, expires_at, refresh_token, user_id }
 * ```
 *
 * Setup:
 * Set REDIS_URL environment variable (e.g., redis://localhost:6379)
 * Optionally set REDIS_KEY_PREFIX to isolate several deployments
 */

import type { Redis } from 'ioredis';
import type { NamespacedKeyValueStore } from '../../interfaces/key-value-store.js';
import { StoreError } from '../../errors.js';
import { logger } from '../../logger.js';
import { createRedisClient, getRedisKeyPrefix, maskRedisUrl } from './redis-utils.js';

const KEY_PREFIX = 'vault:';

export interface RedisKeyValueStoreOptions {
  /** Redis connection URL (default: REDIS_URL) */
  redisUrl?: string;

  /** Prefix for multi-app isolation (default: REDIS_KEY_PREFIX or '') */
  keyPrefix?: string;
}

export class RedisKeyValueStore implements NamespacedKeyValueStore {
  private readonly redis: Redis;
  private readonly keyPrefix: string;

  constructor(options: RedisKeyValueStoreOptions = {}) {
    const url = options.redisUrl ?? process.env.REDIS_URL;
    if (!url) {
      throw new Error('Redis URL not configured. Set REDIS_URL environment variable.');
    }

    this.redis = createRedisClient(url, 'credential vault');
    this.keyPrefix = options.keyPrefix ?? getRedisKeyPrefix();

    logger.info('RedisKeyValueStore initialized', {
      url: maskRedisUrl(url),
      keyPrefix: this.keyPrefix,
    });
  }

  private hashKey(namespace: string): string {
    return `${this.keyPrefix}${KEY_PREFIX}${namespace}`;
  }

  private async run<T>(operation: string, namespace: string, command: () => Promise<T>): Promise<T> {
    try {
      return await command();
    } catch (error) {
      logger.error('Redis command failed', {
        operation,
        namespace,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new StoreError(`Redis ${operation} failed for namespace ${namespace}`, { cause: error });
    }
  }

  async put(namespace: string, key: string, value: string): Promise<void> {
    await this.run('put', namespace, () => this.redis.hset(this.hashKey(namespace), key, value));
  }

  async get(namespace: string, key: string): Promise<string | undefined> {
    const value = await this.run('get', namespace, () => this.redis.hget(this.hashKey(namespace), key));
    return value ?? undefined;
  }

  async remove(namespace: string, key: string): Promise<void> {
    await this.run('remove', namespace, () => this.redis.hdel(this.hashKey(namespace), key));
  }

  async contains(namespace: string, key: string): Promise<boolean> {
    const exists = await this.run('contains', namespace, () => this.redis.hexists(this.hashKey(namespace), key));
    return exists === 1;
  }

  async putAll(namespace: string, entries: Record<string, string>): Promise<void> {
    if (Object.keys(entries).length === 0) {
      return;
    }
    // A single HSET with several fields is applied atomically by Redis
    await this.run('putAll', namespace, () => this.redis.hset(this.hashKey(namespace), entries));
  }

  async removeAll(namespace: string, keys: readonly string[]): Promise<void> {
    if (keys.length === 0) {
      return;
    }
    await this.run('removeAll', namespace, () => this.redis.hdel(this.hashKey(namespace), ...keys));
  }

  async dispose(): Promise<void> {
    await this.redis.quit();
    logger.info('RedisKeyValueStore disposed');
  }
}

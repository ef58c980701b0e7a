/**
 * Key-Value Store Factory
 *
 * Auto-detects the store implementation based on environment:
 * - Redis: RedisKeyValueStore (REDIS_URL set)
 * - Testing: MemoryKeyValueStore (fast, ephemeral, process-isolated)
 * - Otherwise: FileKeyValueStore (single-instance, persistent)
 */

import type { NamespacedKeyValueStore } from '../interfaces/key-value-store.js';
import { MemoryKeyValueStore } from '../stores/memory/memory-key-value-store.js';
import { FileKeyValueStore } from '../stores/file/file-key-value-store.js';
import { RedisKeyValueStore } from '../stores/redis/redis-key-value-store.js';
import { logger } from '../logger.js';

export type KeyValueStoreType = 'memory' | 'file' | 'redis' | 'auto';

export interface KeyValueStoreFactoryOptions {
  /**
   * Store type to create
   * - 'auto': Auto-detect based on environment (default)
   * - 'memory': In-memory store (not persistent)
   * - 'file': File-based store (persistent, single-instance)
   * - 'redis': Redis store (multi-instance deployments)
   */
  type?: KeyValueStoreType;

  /** File path for the file-based store (default: './data/vault.json') */
  filePath?: string;

  /** Redis URL (default: REDIS_URL) */
  redisUrl?: string;

  /** Redis key prefix (default: REDIS_KEY_PREFIX) */
  keyPrefix?: string;
}

function isTestEnvironment(): boolean {
  return process.env.NODE_ENV === 'test' || Boolean(process.env.VITEST);
}

export class KeyValueStoreFactory {
  /**
   * Create a store based on configuration
   */
  static create(options: KeyValueStoreFactoryOptions = {}): NamespacedKeyValueStore {
    const storeType = options.type ?? 'auto';

    switch (storeType) {
      case 'auto':
        return this.createAutoDetected(options);

      case 'memory':
        return new MemoryKeyValueStore();

      case 'file':
        return new FileKeyValueStore({ filePath: options.filePath });

      case 'redis':
        return new RedisKeyValueStore({ redisUrl: options.redisUrl, keyPrefix: options.keyPrefix });

      default:
        throw new Error(`Unknown key-value store type: ${String(storeType)}`);
    }
  }

  /**
   * Auto-detect the best store for current environment
   */
  private static createAutoDetected(options: KeyValueStoreFactoryOptions): NamespacedKeyValueStore {
    if (options.redisUrl ?? process.env.REDIS_URL) {
      logger.info('Creating Redis key-value store', { detected: true });
      return new RedisKeyValueStore({ redisUrl: options.redisUrl, keyPrefix: options.keyPrefix });
    }

    if (isTestEnvironment()) {
      logger.info('Creating in-memory key-value store (test environment)', { detected: true });
      return new MemoryKeyValueStore();
    }

    logger.info('Creating file-based key-value store', { detected: true });
    return new FileKeyValueStore({ filePath: options.filePath });
  }

  /**
   * Report which store auto-detection would pick, with deployment warnings
   */
  static validateEnvironment(type: KeyValueStoreType = 'auto'): {
    storeType: Exclude<KeyValueStoreType, 'auto'>;
    warnings: string[];
  } {
    let storeType: Exclude<KeyValueStoreType, 'auto'>;
    if (type !== 'auto') {
      storeType = type;
    } else if (process.env.REDIS_URL) {
      storeType = 'redis';
    } else if (isTestEnvironment()) {
      storeType = 'memory';
    } else {
      storeType = 'file';
    }

    const warnings: string[] = [];
    switch (storeType) {
      case 'memory':
        warnings.push('Memory store is not persistent - saved tokens are lost on restart');
        break;
      case 'file':
        warnings.push('File store not suitable for multi-instance deployments');
        break;
      case 'redis':
        if (!process.env.REDIS_URL) {
          warnings.push('REDIS_URL environment variable not configured');
        }
        break;
    }

    return { storeType, warnings };
  }
}

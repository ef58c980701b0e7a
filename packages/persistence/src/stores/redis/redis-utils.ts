/**
 * Shared Redis utility functions
 */

import { Redis } from 'ioredis';
import { logger } from '../../logger.js';

/**
 * Mask sensitive parts of Redis URL for logging
 *
 * @returns URL with the password replaced by ***
 */
export function maskRedisUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password) {
      parsed.password = '***';
    }
    return parsed.toString();
  } catch {
    return 'redis://***';
  }
}

/**
 * Key prefix for running several vaults on one Redis instance
 */
export function getRedisKeyPrefix(): string {
  return process.env.REDIS_KEY_PREFIX ?? '';
}

/**
 * Create a configured Redis client with standard connection handling
 *
 * @param redisUrl Redis connection URL (defaults to REDIS_URL env var)
 * @param connectionName Name for logging
 */
export function createRedisClient(redisUrl: string | undefined, connectionName: string): Redis {
  const url = redisUrl ?? process.env.REDIS_URL;
  if (!url) {
    throw new Error('Redis URL not configured. Set REDIS_URL environment variable.');
  }

  const redis = new Redis(url, {
    maxRetriesPerRequest: 3,
    retryStrategy: (times) => Math.min(times * 50, 2000),
    lazyConnect: true,
  });

  redis.on('error', (error: Error) => {
    logger.error('Redis connection error', { connectionName, error: error.message });
  });

  redis.on('connect', () => {
    logger.info(`Redis connected successfully for ${connectionName}`);
  });

  redis.connect().catch((error: unknown) => {
    logger.error('Failed to connect to Redis', {
      connectionName,
      error: error instanceof Error ? error.message : String(error),
    });
  });

  return redis;
}

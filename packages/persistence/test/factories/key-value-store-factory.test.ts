/**
 * Unit tests for KeyValueStoreFactory
 */

import { vi } from 'vitest';
import { createTempDir, preserveEnv, type TempDir } from '@credential-vault/testing';
import {
  FileKeyValueStore,
  KeyValueStoreFactory,
  MemoryKeyValueStore,
  RedisKeyValueStore,
} from '../../src/index.js';

vi.mock('ioredis', async () => {
  const { default: Mock } = await import('ioredis-mock');
  return { default: Mock, Redis: Mock };
});

describe('KeyValueStoreFactory', () => {
  let restoreEnv: () => void;
  let tempDir: TempDir;

  beforeEach(async () => {
    restoreEnv = preserveEnv();
    delete process.env.REDIS_URL;
    tempDir = await createTempDir('kv-factory-test-');
  });

  afterEach(async () => {
    restoreEnv();
    await tempDir.cleanup();
  });

  describe('create', () => {
    it('should create the requested store type', async () => {
      const memory = KeyValueStoreFactory.create({ type: 'memory' });
      const file = KeyValueStoreFactory.create({ type: 'file', filePath: tempDir.file('vault.json') });
      const redis = KeyValueStoreFactory.create({ type: 'redis', redisUrl: 'redis://localhost:6379' });

      expect(memory).toBeInstanceOf(MemoryKeyValueStore);
      expect(file).toBeInstanceOf(FileKeyValueStore);
      expect(redis).toBeInstanceOf(RedisKeyValueStore);

      await redis.dispose();
    });

    it('should pick memory under test when no Redis URL is set', () => {
      expect(KeyValueStoreFactory.create()).toBeInstanceOf(MemoryKeyValueStore);
    });

    it('should pick Redis when a URL is available', async () => {
      process.env.REDIS_URL = 'redis://localhost:6379';

      const store = KeyValueStoreFactory.create({ type: 'auto' });

      expect(store).toBeInstanceOf(RedisKeyValueStore);
      await store.dispose();
    });
  });

  describe('validateEnvironment', () => {
    it('should warn that memory is not persistent', () => {
      expect(KeyValueStoreFactory.validateEnvironment()).toEqual({
        storeType: 'memory',
        warnings: ['Memory store is not persistent - saved tokens are lost on restart'],
      });
    });

    it('should warn when Redis is selected without a URL', () => {
      expect(KeyValueStoreFactory.validateEnvironment('redis')).toEqual({
        storeType: 'redis',
        warnings: ['REDIS_URL environment variable not configured'],
      });
    });

    it('should detect Redis from REDIS_URL', () => {
      process.env.REDIS_URL = 'redis://localhost:6379';

      expect(KeyValueStoreFactory.validateEnvironment()).toEqual({ storeType: 'redis', warnings: [] });
    });

    it('should warn about multi-instance use of the file store', () => {
      expect(KeyValueStoreFactory.validateEnvironment('file').warnings).toEqual([
        'File store not suitable for multi-instance deployments',
      ]);
    });
  });
});

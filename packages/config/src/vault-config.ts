/**
 * Vault configuration schema
 * Store backend, key derivation and device salt settings
 */

import { z } from 'zod';

export const STORE_TYPES = ['memory', 'file', 'redis'] as const;
export type StoreType = (typeof STORE_TYPES)[number];

export const SALT_SOURCES = ['static', 'env', 'file'] as const;
export type SaltSourceType = (typeof SALT_SOURCES)[number];

/**
 * PBKDF2 iteration count used when VAULT_KDF_ITERATIONS is not set
 */
export const DEFAULT_KDF_ITERATIONS = 100_000;

export const VaultConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Host application identifier; the vault namespace is "<id>.sdk"
  VAULT_APP_ID: z.string().min(1).default('credential-vault'),

  // Store selection (auto-detect if not set)
  VAULT_STORE_TYPE: z.enum(STORE_TYPES).optional(),
  VAULT_FILE_PATH: z.string().min(1).default('./data/vault.json'),

  // Redis connection
  REDIS_URL: z.string().url().optional(),
  REDIS_KEY_PREFIX: z.string().optional().default(''),

  // Key derivation
  VAULT_KDF_ITERATIONS: z.number().int().min(1000).default(DEFAULT_KDF_ITERATIONS),

  // Device salt
  VAULT_SALT_SOURCE: z.enum(SALT_SOURCES).default('file'),
  VAULT_DEVICE_ID: z.string().optional(),
  VAULT_DEVICE_ID_FILE: z.string().min(1).default('/etc/machine-id'),
});

export type VaultConfiguration = z.infer<typeof VaultConfigSchema>;

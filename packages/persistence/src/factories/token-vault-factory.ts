/**
 * Token Vault Factory
 *
 * Wires a TokenVault from validated configuration: store backend, device
 * salt source, KDF iteration count and the application's namespace.
 */

import { VaultConfig, type VaultConfiguration } from '@credential-vault/config';
import { getLogger as getObservabilityLogger } from '@credential-vault/observability';
import type { NamespacedKeyValueStore } from '../interfaces/key-value-store.js';
import { CipherCodec } from '../encryption/cipher-codec.js';
import { setLogger, type PersistenceLogger } from '../logger.js';
import { TokenVault } from '../vault/token-vault.js';
import { resolveVaultNamespace } from '../vault/namespace.js';
import type { DeviceSaltSource } from '../vault/device-salt.js';
import { KeyValueStoreFactory } from './key-value-store-factory.js';
import { createDeviceSaltSource } from './device-salt-factory.js';

export interface TokenVaultFactoryOptions {
  /** Configuration (default: VaultConfig.get()) */
  config?: VaultConfiguration;

  /** Replace the configured store */
  store?: NamespacedKeyValueStore;

  /** Replace the configured salt source */
  saltSource?: DeviceSaltSource;

  /** Logger for the vault and stores (default: the observability logger) */
  logger?: PersistenceLogger;
}

export interface ConfiguredTokenVault {
  vault: TokenVault;
  store: NamespacedKeyValueStore;
  /** "<VAULT_APP_ID>.sdk" */
  namespace: string;
}

export function createTokenVault(options: TokenVaultFactoryOptions = {}): ConfiguredTokenVault {
  const config = options.config ?? VaultConfig.get();
  const vaultLogger = options.logger ?? getObservabilityLogger().child('vault');
  setLogger(vaultLogger);

  const store =
    options.store ??
    KeyValueStoreFactory.create({
      type: config.VAULT_STORE_TYPE ?? 'auto',
      filePath: config.VAULT_FILE_PATH,
      redisUrl: config.REDIS_URL,
      keyPrefix: config.REDIS_KEY_PREFIX,
    });

  const vault = new TokenVault({
    store,
    saltSource: options.saltSource ?? createDeviceSaltSource(config),
    codec: new CipherCodec({ iterations: config.VAULT_KDF_ITERATIONS }),
    logger: vaultLogger,
  });

  return { vault, store, namespace: resolveVaultNamespace(config.VAULT_APP_ID) };
}

/**
 * @credential-vault/persistence
 *
 * Password-derived-key credential vault over pluggable key-value stores.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createTokenVault } from '@credential-vault/persistence';
 *
 * const { vault, namespace } = createTokenVault();
 *
 * await vault.save(namespace, passphrase, {
 *   access_token: 'abc123',
 *   expires_at: 1700000000,
 *   refresh_token: 'ref456',
 *   user_id: 'u-42',
 * });
 *
 * const record = await vault.load(namespace, passphrase); // undefined when empty
 * await vault.clear(namespace);
 * ```
 *
 * ## Storage Backends
 *
 * - Memory: ephemeral, for development and tests
 * - File: one JSON document, atomic rename on every write
 * - Redis: one hash per namespace, requires REDIS_URL
 */

// ============================================================================
// Errors
// ============================================================================

export * from './errors.js';

// ============================================================================
// Encryption
// ============================================================================

export * from './encryption/index.js';

// ============================================================================
// Vault
// ============================================================================

export * from './vault/access-token.js';
export * from './vault/namespace.js';
export * from './vault/device-salt.js';
export * from './vault/token-vault.js';

// ============================================================================
// Store Interface and Implementations
// ============================================================================

export * from './interfaces/key-value-store.js';
export * from './stores/memory/memory-key-value-store.js';
export * from './stores/file/file-key-value-store.js';
export * from './stores/redis/redis-key-value-store.js';
export { maskRedisUrl } from './stores/redis/redis-utils.js';

// ============================================================================
// Factory Functions (Recommended API)
// ============================================================================

export * from './factories/key-value-store-factory.js';
export * from './factories/device-salt-factory.js';
export * from './factories/token-vault-factory.js';

// ============================================================================
// Logger Interface
// ============================================================================

export * from './logger.js';

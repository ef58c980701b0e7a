/**
 * Token Vault
 *
 * Persists an AccessTokenRecord as four independently encrypted values under
 * fixed keys in one namespace, and restores it.
 *
 * Consistency (per namespace):
 * - Empty: none of the four keys present; load() returns undefined
 * - Populated: all four keys present and individually decryptable
 *
 * A failed save, an incomplete record, or any field that fails to decrypt or
 * parse clears all four keys before the error reaches the caller, so no
 * partial record is ever returned or left behind as a stable state. The
 * clear is best-effort: the store's batch write is atomic, the compensation
 * after a failure is not linearizable against concurrent writers.
 *
 * The vault does no locking. Callers serialize operations per namespace.
 */

import type { NamespacedKeyValueStore } from '../interfaces/key-value-store.js';
import { CipherCodec } from '../encryption/cipher-codec.js';
import { CryptoError, FormatError, SaltUnavailableError, StoreError, isVaultError } from '../errors.js';
import { logger as defaultLogger, type PersistenceLogger } from '../logger.js';
import type { DeviceSaltSource } from './device-salt.js';
import {
  ACCESS_TOKEN_FIELDS,
  serializeAccessTokenFields,
  type AccessTokenField,
  type AccessTokenRecord,
} from './access-token.js';

const INTEGER_PATTERN = /^-?\d+$/;

export interface TokenVaultOptions {
  store: NamespacedKeyValueStore;
  saltSource: DeviceSaltSource;
  /** Codec to use (default: new CipherCodec() with the default iteration count) */
  codec?: CipherCodec;
  logger?: PersistenceLogger;
}

function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

export class TokenVault {
  private readonly store: NamespacedKeyValueStore;
  private readonly saltSource: DeviceSaltSource;
  private readonly codec: CipherCodec;
  private readonly logger: PersistenceLogger;

  constructor(options: TokenVaultOptions) {
    this.store = options.store;
    this.saltSource = options.saltSource;
    this.codec = options.codec ?? new CipherCodec();
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Encrypt and store a record, replacing any record already in the namespace
   *
   * @throws CryptoError | EncodingError | FormatError | SaltUnavailableError | StoreError
   *         after the namespace has been cleared
   */
  async save(namespace: string, passphrase: string, record: AccessTokenRecord): Promise<void> {
    try {
      if (!Number.isSafeInteger(record.expires_at)) {
        throw new FormatError(`expires_at must be an integer epoch value, got ${record.expires_at}`);
      }

      const key = await this.codec.deriveKey(passphrase, await this.resolveSalt());
      const plaintext = serializeAccessTokenFields(record);

      const entries: Record<string, string> = {};
      for (const field of ACCESS_TOKEN_FIELDS) {
        // The storage key is bound as associated data so fields cannot be swapped
        entries[field] = this.codec.seal(key, plaintext[field], field);
      }

      await this.storeCall('write', () => this.store.putAll(namespace, entries));

      this.logger.debug('Access token saved to vault', {
        namespace,
        fields: ACCESS_TOKEN_FIELDS.length,
        saltSource: this.saltSource.name,
      });
    } catch (error) {
      await this.clearAfterFailure(namespace, 'save', error);
      throw error;
    }
  }

  /**
   * Decrypt the record stored in a namespace
   *
   * @returns The record, or undefined if the namespace holds none of the four keys
   * @throws CryptoError | EncodingError | FormatError after clearing the namespace;
   *         SaltUnavailableError and StoreError without clearing it
   */
  async load(namespace: string, passphrase: string): Promise<AccessTokenRecord | undefined> {
    const stored = await this.readStoredFields(namespace);
    const missing = ACCESS_TOKEN_FIELDS.filter((field) => stored[field] === undefined);

    if (missing.length === ACCESS_TOKEN_FIELDS.length) {
      return undefined;
    }

    if (missing.length > 0) {
      const error = new FormatError(`Stored record is incomplete: missing ${missing.join(', ')}`);
      await this.clearAfterFailure(namespace, 'load', error);
      throw error;
    }

    // An unavailable salt leaves the record in place: it may decrypt once the source recovers
    const salt = await this.resolveSalt();

    try {
      const key = await this.codec.deriveKey(passphrase, salt);
      const field = (name: AccessTokenField): string => {
        const ciphertext = stored[name] ?? '';
        // save() never writes an empty value, so a blank field has been altered
        if (ciphertext === '') {
          throw new CryptoError(`Stored ${name} is empty and cannot be authenticated`);
        }
        return this.codec.open(key, ciphertext, name);
      };

      const record: AccessTokenRecord = {
        access_token: field('access_token'),
        expires_at: this.parseExpiresAt(field('expires_at')),
        refresh_token: field('refresh_token'),
        user_id: field('user_id'),
      };

      this.logger.debug('Access token loaded from vault', { namespace });
      return record;
    } catch (error) {
      await this.clearAfterFailure(namespace, 'load', error);
      throw error;
    }
  }

  /**
   * Remove all four keys; clearing an empty namespace is not an error
   */
  async clear(namespace: string): Promise<void> {
    await this.storeCall('clear', () => this.store.removeAll(namespace, ACCESS_TOKEN_FIELDS));
    this.logger.debug('Vault namespace cleared', { namespace });
  }

  /**
   * Whether a complete record is stored (does not decrypt it)
   */
  async exists(namespace: string): Promise<boolean> {
    const present = await this.storeCall('read', () =>
      Promise.all(ACCESS_TOKEN_FIELDS.map((field) => this.store.contains(namespace, field)))
    );
    return present.every(Boolean);
  }

  private async resolveSalt(): Promise<Uint8Array> {
    let salt: Uint8Array;
    try {
      salt = await this.saltSource.getSalt();
    } catch (error) {
      if (error instanceof SaltUnavailableError) {
        throw error;
      }
      throw new SaltUnavailableError(`Device salt source "${this.saltSource.name}" failed`, { cause: error });
    }
    if (salt.byteLength === 0) {
      throw new SaltUnavailableError(`Device salt source "${this.saltSource.name}" returned an empty salt`);
    }
    return salt;
  }

  private async readStoredFields(namespace: string): Promise<Partial<Record<AccessTokenField, string>>> {
    const stored: Partial<Record<AccessTokenField, string>> = {};
    for (const field of ACCESS_TOKEN_FIELDS) {
      const value = await this.storeCall('read', () => this.store.get(namespace, field));
      if (value !== undefined) {
        stored[field] = value;
      }
    }
    return stored;
  }

  private parseExpiresAt(text: string): number {
    const value = Number(text);
    if (!INTEGER_PATTERN.test(text) || !Number.isSafeInteger(value)) {
      throw new FormatError('Stored expires_at is not an integer epoch value');
    }
    return value;
  }

  private async storeCall<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (isVaultError(error)) {
        throw error;
      }
      throw new StoreError(`Vault store ${operation} failed`, { cause: error });
    }
  }

  /**
   * Compensating clear. A failure here is logged and the original error
   * is what the caller sees.
   */
  private async clearAfterFailure(namespace: string, operation: 'save' | 'load', cause: unknown): Promise<void> {
    this.logger.warn(`Vault ${operation} failed, clearing namespace`, {
      namespace,
      reason: describeError(cause),
      saltUnavailable: cause instanceof SaltUnavailableError,
    });

    try {
      await this.clear(namespace);
    } catch (clearError) {
      this.logger.error('Failed to clear vault namespace after failure', {
        namespace,
        operation,
        error: describeError(clearError),
      });
    }
  }
}

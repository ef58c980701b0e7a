/**
 * Vault error types
 *
 * Every failure surfaced by the codec or the vault is a VaultError; `code`
 * tells callers which kind without instanceof chains across package copies.
 */

export type VaultErrorCode =
  | 'crypto_error'
  | 'encoding_error'
  | 'format_error'
  | 'salt_unavailable'
  | 'store_error';

export class VaultError extends Error {
  constructor(
    message: string,
    public readonly code: VaultErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'VaultError';
  }
}

/**
 * Key derivation or cipher failure (wrong passphrase, wrong salt, tampered
 * or truncated ciphertext).
 */
export class CryptoError extends VaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'crypto_error', options);
    this.name = 'CryptoError';
  }
}

/**
 * Text could not be converted to or from UTF-8.
 */
export class EncodingError extends VaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'encoding_error', options);
    this.name = 'EncodingError';
  }
}

/**
 * A stored record is incomplete or a decrypted field has the wrong shape.
 */
export class FormatError extends VaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'format_error', options);
    this.name = 'FormatError';
  }
}

/**
 * The device salt source could not produce a salt.
 */
export class SaltUnavailableError extends VaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'salt_unavailable', options);
    this.name = 'SaltUnavailableError';
  }
}

/**
 * The backing key-value store rejected a read or write.
 */
export class StoreError extends VaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'store_error', options);
    this.name = 'StoreError';
  }
}

export function isVaultError(error: unknown): error is VaultError {
  return error instanceof VaultError;
}

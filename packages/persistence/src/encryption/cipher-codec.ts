/**
 * Cipher Codec
 *
 * Password-based encryption of single text values.
 *
 * Key derivation:
 * - PBKDF2-HMAC-SHA256 over (passphrase, device salt)
 * - Fixed iteration count per codec instance (default 100 000)
 * - 32-byte key
 *
 * Cipher:
 * - AES-256-GCM with a fresh random 12-byte IV for every value
 * - Optional associated data bound into the auth tag
 *
 * Format:
 * ```
 * encrypted = base64(iv + ciphertext + authTag)
 * iv: 12 bytes
 * ciphertext: variable length (0 for an empty value)
 * authTag: 16 bytes
 * ```
 *
 * The empty string encodes to itself on the way back: decrypt('') === ''.
 */

import {
  createCipheriv,
  createDecipheriv,
  createSecretKey,
  pbkdf2,
  randomBytes,
  type KeyObject,
} from 'node:crypto';
import { promisify } from 'node:util';
import { DEFAULT_KDF_ITERATIONS } from '@credential-vault/config';
import { CryptoError, EncodingError } from '../errors.js';

const pbkdf2Async = promisify(pbkdf2);

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12; // 96 bits (recommended for GCM)
const AUTH_TAG_LENGTH = 16; // 128 bits
const KEY_LENGTH = 32; // 256 bits
const DIGEST = 'sha256';

export { DEFAULT_KDF_ITERATIONS };

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

export interface CipherCodecOptions {
  /** PBKDF2 iteration count (default: 100 000) */
  iterations?: number;
}

export class CipherCodec {
  readonly iterations: number;
  private readonly utf8Decoder = new TextDecoder('utf-8', { fatal: true });

  constructor(options: CipherCodecOptions = {}) {
    const iterations = options.iterations ?? DEFAULT_KDF_ITERATIONS;
    if (!Number.isSafeInteger(iterations) || iterations < 1) {
      throw new RangeError(`Invalid PBKDF2 iteration count: ${iterations}`);
    }
    this.iterations = iterations;
  }

  /**
   * Derive the symmetric key for (passphrase, salt)
   *
   * @throws CryptoError on empty passphrase, empty salt, or PBKDF2 failure
   */
  async deriveKey(passphrase: string, salt: Uint8Array): Promise<KeyObject> {
    if (!passphrase) {
      throw new CryptoError('Passphrase must not be empty');
    }
    if (salt.byteLength === 0) {
      throw new CryptoError('Salt must not be empty');
    }

    try {
      const raw = await pbkdf2Async(passphrase, salt, this.iterations, KEY_LENGTH, DIGEST);
      return createSecretKey(raw);
    } catch (error) {
      throw new CryptoError('Key derivation failed', { cause: error });
    }
  }

  /**
   * Encrypt a value with a freshly derived key
   *
   * @returns base64(iv + ciphertext + authTag)
   */
  async encrypt(
    passphrase: string,
    salt: Uint8Array,
    plaintext: string,
    associatedData?: string
  ): Promise<string> {
    const key = await this.deriveKey(passphrase, salt);
    return this.seal(key, plaintext, associatedData);
  }

  /**
   * Decrypt a value produced by encrypt() with the same passphrase and salt
   */
  async decrypt(
    passphrase: string,
    salt: Uint8Array,
    ciphertextText: string,
    associatedData?: string
  ): Promise<string> {
    const key = await this.deriveKey(passphrase, salt);
    return this.open(key, ciphertextText, associatedData);
  }

  /**
   * Encrypt with an already derived key
   */
  seal(key: KeyObject, plaintext: string, associatedData?: string): string {
    if (LONE_SURROGATE.test(plaintext)) {
      throw new EncodingError('Value contains an unpaired UTF-16 surrogate and cannot be encoded as UTF-8');
    }

    try {
      const iv = randomBytes(IV_LENGTH);
      const cipher = createCipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });
      if (associatedData !== undefined) {
        cipher.setAAD(Buffer.from(associatedData, 'utf8'));
      }

      const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
      const authTag = cipher.getAuthTag();

      return Buffer.concat([iv, ciphertext, authTag]).toString('base64');
    } catch (error) {
      throw new CryptoError('Encryption failed', { cause: error });
    }
  }

  /**
   * Decrypt with an already derived key
   *
   * @throws CryptoError if the text is not base64, too short, or fails authentication
   * @throws EncodingError if the decrypted bytes are not UTF-8
   */
  open(key: KeyObject, ciphertextText: string, associatedData?: string): string {
    if (ciphertextText === '') {
      return '';
    }

    if (!BASE64_PATTERN.test(ciphertextText)) {
      throw new CryptoError('Ciphertext is not valid base64');
    }

    const encrypted = Buffer.from(ciphertextText, 'base64');
    if (encrypted.length < IV_LENGTH + AUTH_TAG_LENGTH) {
      throw new CryptoError('Encrypted data is too short to contain IV and auth tag');
    }

    const iv = encrypted.subarray(0, IV_LENGTH);
    const authTag = encrypted.subarray(encrypted.length - AUTH_TAG_LENGTH);
    const ciphertext = encrypted.subarray(IV_LENGTH, encrypted.length - AUTH_TAG_LENGTH);

    let plaintext: Buffer;
    try {
      const decipher = createDecipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });
      decipher.setAuthTag(authTag);
      if (associatedData !== undefined) {
        decipher.setAAD(Buffer.from(associatedData, 'utf8'));
      }
      plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()]);
    } catch (error) {
      // Don't leak which check failed
      throw new CryptoError('Decryption failed: wrong passphrase or salt, or corrupted data', {
        cause: error,
      });
    }

    try {
      return this.utf8Decoder.decode(plaintext);
    } catch (error) {
      throw new EncodingError('Decrypted value is not valid UTF-8', { cause: error });
    }
  }
}

/**
 * Unit tests for CipherCodec
 */

import { createCipheriv, randomBytes } from 'node:crypto';
import { CipherCodec, CryptoError, EncodingError, DEFAULT_KDF_ITERATIONS } from '../../src/index.js';
import { createTestCodec, saltBytes } from '../helpers/vault-test-helper.js';

describe('CipherCodec', () => {
  let codec: CipherCodec;
  const salt = saltBytes();

  beforeEach(() => {
    codec = createTestCodec();
  });

  describe('constructor', () => {
    it('should default to the documented iteration count', () => {
      expect(new CipherCodec().iterations).toBe(DEFAULT_KDF_ITERATIONS);
      expect(DEFAULT_KDF_ITERATIONS).toBe(100_000);
    });

    it('should reject a non-positive iteration count', () => {
      expect(() => new CipherCodec({ iterations: 0 })).toThrow(RangeError);
      expect(() => new CipherCodec({ iterations: 1.5 })).toThrow('Invalid PBKDF2 iteration count: 1.5');
    });
  });

  describe('deriveKey', () => {
    it('should derive the same 32-byte key for the same passphrase and salt', async () => {
      const first = await codec.deriveKey('k1', salt);
      const second = await codec.deriveKey('k1', salt);

      expect(first.symmetricKeySize).toBe(32);
      expect(first.export().equals(second.export())).toBe(true);
    });

    it('should derive different keys for different salts', async () => {
      const first = await codec.deriveKey('k1', saltBytes('device-a'));
      const second = await codec.deriveKey('k1', saltBytes('device-b'));

      expect(first.export().equals(second.export())).toBe(false);
    });

    it('should reject an empty passphrase', async () => {
      await expect(codec.deriveKey('', salt)).rejects.toThrow(CryptoError);
      await expect(codec.deriveKey('', salt)).rejects.toThrow('Passphrase must not be empty');
    });

    it('should reject an empty salt', async () => {
      await expect(codec.deriveKey('k1', new Uint8Array(0))).rejects.toThrow('Salt must not be empty');
    });
  });

  describe('encrypt / decrypt', () => {
    it.each([
      ['ascii token', 'abc123'],
      ['digits', '1700000000'],
      ['multi-byte text', 'påsskey ✓ 🔐'],
      ['long value', 'x'.repeat(4096)],
    ])('should round-trip %s', async (_label, value) => {
      const encrypted = await codec.encrypt('k1', salt, value);
      expect(await codec.decrypt('k1', salt, encrypted)).toBe(value);
    });

    it('should round-trip the empty string', async () => {
      const encrypted = await codec.encrypt('k1', salt, '');

      // iv (12) + tag (16) = 28 bytes -> 40 base64 characters
      expect(encrypted).toHaveLength(40);
      expect(await codec.decrypt('k1', salt, encrypted)).toBe('');
    });

    it('should map empty ciphertext text to the empty string', async () => {
      expect(await codec.decrypt('k1', salt, '')).toBe('');
    });

    it('should produce standard base64 without line breaks', async () => {
      const encrypted = await codec.encrypt('k1', salt, 'y'.repeat(200));

      expect(encrypted).toMatch(/^[A-Za-z0-9+/]+=*$/);
      expect(encrypted.length % 4).toBe(0);
    });

    it('should use a fresh IV for every value', async () => {
      const first = await codec.encrypt('k1', salt, 'abc123');
      const second = await codec.encrypt('k1', salt, 'abc123');

      expect(first).not.toBe(second);
      expect(Buffer.from(first, 'base64').subarray(0, 12).equals(Buffer.from(second, 'base64').subarray(0, 12))).toBe(false);
    });

    it('should round-trip with matching associated data', async () => {
      const encrypted = await codec.encrypt('k1', salt, 'u-42', 'user_id');
      expect(await codec.decrypt('k1', salt, encrypted, 'user_id')).toBe('u-42');
    });
  });

  describe('failures', () => {
    it('should fail closed on the wrong passphrase', async () => {
      const encrypted = await codec.encrypt('k1', salt, 'abc123');

      await expect(codec.decrypt('k2', salt, encrypted)).rejects.toThrow(CryptoError);
      await expect(codec.decrypt('k2', salt, encrypted)).rejects.toThrow(
        'Decryption failed: wrong passphrase or salt, or corrupted data'
      );
    });

    it('should fail on the wrong salt', async () => {
      const encrypted = await codec.encrypt('k1', saltBytes('device-a'), 'abc123');

      await expect(codec.decrypt('k1', saltBytes('device-b'), encrypted)).rejects.toThrow(CryptoError);
    });

    it('should fail when associated data differs', async () => {
      const encrypted = await codec.encrypt('k1', salt, 'abc123', 'access_token');

      await expect(codec.decrypt('k1', salt, encrypted, 'user_id')).rejects.toThrow(CryptoError);
      await expect(codec.decrypt('k1', salt, encrypted)).rejects.toThrow(CryptoError);
    });

    it('should detect a tampered ciphertext', async () => {
      const encrypted = Buffer.from(await codec.encrypt('k1', salt, 'abc123'), 'base64');
      encrypted[12] = (encrypted[12] ?? 0) ^ 0x01;

      await expect(codec.decrypt('k1', salt, encrypted.toString('base64'))).rejects.toThrow(CryptoError);
    });

    it('should reject malformed base64', async () => {
      await expect(codec.decrypt('k1', salt, 'not base64!')).rejects.toThrow('Ciphertext is not valid base64');
      await expect(codec.decrypt('k1', salt, 'abc')).rejects.toThrow('Ciphertext is not valid base64');
    });

    it('should reject a payload shorter than IV and tag', async () => {
      await expect(codec.decrypt('k1', salt, 'AAAA')).rejects.toThrow(
        'Encrypted data is too short to contain IV and auth tag'
      );
    });

    it('should raise EncodingError for an unpaired surrogate', async () => {
      await expect(codec.encrypt('k1', salt, 'ref\uD800456')).rejects.toThrow(EncodingError);
      await expect(codec.encrypt('k1', salt, '\uDC00')).rejects.toThrow(EncodingError);
    });

    it('should raise EncodingError when decrypted bytes are not UTF-8', async () => {
      const key = await codec.deriveKey('k1', salt);
      const iv = randomBytes(12);
      const cipher = createCipheriv('aes-256-gcm', key, iv);
      const ciphertext = Buffer.concat([cipher.update(Buffer.from([0xff, 0xfe])), cipher.final()]);
      const payload = Buffer.concat([iv, ciphertext, cipher.getAuthTag()]).toString('base64');

      await expect(codec.decrypt('k1', salt, payload)).rejects.toThrow(EncodingError);
      await expect(codec.decrypt('k1', salt, payload)).rejects.toThrow('Decrypted value is not valid UTF-8');
    });

    it('should carry the error code on every failure', async () => {
      const encrypted = await codec.encrypt('k1', salt, 'abc123');

      await expect(codec.decrypt('k2', salt, encrypted)).rejects.toMatchObject({
        code: 'crypto_error',
        name: 'CryptoError',
      });
      await expect(codec.encrypt('k1', salt, '\uD800')).rejects.toMatchObject({
        code: 'encoding_error',
        name: 'EncodingError',
      });
    });
  });
});

/**
 * Password-based value encryption (PBKDF2-SHA256 + AES-256-GCM)
 */

export { CipherCodec, DEFAULT_KDF_ITERATIONS, type CipherCodecOptions } from './cipher-codec.js';

/**
 * @credential-vault/observability
 * Structured logging for the credential vault
 */

export * from './config.js';
export * from './logger.js';

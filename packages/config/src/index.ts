/**
 * @credential-vault/config
 * Validated environment configuration for the credential vault
 */

export * from './vault-config.js';
export * from './environment.js';

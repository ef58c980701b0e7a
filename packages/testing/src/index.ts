/**
 * @credential-vault/testing
 *
 * Shared helpers for the workspace test suites.
 */

export * from './env-helper.js';
export * from './temp-dir.js';

/**
 * Environment configuration for the credential vault
 */

import { VaultConfigSchema, type VaultConfiguration } from './vault-config.js';

/**
 * Logger interface for optional logging
 */
export interface ConfigLogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown): void;
}

export class ConfigurationError extends Error {
  constructor(message: string, public readonly issues: string[]) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return Number(value);
}

/**
 * Environment configuration manager
 */
export class VaultConfig {
  private static _instance: VaultConfiguration | null = null;
  private static _logger: ConfigLogger | null = null;

  /**
   * Set optional logger for configuration messages
   */
  static setLogger(logger: ConfigLogger): void {
    this._logger = logger;
  }

  /**
   * Load and validate environment configuration
   */
  static load(): VaultConfiguration {
    if (this._instance) {
      return this._instance;
    }

    const env = {
      NODE_ENV: process.env.NODE_ENV || 'development',
      VAULT_APP_ID: process.env.VAULT_APP_ID || undefined,
      VAULT_STORE_TYPE: process.env.VAULT_STORE_TYPE || undefined,
      VAULT_FILE_PATH: process.env.VAULT_FILE_PATH || undefined,
      REDIS_URL: process.env.REDIS_URL || undefined,
      REDIS_KEY_PREFIX: process.env.REDIS_KEY_PREFIX,
      VAULT_KDF_ITERATIONS: parseInteger(process.env.VAULT_KDF_ITERATIONS),
      VAULT_SALT_SOURCE: process.env.VAULT_SALT_SOURCE || undefined,
      VAULT_DEVICE_ID: process.env.VAULT_DEVICE_ID || undefined,
      VAULT_DEVICE_ID_FILE: process.env.VAULT_DEVICE_ID_FILE || undefined,
    };

    const result = VaultConfigSchema.safeParse(env);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      this._logger?.error('Vault configuration validation failed', { issues });
      throw new ConfigurationError('Invalid vault configuration', issues);
    }

    this._instance = result.data;
    this._logger?.debug('Vault configuration loaded', {
      storeType: result.data.VAULT_STORE_TYPE ?? 'auto',
      saltSource: result.data.VAULT_SALT_SOURCE,
      kdfIterations: result.data.VAULT_KDF_ITERATIONS,
    });
    return this._instance;
  }

  /**
   * Get current environment configuration
   */
  static get(): VaultConfiguration {
    return this.load();
  }

  static isProduction(): boolean {
    return this.get().NODE_ENV === 'production';
  }

  static isTest(): boolean {
    return this.get().NODE_ENV === 'test';
  }

  /**
   * Reset cached configuration (for testing)
   */
  static reset(): void {
    this._instance = null;
  }
}

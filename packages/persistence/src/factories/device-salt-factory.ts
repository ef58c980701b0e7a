/**
 * Device Salt Source Factory
 */

import type { VaultConfiguration } from '@credential-vault/config';
import {
  EnvironmentDeviceSaltSource,
  FileDeviceSaltSource,
  StaticDeviceSaltSource,
  type DeviceSaltSource,
} from '../vault/device-salt.js';
import { SaltUnavailableError } from '../errors.js';

export type DeviceSaltConfig = Pick<
  VaultConfiguration,
  'VAULT_SALT_SOURCE' | 'VAULT_DEVICE_ID' | 'VAULT_DEVICE_ID_FILE'
>;

export function createDeviceSaltSource(config: DeviceSaltConfig): DeviceSaltSource {
  switch (config.VAULT_SALT_SOURCE) {
    case 'static':
      if (!config.VAULT_DEVICE_ID) {
        throw new SaltUnavailableError('VAULT_SALT_SOURCE=static requires VAULT_DEVICE_ID');
      }
      return new StaticDeviceSaltSource(config.VAULT_DEVICE_ID);

    case 'env':
      return new EnvironmentDeviceSaltSource('VAULT_DEVICE_ID');

    case 'file':
      return new FileDeviceSaltSource(config.VAULT_DEVICE_ID_FILE);
  }
}

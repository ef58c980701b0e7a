/**
 * Device Salt Sources
 *
 * The salt binds stored ciphertext to one installation. It must be stable:
 * a different salt at load time makes every stored record undecryptable.
 * Sources raise SaltUnavailableError rather than returning an empty salt,
 * so callers can tell "salt unavailable" from "wrong passphrase".
 */

import { readFile } from 'node:fs/promises';
import { SaltUnavailableError } from '../errors.js';

export interface DeviceSaltSource {
  /** Short label for logging (never the salt itself) */
  readonly name: string;

  getSalt(): Promise<Uint8Array>;
}

function toSalt(value: string, origin: string): Uint8Array {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new SaltUnavailableError(`Device identifier from ${origin} is empty`);
  }
  return Buffer.from(trimmed, 'utf8');
}

/**
 * Fixed salt, for tests and hosts that manage the identifier themselves
 */
export class StaticDeviceSaltSource implements DeviceSaltSource {
  readonly name = 'static';
  private readonly salt: Uint8Array;

  constructor(value: string | Uint8Array) {
    if (typeof value === 'string') {
      this.salt = toSalt(value, 'static value');
    } else {
      if (value.byteLength === 0) {
        throw new SaltUnavailableError('Device salt must not be empty');
      }
      this.salt = Uint8Array.from(value);
    }
  }

  async getSalt(): Promise<Uint8Array> {
    return Uint8Array.from(this.salt);
  }
}

/**
 * Reads the device identifier from an environment variable on every call
 */
export class EnvironmentDeviceSaltSource implements DeviceSaltSource {
  readonly name = 'env';

  constructor(private readonly variable = 'VAULT_DEVICE_ID') {}

  async getSalt(): Promise<Uint8Array> {
    const value = process.env[this.variable];
    if (value === undefined) {
      throw new SaltUnavailableError(`${this.variable} is not set`);
    }
    return toSalt(value, this.variable);
  }
}

/**
 * Reads the installation identifier from a file such as /etc/machine-id
 */
export class FileDeviceSaltSource implements DeviceSaltSource {
  readonly name = 'file';

  constructor(private readonly filePath = '/etc/machine-id') {}

  async getSalt(): Promise<Uint8Array> {
    let contents: string;
    try {
      contents = await readFile(this.filePath, 'utf8');
    } catch (error) {
      throw new SaltUnavailableError(`Cannot read device identifier from ${this.filePath}`, { cause: error });
    }
    return toSalt(contents, this.filePath);
  }
}

/**
 * File-Based Key-Value Store
 *
 * Keeps every namespace in one JSON document on disk. Values written by the
 * vault are already ciphertext; this store adds no encryption of its own.
 *
 * **File Permissions:**
 * - 0600 (owner read/write only) for the data file and its backup
 * - 0700 (owner only) for the directory
 *
 * Features:
 * - Survives restarts
 * - Atomic writes (write to temp file, then rename)
 * - Backup of the previous file on every write
 * - Batched writes land in a single rename, so putAll/removeAll are atomic
 *
 * Limitations:
 * - Not suitable for multi-instance deployments (last writer wins)
 * - Full file rewrite on every mutation
 */

import { promises as fs, readFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { NamespacedKeyValueStore } from '../../interfaces/key-value-store.js';
import { StoreError } from '../../errors.js';
import { logger } from '../../logger.js';

const PersistedStoreSchema = z.object({
  version: z.literal(1),
  updatedAt: z.string(),
  namespaces: z.record(z.string(), z.record(z.string(), z.string())),
});

type PersistedStore = z.infer<typeof PersistedStoreSchema>;
type Namespaces = PersistedStore['namespaces'];

export interface FileKeyValueStoreOptions {
  /** Path to the JSON file (default: './data/vault.json') */
  filePath?: string;
}

export class FileKeyValueStore implements NamespacedKeyValueStore {
  private namespaces: Namespaces = {};
  private readonly filePath: string;
  private readonly backupPath: string;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(options: FileKeyValueStoreOptions = {}) {
    this.filePath = options.filePath ?? './data/vault.json';
    this.backupPath = `${this.filePath}.backup`;

    this.loadSync();

    logger.info('FileKeyValueStore initialized', {
      filePath: this.filePath,
      namespacesLoaded: Object.keys(this.namespaces).length,
    });
  }

  /**
   * Load namespaces from file (synchronous for constructor)
   */
  private loadSync(): void {
    let raw: string;
    try {
      raw = readFileSync(this.filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        logger.info('No existing vault file found, starting fresh', { filePath: this.filePath });
        return;
      }
      throw new StoreError(`Failed to read ${this.filePath}`, { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new StoreError(`${this.filePath} is not valid JSON`, { cause: error });
    }

    const parsed = PersistedStoreSchema.safeParse(json);
    if (!parsed.success) {
      throw new StoreError(`${this.filePath} has an unsupported layout`, { cause: parsed.error });
    }

    this.namespaces = parsed.data.namespaces;
  }

  /**
   * Enforce strict file permissions (0600 - owner read/write only)
   */
  private async enforceFilePermissions(filePath: string): Promise<void> {
    try {
      await fs.chmod(filePath, 0o600);
    } catch (error) {
      logger.warn('Failed to set file permissions', {
        filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * Write a snapshot to disk (atomic with backup, strict permissions)
   */
  private async saveToFile(snapshot: Namespaces): Promise<void> {
    await fs.mkdir(dirname(this.filePath), { recursive: true, mode: 0o700 });

    const data: PersistedStore = {
      version: 1,
      updatedAt: new Date().toISOString(),
      namespaces: snapshot,
    };

    const tempPath = `${this.filePath}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(data, null, 2), { encoding: 'utf8', mode: 0o600 });
    await this.enforceFilePermissions(tempPath);

    try {
      await fs.copyFile(this.filePath, this.backupPath);
      await this.enforceFilePermissions(this.backupPath);
    } catch (error) {
      // Nothing to back up on first write
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        throw error;
      }
    }

    // Rename temp to actual (atomic on POSIX systems)
    await fs.rename(tempPath, this.filePath);
  }

  /**
   * Apply a mutation to a copy, persist it, then swap it in.
   * Mutations are serialized so concurrent callers never interleave writes.
   * `change` reports whether it altered the section; an unchanged section
   * skips the write.
   */
  private mutate(namespace: string, change: (section: Record<string, string>) => boolean): Promise<void> {
    const run = async (): Promise<void> => {
      const next: Namespaces = { ...this.namespaces };
      const section = { ...(next[namespace] ?? {}) };
      if (!change(section)) {
        return;
      }

      if (Object.keys(section).length === 0) {
        delete next[namespace];
      } else {
        next[namespace] = section;
      }

      try {
        await this.saveToFile(next);
      } catch (error) {
        logger.error('Failed to save vault file', {
          filePath: this.filePath,
          error: error instanceof Error ? error.message : String(error),
        });
        throw new StoreError(`Failed to write ${this.filePath}`, { cause: error });
      }

      this.namespaces = next;
    };

    const result = this.writeQueue.then(run);
    // Keep the queue alive after a failed write; the caller still sees the rejection
    this.writeQueue = result.catch(() => undefined);
    return result;
  }

  async put(namespace: string, key: string, value: string): Promise<void> {
    await this.mutate(namespace, (section) => {
      section[key] = value;
      return true;
    });
  }

  async get(namespace: string, key: string): Promise<string | undefined> {
    return this.namespaces[namespace]?.[key];
  }

  async remove(namespace: string, key: string): Promise<void> {
    await this.removeAll(namespace, [key]);
  }

  async contains(namespace: string, key: string): Promise<boolean> {
    const section = this.namespaces[namespace];
    return section !== undefined && Object.prototype.hasOwnProperty.call(section, key);
  }

  async putAll(namespace: string, entries: Record<string, string>): Promise<void> {
    await this.mutate(namespace, (section) => {
      Object.assign(section, entries);
      return Object.keys(entries).length > 0;
    });
  }

  async removeAll(namespace: string, keys: readonly string[]): Promise<void> {
    await this.mutate(namespace, (section) => {
      let removed = false;
      for (const key of keys) {
        if (Object.prototype.hasOwnProperty.call(section, key)) {
          delete section[key];
          removed = true;
        }
      }
      return removed;
    });
  }

  async dispose(): Promise<void> {
    await this.writeQueue;
    this.namespaces = {};
    logger.info('FileKeyValueStore disposed');
  }
}

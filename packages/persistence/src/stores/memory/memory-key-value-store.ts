/**
 * In-Memory Key-Value Store
 *
 * Fast, ephemeral storage for development and testing.
 *
 * Limitations:
 * - Values lost on restart (not persistent)
 * - Not suitable for multi-instance deployments
 */

import type { NamespacedKeyValueStore } from '../../interfaces/key-value-store.js';
import { logger } from '../../logger.js';

export class MemoryKeyValueStore implements NamespacedKeyValueStore {
  private readonly namespaces = new Map<string, Map<string, string>>();

  constructor() {
    logger.debug('MemoryKeyValueStore initialized');
  }

  private section(namespace: string): Map<string, string> {
    let section = this.namespaces.get(namespace);
    if (!section) {
      section = new Map();
      this.namespaces.set(namespace, section);
    }
    return section;
  }

  async put(namespace: string, key: string, value: string): Promise<void> {
    this.section(namespace).set(key, value);
  }

  async get(namespace: string, key: string): Promise<string | undefined> {
    return this.namespaces.get(namespace)?.get(key);
  }

  async remove(namespace: string, key: string): Promise<void> {
    const section = this.namespaces.get(namespace);
    if (!section) {
      return;
    }
    section.delete(key);
    if (section.size === 0) {
      this.namespaces.delete(namespace);
    }
  }

  async contains(namespace: string, key: string): Promise<boolean> {
    return this.namespaces.get(namespace)?.has(key) ?? false;
  }

  async putAll(namespace: string, entries: Record<string, string>): Promise<void> {
    const section = this.section(namespace);
    for (const [key, value] of Object.entries(entries)) {
      section.set(key, value);
    }
  }

  async removeAll(namespace: string, keys: readonly string[]): Promise<void> {
    for (const key of keys) {
      await this.remove(namespace, key);
    }
  }

  /**
   * Number of keys held under a namespace (for tests and monitoring)
   */
  size(namespace: string): number {
    return this.namespaces.get(namespace)?.size ?? 0;
  }

  async dispose(): Promise<void> {
    this.namespaces.clear();
    logger.debug('MemoryKeyValueStore disposed');
  }
}

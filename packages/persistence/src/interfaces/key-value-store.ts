/**
 * Namespaced Key-Value Store Interface
 *
 * Text-only storage the vault persists ciphertext into. A namespace is an
 * opaque section name ("<app-id>.sdk"); keys are unique within it.
 *
 * Implementations:
 * - MemoryKeyValueStore: Testing/dev only (ephemeral, process-isolated)
 * - FileKeyValueStore: Single-instance deployments (JSON file, atomic rename)
 * - RedisKeyValueStore: Multi-instance deployments (one hash per namespace)
 */

export interface NamespacedKeyValueStore {
  /**
   * Write a single value, replacing any existing one
   */
  put(namespace: string, key: string, value: string): Promise<void>;

  /**
   * Read a value
   *
   * @returns The stored text or undefined if the key is absent
   */
  get(namespace: string, key: string): Promise<string | undefined>;

  /**
   * Remove a value; removing an absent key is not an error
   */
  remove(namespace: string, key: string): Promise<void>;

  /**
   * Check whether a key is present
   */
  contains(namespace: string, key: string): Promise<boolean>;

  /**
   * Write several values as one batch: either all land or none do
   */
  putAll(namespace: string, entries: Record<string, string>): Promise<void>;

  /**
   * Remove several keys as one batch
   */
  removeAll(namespace: string, keys: readonly string[]): Promise<void>;

  /**
   * Dispose of store resources (close connections, flush files, etc.)
   */
  dispose(): Promise<void>;
}

/**
 * Environment Variable Preservation Helper
 *
 * Snapshots process.env so a test can set VAULT_* variables freely.
 *
 * ```typescript
 * let restoreEnv: () => void;
 * beforeEach(() => { restoreEnv = preserveEnv(); });
 * afterEach(() => { restoreEnv(); });
 * ```
 */

/**
 * Captures process.env and returns a function that puts it back,
 * removing any variable added after the snapshot.
 */
export function preserveEnv(): () => void {
  const snapshot = { ...process.env };

  return () => {
    for (const key of Object.keys(process.env)) {
      if (!(key in snapshot)) {
        delete process.env[key];
      }
    }

    for (const [key, value] of Object.entries(snapshot)) {
      if (value !== undefined) {
        process.env[key] = value;
      }
    }
  };
}

/**
 * Runs `fn` with the given variables set (undefined unsets), then restores.
 */
export async function withEnv<T>(
  overrides: Record<string, string | undefined>,
  fn: () => T | Promise<T>
): Promise<T> {
  const restore = preserveEnv();
  try {
    for (const [key, value] of Object.entries(overrides)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    return await fn();
  } finally {
    restore();
  }
}

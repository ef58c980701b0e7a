/**
 * Vault namespace resolution
 */

const NAMESPACE_SUFFIX = '.sdk';

/**
 * Store section for a host application: "<app-id>.sdk"
 */
export function resolveVaultNamespace(appId: string): string {
  const trimmed = appId.trim();
  if (!trimmed) {
    throw new Error('Application identifier is required to resolve the vault namespace');
  }
  return `${trimmed}${NAMESPACE_SUFFIX}`;
}

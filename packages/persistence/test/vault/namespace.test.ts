/**
 * Unit tests for vault namespace resolution
 */

import { resolveVaultNamespace } from '../../src/index.js';

describe('resolveVaultNamespace', () => {
  it('should append the .sdk suffix', () => {
    expect(resolveVaultNamespace('com.example.app')).toBe('com.example.app.sdk');
  });

  it('should trim surrounding whitespace', () => {
    expect(resolveVaultNamespace('  com.example.app ')).toBe('com.example.app.sdk');
  });

  it('should require an application identifier', () => {
    expect(() => resolveVaultNamespace(' ')).toThrow(
      'Application identifier is required to resolve the vault namespace'
    );
  });
});

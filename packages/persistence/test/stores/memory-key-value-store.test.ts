/**
 * Unit tests for MemoryKeyValueStore
 */

import { MemoryKeyValueStore } from '../../src/index.js';
import { describeKeyValueStoreContract } from '../helpers/key-value-store-contract.js';

describeKeyValueStoreContract('MemoryKeyValueStore', () => new MemoryKeyValueStore());

describe('MemoryKeyValueStore', () => {
  let store: MemoryKeyValueStore;

  beforeEach(() => {
    store = new MemoryKeyValueStore();
  });

  it('should drop a namespace once its last key is removed', async () => {
    await store.putAll('app.sdk', { access_token: 'a', user_id: 'u' });
    expect(store.size('app.sdk')).toBe(2);

    await store.removeAll('app.sdk', ['access_token', 'user_id']);
    expect(store.size('app.sdk')).toBe(0);
  });

  it('should forget everything on dispose', async () => {
    await store.put('app.sdk', 'user_id', 'u-42');
    await store.dispose();

    expect(await store.get('app.sdk', 'user_id')).toBeUndefined();
  });
});

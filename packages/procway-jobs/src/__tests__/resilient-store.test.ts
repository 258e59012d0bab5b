/**
 * ResilientStore
 * Transient faults retried with backoff, everything else surfaced as LibraryError
 */

import { MemoryKeyValueStore, StoreError, StoreUnavailableError } from 'procway-storage';
import { LibraryError } from '../errors';
import { ResilientStore } from '../resilient-store';

/**
 * Fails the next `failures` get() calls with the given error
 */
class FlakyStore extends MemoryKeyValueStore {
  calls = 0;

  constructor(private failures: number, private readonly error: () => Error) {
    super();
  }

  async get(key: string): Promise<string | null> {
    this.calls++;
    if (this.failures > 0) {
      this.failures--;
      throw this.error();
    }
    return super.get(key);
  }
}

const POLICY = { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 2 };

describe('ResilientStore', () => {
  it('retries transient faults until the call succeeds', async () => {
    const inner = new FlakyStore(2, () => new StoreUnavailableError('database is locked'));
    await inner.initialize();
    await inner.set('k', 'v', 1_000);
    const store = new ResilientStore(inner, POLICY);

    expect(await store.get('k')).toBe('v');
    expect(inner.calls).toBe(3);
  });

  it('raises LibraryError once retries are exhausted', async () => {
    const inner = new FlakyStore(3, () => new StoreUnavailableError('database is locked'));
    await inner.initialize();
    const store = new ResilientStore(inner, POLICY);

    const call = store.get('k');
    await expect(call).rejects.toBeInstanceOf(LibraryError);
    await expect(call).rejects.toThrow('Store get failed for k: database is locked');
    expect(inner.calls).toBe(3);
  });

  it('does not retry permanent store errors', async () => {
    const inner = new FlakyStore(1, () => new StoreError('bad row', 'CORRUPT'));
    await inner.initialize();
    const store = new ResilientStore(inner, POLICY);

    await expect(store.get('k')).rejects.toThrow('Store get failed for k: bad row');
    expect(inner.calls).toBe(1);
  });
});

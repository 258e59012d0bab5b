import { createKeyValueStore, loadStoreConfigFromEnv, StoreMisconfiguredError } from '../config';
import { MemoryKeyValueStore } from '../memory-store';
import { SQLiteKeyValueStore } from '../sqlite-store';

describe('loadStoreConfigFromEnv', () => {
  it('fails closed when the backend is missing', () => {
    expect(() => loadStoreConfigFromEnv({})).toThrow(StoreMisconfiguredError);
    expect(() => loadStoreConfigFromEnv({})).toThrow('Missing PROCWAY_STORE_BACKEND (MEMORY|SQLITE).');
  });

  it('rejects unknown backends', () => {
    expect(() => loadStoreConfigFromEnv({ PROCWAY_STORE_BACKEND: 'redis' })).toThrow(
      'Invalid PROCWAY_STORE_BACKEND: REDIS (expected MEMORY|SQLITE).'
    );
  });

  it('requires a path for SQLITE', () => {
    expect(() => loadStoreConfigFromEnv({ PROCWAY_STORE_BACKEND: 'SQLITE' })).toThrow(
      'Missing PROCWAY_STORE_PATH (required for SQLITE).'
    );
  });

  it('normalizes backend case and whitespace', () => {
    expect(loadStoreConfigFromEnv({ PROCWAY_STORE_BACKEND: ' sqlite ', PROCWAY_STORE_PATH: ' /tmp/p.db ' })).toEqual({
      backend: 'SQLITE',
      path: '/tmp/p.db'
    });
    expect(loadStoreConfigFromEnv({ PROCWAY_STORE_BACKEND: 'memory' })).toEqual({ backend: 'MEMORY' });
  });

  it('carries the STORE_MISCONFIGURED code', () => {
    try {
      loadStoreConfigFromEnv({});
      throw new Error('expected failure');
    } catch (error) {
      expect(error).toBeInstanceOf(StoreMisconfiguredError);
      expect((error as StoreMisconfiguredError).code).toBe('STORE_MISCONFIGURED');
    }
  });
});

describe('createKeyValueStore', () => {
  it('builds the configured backend', () => {
    expect(createKeyValueStore({ backend: 'MEMORY' })).toBeInstanceOf(MemoryKeyValueStore);
    expect(createKeyValueStore({ backend: 'SQLITE', path: '/tmp/never-opened.db' })).toBeInstanceOf(SQLiteKeyValueStore);
  });
});

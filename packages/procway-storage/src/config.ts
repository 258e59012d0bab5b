/**
 * Store Backend Configuration
 * Backend selection with fail-closed validation
 */

import { KeyValueStore } from './interfaces';
import { MemoryKeyValueStore } from './memory-store';
import { SQLiteKeyValueStore } from './sqlite-store';

export type StoreBackend = 'MEMORY' | 'SQLITE';

export interface StoreConfig {
  backend: StoreBackend;
  path?: string; // SQLITE: db file path
}

export class StoreMisconfiguredError extends Error {
  code = 'STORE_MISCONFIGURED' as const;

  constructor(message: string) {
    super(message);
    this.name = 'StoreMisconfiguredError';
  }
}

/**
 * Load store configuration from environment variables.
 * Fail-closed: throws StoreMisconfiguredError if invalid/missing.
 */
export function loadStoreConfigFromEnv(env: NodeJS.ProcessEnv = process.env): StoreConfig {
  const backendRaw = (env.PROCWAY_STORE_BACKEND || '').trim().toUpperCase();
  const path = (env.PROCWAY_STORE_PATH || '').trim();

  if (!backendRaw) {
    throw new StoreMisconfiguredError('Missing PROCWAY_STORE_BACKEND (MEMORY|SQLITE).');
  }
  if (backendRaw !== 'MEMORY' && backendRaw !== 'SQLITE') {
    throw new StoreMisconfiguredError(`Invalid PROCWAY_STORE_BACKEND: ${backendRaw} (expected MEMORY|SQLITE).`);
  }
  if (backendRaw === 'SQLITE' && !path) {
    throw new StoreMisconfiguredError('Missing PROCWAY_STORE_PATH (required for SQLITE).');
  }

  return backendRaw === 'SQLITE' ? { backend: 'SQLITE', path } : { backend: 'MEMORY' };
}

/**
 * Create a keyed store based on configuration (not yet initialized)
 */
export function createKeyValueStore(config: StoreConfig): KeyValueStore {
  switch (config.backend) {
    case 'MEMORY':
      return new MemoryKeyValueStore();
    case 'SQLITE':
      return new SQLiteKeyValueStore({ dbPath: config.path });
  }
}

export function makeStoreFromEnv(env: NodeJS.ProcessEnv = process.env): KeyValueStore {
  return createKeyValueStore(loadStoreConfigFromEnv(env));
}

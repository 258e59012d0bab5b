/**
 * Keyed Store Interfaces
 *
 * Every piece of shared mutable state (results cache, in-flight markers, job
 * records, queued tasks) lives behind KeyValueStore. Request handlers and
 * workers in different OS processes race on the same keys, so conditional
 * writes must be atomic in the backend itself.
 */

export interface KeyValueStore {
  /**
   * Open connections, create tables, etc.
   */
  initialize(): Promise<void>;

  /**
   * Close connections and release resources
   */
  shutdown(): Promise<void>;

  /**
   * Read a live value (expired entries read as null)
   */
  get(key: string): Promise<string | null>;

  /**
   * Unconditional write with TTL
   */
  set(key: string, value: string, ttlMs: number): Promise<void>;

  /**
   * Atomic "set if not exists". An expired entry counts as absent.
   * Returns true when this call created the entry.
   */
  setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean>;

  /**
   * Atomic replace, only when the live value equals `expected`
   */
  compareAndSet(key: string, expected: string, value: string, ttlMs: number): Promise<boolean>;

  /**
   * Atomic delete, only when the live value equals `expected`
   */
  compareAndDelete(key: string, expected: string): Promise<boolean>;

  delete(key: string): Promise<void>;

  /**
   * Live keys starting with `prefix`, in ascending order
   */
  keys(prefix: string): Promise<string[]>;

  /**
   * Drop expired entries, returns how many were removed
   */
  purgeExpired(): Promise<number>;
}

export class StoreError extends Error {
  code: string;
  transient: boolean;

  constructor(message: string, code: string = 'STORE_ERROR', transient: boolean = false) {
    super(message);
    this.name = 'StoreError';
    this.code = code;
    this.transient = transient;
  }
}

/**
 * Backend temporarily unreachable (locked database, closed connection).
 * Callers may retry.
 */
export class StoreUnavailableError extends StoreError {
  constructor(message: string) {
    super(message, 'STORE_UNAVAILABLE', true);
    this.name = 'StoreUnavailableError';
  }
}

export function assertValidTtl(ttlMs: number): void {
  if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
    throw new StoreError(`TTL must be a positive number of milliseconds, got ${ttlMs}`, 'INVALID_TTL');
  }
}

export function isTransientStoreError(error: unknown): boolean {
  return error instanceof StoreError && error.transient;
}

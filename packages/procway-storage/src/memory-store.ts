/**
 * MemoryKeyValueStore - in-process backend
 *
 * Single event loop, so each method body runs without interleaving and the
 * conditional writes are atomic. Useful for tests and single-process
 * deployments (server with an embedded worker pool).
 */

import { KeyValueStore, StoreUnavailableError, assertValidTtl } from './interfaces';

export interface MemoryStoreConfig {
  /** Clock in epoch milliseconds; override to drive expiry in tests */
  now?: () => number;
}

interface Entry {
  value: string;
  expiresAt: number;
}

export class MemoryKeyValueStore implements KeyValueStore {
  private entries: Map<string, Entry> = new Map();
  private now: () => number;
  private open = false;

  constructor(config: MemoryStoreConfig = {}) {
    this.now = config.now ?? Date.now;
  }

  async initialize(): Promise<void> {
    this.open = true;
  }

  async shutdown(): Promise<void> {
    this.open = false;
    this.entries.clear();
  }

  async get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    this.ensureOpen();
    assertValidTtl(ttlMs);
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    assertValidTtl(ttlMs);
    if (this.live(key)) return false;
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
    return true;
  }

  async compareAndSet(key: string, expected: string, value: string, ttlMs: number): Promise<boolean> {
    assertValidTtl(ttlMs);
    const entry = this.live(key);
    if (!entry || entry.value !== expected) return false;
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
    return true;
  }

  async compareAndDelete(key: string, expected: string): Promise<boolean> {
    const entry = this.live(key);
    if (!entry || entry.value !== expected) return false;
    this.entries.delete(key);
    return true;
  }

  async delete(key: string): Promise<void> {
    this.ensureOpen();
    this.entries.delete(key);
  }

  async keys(prefix: string): Promise<string[]> {
    this.ensureOpen();
    const now = this.now();
    const result: string[] = [];
    for (const [key, entry] of this.entries) {
      if (key.startsWith(prefix) && entry.expiresAt > now) {
        result.push(key);
      }
    }
    return result.sort();
  }

  async purgeExpired(): Promise<number> {
    this.ensureOpen();
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  private live(key: string): Entry | undefined {
    this.ensureOpen();
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private ensureOpen(): void {
    if (!this.open) {
      throw new StoreUnavailableError('Memory store not initialized');
    }
  }
}

/**
 * ResilientStore - KeyValueStore decorator for the results cache and job store
 *
 * Transient backend faults are retried with bounded backoff; whatever still
 * fails surfaces as LibraryError (internal fault, generic to callers).
 */

import { KeyValueStore, isTransientStoreError } from 'procway-storage';
import { LibraryError, messageOf } from './errors';
import { Logger, silentLogger } from './logging';
import { RetryPolicy, withRetry } from './retry';

export class ResilientStore implements KeyValueStore {
  constructor(
    private readonly inner: KeyValueStore,
    private readonly policy: RetryPolicy,
    private readonly logger: Logger = silentLogger
  ) {}

  initialize(): Promise<void> {
    return this.inner.initialize();
  }

  shutdown(): Promise<void> {
    return this.inner.shutdown();
  }

  get(key: string): Promise<string | null> {
    return this.guard('get', key, () => this.inner.get(key));
  }

  set(key: string, value: string, ttlMs: number): Promise<void> {
    return this.guard('set', key, () => this.inner.set(key, value, ttlMs));
  }

  setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    return this.guard('setIfAbsent', key, () => this.inner.setIfAbsent(key, value, ttlMs));
  }

  compareAndSet(key: string, expected: string, value: string, ttlMs: number): Promise<boolean> {
    return this.guard('compareAndSet', key, () => this.inner.compareAndSet(key, expected, value, ttlMs));
  }

  compareAndDelete(key: string, expected: string): Promise<boolean> {
    return this.guard('compareAndDelete', key, () => this.inner.compareAndDelete(key, expected));
  }

  delete(key: string): Promise<void> {
    return this.guard('delete', key, () => this.inner.delete(key));
  }

  keys(prefix: string): Promise<string[]> {
    return this.guard('keys', prefix, () => this.inner.keys(prefix));
  }

  purgeExpired(): Promise<number> {
    return this.guard('purgeExpired', '*', () => this.inner.purgeExpired());
  }

  private async guard<T>(operation: string, key: string, call: () => Promise<T>): Promise<T> {
    try {
      return await withRetry(call, this.policy, {
        isRetryable: isTransientStoreError,
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn({ operation, key, attempt, delayMs, err: error }, 'store call failed, retrying');
        }
      });
    } catch (error) {
      if (error instanceof LibraryError) throw error;
      this.logger.error({ operation, key, err: error }, 'store call failed');
      throw new LibraryError(`Store ${operation} failed for ${key}: ${messageOf(error)}`, { cause: error });
    }
  }
}

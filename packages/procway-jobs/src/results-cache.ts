/**
 * Results Cache
 *
 * fingerprint -> completed result (success TTL) or deterministic failure
 * (failure TTL), plus the short-lived in-flight marker used to deduplicate
 * concurrent identical requests.
 *
 * A success, once stored, is never overwritten. A cached failure gives way
 * to a later success for the same fingerprint.
 */

import { KeyValueStore } from 'procway-storage';
import { JobsConfig } from './config';
import { LibraryError, messageOf } from './errors';
import { Keyspace } from './keys';
import { CacheEntry, CacheEntrySchema, JobErrorDetail, OutputValues } from './types';

const MAX_REPLACE_ATTEMPTS = 5;

export type ResultsCacheConfig = Pick<JobsConfig, 'resultTtlMs' | 'failureTtlMs' | 'inflightTtlMs'>;

export class ResultsCache {
  constructor(
    private readonly store: KeyValueStore,
    private readonly config: ResultsCacheConfig,
    private readonly keys: Keyspace = new Keyspace()
  ) {}

  async get(fingerprint: string): Promise<CacheEntry | null> {
    const raw = await this.store.get(this.keys.result(fingerprint));
    if (raw === null) return null;
    return parseEntry(fingerprint, raw);
  }

  /**
   * Store a successful result, replacing a cached failure. Returns false if
   * a success was already stored (the existing one is kept).
   */
  async putSuccess(fingerprint: string, outputs: OutputValues): Promise<boolean> {
    const key = this.keys.result(fingerprint);
    const entry: CacheEntry = { kind: 'success', fingerprint, outputs, stored_at: new Date().toISOString() };
    const value = serialize(entry);

    for (let attempt = 0; attempt < MAX_REPLACE_ATTEMPTS; attempt++) {
      if (await this.store.setIfAbsent(key, value, this.config.resultTtlMs)) {
        return true;
      }
      const existing = await this.store.get(key);
      if (existing === null) continue;
      if (parseEntry(fingerprint, existing).kind === 'success') {
        return false;
      }
      if (await this.store.compareAndSet(key, existing, value, this.config.resultTtlMs)) {
        return true;
      }
    }
    throw new LibraryError(`Could not store result for ${fingerprint}: cache entry kept changing`);
  }

  /**
   * Cache a deterministic failure for the (shorter) failure TTL
   */
  async putFailure(fingerprint: string, error: JobErrorDetail): Promise<boolean> {
    const entry: CacheEntry = { kind: 'failure', fingerprint, error, stored_at: new Date().toISOString() };
    return this.store.setIfAbsent(this.keys.result(fingerprint), serialize(entry), this.config.failureTtlMs);
  }

  /**
   * Atomically claim the in-flight marker for a fingerprint.
   * Returns true when this caller now owns the execution.
   */
  claimInFlight(fingerprint: string, jobId: string): Promise<boolean> {
    return this.store.setIfAbsent(this.keys.inflight(fingerprint), jobId, this.config.inflightTtlMs);
  }

  /**
   * Job id currently holding the marker, if any
   */
  getInFlight(fingerprint: string): Promise<string | null> {
    return this.store.get(this.keys.inflight(fingerprint));
  }

  /**
   * Clear the marker only if it still belongs to `jobId`, so a late release
   * never removes a marker claimed by a newer execution
   */
  releaseInFlight(fingerprint: string, jobId: string): Promise<boolean> {
    return this.store.compareAndDelete(this.keys.inflight(fingerprint), jobId);
  }
}

function serialize(entry: CacheEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    throw new LibraryError(`Cannot serialize result for ${entry.fingerprint}: ${messageOf(error)}`, { cause: error });
  }
}

function parseEntry(fingerprint: string, raw: string): CacheEntry {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new LibraryError(`Corrupt cache entry for ${fingerprint}: ${messageOf(error)}`, { cause: error });
  }
  const parsed = CacheEntrySchema.safeParse(json);
  if (!parsed.success) {
    throw new LibraryError(`Corrupt cache entry for ${fingerprint}: ${parsed.error.message}`);
  }
  return parsed.data;
}

/**
 * Job Store
 *
 * job id -> job record, with its own TTL (refreshed on every write). Updates
 * are compare-and-set loops over the serialized record, so concurrent
 * writers (worker progress, dismissal, completion) never lose each other's
 * fields and a terminal status is never overwritten.
 */

import { KeyValueStore } from 'procway-storage';
import { LibraryError, messageOf } from './errors';
import { Keyspace } from './keys';
import { Logger, silentLogger } from './logging';
import { JobPatch, JobRecord, JobRecordSchema, JobStatus, canTransition, isTerminal } from './types';

const MAX_CAS_ATTEMPTS = 8;

export interface UpdateOptions {
  /** Only apply the patch when the current status is one of these */
  from?: readonly JobStatus[];
}

export type UpdateResult =
  | { applied: true; record: JobRecord }
  | { applied: false; record: JobRecord | null };

export class JobStore {
  constructor(
    private readonly store: KeyValueStore,
    private readonly ttlMs: number,
    private readonly keys: Keyspace = new Keyspace(),
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Persist a new record. Job ids are unique; a collision is an internal fault.
   */
  async create(record: JobRecord): Promise<JobRecord> {
    if (record.status !== 'accepted') {
      throw new LibraryError(`Job ${record.job_id} must be created in status accepted, got ${record.status}`);
    }
    const created = await this.store.setIfAbsent(this.keys.job(record.job_id), serialize(record), this.ttlMs);
    if (!created) {
      throw new LibraryError(`Job id collision: ${record.job_id}`);
    }
    return record;
  }

  async get(jobId: string): Promise<JobRecord | null> {
    const raw = await this.store.get(this.keys.job(jobId));
    return raw === null ? null : parseRecord(jobId, raw);
  }

  /**
   * Apply a patch atomically. Rejected (applied: false) when the record is
   * missing, not in one of `options.from`, or the status change is not a
   * legal transition. Fields not named in the patch are left untouched.
   */
  async update(jobId: string, patch: JobPatch, options: UpdateOptions = {}): Promise<UpdateResult> {
    const key = this.keys.job(jobId);

    for (let attempt = 0; attempt < MAX_CAS_ATTEMPTS; attempt++) {
      const raw = await this.store.get(key);
      if (raw === null) {
        return { applied: false, record: null };
      }

      const current = parseRecord(jobId, raw);
      const nextStatus = patch.status ?? current.status;

      if (options.from && !options.from.includes(current.status)) {
        return { applied: false, record: current };
      }
      if (isTerminal(current.status) || !canTransition(current.status, nextStatus)) {
        return { applied: false, record: current };
      }

      const next: JobRecord = { ...current, ...definedFields(patch), updated_at: new Date().toISOString() };
      if (await this.store.compareAndSet(key, raw, serialize(next), this.ttlMs)) {
        return { applied: true, record: next };
      }
      this.logger.debug({ job_id: jobId, attempt }, 'job record changed concurrently, retrying update');
    }

    throw new LibraryError(`Job ${jobId} update did not converge after ${MAX_CAS_ATTEMPTS} attempts`);
  }

  /**
   * Remove a record that was never handed out to a caller (lost dedup race)
   */
  async discard(jobId: string): Promise<void> {
    await this.store.delete(this.keys.job(jobId));
  }

  /**
   * All live job records, newest first
   */
  async list(): Promise<JobRecord[]> {
    const keys = await this.store.keys(this.keys.jobPrefix);
    const records: JobRecord[] = [];

    for (const key of keys) {
      const jobId = key.slice(this.keys.jobPrefix.length);
      try {
        const record = await this.get(jobId);
        if (record) records.push(record);
      } catch (error) {
        this.logger.error({ job_id: jobId, err: error }, 'skipping unreadable job record');
      }
    }

    return records.sort((a, b) => b.created_at.localeCompare(a.created_at));
  }
}

function definedFields(patch: JobPatch): JobPatch {
  return Object.fromEntries(Object.entries(patch).filter(([, value]) => value !== undefined));
}

function serialize(record: JobRecord): string {
  return JSON.stringify(record);
}

function parseRecord(jobId: string, raw: string): JobRecord {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new LibraryError(`Corrupt job record ${jobId}: ${messageOf(error)}`, { cause: error });
  }
  const parsed = JobRecordSchema.safeParse(json);
  if (!parsed.success) {
    throw new LibraryError(`Corrupt job record ${jobId}: ${parsed.error.message}`);
  }
  return parsed.data;
}

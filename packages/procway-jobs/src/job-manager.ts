/**
 * Job Manager
 *
 * Entry point for the HTTP layer. submit() resolves a request to a job:
 *
 *   1. validate inputs, resolve requested outputs, compute the fingerprint
 *   2. completed cache entry -> job wrapped around the cached result, no execution
 *   3. otherwise create an accepted job and race for the in-flight marker
 *      - won: dispatch the task
 *      - lost to a live job: drop our record and attach to that job
 *      - lost to a stale marker (job gone, failed or dismissed): clear it, retry
 *   4. sync mode polls the job until it is terminal or the deadline passes;
 *      a missed deadline degrades to the async answer
 */

import { v4 as uuidv4 } from 'uuid';
import { JobsConfig } from './config';
import {
  INTERNAL_ERROR_MESSAGE,
  InvalidInputError,
  JobDismissedError,
  JobFailedError,
  JobNotDismissableError,
  JobNotFoundError,
  LibraryError,
  ResultNotReadyError
} from './errors';
import { TaskDispatcher } from './dispatcher';
import { computeFingerprint, normalizeOutputs } from './fingerprint';
import { JobStore } from './job-store';
import { Logger, silentLogger } from './logging';
import { ValidatedProcessDescription } from './process';
import { ProcessRegistry } from './registry';
import { ResultsCache } from './results-cache';
import { sleep } from './retry';
import { CacheEntry, ExecutionMode, JobRecord, OutputValues, isTerminal } from './types';

const MAX_SETTLE_ATTEMPTS = 5;

/**
 * The requested mode when the process supports it, otherwise the one it does
 */
export function resolveMode(description: ValidatedProcessDescription, requested: ExecutionMode): ExecutionMode {
  const option = requested === 'sync' ? 'sync-execute' : 'async-execute';
  if (description.jobControlOptions.includes(option)) return requested;
  return requested === 'sync' ? 'async' : 'sync';
}

export interface SubmitRequest {
  inputs: unknown;
  /** Output ids to compute; omitted or empty means every declared output */
  outputs?: readonly string[];
  mode?: ExecutionMode;
  /** Overrides the configured sync deadline for this call */
  syncDeadlineMs?: number;
}

export interface SubmitOutcome {
  job: JobRecord;
  /** Answered from the results cache without dispatching */
  cacheHit: boolean;
  /** Attached to an execution already in flight for the same fingerprint */
  deduplicated: boolean;
  /** Set when the job finished successfully within the sync deadline */
  outputs?: OutputValues;
}

export interface JobManagerDeps {
  registry: ProcessRegistry;
  jobStore: JobStore;
  resultsCache: ResultsCache;
  dispatcher: TaskDispatcher;
  config: Pick<JobsConfig, 'syncDeadlineMs' | 'syncPollIntervalMs'>;
  logger?: Logger;
}

interface PreparedRequest {
  processId: string;
  description: ValidatedProcessDescription;
  inputs: Record<string, unknown>;
  outputs: string[];
  fingerprint: string;
}

export class JobManager {
  private registry: ProcessRegistry;
  private jobStore: JobStore;
  private resultsCache: ResultsCache;
  private dispatcher: TaskDispatcher;
  private config: Pick<JobsConfig, 'syncDeadlineMs' | 'syncPollIntervalMs'>;
  private logger: Logger;

  constructor(deps: JobManagerDeps) {
    this.registry = deps.registry;
    this.jobStore = deps.jobStore;
    this.resultsCache = deps.resultsCache;
    this.dispatcher = deps.dispatcher;
    this.config = deps.config;
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * @throws ProcessNotFoundError | InvalidInputError | DispatchError | LibraryError
   */
  async submit(processId: string, request: SubmitRequest): Promise<SubmitOutcome> {
    const prepared = this.prepare(processId, request);
    const log = this.logger.child({ process_id: processId, fingerprint: prepared.fingerprint });
    const mode = resolveMode(prepared.description, request.mode ?? 'async');

    for (let attempt = 0; attempt < MAX_SETTLE_ATTEMPTS; attempt++) {
      const cached = await this.resultsCache.get(prepared.fingerprint);
      if (cached) {
        log.info({ kind: cached.kind }, 'results cache hit');
        return this.fromCache(prepared, cached);
      }

      const job = await this.jobStore.create(this.newRecord(prepared, false));

      if (await this.resultsCache.claimInFlight(prepared.fingerprint, job.job_id)) {
        await this.dispatch(prepared, job, log);
        return this.settle({ job, cacheHit: false, deduplicated: false }, mode, request.syncDeadlineMs);
      }

      await this.jobStore.discard(job.job_id);

      const holderId = await this.resultsCache.getInFlight(prepared.fingerprint);
      if (holderId === null) {
        // Released between our claim and the read; the cache is worth another look
        continue;
      }

      const holder = await this.jobStore.get(holderId);
      if (holder && (holder.status === 'accepted' || holder.status === 'running' || holder.status === 'successful')) {
        log.info({ job_id: holder.job_id }, 'attached to in-flight execution');
        return this.settle({ job: holder, cacheHit: false, deduplicated: true }, mode, request.syncDeadlineMs);
      }

      log.warn({ job_id: holderId, status: holder?.status ?? 'missing' }, 'clearing stale in-flight marker');
      await this.resultsCache.releaseInFlight(prepared.fingerprint, holderId);
    }

    throw new LibraryError(`Could not settle a job for fingerprint ${prepared.fingerprint}`);
  }

  /**
   * @throws JobNotFoundError
   */
  async getStatus(jobId: string): Promise<JobRecord> {
    const record = await this.jobStore.get(jobId);
    if (!record) {
      throw new JobNotFoundError(jobId);
    }
    return record;
  }

  /**
   * Outputs of a successful job, restricted to `requestedOutputs` when given
   * (which must be a subset of what the job computed)
   * @throws JobNotFoundError | ResultNotReadyError | JobFailedError | JobDismissedError | InvalidInputError
   */
  async getResult(jobId: string, requestedOutputs?: readonly string[]): Promise<OutputValues> {
    const record = await this.getStatus(jobId);

    switch (record.status) {
      case 'dismissed':
        throw new JobDismissedError(jobId);
      case 'failed':
        throw new JobFailedError(jobId, record.error ?? { code: 'LIBRARY_ERROR', message: INTERNAL_ERROR_MESSAGE });
      case 'accepted':
      case 'running':
        throw new ResultNotReadyError(jobId, record.status);
      case 'successful':
        break;
    }

    const wanted = requestedOutputs && requestedOutputs.length > 0 ? normalizeOutputs(requestedOutputs) : record.outputs;
    const unknown = wanted.filter((id) => !record.outputs.includes(id));
    if (unknown.length > 0) {
      throw new InvalidInputError(
        `Output(s) ${unknown.map((id) => `'${id}'`).join(', ')} were not requested by job ${jobId}`
      );
    }

    const entry = await this.resultsCache.get(record.fingerprint);
    if (!entry) {
      throw new JobNotFoundError(jobId, `Result for job ${jobId} has expired`);
    }
    if (entry.kind !== 'success') {
      throw new LibraryError(`Job ${jobId} is successful but its cache entry is a failure`);
    }

    const result: OutputValues = {};
    for (const id of wanted) {
      if (id in entry.outputs) result[id] = entry.outputs[id];
    }
    return result;
  }

  /**
   * Advisory cancellation: marks the job dismissed and frees the fingerprint.
   * A worker already executing it finds out through isDismissed().
   * @throws JobNotFoundError | JobNotDismissableError
   */
  async dismiss(jobId: string): Promise<JobRecord> {
    const current = await this.getStatus(jobId);
    if (current.status === 'dismissed') return current;
    if (isTerminal(current.status)) {
      throw new JobNotDismissableError(jobId, current.status);
    }
    if (
      this.registry.has(current.process_id) &&
      !this.registry.describe(current.process_id).jobControlOptions.includes('dismiss')
    ) {
      throw new JobNotDismissableError(
        jobId,
        current.status,
        `because process ${current.process_id} does not support dismissal`
      );
    }

    const result = await this.jobStore.update(
      jobId,
      { status: 'dismissed', finished_at: new Date().toISOString(), message: 'Job dismissed' },
      { from: ['accepted', 'running'] }
    );

    if (!result.applied) {
      if (!result.record) throw new JobNotFoundError(jobId);
      if (result.record.status === 'dismissed') return result.record;
      throw new JobNotDismissableError(jobId, result.record.status);
    }

    try {
      await this.resultsCache.releaseInFlight(current.fingerprint, jobId);
    } catch (error) {
      // Marker TTL clears it eventually
      this.logger.error({ job_id: jobId, err: error }, 'could not clear in-flight marker on dismissal');
    }

    this.logger.info({ job_id: jobId }, 'job dismissed');
    return result.record;
  }

  listJobs(): Promise<JobRecord[]> {
    return this.jobStore.list();
  }

  listProcesses(): ValidatedProcessDescription[] {
    return this.registry.list();
  }

  describeProcess(processId: string): ValidatedProcessDescription {
    return this.registry.describe(processId);
  }

  private prepare(processId: string, request: SubmitRequest): PreparedRequest {
    const description = this.registry.describe(processId);
    const declared = Object.keys(description.outputs);

    const outputs = normalizeOutputs(request.outputs && request.outputs.length > 0 ? request.outputs : declared);
    const undeclared = outputs.filter((id) => !declared.includes(id));
    if (undeclared.length > 0) {
      throw new InvalidInputError(
        `Unknown output(s) ${undeclared.map((id) => `'${id}'`).join(', ')} for process ${processId}`
      );
    }

    const inputs = this.registry.validateInputs(processId, request.inputs);

    let fingerprint: string;
    try {
      fingerprint = computeFingerprint(processId, inputs, outputs);
    } catch (error) {
      if (error instanceof TypeError) {
        throw new InvalidInputError(`Inputs for process ${processId} cannot be encoded: ${error.message}`);
      }
      throw error;
    }

    return { processId, description, inputs, outputs, fingerprint };
  }

  private newRecord(prepared: PreparedRequest, cacheHit: boolean): JobRecord {
    const now = new Date().toISOString();
    const record: JobRecord = {
      job_id: uuidv4(),
      process_id: prepared.processId,
      status: 'accepted',
      fingerprint: prepared.fingerprint,
      outputs: prepared.outputs,
      created_at: now,
      updated_at: now,
      message: 'Job accepted'
    };
    if (cacheHit) record.cache_hit = true;
    return record;
  }

  private async fromCache(prepared: PreparedRequest, entry: CacheEntry): Promise<SubmitOutcome> {
    const job = await this.jobStore.create(this.newRecord(prepared, true));
    const finishedAt = new Date().toISOString();

    const result =
      entry.kind === 'success'
        ? await this.jobStore.update(
            job.job_id,
            { status: 'successful', finished_at: finishedAt, message: 'Result retrieved from cache', progress: 100 },
            { from: ['accepted'] }
          )
        : await this.jobStore.update(
            job.job_id,
            { status: 'failed', finished_at: finishedAt, message: entry.error.message, error: entry.error },
            { from: ['accepted'] }
          );

    if (!result.applied) {
      throw new LibraryError(`Could not finalize cache-hit job ${job.job_id}`);
    }

    return {
      job: result.record,
      cacheHit: true,
      deduplicated: false,
      outputs: entry.kind === 'success' ? entry.outputs : undefined
    };
  }

  private async dispatch(prepared: PreparedRequest, job: JobRecord, log: Logger): Promise<void> {
    try {
      await this.dispatcher.dispatch({
        job_id: job.job_id,
        process_id: prepared.processId,
        fingerprint: prepared.fingerprint,
        inputs: prepared.inputs,
        outputs: prepared.outputs
      });
    } catch (error) {
      await this.resultsCache.releaseInFlight(prepared.fingerprint, job.job_id).catch((releaseError: unknown) => {
        log.error({ job_id: job.job_id, err: releaseError }, 'could not clear in-flight marker after dispatch error');
      });
      throw error;
    }
  }

  private async settle(outcome: SubmitOutcome, mode: ExecutionMode, deadlineMs?: number): Promise<SubmitOutcome> {
    if (mode === 'async') return outcome;

    const job = await this.waitForTerminal(outcome.job.job_id, deadlineMs ?? this.config.syncDeadlineMs);
    if (job.status !== 'successful') {
      // Not done in time (degrade to async) or finished without a result
      return { ...outcome, job };
    }
    return { ...outcome, job, outputs: await this.getResult(job.job_id) };
  }

  private async waitForTerminal(jobId: string, deadlineMs: number): Promise<JobRecord> {
    const deadline = Date.now() + deadlineMs;

    for (;;) {
      const record = await this.getStatus(jobId);
      const remaining = deadline - Date.now();
      if (isTerminal(record.status) || remaining <= 0) {
        return record;
      }
      await sleep(Math.min(this.config.syncPollIntervalMs, remaining));
    }
  }
}

/**
 * Worker Execution Handler
 *
 * Runs inside a worker: moves the job to running, executes the process with
 * validated inputs, writes the result (or deterministic failure) into the
 * results cache, finalizes the job and clears the in-flight marker on every
 * terminal path.
 */

import { JobsConfig } from './config';
import {
  ExecutionError,
  INTERNAL_ERROR_MESSAGE,
  LibraryError,
  ProcessNotFoundError,
  isDeterministicFailure,
  messageOf,
  toJobError
} from './errors';
import { JobStore } from './job-store';
import { Logger, silentLogger } from './logging';
import { ExecutionContext, Process } from './process';
import { ProgressReporter } from './progress';
import { ProcessRegistry } from './registry';
import { ResultsCache } from './results-cache';
import { JobRecord, OutputValues, OutputValuesSchema, TaskDescriptor } from './types';

export interface WorkerExecutionHandlerDeps {
  registry: ProcessRegistry;
  jobStore: JobStore;
  resultsCache: ResultsCache;
  config: Pick<JobsConfig, 'progressIntervalMs'>;
  logger?: Logger;
}

/**
 * Keep only the requested outputs; a requested output the process did not
 * produce is an execution error
 */
export function selectOutputs(produced: unknown, requested: readonly string[]): OutputValues {
  const parsed = OutputValuesSchema.safeParse(produced);
  if (!parsed.success) {
    throw new ExecutionError('Process returned a value that is not an output map');
  }

  const selected: OutputValues = {};
  for (const id of requested) {
    if (!Object.hasOwn(parsed.data, id)) {
      throw new ExecutionError(`Process did not produce requested output '${id}'`);
    }
    selected[id] = parsed.data[id];
  }
  return selected;
}

export class WorkerExecutionHandler {
  private registry: ProcessRegistry;
  private jobStore: JobStore;
  private resultsCache: ResultsCache;
  private progressIntervalMs: number;
  private logger: Logger;

  constructor(deps: WorkerExecutionHandlerDeps) {
    this.registry = deps.registry;
    this.jobStore = deps.jobStore;
    this.resultsCache = deps.resultsCache;
    this.progressIntervalMs = deps.config.progressIntervalMs;
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Execute one task. Returns the job record as left by this call (null if
   * the record has expired).
   */
  async handle(task: TaskDescriptor): Promise<JobRecord | null> {
    const log = this.logger.child({ job_id: task.job_id, process_id: task.process_id, fingerprint: task.fingerprint });

    try {
      const started = await this.jobStore.update(
        task.job_id,
        { status: 'running', started_at: new Date().toISOString(), message: 'Job started', progress: 0 },
        { from: ['accepted'] }
      );
      if (!started.applied) {
        log.info({ status: started.record?.status ?? 'missing' }, 'job not in accepted state, skipping execution');
        return started.record;
      }

      let outputs: OutputValues;
      try {
        outputs = await this.execute(task);
        await this.resultsCache.putSuccess(task.fingerprint, outputs);
      } catch (error) {
        return await this.fail(task, error, log);
      }

      const done = await this.jobStore.update(
        task.job_id,
        { status: 'successful', finished_at: new Date().toISOString(), message: 'Job completed', progress: 100 },
        { from: ['running'] }
      );
      if (done.applied) {
        log.info('job successful');
      } else {
        log.info({ status: done.record?.status }, 'job left running before completion; result cached, status kept');
      }
      return done.record;
    } finally {
      await this.release(task, log);
    }
  }

  /**
   * Liveness backstop: the worker holding this task stopped without
   * finalizing it
   */
  async handleCrash(task: TaskDescriptor): Promise<JobRecord | null> {
    const log = this.logger.child({ job_id: task.job_id, process_id: task.process_id, fingerprint: task.fingerprint });
    log.error({ worker: task.claimed_by }, 'worker stopped while executing job');

    try {
      const result = await this.jobStore.update(
        task.job_id,
        {
          status: 'failed',
          finished_at: new Date().toISOString(),
          message: 'Worker stopped unexpectedly',
          error: { code: 'LIBRARY_ERROR', message: INTERNAL_ERROR_MESSAGE }
        },
        { from: ['accepted', 'running'] }
      );
      return result.record;
    } finally {
      await this.release(task, log);
    }
  }

  private async execute(task: TaskDescriptor): Promise<OutputValues> {
    let process: Process;
    try {
      process = this.registry.lookup(task.process_id);
    } catch (error) {
      if (error instanceof ProcessNotFoundError) {
        throw new LibraryError(`Worker has no process registered as ${task.process_id}`, { cause: error });
      }
      throw error;
    }

    // Full validation happens here as well; the task may come from another
    // process with a different registry version
    const inputs = this.registry.validateInputs(task.process_id, task.inputs);

    const reporter = new ProgressReporter(this.jobStore, task.job_id, this.progressIntervalMs, this.logger);
    const context: ExecutionContext = {
      jobId: task.job_id,
      processId: task.process_id,
      reportProgress: (message, percent) => reporter.report(message, percent),
      isDismissed: async () => {
        if (reporter.wasDismissed) return true;
        const record = await this.jobStore.get(task.job_id);
        return record?.status === 'dismissed';
      }
    };

    let produced: OutputValues;
    try {
      produced = await process.execute(inputs, context);
    } finally {
      await reporter.flush().catch((error: unknown) => {
        this.logger.warn({ job_id: task.job_id, err: error }, 'could not persist final progress');
      });
    }

    return selectOutputs(produced, task.outputs);
  }

  private async fail(task: TaskDescriptor, error: unknown, log: Logger): Promise<JobRecord | null> {
    const detail = toJobError(error);

    const current = await this.jobStore.get(task.job_id);
    if (current?.status !== 'running') {
      // Dismissed while executing; a failure here must not shadow a later run
      log.info({ status: current?.status ?? 'missing', code: detail.code }, 'job no longer running, failure not recorded');
      return current;
    }

    if (detail.code === 'LIBRARY_ERROR' || detail.code === 'DISPATCH_ERROR') {
      log.error({ err: error }, 'job failed with internal error');
    } else {
      log.warn({ code: detail.code, reason: messageOf(error) }, 'job failed');
    }

    if (isDeterministicFailure(detail)) {
      try {
        await this.resultsCache.putFailure(task.fingerprint, detail);
      } catch (cacheError) {
        log.error({ err: cacheError }, 'could not cache failure');
      }
    }

    const result = await this.jobStore.update(
      task.job_id,
      { status: 'failed', finished_at: new Date().toISOString(), message: detail.message, error: detail },
      { from: ['running'] }
    );
    return result.record;
  }

  private async release(task: TaskDescriptor, log: Logger): Promise<void> {
    try {
      await this.resultsCache.releaseInFlight(task.fingerprint, task.job_id);
    } catch (error) {
      // The marker TTL clears it eventually
      log.error({ err: error }, 'could not clear in-flight marker');
    }
  }
}

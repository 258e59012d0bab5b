/**
 * Task Dispatcher
 *
 * Submits execution requests to the worker pool's broker. Transient broker
 * faults are retried with bounded exponential backoff. Once retries are
 * exhausted the job is marked failed (never left in accepted) and
 * DispatchError is raised.
 *
 * Retries happen only here, before any worker has seen the task.
 */

import { Broker, NewTask, isTransientBrokerError } from './broker';
import { DispatchError, INTERNAL_ERROR_MESSAGE, messageOf } from './errors';
import { JobStore } from './job-store';
import { Logger, silentLogger } from './logging';
import { RetryPolicy, withRetry } from './retry';
import { DispatchHandle } from './types';

export class TaskDispatcher {
  constructor(
    private readonly broker: Broker,
    private readonly jobStore: JobStore,
    private readonly policy: RetryPolicy,
    private readonly logger: Logger = silentLogger
  ) {}

  async dispatch(task: NewTask): Promise<DispatchHandle> {
    const log = this.logger.child({ job_id: task.job_id, process_id: task.process_id });

    try {
      const handle = await withRetry(() => this.broker.enqueue(task), this.policy, {
        isRetryable: isTransientBrokerError,
        onRetry: (error, attempt, delayMs) => {
          log.warn({ attempt, delayMs, err: error }, 'enqueue failed, retrying');
        }
      });
      log.info({ task_id: handle.task_id }, 'task dispatched');
      return handle;
    } catch (error) {
      log.error({ err: error }, 'dispatch failed');

      try {
        const marked = await this.jobStore.update(
          task.job_id,
          {
            status: 'failed',
            finished_at: new Date().toISOString(),
            message: 'Job could not be dispatched',
            error: { code: 'DISPATCH_ERROR', message: INTERNAL_ERROR_MESSAGE }
          },
          { from: ['accepted'] }
        );
        if (!marked.applied) {
          log.warn({ status: marked.record?.status }, 'job not marked failed after dispatch error');
        }
      } catch (updateError) {
        log.error({ err: updateError }, 'could not mark job failed after dispatch error');
      }

      throw new DispatchError(`Could not enqueue job ${task.job_id}: ${messageOf(error)}`, { cause: error });
    }
  }
}

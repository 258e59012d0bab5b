/**
 * Worker pool
 *
 * Polls the broker, runs claimed tasks through the WorkerExecutionHandler
 * (at most `concurrency` at a time, one by default) and keeps each claimed
 * task's lease alive while it runs. Every poll also reaps tasks whose worker
 * died and hands them to handleCrash.
 *
 * stop() stops claiming and waits for running jobs to finish, so a worker is
 * never torn down mid-job.
 */

import { hostname } from 'os';
import { v4 as uuidv4 } from 'uuid';
import { Broker } from './broker';
import { Logger, silentLogger } from './logging';
import { TaskDescriptor } from './types';
import { WorkerExecutionHandler } from './worker';

export interface WorkerPoolOptions {
  concurrency: number;
  pollIntervalMs: number;
  leaseMs: number;
  workerId?: string;
}

export class WorkerPool {
  readonly workerId: string;
  private options: WorkerPoolOptions;
  private active: Map<string, Promise<void>> = new Map();
  private timer: NodeJS.Timeout | null = null;
  private ticking: Promise<void> | null = null;
  private running = false;
  private accepting = true;

  constructor(
    private readonly broker: Broker,
    private readonly handler: WorkerExecutionHandler,
    options: WorkerPoolOptions,
    private readonly logger: Logger = silentLogger
  ) {
    this.options = options;
    this.workerId = options.workerId ?? `worker-${hostname()}-${process.pid}-${uuidv4().slice(0, 8)}`;
  }

  get activeCount(): number {
    return this.active.size;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.accepting = true;
    this.logger.info({ worker: this.workerId, concurrency: this.options.concurrency }, 'worker pool started');
    this.schedule(0);
  }

  /**
   * One poll: reap abandoned tasks, then claim tasks into free slots.
   * Returns how many tasks were started.
   */
  async tick(): Promise<number> {
    for (const task of await this.broker.reapAbandoned()) {
      await this.handler.handleCrash(task);
    }

    let started = 0;
    while (this.accepting && this.active.size < this.options.concurrency) {
      const task = await this.broker.claim(this.workerId, this.options.leaseMs);
      if (!task) break;
      this.launch(task);
      started++;
    }
    return started;
  }

  /**
   * Wait for every running task to finish
   */
  async drain(): Promise<void> {
    while (this.active.size > 0) {
      await Promise.all([...this.active.values()]);
    }
  }

  async stop(): Promise<void> {
    this.accepting = false;
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.ticking) {
      await this.ticking;
    }
    await this.drain();
    this.logger.info({ worker: this.workerId }, 'worker pool stopped');
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.ticking = this.tick()
        .then(() => undefined)
        .catch((error: unknown) => {
          this.logger.error({ err: error, worker: this.workerId }, 'worker poll failed');
        })
        .finally(() => {
          this.ticking = null;
          if (this.running) this.schedule(this.options.pollIntervalMs);
        });
    }, delayMs);
  }

  private launch(task: TaskDescriptor): void {
    const log = this.logger.child({ task_id: task.task_id, job_id: task.job_id, worker: this.workerId });
    const heartbeatMs = Math.max(1, Math.floor(this.options.leaseMs / 3));

    const heartbeat = setInterval(() => {
      this.broker
        .heartbeat(task.task_id, this.workerId, this.options.leaseMs)
        .then((renewed) => {
          if (!renewed) log.warn('lease lost while task running');
        })
        .catch((error: unknown) => {
          log.warn({ err: error }, 'lease heartbeat failed');
        });
    }, heartbeatMs);

    const run = (async () => {
      try {
        await this.handler.handle(task);
        await this.broker.complete(task.task_id);
      } catch (error) {
        // Not completed: the lease runs out and the reaper fails the job
        log.error({ err: error }, 'task handling failed, leaving lease to expire');
      } finally {
        clearInterval(heartbeat);
        this.active.delete(task.task_id);
      }
    })();

    this.active.set(task.task_id, run);
  }
}

/**
 * Task broker
 *
 * The worker pool's queue. StoreBroker keeps it in the same keyed store as
 * jobs and results:
 *
 * - enqueue: write <prefix>:task:<id>
 * - claim: take the lease with setIfAbsent (the lease is the claim lock),
 *   then mark the task claimed with compare-and-set
 * - heartbeat: refresh the lease
 * - complete: remove task and lease
 * - reapAbandoned: a claimed task whose lease expired belongs to a dead
 *   worker; it is removed and returned so the caller can fail its job.
 *   Claimed tasks are never handed out again.
 */

import { v4 as uuidv4 } from 'uuid';
import { KeyValueStore, StoreError } from 'procway-storage';
import { Keyspace } from './keys';
import { Logger, silentLogger } from './logging';
import { DispatchHandle, TaskDescriptor, TaskDescriptorSchema } from './types';

export type NewTask = Omit<TaskDescriptor, 'task_id' | 'enqueued_at' | 'claimed_by' | 'claimed_at'>;

export interface Broker {
  enqueue(task: NewTask): Promise<DispatchHandle>;
  claim(workerId: string, leaseMs: number): Promise<TaskDescriptor | null>;
  heartbeat(taskId: string, workerId: string, leaseMs: number): Promise<boolean>;
  complete(taskId: string): Promise<void>;
  reapAbandoned(): Promise<TaskDescriptor[]>;
}

/**
 * Broker unreachable or refused the request; retryable by the dispatcher
 */
export class BrokerUnavailableError extends Error {
  code = 'BROKER_UNAVAILABLE' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BrokerUnavailableError';
  }
}

export function isTransientBrokerError(error: unknown): boolean {
  return error instanceof BrokerUnavailableError || (error instanceof StoreError && error.transient);
}

interface StoredTask {
  raw: string;
  task: TaskDescriptor;
}

export class StoreBroker implements Broker {
  constructor(
    private readonly store: KeyValueStore,
    private readonly taskTtlMs: number,
    private readonly keys: Keyspace = new Keyspace(),
    private readonly logger: Logger = silentLogger
  ) {}

  async enqueue(newTask: NewTask): Promise<DispatchHandle> {
    const task: TaskDescriptor = {
      ...newTask,
      task_id: uuidv4(),
      enqueued_at: new Date().toISOString()
    };
    await this.store.set(this.keys.task(task.task_id), JSON.stringify(task), this.taskTtlMs);
    return { task_id: task.task_id, enqueued_at: task.enqueued_at };
  }

  async claim(workerId: string, leaseMs: number): Promise<TaskDescriptor | null> {
    const pending = (await this.loadTasks())
      .filter(({ task }) => task.claimed_by === undefined)
      .sort((a, b) => a.task.enqueued_at.localeCompare(b.task.enqueued_at));

    for (const { raw, task } of pending) {
      const leaseKey = this.keys.lease(task.task_id);
      if (!(await this.store.setIfAbsent(leaseKey, workerId, leaseMs))) {
        continue;
      }

      const claimed: TaskDescriptor = { ...task, claimed_by: workerId, claimed_at: new Date().toISOString() };
      if (await this.store.compareAndSet(this.keys.task(task.task_id), raw, JSON.stringify(claimed), this.taskTtlMs)) {
        return claimed;
      }

      // Task vanished or changed under us; give the lease back
      await this.store.compareAndDelete(leaseKey, workerId);
    }

    return null;
  }

  heartbeat(taskId: string, workerId: string, leaseMs: number): Promise<boolean> {
    return this.store.compareAndSet(this.keys.lease(taskId), workerId, workerId, leaseMs);
  }

  async complete(taskId: string): Promise<void> {
    await this.store.delete(this.keys.task(taskId));
    await this.store.delete(this.keys.lease(taskId));
  }

  async reapAbandoned(): Promise<TaskDescriptor[]> {
    const abandoned: TaskDescriptor[] = [];

    for (const { raw, task } of await this.loadTasks()) {
      if (task.claimed_by === undefined) continue;
      if ((await this.store.get(this.keys.lease(task.task_id))) !== null) continue;

      // Only one reaper wins the delete, so each crash is reported once
      if (await this.store.compareAndDelete(this.keys.task(task.task_id), raw)) {
        this.logger.warn({ task_id: task.task_id, job_id: task.job_id, worker: task.claimed_by }, 'worker lease expired');
        abandoned.push(task);
      }
    }

    return abandoned;
  }

  private async loadTasks(): Promise<StoredTask[]> {
    const tasks: StoredTask[] = [];
    for (const key of await this.store.keys(this.keys.taskPrefix)) {
      const raw = await this.store.get(key);
      if (raw === null) continue;

      const parsed = TaskDescriptorSchema.safeParse(safeJson(raw));
      if (!parsed.success) {
        this.logger.error({ key }, 'dropping unreadable task');
        await this.store.compareAndDelete(key, raw);
        continue;
      }
      tasks.push({ raw, task: parsed.data });
    }
    return tasks;
  }
}

function safeJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

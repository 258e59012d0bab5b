/**
 * Progress reporting for running jobs
 *
 * Rapid reportProgress() calls are coalesced: at most one store write per
 * interval, and only fields that changed since the last write are sent.
 * The latest pending values are flushed before the job finalizes.
 */

import { JobStore } from './job-store';
import { Logger, silentLogger } from './logging';
import { JobPatch } from './types';

interface ProgressState {
  message?: string;
  progress?: number;
}

export class ProgressReporter {
  private persisted: ProgressState = {};
  private pending: ProgressState = {};
  private lastWriteAt = 0;
  private dismissed = false;

  constructor(
    private readonly jobStore: JobStore,
    private readonly jobId: string,
    private readonly intervalMs: number,
    private readonly logger: Logger = silentLogger,
    private readonly now: () => number = Date.now
  ) {}

  /** Set once a write was rejected because the job left `running` */
  get wasDismissed(): boolean {
    return this.dismissed;
  }

  async report(message?: string, percent?: number): Promise<void> {
    if (message !== undefined) this.pending.message = message;
    if (percent !== undefined) this.pending.progress = clampPercent(percent);

    if (this.now() - this.lastWriteAt >= this.intervalMs) {
      await this.flush();
    }
  }

  /**
   * Write any changed fields now
   */
  async flush(): Promise<void> {
    const patch: JobPatch = {};
    if (this.pending.message !== undefined && this.pending.message !== this.persisted.message) {
      patch.message = this.pending.message;
    }
    if (this.pending.progress !== undefined && this.pending.progress !== this.persisted.progress) {
      patch.progress = this.pending.progress;
    }
    this.pending = {};

    if (patch.message === undefined && patch.progress === undefined) return;

    const result = await this.jobStore.update(this.jobId, patch, { from: ['running'] });
    this.lastWriteAt = this.now();

    if (result.applied) {
      this.persisted = { ...this.persisted, ...patch };
    } else {
      this.dismissed = result.record?.status === 'dismissed';
      this.logger.debug({ job_id: this.jobId, status: result.record?.status }, 'progress update rejected');
    }
  }
}

function clampPercent(percent: number): number {
  if (!Number.isFinite(percent)) return 0;
  return Math.min(100, Math.max(0, Math.round(percent)));
}

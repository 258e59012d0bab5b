/**
 * Jobs configuration
 * Fail-closed: an unparsable value throws ConfigError rather than falling
 * back to a default.
 */

import { z } from 'zod';
import { RetryPolicy } from './retry';

export interface JobsConfig {
  /** TTL of successful results in the results cache */
  resultTtlMs: number;
  /** TTL of job records, refreshed on every write */
  jobTtlMs: number;
  /** TTL of cached deterministic failures */
  failureTtlMs: number;
  /** TTL of the in-flight marker; backstop for workers that die silently */
  inflightTtlMs: number;
  /** How long a sync-mode submit blocks before degrading to async */
  syncDeadlineMs: number;
  syncPollIntervalMs: number;
  dispatchRetry: RetryPolicy;
  storeRetry: RetryPolicy;
  /** Minimum spacing between persisted progress updates */
  progressIntervalMs: number;
  workerConcurrency: number;
  workerPollIntervalMs: number;
  workerLeaseMs: number;
  keyPrefix: string;
  logLevel: string;
}

export class ConfigError extends Error {
  code = 'CONFIG_INVALID' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

const EnvSchema = z.object({
  PROCWAY_RESULT_TTL_SECONDS: positiveInt(7 * 24 * 3600),
  PROCWAY_JOB_TTL_SECONDS: positiveInt(7 * 24 * 3600),
  PROCWAY_FAILURE_TTL_SECONDS: positiveInt(300),
  PROCWAY_INFLIGHT_TTL_SECONDS: positiveInt(900),
  PROCWAY_SYNC_DEADLINE_MS: nonNegativeInt(30_000),
  PROCWAY_SYNC_POLL_INTERVAL_MS: positiveInt(250),
  PROCWAY_DISPATCH_MAX_RETRIES: nonNegativeInt(3),
  PROCWAY_DISPATCH_BASE_DELAY_MS: nonNegativeInt(200),
  PROCWAY_DISPATCH_MAX_DELAY_MS: nonNegativeInt(5000),
  PROCWAY_STORE_MAX_RETRIES: nonNegativeInt(3),
  PROCWAY_STORE_BASE_DELAY_MS: nonNegativeInt(50),
  PROCWAY_STORE_MAX_DELAY_MS: nonNegativeInt(1000),
  PROCWAY_PROGRESS_INTERVAL_MS: nonNegativeInt(500),
  PROCWAY_WORKER_CONCURRENCY: positiveInt(1),
  PROCWAY_WORKER_POLL_INTERVAL_MS: positiveInt(1000),
  PROCWAY_WORKER_LEASE_MS: positiveInt(30_000),
  PROCWAY_KEY_PREFIX: z.string().trim().min(1).default('procway'),
  PROCWAY_LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
});

export function loadJobsConfigFromEnv(env: NodeJS.ProcessEnv = process.env): JobsConfig {
  // Empty strings mean "unset"
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''));
  const parsed = EnvSchema.safeParse(present);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid jobs configuration: ${issues}`);
  }

  const e = parsed.data;
  return {
    resultTtlMs: e.PROCWAY_RESULT_TTL_SECONDS * 1000,
    jobTtlMs: e.PROCWAY_JOB_TTL_SECONDS * 1000,
    failureTtlMs: e.PROCWAY_FAILURE_TTL_SECONDS * 1000,
    inflightTtlMs: e.PROCWAY_INFLIGHT_TTL_SECONDS * 1000,
    syncDeadlineMs: e.PROCWAY_SYNC_DEADLINE_MS,
    syncPollIntervalMs: e.PROCWAY_SYNC_POLL_INTERVAL_MS,
    dispatchRetry: {
      maxRetries: e.PROCWAY_DISPATCH_MAX_RETRIES,
      baseDelayMs: e.PROCWAY_DISPATCH_BASE_DELAY_MS,
      maxDelayMs: e.PROCWAY_DISPATCH_MAX_DELAY_MS
    },
    storeRetry: {
      maxRetries: e.PROCWAY_STORE_MAX_RETRIES,
      baseDelayMs: e.PROCWAY_STORE_BASE_DELAY_MS,
      maxDelayMs: e.PROCWAY_STORE_MAX_DELAY_MS
    },
    progressIntervalMs: e.PROCWAY_PROGRESS_INTERVAL_MS,
    workerConcurrency: e.PROCWAY_WORKER_CONCURRENCY,
    workerPollIntervalMs: e.PROCWAY_WORKER_POLL_INTERVAL_MS,
    workerLeaseMs: e.PROCWAY_WORKER_LEASE_MS,
    keyPrefix: e.PROCWAY_KEY_PREFIX,
    logLevel: e.PROCWAY_LOG_LEVEL
  };
}

export const DEFAULT_JOBS_CONFIG: Readonly<JobsConfig> = loadJobsConfigFromEnv({});

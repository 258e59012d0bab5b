/**
 * Job and cache data model
 *
 * Records are stored as JSON strings and parsed with zod on every read, so a
 * corrupted or foreign value surfaces as a LibraryError instead of flowing
 * into the job lifecycle.
 */

import { z } from 'zod';

// ============================================================================
// Job status state machine
// ============================================================================

export const JOB_STATUSES = ['accepted', 'running', 'successful', 'failed', 'dismissed'] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set(['successful', 'failed', 'dismissed']);

/**
 * accepted is the only initial state. accepted -> successful is used for jobs
 * wrapped around a cache hit. running -> running carries progress updates.
 */
const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  accepted: ['running', 'successful', 'failed', 'dismissed'],
  running: ['running', 'successful', 'failed', 'dismissed'],
  successful: [],
  failed: [],
  dismissed: []
};

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

// ============================================================================
// Error detail stored on jobs and failure cache entries
// ============================================================================

export const JOB_ERROR_CODES = ['INVALID_INPUT', 'EXECUTION_ERROR', 'LIBRARY_ERROR', 'DISPATCH_ERROR'] as const;

export type JobErrorCode = (typeof JOB_ERROR_CODES)[number];

export const JobErrorDetailSchema = z.object({
  code: z.enum(JOB_ERROR_CODES),
  message: z.string()
});

export type JobErrorDetail = z.infer<typeof JobErrorDetailSchema>;

// ============================================================================
// Job record
// ============================================================================

export const JobRecordSchema = z.object({
  job_id: z.string().min(1),
  process_id: z.string().min(1),
  status: z.enum(JOB_STATUSES),
  fingerprint: z.string().min(1),
  outputs: z.array(z.string()),
  created_at: z.string(),
  updated_at: z.string(),
  started_at: z.string().optional(),
  finished_at: z.string().optional(),
  message: z.string().optional(),
  progress: z.number().int().min(0).max(100).optional(),
  error: JobErrorDetailSchema.optional(),
  cache_hit: z.boolean().optional()
});

export type JobRecord = z.infer<typeof JobRecordSchema>;

/**
 * Fields a status update may touch. Identity fields (job_id, process_id,
 * fingerprint, outputs, created_at) are fixed at creation.
 */
export type JobPatch = Partial<
  Pick<JobRecord, 'status' | 'started_at' | 'finished_at' | 'message' | 'progress' | 'error'>
>;

// ============================================================================
// Results cache entries
// ============================================================================

export const OutputValuesSchema = z.record(z.unknown());

export type OutputValues = z.infer<typeof OutputValuesSchema>;

export const CacheEntrySchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('success'),
    fingerprint: z.string(),
    outputs: OutputValuesSchema,
    stored_at: z.string()
  }),
  z.object({
    kind: z.literal('failure'),
    fingerprint: z.string(),
    error: JobErrorDetailSchema,
    stored_at: z.string()
  })
]);

export type CacheEntry = z.infer<typeof CacheEntrySchema>;

// ============================================================================
// Queued task
// ============================================================================

export const TaskDescriptorSchema = z.object({
  task_id: z.string().min(1),
  job_id: z.string().min(1),
  process_id: z.string().min(1),
  fingerprint: z.string().min(1),
  inputs: z.record(z.unknown()),
  outputs: z.array(z.string()),
  enqueued_at: z.string(),
  claimed_by: z.string().optional(),
  claimed_at: z.string().optional()
});

export type TaskDescriptor = z.infer<typeof TaskDescriptorSchema>;

export interface DispatchHandle {
  task_id: string;
  enqueued_at: string;
}

// ============================================================================
// Execution modes
// ============================================================================

export type ExecutionMode = 'sync' | 'async';

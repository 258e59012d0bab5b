/**
 * Error taxonomy
 *
 * Caller errors (bad input, unknown ids) carry their message to the caller.
 * Internal faults (dispatch, cache, serialization) are logged in full and
 * surface as a generic internal error.
 */

import { JobErrorDetail } from './types';

export type ProcwayErrorCode =
  | 'INVALID_INPUT'
  | 'PROCESS_NOT_FOUND'
  | 'JOB_NOT_FOUND'
  | 'RESULT_NOT_READY'
  | 'JOB_FAILED'
  | 'JOB_DISMISSED'
  | 'JOB_NOT_DISMISSABLE'
  | 'EXECUTION_ERROR'
  | 'DISPATCH_ERROR'
  | 'LIBRARY_ERROR';

export const INTERNAL_ERROR_MESSAGE = 'Internal server error';

export class ProcwayError extends Error {
  code: ProcwayErrorCode;
  statusCode: number;
  /** Whether the message may be shown to the caller */
  expose: boolean;

  constructor(message: string, code: ProcwayErrorCode, statusCode: number, expose: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProcwayError';
    this.code = code;
    this.statusCode = statusCode;
    this.expose = expose;
  }

  /** Message safe to return to a caller */
  publicMessage(): string {
    return this.expose ? this.message : INTERNAL_ERROR_MESSAGE;
  }
}

/**
 * Caller error: inputs violate the declared schema or are semantically invalid.
 * Processes may throw this from execute() to reject input they cannot handle.
 */
export class InvalidInputError extends ProcwayError {
  constructor(message: string) {
    super(message, 'INVALID_INPUT', 400, true);
    this.name = 'InvalidInputError';
  }
}

export class ProcessNotFoundError extends ProcwayError {
  constructor(public readonly processId: string) {
    super(`Process ${processId} not found`, 'PROCESS_NOT_FOUND', 404, true);
    this.name = 'ProcessNotFoundError';
  }
}

export class JobNotFoundError extends ProcwayError {
  constructor(public readonly jobId: string, message: string = `Job ${jobId} not found`) {
    super(message, 'JOB_NOT_FOUND', 404, true);
    this.name = 'JobNotFoundError';
  }
}

export class ResultNotReadyError extends ProcwayError {
  constructor(public readonly jobId: string, status: string) {
    super(`Result for job ${jobId} is not ready (status: ${status})`, 'RESULT_NOT_READY', 404, true);
    this.name = 'ResultNotReadyError';
  }
}

/**
 * The job reached `failed`; carries the detail stored on the job record
 */
export class JobFailedError extends ProcwayError {
  constructor(public readonly jobId: string, public readonly detail: JobErrorDetail) {
    super(
      `Job ${jobId} failed: ${detail.message}`,
      'JOB_FAILED',
      detail.code === 'INVALID_INPUT' ? 400 : 500,
      true
    );
    this.name = 'JobFailedError';
  }
}

export class JobDismissedError extends ProcwayError {
  constructor(public readonly jobId: string) {
    super(`Job ${jobId} was dismissed`, 'JOB_DISMISSED', 410, true);
    this.name = 'JobDismissedError';
  }
}

export class JobNotDismissableError extends ProcwayError {
  constructor(public readonly jobId: string, status: string, reason = `in status ${status}`) {
    super(`Job ${jobId} cannot be dismissed ${reason}`, 'JOB_NOT_DISMISSABLE', 409, true);
    this.name = 'JobNotDismissableError';
  }
}

/**
 * The wrapped process raised during computation. The process's own message
 * is forwarded to the caller.
 */
export class ExecutionError extends ProcwayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'EXECUTION_ERROR', 500, true, options);
    this.name = 'ExecutionError';
  }
}

export class DispatchError extends ProcwayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'DISPATCH_ERROR', 500, false, options);
    this.name = 'DispatchError';
  }
}

export class LibraryError extends ProcwayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'LIBRARY_ERROR', 500, false, options);
    this.name = 'LibraryError';
  }
}

export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Classify anything thrown while executing a job into the detail stored on
 * the job record. Internal faults get a generic message; the full error is
 * the caller's to log.
 */
export function toJobError(error: unknown): JobErrorDetail {
  if (error instanceof InvalidInputError) {
    return { code: 'INVALID_INPUT', message: error.message };
  }
  if (error instanceof LibraryError) {
    return { code: 'LIBRARY_ERROR', message: INTERNAL_ERROR_MESSAGE };
  }
  if (error instanceof DispatchError) {
    return { code: 'DISPATCH_ERROR', message: INTERNAL_ERROR_MESSAGE };
  }
  if (error instanceof ExecutionError) {
    return { code: 'EXECUTION_ERROR', message: error.message };
  }
  return { code: 'EXECUTION_ERROR', message: messageOf(error) };
}

/**
 * Whether a classified failure is deterministic, i.e. re-running the same
 * request would fail the same way
 */
export function isDeterministicFailure(detail: JobErrorDetail): boolean {
  return detail.code === 'INVALID_INPUT' || detail.code === 'EXECUTION_ERROR';
}

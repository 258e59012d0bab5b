/**
 * Error responses
 *
 * Every error leaves the server as { type, title, status, detail }. The
 * OGC API Processes exception URIs are used where the standard defines one.
 * Internal faults carry the generic message only.
 */

import { FastifyError } from 'fastify';
import { INTERNAL_ERROR_MESSAGE, ProcwayError, ProcwayErrorCode } from 'procway-jobs';

const OGC_EXCEPTIONS = 'http://www.opengis.net/def/exceptions/ogcapi-processes-1/1.0';

const EXCEPTION_TYPES: Partial<Record<ProcwayErrorCode, string>> = {
  PROCESS_NOT_FOUND: `${OGC_EXCEPTIONS}/no-such-process`,
  JOB_NOT_FOUND: `${OGC_EXCEPTIONS}/no-such-job`,
  RESULT_NOT_READY: `${OGC_EXCEPTIONS}/result-not-ready`
};

export interface Problem {
  type: string;
  title: string;
  status: number;
  detail: string;
}

export function problem(status: number, title: string, detail: string, type = 'about:blank'): Problem {
  return { type, title, status, detail };
}

export function problemFromError(error: ProcwayError): Problem {
  return problem(error.statusCode, error.code, error.publicMessage(), EXCEPTION_TYPES[error.code]);
}

/**
 * Errors raised by Fastify itself (bad JSON, oversized body, ...)
 */
export function problemFromFastifyError(error: FastifyError): Problem {
  const status = error.statusCode ?? 500;
  if (status >= 500) {
    return problem(500, 'INTERNAL_ERROR', INTERNAL_ERROR_MESSAGE);
  }
  return problem(status, error.code || 'BAD_REQUEST', error.message);
}

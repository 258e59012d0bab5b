/**
 * Process routes
 *
 * GET  /conformance
 * GET  /processes
 * GET  /processes/:processId
 * POST /processes/:processId/execution
 *
 * Execution defaults to async. `Prefer: respond-async` forces async; a body
 * `mode: "sync"` waits for the result up to the sync deadline. A process
 * that supports only one mode runs in that mode whatever was asked.
 */

import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import {
  ExecutionMode,
  INTERNAL_ERROR_MESSAGE,
  InvalidInputError,
  JobFailedError,
  JobManager,
  ValidatedProcessDescription,
  resolveMode
} from 'procway-jobs';
import { Link, toStatusInfo } from '../status-info';

export const CONFORMANCE_CLASSES = [
  'http://www.opengis.net/spec/ogcapi-processes-1/1.0/conf/core',
  'http://www.opengis.net/spec/ogcapi-processes-1/1.0/conf/json',
  'http://www.opengis.net/spec/ogcapi-processes-1/1.0/conf/job-list',
  'http://www.opengis.net/spec/ogcapi-processes-1/1.0/conf/dismiss'
];

const ExecuteBodySchema = z.object({
  inputs: z.record(z.unknown()).default({}),
  /** Output ids, as a list or as the keys of an OGC outputs object */
  outputs: z.union([z.array(z.string()), z.record(z.unknown())]).optional(),
  mode: z.enum(['sync', 'async']).optional()
});

type ExecuteBody = z.infer<typeof ExecuteBodySchema>;

function parseExecuteBody(body: unknown): ExecuteBody {
  const parsed = ExecuteBodySchema.safeParse(body ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'body'}: ${issue.message}`)
      .join('; ');
    throw new InvalidInputError(`Invalid execute request: ${issues}`);
  }
  return parsed.data;
}

function requestedOutputs(outputs: ExecuteBody['outputs']): string[] | undefined {
  if (outputs === undefined) return undefined;
  return Array.isArray(outputs) ? outputs : Object.keys(outputs);
}

function prefersAsync(header: string | string[] | undefined): boolean {
  const values = Array.isArray(header) ? header : header ? [header] : [];
  return values.some((value) =>
    value
      .split(',')
      .map((token) => token.trim().toLowerCase())
      .includes('respond-async')
  );
}

function processLinks(description: ValidatedProcessDescription): Link[] {
  return [
    { href: `/processes/${description.id}`, rel: 'self', type: 'application/json', title: 'Process description' },
    {
      href: `/processes/${description.id}/execution`,
      rel: 'http://www.opengis.net/def/rel/ogc/1.0/execute',
      title: 'Execute endpoint'
    }
  ];
}

function processSummary(description: ValidatedProcessDescription) {
  return {
    id: description.id,
    title: description.title,
    description: description.description,
    version: description.version,
    keywords: description.keywords,
    jobControlOptions: description.jobControlOptions,
    outputTransmission: description.outputTransmission,
    links: processLinks(description)
  };
}

export function registerProcessRoutes(app: FastifyInstance, manager: JobManager): void {
  app.get('/conformance', async () => {
    return { conformsTo: CONFORMANCE_CLASSES };
  });

  app.get('/processes', async () => {
    return {
      processes: manager.listProcesses().map(processSummary),
      links: [{ href: '/processes', rel: 'self', type: 'application/json' }]
    };
  });

  app.get<{ Params: { processId: string } }>('/processes/:processId', async (request) => {
    const description = manager.describeProcess(request.params.processId);
    return { ...description, links: processLinks(description) };
  });

  app.post<{ Params: { processId: string } }>('/processes/:processId/execution', async (request, reply) => {
    const body = parseExecuteBody(request.body);
    const requested: ExecutionMode = prefersAsync(request.headers.prefer) ? 'async' : body.mode ?? 'async';
    const mode = resolveMode(manager.describeProcess(request.params.processId), requested);

    const outcome = await manager.submit(request.params.processId, {
      inputs: body.inputs,
      outputs: requestedOutputs(body.outputs),
      mode
    });
    const { job } = outcome;

    if (mode === 'sync') {
      if (job.status === 'successful' && outcome.outputs) {
        return reply.code(200).send({ jobID: job.job_id, status: job.status, type: 'process', outputs: outcome.outputs });
      }
      if (job.status === 'failed') {
        throw new JobFailedError(job.job_id, job.error ?? { code: 'LIBRARY_ERROR', message: INTERNAL_ERROR_MESSAGE });
      }
    }

    // Async, or sync past its deadline
    return reply.code(201).header('Location', `/jobs/${job.job_id}`).send(toStatusInfo(job));
  });
}

/**
 * Job routes
 *
 * GET    /jobs
 * GET    /jobs/:jobId
 * GET    /jobs/:jobId/results?outputs=a,b
 * DELETE /jobs/:jobId            (dismiss)
 */

import { FastifyInstance } from 'fastify';
import { JobManager } from 'procway-jobs';
import { toStatusInfo } from '../status-info';

interface JobParams {
  jobId: string;
}

/**
 * "a, b,,c" -> ['a', 'b', 'c']; absent or blank -> every output of the job.
 * A repeated parameter (?outputs=a&outputs=b) arrives as an array.
 */
export function parseOutputList(raw: string | string[] | undefined): string[] | undefined {
  if (raw === undefined) return undefined;
  const ids = (Array.isArray(raw) ? raw : [raw])
    .flatMap((value) => value.split(','))
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
  return ids.length > 0 ? ids : undefined;
}

export function registerJobRoutes(app: FastifyInstance, manager: JobManager): void {
  app.get('/jobs', async () => {
    const jobs = await manager.listJobs();
    return {
      jobs: jobs.map(toStatusInfo),
      links: [{ href: '/jobs', rel: 'self', type: 'application/json' }]
    };
  });

  app.get<{ Params: JobParams }>('/jobs/:jobId', async (request) => {
    return toStatusInfo(await manager.getStatus(request.params.jobId));
  });

  app.get<{ Params: JobParams; Querystring: { outputs?: string | string[] } }>('/jobs/:jobId/results', async (request) => {
    return manager.getResult(request.params.jobId, parseOutputList(request.query.outputs));
  });

  app.delete<{ Params: JobParams }>('/jobs/:jobId', async (request) => {
    return toStatusInfo(await manager.dismiss(request.params.jobId));
  });
}

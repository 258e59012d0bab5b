import { JobRecord } from 'procway-jobs';

export interface Link {
  href: string;
  rel: string;
  type?: string;
  title?: string;
}

/**
 * OGC API Processes statusInfo document
 */
export interface StatusInfo {
  jobID: string;
  processID: string;
  type: 'process';
  status: JobRecord['status'];
  message?: string;
  created: string;
  started?: string;
  finished?: string;
  updated: string;
  progress?: number;
  links: Link[];
}

export function jobLinks(job: JobRecord): Link[] {
  const links: Link[] = [{ href: `/jobs/${job.job_id}`, rel: 'self', type: 'application/json', title: 'Job status' }];
  if (job.status === 'successful') {
    links.push({
      href: `/jobs/${job.job_id}/results`,
      rel: 'http://www.opengis.net/def/rel/ogc/1.0/results',
      type: 'application/json',
      title: 'Job results'
    });
  }
  return links;
}

export function toStatusInfo(job: JobRecord): StatusInfo {
  return {
    jobID: job.job_id,
    processID: job.process_id,
    type: 'process',
    status: job.status,
    message: job.message,
    created: job.created_at,
    started: job.started_at,
    finished: job.finished_at,
    updated: job.updated_at,
    progress: job.progress,
    links: jobLinks(job)
  };
}

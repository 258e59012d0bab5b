/**
 * Key layout shared by request handlers and workers
 *
 *   <prefix>:result:<fingerprint>    completed result or cached failure
 *   <prefix>:inflight:<fingerprint>  job id currently executing the fingerprint
 *   <prefix>:job:<job id>            job record
 *   <prefix>:task:<task id>          queued / claimed task
 *   <prefix>:lease:<task id>         worker lease on a claimed task
 */

export class Keyspace {
  constructor(private readonly prefix: string = 'procway') {}

  result(fingerprint: string): string {
    return `${this.prefix}:result:${fingerprint}`;
  }

  inflight(fingerprint: string): string {
    return `${this.prefix}:inflight:${fingerprint}`;
  }

  job(jobId: string): string {
    return `${this.prefix}:job:${jobId}`;
  }

  get jobPrefix(): string {
    return `${this.prefix}:job:`;
  }

  task(taskId: string): string {
    return `${this.prefix}:task:${taskId}`;
  }

  get taskPrefix(): string {
    return `${this.prefix}:task:`;
  }

  lease(taskId: string): string {
    return `${this.prefix}:lease:${taskId}`;
  }
}

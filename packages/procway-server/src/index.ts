/**
 * procway server
 * OGC API Processes over the job lifecycle and results cache
 *
 * Storage is fail-closed: without a store passed in, PROCWAY_STORE_BACKEND
 * (and PROCWAY_STORE_PATH for SQLITE) must be set or start() throws.
 */

import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { KeyValueStore, makeStoreFromEnv } from 'procway-storage';
import {
  JobsConfig,
  JobsRuntime,
  ProcessRegistry,
  ProcwayError,
  WorkerPool,
  createJobsRuntime,
  createLogger,
  loadJobsConfigFromEnv
} from 'procway-jobs';
import { problem, problemFromError, problemFromFastifyError } from './problem';
import { registerBuiltinProcesses } from './processes';
import { registerJobRoutes } from './routes/jobs';
import { registerProcessRoutes } from './routes/processes';

export interface ProcwayServerConfig {
  port?: number;
  host?: string;
  /** Run a worker pool inside the server process */
  withWorker?: boolean;
  /** Defaults to the store described by the environment */
  store?: KeyValueStore;
  /** Defaults to a registry holding the built-in processes */
  registry?: ProcessRegistry;
  /** Defaults to loadJobsConfigFromEnv(env) */
  jobs?: JobsConfig;
  env?: NodeJS.ProcessEnv;
}

export class ProcwayServer {
  private app: FastifyInstance;
  private config: ProcwayServerConfig & { port: number; host: string };
  private jobsConfig: JobsConfig;
  private runtime: JobsRuntime | null = null;
  private pool: WorkerPool | null = null;
  private bootStatus: 'booting' | 'ready' | 'failed' = 'booting';
  private bootError: string | null = null;

  constructor(config: ProcwayServerConfig = {}) {
    const env = config.env ?? process.env;
    this.config = { ...config, port: config.port ?? 8000, host: config.host ?? '0.0.0.0' };
    this.jobsConfig = config.jobs ?? loadJobsConfigFromEnv(env);

    this.app = Fastify({
      logger: { level: this.jobsConfig.logLevel }
    });
  }

  /**
   * Open storage, register routes and make the app ready for requests
   * (app.inject works from here on). Does not listen.
   */
  async init(): Promise<void> {
    try {
      const store = this.config.store ?? makeStoreFromEnv(this.config.env ?? process.env);
      const registry = this.config.registry ?? registerBuiltinProcesses(new ProcessRegistry());

      this.runtime = createJobsRuntime({
        store,
        registry,
        config: this.jobsConfig,
        logger: createLogger('procway-jobs', this.jobsConfig.logLevel)
      });
      await this.runtime.initialize();

      await this.app.register(cors, { origin: '*' });
      this.registerErrorHandling();
      this.registerRoutes(this.runtime);
      await this.app.ready();

      if (this.config.withWorker) {
        this.pool = this.runtime.createWorkerPool();
        this.pool.start();
      }

      this.bootStatus = 'ready';
    } catch (error) {
      this.bootStatus = 'failed';
      this.bootError = error instanceof Error ? error.message : String(error);
      this.app.log.error({ err: error }, 'server boot failed');
      throw error;
    }
  }

  async start(): Promise<void> {
    await this.init();
    await this.app.listen({ port: this.config.port, host: this.config.host });
  }

  /**
   * Drain the embedded worker pool, then close HTTP and storage
   */
  async stop(): Promise<void> {
    if (this.pool) {
      await this.pool.stop();
      this.pool = null;
    }
    await this.app.close();
    if (this.runtime) {
      await this.runtime.shutdown();
      this.runtime = null;
    }
  }

  getApp(): FastifyInstance {
    return this.app;
  }

  getRuntime(): JobsRuntime {
    if (!this.runtime) {
      throw new Error('Server not initialized');
    }
    return this.runtime;
  }

  private registerErrorHandling(): void {
    this.app.setErrorHandler((error, request, reply) => {
      if (error instanceof ProcwayError) {
        if (!error.expose) {
          request.log.error({ err: error }, 'internal fault');
        }
        return reply.code(error.statusCode).send(problemFromError(error));
      }

      const body = problemFromFastifyError(error);
      if (body.status >= 500) {
        request.log.error({ err: error }, 'unhandled error');
      }
      return reply.code(body.status).send(body);
    });

    this.app.setNotFoundHandler((request, reply) => {
      return reply.code(404).send(problem(404, 'NOT_FOUND', `Route ${request.method} ${request.url} not found`));
    });
  }

  private registerRoutes(runtime: JobsRuntime): void {
    this.app.get('/health', async (_request, reply) => {
      if (this.bootStatus !== 'ready') {
        return reply.code(503).send({ status: 'unhealthy', bootStatus: this.bootStatus, error: this.bootError });
      }
      return {
        status: 'healthy',
        bootStatus: this.bootStatus,
        processes: runtime.registry.list().length,
        worker: {
          embedded: this.pool !== null,
          active: this.pool?.activeCount ?? 0
        }
      };
    });

    registerProcessRoutes(this.app, runtime.manager);
    registerJobRoutes(this.app, runtime.manager);
  }
}

export default ProcwayServer;
export { registerBuiltinProcesses, EchoProcess, CountdownProcess } from './processes';
export { toStatusInfo } from './status-info';
export type { StatusInfo, Link } from './status-info';
export type { Problem } from './problem';

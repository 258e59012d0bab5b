/**
 * Runtime composition
 *
 * Wires one keyed store into every component. Cache and job-store calls go
 * through ResilientStore (retry, then LibraryError); the broker talks to the
 * raw store so the dispatcher can see and retry transient faults itself.
 */

import { KeyValueStore } from 'procway-storage';
import { DEFAULT_JOBS_CONFIG, JobsConfig } from './config';
import { Broker, StoreBroker } from './broker';
import { TaskDispatcher } from './dispatcher';
import { JobManager } from './job-manager';
import { JobStore } from './job-store';
import { Keyspace } from './keys';
import { Logger, silentLogger } from './logging';
import { ProcessRegistry } from './registry';
import { ResilientStore } from './resilient-store';
import { ResultsCache } from './results-cache';
import { WorkerExecutionHandler } from './worker';
import { WorkerPool, WorkerPoolOptions } from './worker-pool';

export interface JobsRuntimeOptions {
  store: KeyValueStore;
  registry: ProcessRegistry;
  config?: JobsConfig;
  logger?: Logger;
  /** Replaces the store-backed broker */
  broker?: Broker;
}

export interface JobsRuntime {
  config: JobsConfig;
  registry: ProcessRegistry;
  store: KeyValueStore;
  resultsCache: ResultsCache;
  jobStore: JobStore;
  broker: Broker;
  dispatcher: TaskDispatcher;
  handler: WorkerExecutionHandler;
  manager: JobManager;
  createWorkerPool(overrides?: Partial<WorkerPoolOptions>): WorkerPool;
  initialize(): Promise<void>;
  shutdown(): Promise<void>;
}

export function createJobsRuntime(options: JobsRuntimeOptions): JobsRuntime {
  const config = options.config ?? DEFAULT_JOBS_CONFIG;
  const logger = options.logger ?? silentLogger;
  const keys = new Keyspace(config.keyPrefix);

  const store = new ResilientStore(options.store, config.storeRetry, logger.child({ component: 'store' }));
  const resultsCache = new ResultsCache(store, config, keys);
  const jobStore = new JobStore(store, config.jobTtlMs, keys, logger.child({ component: 'job-store' }));
  const broker = options.broker ?? new StoreBroker(options.store, config.jobTtlMs, keys, logger.child({ component: 'broker' }));
  const dispatcher = new TaskDispatcher(broker, jobStore, config.dispatchRetry, logger.child({ component: 'dispatcher' }));

  const handler = new WorkerExecutionHandler({
    registry: options.registry,
    jobStore,
    resultsCache,
    config,
    logger: logger.child({ component: 'worker' })
  });

  const manager = new JobManager({
    registry: options.registry,
    jobStore,
    resultsCache,
    dispatcher,
    config,
    logger: logger.child({ component: 'job-manager' })
  });

  return {
    config,
    registry: options.registry,
    store,
    resultsCache,
    jobStore,
    broker,
    dispatcher,
    handler,
    manager,
    createWorkerPool: (overrides = {}) =>
      new WorkerPool(
        broker,
        handler,
        {
          concurrency: config.workerConcurrency,
          pollIntervalMs: config.workerPollIntervalMs,
          leaseMs: config.workerLeaseMs,
          ...overrides
        },
        logger.child({ component: 'worker-pool' })
      ),
    initialize: () => store.initialize(),
    shutdown: () => store.shutdown()
  };
}

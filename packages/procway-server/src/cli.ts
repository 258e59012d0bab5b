#!/usr/bin/env node
/**
 * procway CLI
 * Commands: serve, worker
 */

import dotenv from 'dotenv';
import { Command, InvalidArgumentError } from 'commander';
import { makeStoreFromEnv } from 'procway-storage';
import { ProcessRegistry, createJobsRuntime, createLogger, loadJobsConfigFromEnv } from 'procway-jobs';
import { ProcwayServer } from './index';
import { registerBuiltinProcesses } from './processes';

dotenv.config();

function parseInteger(name: string) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
      throw new InvalidArgumentError(`${name} must be a non-negative integer, got ${value}`);
    }
    return parsed;
  };
}

/**
 * Run `stop` once on SIGINT/SIGTERM, then exit
 */
function onShutdown(stop: () => Promise<void>): void {
  let stopping = false;
  const handler = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    console.log(`Received ${signal}, draining...`);
    stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      });
  };
  process.on('SIGINT', handler);
  process.on('SIGTERM', handler);
}

const program = new Command();

program.name('procway').description('procway - OGC API Processes job service').version('0.1.0');

program
  .command('serve')
  .description('Start the HTTP API')
  .option('--port <port>', 'Port to listen on', parseInteger('port'), 8000)
  .option('--host <host>', 'Interface to bind', '0.0.0.0')
  .option('--with-worker', 'Also run a worker pool inside the server process', false)
  .action(async (options: { port: number; host: string; withWorker: boolean }) => {
    try {
      const server = new ProcwayServer({ port: options.port, host: options.host, withWorker: options.withWorker });
      await server.start();
      onShutdown(() => server.stop());
    } catch (error) {
      console.error('Error:', error);
      process.exit(1);
    }
  });

program
  .command('worker')
  .description('Run a worker pool that executes queued jobs')
  .option('--concurrency <n>', 'Jobs executed at the same time (default: PROCWAY_WORKER_CONCURRENCY)', parseInteger('concurrency'))
  .action(async (options: { concurrency?: number }) => {
    try {
      const config = loadJobsConfigFromEnv();
      const logger = createLogger('procway-worker', config.logLevel);
      const runtime = createJobsRuntime({
        store: makeStoreFromEnv(),
        registry: registerBuiltinProcesses(new ProcessRegistry()),
        config,
        logger
      });
      await runtime.initialize();

      const pool = runtime.createWorkerPool(options.concurrency ? { concurrency: options.concurrency } : {});
      pool.start();

      onShutdown(async () => {
        await pool.stop();
        await runtime.shutdown();
      });
    } catch (error) {
      console.error('Error:', error);
      process.exit(1);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('Error:', error);
  process.exit(1);
});

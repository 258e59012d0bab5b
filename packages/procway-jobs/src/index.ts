/**
 * procway-jobs - job lifecycle and results caching for OGC API Processes
 */

export * from './types';
export * from './errors';
export * from './config';
export * from './retry';
export * from './logging';
export * from './fingerprint';
export * from './process';
export * from './input-schema';
export * from './registry';
export * from './keys';
export * from './resilient-store';
export * from './results-cache';
export * from './job-store';
export * from './broker';
export * from './dispatcher';
export * from './progress';
export * from './worker';
export * from './worker-pool';
export * from './job-manager';
export * from './runtime';

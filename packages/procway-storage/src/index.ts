/**
 * procway storage
 *
 * KeyValueStore: keyed values with TTL plus atomic set-if-absent,
 * compare-and-set and compare-and-delete.
 *
 * Backends:
 * - MemoryKeyValueStore: in-process (tests, single-process deployments)
 * - SQLiteKeyValueStore: SQLite with WAL, shared by several processes
 */

export * from './interfaces';
export * from './memory-store';
export * from './sqlite-store';
export * from './config';

/**
 * SQLiteKeyValueStore - SQLite-based keyed store
 *
 * - WAL mode so request handlers and workers can share one database file
 * - busy_timeout for lock retry inside SQLite itself
 * - every conditional write is a single statement, hence atomic across
 *   processes
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { KeyValueStore, StoreError, StoreUnavailableError, assertValidTtl } from './interfaces';

export interface SQLiteStoreConfig {
  dbPath?: string;
  walMode?: boolean;
  busyTimeout?: number;
  now?: () => number;
}

const BUSY_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_BUSY_SNAPSHOT']);

function sqliteCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export class SQLiteKeyValueStore implements KeyValueStore {
  private db: Database.Database | null = null;
  private dbPath: string;
  private walMode: boolean;
  private busyTimeout: number;
  private now: () => number;

  constructor(config: SQLiteStoreConfig = {}) {
    this.dbPath = config.dbPath || '.procway/procway.db';
    this.walMode = config.walMode !== false;
    this.busyTimeout = config.busyTimeout || 5000;
    this.now = config.now ?? Date.now;
  }

  async initialize(): Promise<void> {
    if (this.dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    }

    this.db = new Database(this.dbPath);

    if (this.walMode && this.dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma(`busy_timeout = ${this.busyTimeout}`);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS kv (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        expires_at INTEGER NOT NULL
      )
    `);
    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_kv_expires_at
      ON kv(expires_at)
    `);
  }

  async shutdown(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  async get(key: string): Promise<string | null> {
    return this.run((db) => {
      const row = db
        .prepare<[string, number], { value: string }>('SELECT value FROM kv WHERE key = ? AND expires_at > ?')
        .get(key, this.now());
      return row ? row.value : null;
    });
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    assertValidTtl(ttlMs);
    this.run((db) => {
      db.prepare(`
        INSERT INTO kv (key, value, expires_at) VALUES (?, ?, ?)
        ON CONFLICT(key) DO UPDATE SET value = excluded.value, expires_at = excluded.expires_at
      `).run(key, value, this.now() + ttlMs);
    });
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    assertValidTtl(ttlMs);
    return this.run((db) => {
      const now = this.now();
      // An expired row is overwritten in place; a live one is left untouched
      const result = db.prepare(`
        INSERT INTO kv (key, value, expires_at) VALUES (?, ?, ?)
        ON CONFLICT(key) DO UPDATE SET value = excluded.value, expires_at = excluded.expires_at
        WHERE kv.expires_at <= ?
      `).run(key, value, now + ttlMs, now);
      return result.changes === 1;
    });
  }

  async compareAndSet(key: string, expected: string, value: string, ttlMs: number): Promise<boolean> {
    assertValidTtl(ttlMs);
    return this.run((db) => {
      const now = this.now();
      const result = db.prepare(`
        UPDATE kv SET value = ?, expires_at = ?
        WHERE key = ? AND value = ? AND expires_at > ?
      `).run(value, now + ttlMs, key, expected, now);
      return result.changes === 1;
    });
  }

  async compareAndDelete(key: string, expected: string): Promise<boolean> {
    return this.run((db) => {
      const result = db
        .prepare('DELETE FROM kv WHERE key = ? AND value = ? AND expires_at > ?')
        .run(key, expected, this.now());
      return result.changes === 1;
    });
  }

  async delete(key: string): Promise<void> {
    this.run((db) => {
      db.prepare('DELETE FROM kv WHERE key = ?').run(key);
    });
  }

  async keys(prefix: string): Promise<string[]> {
    return this.run((db) => {
      const rows = db
        .prepare<[number, string, number], { key: string }>(
          'SELECT key FROM kv WHERE substr(key, 1, ?) = ? AND expires_at > ? ORDER BY key'
        )
        .all(prefix.length, prefix, this.now());
      return rows.map((row) => row.key);
    });
  }

  async purgeExpired(): Promise<number> {
    return this.run((db) => db.prepare('DELETE FROM kv WHERE expires_at <= ?').run(this.now()).changes);
  }

  private run<T>(operation: (db: Database.Database) => T): T {
    if (!this.db) {
      throw new StoreUnavailableError('Database not initialized');
    }
    try {
      return operation(this.db);
    } catch (error) {
      const code = sqliteCode(error);
      const message = error instanceof Error ? error.message : String(error);
      if (code && BUSY_CODES.has(code)) {
        throw new StoreUnavailableError(`SQLite store busy: ${message}`);
      }
      throw new StoreError(`SQLite store failure: ${message}`, code ?? 'STORE_ERROR');
    }
  }
}

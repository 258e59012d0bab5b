/**
 * Store Conformance Suite
 * Both backends must give identical answers for the same sequence of calls,
 * including expiry and the conditional writes.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { KeyValueStore, StoreError, StoreUnavailableError } from '../interfaces';
import { MemoryKeyValueStore } from '../memory-store';
import { SQLiteKeyValueStore } from '../sqlite-store';

interface Harness {
  store: KeyValueStore;
  advance(ms: number): void;
}

let tempDirs: string[] = [];

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'procway-store-test-'));
  tempDirs.push(dir);
  return dir;
}

const backends: Array<[string, () => Harness]> = [
  [
    'MEMORY',
    () => {
      let clock = 1_000_000;
      return {
        store: new MemoryKeyValueStore({ now: () => clock }),
        advance: (ms) => {
          clock += ms;
        }
      };
    }
  ],
  [
    'SQLITE',
    () => {
      let clock = 1_000_000;
      return {
        store: new SQLiteKeyValueStore({ dbPath: path.join(makeTempDir(), 'kv.db'), now: () => clock }),
        advance: (ms) => {
          clock += ms;
        }
      };
    }
  ]
];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs = [];
});

describe.each(backends)('%s store', (_name, makeHarness) => {
  let harness: Harness;
  let store: KeyValueStore;

  beforeEach(async () => {
    harness = makeHarness();
    store = harness.store;
    await store.initialize();
  });

  afterEach(async () => {
    await store.shutdown();
  });

  it('reads back what was written', async () => {
    await store.set('a', 'one', 1000);
    expect(await store.get('a')).toBe('one');
    expect(await store.get('missing')).toBeNull();
  });

  it('overwrites on set', async () => {
    await store.set('a', 'one', 1000);
    await store.set('a', 'two', 1000);
    expect(await store.get('a')).toBe('two');
  });

  it('hides entries once their TTL passes', async () => {
    await store.set('a', 'one', 1000);
    harness.advance(999);
    expect(await store.get('a')).toBe('one');
    harness.advance(1);
    expect(await store.get('a')).toBeNull();
  });

  it('creates only the first setIfAbsent', async () => {
    expect(await store.setIfAbsent('marker', 'job-1', 1000)).toBe(true);
    expect(await store.setIfAbsent('marker', 'job-2', 1000)).toBe(false);
    expect(await store.get('marker')).toBe('job-1');
  });

  it('treats an expired entry as absent for setIfAbsent', async () => {
    await store.setIfAbsent('marker', 'job-1', 100);
    harness.advance(100);
    expect(await store.setIfAbsent('marker', 'job-2', 100)).toBe(true);
    expect(await store.get('marker')).toBe('job-2');
  });

  it('lets exactly one of many concurrent setIfAbsent calls win', async () => {
    const results = await Promise.all(
      Array.from({ length: 10 }, (_, i) => store.setIfAbsent('race', `job-${i}`, 1000))
    );
    expect(results.filter(Boolean)).toHaveLength(1);
  });

  it('compareAndSet replaces only a matching live value', async () => {
    await store.set('rec', 'v1', 1000);
    expect(await store.compareAndSet('rec', 'stale', 'v2', 1000)).toBe(false);
    expect(await store.compareAndSet('rec', 'v1', 'v2', 1000)).toBe(true);
    expect(await store.get('rec')).toBe('v2');
    expect(await store.compareAndSet('missing', 'v1', 'v2', 1000)).toBe(false);
    expect(await store.get('missing')).toBeNull();
  });

  it('compareAndSet refreshes the TTL', async () => {
    await store.set('rec', 'v1', 100);
    harness.advance(90);
    await store.compareAndSet('rec', 'v1', 'v2', 100);
    harness.advance(90);
    expect(await store.get('rec')).toBe('v2');
  });

  it('compareAndDelete removes only a matching value', async () => {
    await store.set('marker', 'job-1', 1000);
    expect(await store.compareAndDelete('marker', 'job-2')).toBe(false);
    expect(await store.get('marker')).toBe('job-1');
    expect(await store.compareAndDelete('marker', 'job-1')).toBe(true);
    expect(await store.get('marker')).toBeNull();
  });

  it('lists live keys by prefix in order', async () => {
    await store.set('job:b', '2', 1000);
    await store.set('job:a', '1', 1000);
    await store.set('job:c', '3', 10);
    await store.set('result:x', 'r', 1000);
    harness.advance(10);
    expect(await store.keys('job:')).toEqual(['job:a', 'job:b']);
  });

  it('purges expired entries', async () => {
    await store.set('short', '1', 10);
    await store.set('long', '2', 1000);
    harness.advance(10);
    expect(await store.purgeExpired()).toBe(1);
    expect(await store.keys('')).toEqual(['long']);
  });

  it('deletes unconditionally', async () => {
    await store.set('a', 'one', 1000);
    await store.delete('a');
    expect(await store.get('a')).toBeNull();
  });

  it('rejects non-positive TTLs', async () => {
    await expect(store.set('a', 'one', 0)).rejects.toThrow(StoreError);
    await expect(store.setIfAbsent('a', 'one', -5)).rejects.toThrow(/TTL must be a positive/);
  });

  it('reports a closed store as unavailable', async () => {
    await store.shutdown();
    await expect(store.get('a')).rejects.toBeInstanceOf(StoreUnavailableError);
    await store.initialize();
  });
});

describe('SQLite store across connections', () => {
  it('shares markers between two handles on the same file', async () => {
    const dbPath = path.join(makeTempDir(), 'shared.db');
    const first = new SQLiteKeyValueStore({ dbPath });
    const second = new SQLiteKeyValueStore({ dbPath });
    await first.initialize();
    await second.initialize();

    expect(await first.setIfAbsent('inflight:fp', 'job-1', 60_000)).toBe(true);
    expect(await second.setIfAbsent('inflight:fp', 'job-2', 60_000)).toBe(false);
    expect(await second.get('inflight:fp')).toBe('job-1');

    await first.shutdown();
    await second.shutdown();
  });

  it('enables WAL mode on file databases', async () => {
    const dbPath = path.join(makeTempDir(), 'wal.db');
    const store = new SQLiteKeyValueStore({ dbPath });
    await store.initialize();
    await store.set('a', 'one', 1000);

    expect(fs.existsSync(dbPath + '-wal')).toBe(true);

    await store.shutdown();
  });
});

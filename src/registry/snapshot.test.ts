import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { SnapshotStore, parseSnapshot, toSnapshot, fromSnapshot } from './snapshot.js';
import type { DatabaseRecord } from './types.js';
import { makeTempDir, removeDir } from '../__tests__/fixtures.js';

const DIGEST = 'a'.repeat(64);

const RECORD: DatabaseRecord = {
  name: 'shop',
  digest: DIGEST,
  file: 'shop.db',
  tables: { orders: 3, items: 0 },
};

describe('snapshot conversion', () => {
  it('should map records to the persisted shape and back', () => {
    const snapshot = toSnapshot([RECORD], '2026-01-01T00:00:00.000Z');

    expect(snapshot).toEqual({
      version: 1,
      generated_at: '2026-01-01T00:00:00.000Z',
      databases: {
        shop: { hash: DIGEST, file: 'shop.db', tables: { orders: 3, items: 0 } },
      },
    });
    expect(fromSnapshot(snapshot).get('shop')).toEqual(RECORD);
  });
});

describe('parseSnapshot', () => {
  const valid = {
    version: 1,
    generated_at: '2026-01-01T00:00:00.000Z',
    databases: { shop: { hash: DIGEST, file: 'shop.db', tables: { orders: 3 } } },
  };

  it('should accept a valid snapshot', () => {
    expect(parseSnapshot(valid)).toEqual({ snapshot: valid });
  });

  it('should reject another version', () => {
    expect(parseSnapshot({ ...valid, version: 2 })).toEqual({ reason: 'unsupported snapshot version: 2' });
  });

  it('should reject the unversioned legacy layout', () => {
    expect(parseSnapshot({ shop: { hash: DIGEST, file: 'shop.db', tables: {} } })).toEqual({
      reason: 'unsupported snapshot version: undefined',
    });
  });

  it('should reject a malformed entry', () => {
    const bad = { ...valid, databases: { shop: { hash: 'xyz', file: 'shop.db', tables: {} } } };
    expect(parseSnapshot(bad)).toEqual({ reason: 'malformed entry for database: shop' });
  });

  it('should reject negative row counts', () => {
    const bad = { ...valid, databases: { shop: { hash: DIGEST, file: 'shop.db', tables: { t: -1 } } } };
    expect(parseSnapshot(bad)).toEqual({ reason: 'malformed entry for database: shop' });
  });
});

describe('SnapshotStore', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = makeTempDir();
  });

  afterEach(() => {
    removeDir(testDir);
  });

  it('should report a missing file', async () => {
    const store = new SnapshotStore(join(testDir, 'build-metadata.json'));
    expect(await store.load()).toEqual({ status: 'missing' });
  });

  it('should save pretty JSON and load it back', async () => {
    const filePath = join(testDir, 'build-metadata.json');
    const store = new SnapshotStore(filePath);
    const snapshot = toSnapshot([RECORD], '2026-01-01T00:00:00.000Z');

    await store.save(snapshot);

    expect(readFileSync(filePath, 'utf-8')).toBe(JSON.stringify(snapshot, null, 4) + '\n');
    expect(await store.load()).toEqual({ status: 'ok', snapshot });
  });

  it('should report invalid JSON', async () => {
    const filePath = join(testDir, 'build-metadata.json');
    writeFileSync(filePath, '{ not json');

    const result = await new SnapshotStore(filePath).load();
    expect(result.status).toBe('invalid');
  });
});

/**
 * Persisted registry snapshot
 *
 * Stores the registry as pretty-printed JSON so it can be inspected by
 * hand. Anything that does not match schema version 1 exactly is treated
 * as absent.
 */

import { errorMessage } from '../errors.js';
import { atomicWriteFile, readFileSafe } from '../utils/fs.js';
import {
  SNAPSHOT_VERSION,
  type DatabaseRecord,
  type RegistryMap,
  type RegistrySnapshot,
  type SnapshotEntry,
  type TableCounts,
} from './types.js';

/** Default snapshot file name inside the root directory */
export const DEFAULT_SNAPSHOT_FILE = 'build-metadata.json';

/**
 * Outcome of reading a snapshot file
 */
export type SnapshotLoadResult =
  | { status: 'missing' }
  | { status: 'invalid'; reason: string }
  | { status: 'ok'; snapshot: RegistrySnapshot };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseTables(value: unknown): TableCounts | null {
  if (!isRecord(value)) return null;
  const tables: TableCounts = {};
  for (const [table, count] of Object.entries(value)) {
    if (typeof count !== 'number' || !Number.isInteger(count) || count < 0) return null;
    tables[table] = count;
  }
  return tables;
}

function parseEntry(value: unknown): SnapshotEntry | null {
  if (!isRecord(value)) return null;
  const { hash, file, tables } = value;
  if (typeof hash !== 'string' || !/^[0-9a-f]{64}$/.test(hash)) return null;
  if (typeof file !== 'string' || file === '') return null;
  const parsedTables = parseTables(tables);
  if (!parsedTables) return null;
  return { hash, file, tables: parsedTables };
}

/**
 * Validate parsed JSON against the snapshot schema
 * @returns the snapshot, or a reason it was rejected
 */
export function parseSnapshot(data: unknown): { snapshot: RegistrySnapshot } | { reason: string } {
  if (!isRecord(data)) {
    return { reason: 'snapshot is not an object' };
  }
  if (data.version !== SNAPSHOT_VERSION) {
    return { reason: `unsupported snapshot version: ${String(data.version)}` };
  }
  if (typeof data.generated_at !== 'string') {
    return { reason: 'generated_at must be a string' };
  }
  if (!isRecord(data.databases)) {
    return { reason: 'databases must be an object' };
  }

  const databases: Record<string, SnapshotEntry> = {};
  for (const [name, value] of Object.entries(data.databases)) {
    const entry = parseEntry(value);
    if (!entry) {
      return { reason: `malformed entry for database: ${name}` };
    }
    databases[name] = entry;
  }

  return {
    snapshot: {
      version: SNAPSHOT_VERSION,
      generated_at: data.generated_at,
      databases,
    },
  };
}

/**
 * Convert registry records to the persisted form
 */
export function toSnapshot(records: Iterable<DatabaseRecord>, generatedAt: string): RegistrySnapshot {
  const databases: Record<string, SnapshotEntry> = {};
  for (const record of records) {
    databases[record.name] = {
      hash: record.digest,
      file: record.file,
      tables: { ...record.tables },
    };
  }
  return { version: SNAPSHOT_VERSION, generated_at: generatedAt, databases };
}

/**
 * Convert a persisted snapshot back to registry records
 */
export function fromSnapshot(snapshot: RegistrySnapshot): RegistryMap {
  const map = new Map<string, DatabaseRecord>();
  for (const [name, entry] of Object.entries(snapshot.databases)) {
    map.set(name, {
      name,
      digest: entry.hash,
      file: entry.file,
      tables: { ...entry.tables },
    });
  }
  return map;
}

/**
 * Reads and writes the snapshot file
 */
export class SnapshotStore {
  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  async load(): Promise<SnapshotLoadResult> {
    const content = await readFileSafe(this.filePath);
    if (content === null) {
      return { status: 'missing' };
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (err) {
      return { status: 'invalid', reason: `invalid JSON: ${errorMessage(err)}` };
    }

    const parsed = parseSnapshot(data);
    if ('reason' in parsed) {
      return { status: 'invalid', reason: parsed.reason };
    }
    return { status: 'ok', snapshot: parsed.snapshot };
  }

  async save(snapshot: RegistrySnapshot): Promise<void> {
    await atomicWriteFile(this.filePath, JSON.stringify(snapshot, null, 4) + '\n');
  }
}

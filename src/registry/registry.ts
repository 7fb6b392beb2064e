/**
 * Metadata registry
 *
 * Maps logical database names to their digest, file and table row counts.
 * The mapping is built in one pass and swapped in whole, so readers see
 * either the previous complete registry or the new one.
 */

import { join, resolve } from 'path';
import { NotFoundError } from '../errors.js';
import { introspectDatabase } from '../db/introspect.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { fingerprintFile, HASH_BLOCK_SIZE } from './fingerprint.js';
import { discoverDatabaseFiles, DEFAULT_EXTENSIONS } from './discovery.js';
import { DEFAULT_SNAPSHOT_FILE, SnapshotStore, fromSnapshot, toSnapshot } from './snapshot.js';
import type { DatabaseRecord, RegistryMap } from './types.js';

export interface MetadataRegistryOptions {
  /** Directory scanned for database files */
  rootDir: string;
  /** File extensions to scan, in order */
  extensions?: readonly string[];
  /** Snapshot file; relative paths resolve against rootDir */
  snapshotFile?: string;
  /** Block size used while hashing */
  hashBlockSize?: number;
  logger?: Logger;
}

export class MetadataRegistry {
  readonly rootDir: string;
  private readonly extensions: readonly string[];
  private readonly store: SnapshotStore;
  private readonly hashBlockSize: number;
  private readonly logger: Logger;

  private records: RegistryMap = new Map();
  /** Tail of the build queue; builds never overlap */
  private pending: Promise<unknown> = Promise.resolve();

  constructor(options: MetadataRegistryOptions) {
    this.rootDir = options.rootDir;
    this.extensions = options.extensions ?? DEFAULT_EXTENSIONS;
    this.store = new SnapshotStore(resolve(options.rootDir, options.snapshotFile ?? DEFAULT_SNAPSHOT_FILE));
    this.hashBlockSize = options.hashBlockSize ?? HASH_BLOCK_SIZE;
    this.logger = options.logger ?? silentLogger;
  }

  get snapshotPath(): string {
    return this.store.path;
  }

  /**
   * Build the registry.
   *
   * Without `force`, a valid snapshot on disk is trusted as-is: files that
   * changed since it was written are not noticed until a forced build.
   * Otherwise the root is scanned, every file hashed and introspected, and
   * the result persisted. Any failure aborts the build and leaves the
   * current mapping untouched.
   */
  build(force = false): Promise<RegistryMap> {
    const run = this.pending.then(() => this.runBuild(force));
    this.pending = run.catch(() => undefined);
    return run;
  }

  private async runBuild(force: boolean): Promise<RegistryMap> {
    if (!force) {
      const loaded = await this.store.load();
      if (loaded.status === 'ok') {
        this.records = fromSnapshot(loaded.snapshot);
        this.logger.info({
          event: 'registry_snapshot_reused',
          file: this.store.path,
          databases: this.records.size,
        });
        return this.records;
      }
      if (loaded.status === 'invalid') {
        this.logger.warn({
          event: 'registry_snapshot_invalid',
          file: this.store.path,
          error: loaded.reason,
        });
      }
    }

    this.logger.info({ event: 'registry_build_started', root: this.rootDir, force });
    const startedAt = Date.now();

    const next = new Map<string, DatabaseRecord>();
    for (const { name, file } of await discoverDatabaseFiles(this.rootDir, this.extensions)) {
      const filePath = join(this.rootDir, file);
      const digest = await fingerprintFile(filePath, this.hashBlockSize);
      const tables = introspectDatabase(filePath);
      next.set(name, { name, digest, file, tables });
      this.logger.debug({ event: 'database_indexed', database: name, file, hash: digest });
    }

    await this.store.save(toSnapshot(next.values(), new Date().toISOString()));
    this.records = next;

    this.logger.info({
      event: 'registry_built',
      databases: next.size,
      latency_ms: Date.now() - startedAt,
    });
    return this.records;
  }

  /**
   * Current record for a name
   * @throws NotFoundError when the name is not registered
   */
  lookup(name: string): DatabaseRecord {
    const record = this.records.get(name);
    if (!record) {
      throw new NotFoundError(`Database not found: ${name}`);
    }
    return record;
  }

  has(name: string): boolean {
    return this.records.has(name);
  }

  /**
   * All records in name order
   */
  list(): DatabaseRecord[] {
    return [...this.records.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  /**
   * Current immutable mapping
   */
  snapshot(): RegistryMap {
    return this.records;
  }

  /**
   * Absolute path of a record's file
   */
  resolvePath(record: DatabaseRecord): string {
    return join(this.rootDir, record.file);
  }
}

/**
 * Process-wide cache of read-only connections, one per database name
 */

import type Database from 'better-sqlite3';
import type { MetadataRegistry } from '../registry/registry.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { openReadOnly } from './open.js';

export type ConnectionOpener = (filePath: string) => Database.Database;

export interface ConnectionCacheOptions {
  /** Opens a handle for a file (default: openReadOnly) */
  open?: ConnectionOpener;
  logger?: Logger;
}

/**
 * Handles are opened lazily on first use and kept until close().
 *
 * Opening is synchronous, so check-open-insert runs without yielding to
 * the event loop and concurrent first requests for the same name always
 * share a single handle. A handle keeps serving the file it was opened on
 * even if the registry is later rebuilt with a new digest.
 */
export class ConnectionCache {
  private readonly handles = new Map<string, Database.Database>();
  private readonly open: ConnectionOpener;
  private readonly logger: Logger;

  constructor(
    private readonly registry: MetadataRegistry,
    options: ConnectionCacheOptions = {}
  ) {
    this.open = options.open ?? openReadOnly;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Get the handle for a database, opening it on first use
   * @throws NotFoundError when the name is not registered
   * @throws IOError when the file cannot be opened
   */
  get(name: string): Database.Database {
    const cached = this.handles.get(name);
    if (cached) {
      return cached;
    }

    const record = this.registry.lookup(name);
    const filePath = this.registry.resolvePath(record);
    const db = this.open(filePath);
    this.handles.set(name, db);

    this.logger.info({ event: 'connection_opened', database: name, file: record.file });
    return db;
  }

  has(name: string): boolean {
    return this.handles.has(name);
  }

  get size(): number {
    return this.handles.size;
  }

  /**
   * Close every cached handle
   */
  close(): void {
    for (const db of this.handles.values()) {
      db.close();
    }
    this.handles.clear();
  }
}

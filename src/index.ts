/**
 * sqlpin - programmatic API exports
 */

// Types
export type {
  DatabaseRecord,
  RegistryMap,
  CanonicalAddress,
  RegistrySnapshot,
  SnapshotEntry,
  TableCounts,
} from './registry/types.js';
export { HASH_PREFIX_LENGTH } from './registry/types.js';
export type { Result, RowSet, QueryResult, ViewData, ViewResult } from './query/types.js';

// Errors
export { DuplicateNameError, NotFoundError, QueryError, IOError } from './errors.js';

// Registry
export { fingerprintFile, HASH_BLOCK_SIZE } from './registry/fingerprint.js';
export { discoverDatabaseFiles, DEFAULT_EXTENSIONS } from './registry/discovery.js';
export { SnapshotStore, DEFAULT_SNAPSHOT_FILE } from './registry/snapshot.js';
export { MetadataRegistry } from './registry/registry.js';
export type { MetadataRegistryOptions } from './registry/registry.js';

// Database access
export { openReadOnly } from './db/open.js';
export { introspectDatabase, listTables } from './db/introspect.js';
export { ConnectionCache } from './db/connection-cache.js';

// Addressing
export { resolveAddress, canonicalPath, splitNameAndHash } from './address/resolver.js';
export type { Resolution, AddressContext } from './address/resolver.js';
export {
  encodeCompoundKey,
  decodeCompoundKey,
  primaryKeyColumns,
  rowKeyColumns,
} from './address/compound-key.js';

// Queries
export { executeQuery } from './query/executor.js';
export { loadDatabaseView, loadTableView, loadRowView } from './query/views.js';

// HTTP
export { createApp } from './server/app.js';
export { startServer } from './server/server.js';
export { createServerConfig } from './config.js';
export type { ServerConfig } from './config.js';
export { createLogger } from './utils/logger.js';
export type { Logger, LogEntry } from './utils/logger.js';

/**
 * Registry data model
 */

/** Row counts keyed by table name */
export type TableCounts = Record<string, number>;

/**
 * One discovered database file
 */
export interface DatabaseRecord {
  /** File name without extension; unique within a registry */
  name: string;
  /** SHA-256 of the whole file, hex */
  digest: string;
  /** File name relative to the registry root */
  file: string;
  /** Row count per table at scan time */
  tables: TableCounts;
}

/** Immutable name -> record mapping */
export type RegistryMap = ReadonlyMap<string, DatabaseRecord>;

/**
 * Identity of a servable snapshot: database name plus the first
 * HASH_PREFIX_LENGTH hex characters of its digest
 */
export interface CanonicalAddress {
  name: string;
  hashPrefix: string;
}

/** Length of the hash prefix embedded in URLs */
export const HASH_PREFIX_LENGTH = 7;

/**
 * Persisted snapshot entry
 */
export interface SnapshotEntry {
  hash: string;
  file: string;
  tables: TableCounts;
}

/**
 * Persisted registry snapshot (schema version 1)
 */
export interface RegistrySnapshot {
  version: 1;
  generated_at: string;
  databases: Record<string, SnapshotEntry>;
}

export const SNAPSHOT_VERSION = 1;

/**
 * Helpers shared by the registry-backed commands
 */

import { createServerConfig, type ServerConfig } from '../config.js';
import { MetadataRegistry } from '../registry/registry.js';
import { HASH_PREFIX_LENGTH, type DatabaseRecord } from '../registry/types.js';
import type { Logger } from '../utils/logger.js';

export function createRegistry(config: ServerConfig, logger: Logger): MetadataRegistry {
  return new MetadataRegistry({
    rootDir: config.rootDir,
    extensions: config.extensions,
    snapshotFile: config.snapshotFile,
    logger,
  });
}

/**
 * Build config from CLI values; validation errors are thrown
 */
export function configFromOptions(rootDir: string, overrides: Partial<ServerConfig> = {}): ServerConfig {
  return createServerConfig({ ...overrides, rootDir });
}

export const RECORD_HEADERS = ['NAME', 'HASH', 'FILE', 'TABLES', 'ROWS'];

/**
 * One display row per database
 */
export function recordRow(record: DatabaseRecord): string[] {
  const counts = Object.values(record.tables);
  const totalRows = counts.reduce((sum, n) => sum + n, 0);
  return [
    record.name,
    record.digest.slice(0, HASH_PREFIX_LENGTH),
    record.file,
    String(counts.length),
    String(totalRows),
  ];
}

/**
 * JSON shape of a record for --json output
 */
export function recordJson(record: DatabaseRecord): Record<string, unknown> {
  return {
    name: record.name,
    hash: record.digest,
    file: record.file,
    tables: record.tables,
  };
}

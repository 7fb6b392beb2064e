/**
 * Server configuration
 *
 * Root directory priority:
 * 1) --root <dir> (passed as argument)
 * 2) SQLPIN_ROOT environment variable
 * 3) Current working directory
 */

import { resolve } from 'path';
import { DEFAULT_EXTENSIONS } from './registry/discovery.js';
import { DEFAULT_SNAPSHOT_FILE } from './registry/snapshot.js';
import { DEFAULT_ROW_LIMIT } from './query/views.js';

export interface ServerConfig {
  /** Directory holding the served database files */
  rootDir: string;
  /** Server host */
  host: string;
  /** Server port */
  port: number;
  /** Database file extensions, in scan order */
  extensions: readonly string[];
  /** Snapshot file, relative to rootDir unless absolute */
  snapshotFile: string;
  /** Rows shown by the table view */
  rowLimit: number;
}

/** Default server configuration (rootDir filled in by resolveRootDir) */
export const DEFAULT_CONFIG: Omit<ServerConfig, 'rootDir'> = {
  host: '0.0.0.0',
  port: 8006,
  extensions: DEFAULT_EXTENSIONS,
  snapshotFile: DEFAULT_SNAPSHOT_FILE,
  rowLimit: DEFAULT_ROW_LIMIT,
};

export interface RootDirOptions {
  root?: string; // --root argument
}

export function resolveRootDir(options: RootDirOptions = {}): string {
  // Priority 1: --root argument
  if (options.root) {
    return resolve(options.root);
  }

  // Priority 2: SQLPIN_ROOT environment variable
  const envRoot = process.env.SQLPIN_ROOT;
  if (envRoot) {
    return resolve(envRoot);
  }

  // Priority 3: current directory
  return process.cwd();
}

/**
 * Validate port number
 * Port 0 is allowed (OS assigns available ephemeral port)
 */
function validatePort(port: number): void {
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port: ${port}. Must be between 0 and 65535.`);
  }
}

/**
 * Validate host string
 */
function validateHost(host: string): void {
  if (!host || host.trim() === '') {
    throw new Error('Invalid host: host cannot be empty.');
  }
  if (/[\s<>{}|\\^`]/.test(host)) {
    throw new Error(`Invalid host: ${host}. Contains invalid characters.`);
  }
}

function validateExtensions(extensions: readonly string[]): void {
  if (extensions.length === 0) {
    throw new Error('Invalid extensions: at least one extension is required.');
  }
  for (const ext of extensions) {
    if (!/^\.[^./\\]+$/.test(ext)) {
      throw new Error(`Invalid extension: ${ext}. Must look like ".db".`);
    }
  }
}

function validateRowLimit(rowLimit: number): void {
  if (!Number.isInteger(rowLimit) || rowLimit < 1) {
    throw new Error(`Invalid row limit: ${rowLimit}. Must be a positive integer.`);
  }
}

/**
 * Create server configuration with overrides
 */
export function createServerConfig(overrides: Partial<ServerConfig> = {}): ServerConfig {
  const config: ServerConfig = {
    ...DEFAULT_CONFIG,
    rootDir: resolveRootDir(),
    ...overrides,
  };

  validatePort(config.port);
  validateHost(config.host);
  validateExtensions(config.extensions);
  validateRowLimit(config.rowLimit);

  return config;
}

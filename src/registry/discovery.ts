/**
 * Database file discovery
 */

import { readdir } from 'fs/promises';
import { extname, basename } from 'path';
import { DuplicateNameError, IOError, errorMessage } from '../errors.js';

/** Default database file extensions, in scan order */
export const DEFAULT_EXTENSIONS: readonly string[] = ['.db', '.sqlite', '.sqlite3'];

/**
 * A discovered database file
 */
export interface DiscoveredFile {
  /** Logical database name (file stem) */
  name: string;
  /** File name relative to the root */
  file: string;
}

/**
 * List candidate database files directly under rootDir.
 *
 * Extensions are scanned in the given order, file names within one
 * extension in name order. Two files with the same stem (e.g. `a.db` and
 * `a.sqlite`) fail the whole discovery with DuplicateNameError.
 */
export async function discoverDatabaseFiles(
  rootDir: string,
  extensions: readonly string[] = DEFAULT_EXTENSIONS
): Promise<DiscoveredFile[]> {
  let entries;
  try {
    entries = await readdir(rootDir, { withFileTypes: true });
  } catch (err) {
    throw new IOError(rootDir, `Failed to list ${rootDir}: ${errorMessage(err)}`, { cause: err });
  }

  const fileNames = entries
    .filter(e => e.isFile())
    .map(e => e.name)
    .sort();

  const byName = new Map<string, DiscoveredFile>();
  for (const ext of extensions) {
    for (const file of fileNames) {
      if (extname(file) !== ext) continue;

      const name = basename(file, ext);
      const existing = byName.get(name);
      if (existing) {
        throw new DuplicateNameError(name, [existing.file, file]);
      }
      byName.set(name, { name, file });
    }
  }

  return [...byName.values()];
}

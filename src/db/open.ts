/**
 * Read-only database handles
 */

import Database from 'better-sqlite3';
import { IOError, errorMessage } from '../errors.js';

/**
 * Open a database file strictly read-only.
 *
 * The file must already exist; nothing is created. `query_only` rejects
 * any write that slips past the read-only open. Served files are assumed
 * never to change once placed in the root directory, so a handle may be
 * kept for the life of the process.
 */
export function openReadOnly(filePath: string): Database.Database {
  let db: Database.Database;
  try {
    db = new Database(filePath, { readonly: true, fileMustExist: true });
  } catch (err) {
    throw new IOError(filePath, `Failed to open ${filePath}: ${errorMessage(err)}`, { cause: err });
  }

  try {
    db.pragma('query_only = ON');
  } catch (err) {
    db.close();
    throw new IOError(filePath, `Failed to open ${filePath}: ${errorMessage(err)}`, { cause: err });
  }

  return db;
}

/**
 * Schema introspection: list user tables and count their rows
 */

import type Database from 'better-sqlite3';
import { IOError, errorMessage } from '../errors.js';
import type { TableCounts } from '../registry/types.js';
import { openReadOnly } from './open.js';
import { quoteIdentifier } from './sql.js';

/**
 * List user tables in name order (internal sqlite_* tables excluded)
 */
export function listTables(db: Database.Database): string[] {
  const rows = db.prepare<[], { name: string }>(
    "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
  ).all();
  return rows.map(r => r.name);
}

/**
 * Exact row count of one table
 */
export function countRows(db: Database.Database, table: string): number {
  const count = db.prepare(`SELECT count(*) FROM ${quoteIdentifier(table)}`).pluck().get();
  return typeof count === 'number' ? count : Number(count);
}

/**
 * Open a database file read-only, count the rows of every table and close
 * it again. Any failure aborts introspection of the file.
 */
export function introspectDatabase(filePath: string): TableCounts {
  const db = openReadOnly(filePath);
  try {
    const tables: TableCounts = {};
    for (const table of listTables(db)) {
      tables[table] = countRows(db, table);
    }
    return tables;
  } catch (err) {
    throw new IOError(filePath, `Failed to introspect ${filePath}: ${errorMessage(err)}`, { cause: err });
  } finally {
    db.close();
  }
}

/**
 * Query execution against a read-only handle
 */

import Database from 'better-sqlite3';
import { QueryError, errorMessage } from '../errors.js';
import type { QueryResult } from './types.js';

/**
 * Convert anything thrown while preparing or running a statement
 */
export function toQueryError(err: unknown): QueryError {
  if (err instanceof Database.SqliteError) {
    return new QueryError(err.message, err.code);
  }
  return new QueryError(errorMessage(err));
}

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * Integers are read as bigint; those that fit a double become numbers again
 */
function normalizeCell(value: unknown): unknown {
  if (typeof value === 'bigint' && value >= MIN_SAFE && value <= MAX_SAFE) {
    return Number(value);
  }
  return value;
}

/**
 * Run one statement and collect its rows.
 * Never throws for bad SQL: failures come back as `{ ok: false }` with
 * SQLite's own message.
 */
export function executeQuery(
  db: Database.Database,
  sql: string,
  params: readonly unknown[] = []
): QueryResult {
  try {
    const stmt = db.prepare<unknown[], unknown[]>(sql);
    if (!stmt.reader) {
      return { ok: false, error: new QueryError('Statement does not return data') };
    }
    const columns = stmt.columns().map(c => c.name);
    const rows = stmt.safeIntegers(true).raw(true).all(...params)
      .map(row => row.map(normalizeCell));
    return { ok: true, value: { columns, rows } };
  } catch (err) {
    return { ok: false, error: toQueryError(err) };
  }
}

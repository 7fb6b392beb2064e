/**
 * Compound primary key codec
 *
 * A row is addressed by its primary-key values joined with commas, each
 * value form-encoded (space as `+`). Values are ordered by the table's
 * primary-key ordinal, the same order used to build the WHERE clause.
 * A literal comma inside a key value cannot be addressed: decoding splits
 * on every comma before unescaping.
 */

import type Database from 'better-sqlite3';
import { quoteIdentifier } from '../db/sql.js';

/** Column info as returned by PRAGMA table_info */
interface TableInfoRow {
  cid: number;
  name: string;
  type: string;
  notnull: number;
  dflt_value: unknown;
  pk: number;
}

const KEY_SEPARATOR = ',';

/**
 * Form-encode one value: unreserved characters stay, space becomes `+`,
 * everything else is percent-encoded as UTF-8
 */
export function quotePlus(value: string): string {
  return encodeURIComponent(value)
    .replace(/[!'()*]/g, c => `%${c.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%20/g, '+');
}

/**
 * Reverse of quotePlus. Malformed escapes are kept verbatim.
 */
export function unquotePlus(value: string): string {
  return value
    .replace(/\+/g, ' ')
    .replace(/(?:%[0-9A-Fa-f]{2})+/g, run => {
      try {
        return decodeURIComponent(run);
      } catch {
        return run;
      }
    });
}

/**
 * Text form of one key value. NULL and BLOB values have none: a text
 * parameter never compares equal to them.
 */
function keyPart(value: unknown): string | null {
  if (value === null || value === undefined || Buffer.isBuffer(value)) return null;
  return String(value);
}

/**
 * Encode a row's primary-key values as a single path segment.
 * Returns null when the row cannot be addressed by its key.
 * @param row Row keyed by column name
 * @param pkColumns Primary-key columns in ordinal order
 */
export function encodeCompoundKey(row: Record<string, unknown>, pkColumns: readonly string[]): string | null {
  const parts: string[] = [];
  for (const pk of pkColumns) {
    const part = keyPart(Object.hasOwn(row, pk) ? row[pk] : undefined);
    if (part === null) return null;
    parts.push(quotePlus(part));
  }
  return parts.join(KEY_SEPARATOR);
}

/**
 * Decode a path segment into ordered primary-key values
 */
export function decodeCompoundKey(segment: string): string[] {
  return segment.split(KEY_SEPARATOR).map(unquotePlus);
}

/**
 * Primary-key columns of a table, ordered by their position in the key
 * (not by their position in the table). Empty when no key is declared.
 */
export function primaryKeyColumns(db: Database.Database, table: string): string[] {
  const columns = db.prepare<[], TableInfoRow>(`PRAGMA table_info(${quoteIdentifier(table)})`).all();
  return columns
    .filter(c => c.pk > 0)
    .sort((a, b) => a.pk - b.pk)
    .map(c => c.name);
}

/**
 * Columns that identify a row of `table`: its primary key, or `rowid` for
 * an ordinary table without one. Null for views and unknown tables.
 */
export function rowKeyColumns(db: Database.Database, table: string): string[] | null {
  const pks = primaryKeyColumns(db, table);
  if (pks.length > 0) return pks;

  const kind = db.prepare<[string], { type: string }>(
    'SELECT type FROM sqlite_master WHERE name = ?'
  ).get(table);
  return kind?.type === 'table' ? ['rowid'] : null;
}

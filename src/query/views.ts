/**
 * Data loaders for the database, table and row views
 */

import type Database from 'better-sqlite3';
import { NotFoundError } from '../errors.js';
import { quoteIdentifier } from '../db/sql.js';
import { decodeCompoundKey, encodeCompoundKey, rowKeyColumns } from '../address/compound-key.js';
import type { CanonicalAddress } from '../registry/types.js';
import { executeQuery } from './executor.js';
import type { ViewResult } from './types.js';

export const DEFAULT_DATABASE_SQL = 'select * from sqlite_master';
export const DEFAULT_ROW_LIMIT = 20;

function selectFrom(table: string, keyColumns: readonly string[] | null): string {
  const rowid = keyColumns?.length === 1 && keyColumns[0] === 'rowid' ? 'rowid, ' : '';
  return `select ${rowid}* from ${quoteIdentifier(table)}`;
}

function rowObject(columns: readonly string[], row: readonly unknown[]): Record<string, unknown> {
  const obj: Record<string, unknown> = {};
  columns.forEach((col, i) => {
    if (!Object.hasOwn(obj, col)) obj[col] = row[i];
  });
  return obj;
}

/**
 * Run an arbitrary read query against a database
 */
export function loadDatabaseView(
  db: Database.Database,
  address: CanonicalAddress,
  sql?: string
): ViewResult {
  const text = sql || DEFAULT_DATABASE_SQL;
  const result = executeQuery(db, text);
  if (!result.ok) return result;

  return {
    ok: true,
    value: {
      database: address.name,
      database_hash: address.hashPrefix,
      sql: text,
      columns: result.value.columns,
      rows: result.value.rows,
    },
  };
}

/**
 * First `limit` rows of a table, each with its row key when addressable
 */
export function loadTableView(
  db: Database.Database,
  address: CanonicalAddress,
  table: string,
  limit: number = DEFAULT_ROW_LIMIT
): ViewResult {
  const keyColumns = rowKeyColumns(db, table);
  const result = executeQuery(db, `${selectFrom(table, keyColumns)} limit ?`, [limit]);
  if (!result.ok) return result;

  const { columns, rows } = result.value;
  return {
    ok: true,
    value: {
      database: address.name,
      database_hash: address.hashPrefix,
      table,
      columns,
      rows,
      rowKeys: keyColumns
        ? rows.map(row => encodeCompoundKey(rowObject(columns, row), keyColumns))
        : undefined,
    },
  };
}

/**
 * One row addressed by its encoded primary key
 * @throws NotFoundError when the table has no addressable rows or no row
 * matches the key
 */
export function loadRowView(
  db: Database.Database,
  address: CanonicalAddress,
  table: string,
  rowKey: string
): ViewResult {
  const keyColumns = rowKeyColumns(db, table);
  if (!keyColumns) {
    throw new NotFoundError(`Table not found: ${table}`);
  }

  const values = decodeCompoundKey(rowKey);
  if (values.length !== keyColumns.length) {
    throw new NotFoundError(`Record not found: ${JSON.stringify(values)}`);
  }

  const where = keyColumns.map(pk => `${quoteIdentifier(pk)} = ?`).join(' AND ');
  const result = executeQuery(db, `${selectFrom(table, keyColumns)} where ${where}`, values);
  if (!result.ok) return result;

  const { columns, rows } = result.value;
  if (rows.length === 0) {
    throw new NotFoundError(`Record not found: ${JSON.stringify(values)}`);
  }

  return {
    ok: true,
    value: {
      database: address.name,
      database_hash: address.hashPrefix,
      table,
      columns,
      rows,
      rowKeys: rows.map(row => encodeCompoundKey(rowObject(columns, row), keyColumns)),
    },
  };
}

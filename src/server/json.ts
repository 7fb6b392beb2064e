/**
 * JSON response bodies
 */

import type { QueryError } from '../errors.js';
import type { ViewResult } from '../query/types.js';

export interface JsonViewBody {
  database: string;
  database_hash: string;
  table?: string;
  columns: string[];
  rows: unknown[][];
}

export interface JsonErrorBody {
  ok: false;
  error: string;
}

/**
 * Make a cell JSON-safe: BLOBs become base64 strings
 */
export function serializeCell(value: unknown): unknown {
  if (Buffer.isBuffer(value)) return value.toString('base64');
  if (typeof value === 'bigint') return value.toString();
  return value;
}

export function errorBody(error: Error | QueryError): JsonErrorBody {
  return { ok: false, error: error.message };
}

export function viewBody(result: ViewResult): JsonViewBody | JsonErrorBody {
  if (!result.ok) return errorBody(result.error);

  const { database, database_hash, table, columns, rows } = result.value;
  return {
    database,
    database_hash,
    ...(table !== undefined ? { table } : {}),
    columns,
    rows: rows.map(row => row.map(serializeCell)),
  };
}

/**
 * Query result types
 */

import type { QueryError } from '../errors.js';

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Ordered column names plus ordered rows of cell values
 */
export interface RowSet {
  columns: string[];
  rows: unknown[][];
}

export type QueryResult = Result<RowSet, QueryError>;

/**
 * Data handed to renderers for the database, table and row views
 */
export interface ViewData {
  database: string;
  /** Hash prefix of the snapshot that produced the rows */
  database_hash: string;
  table?: string;
  /** Query text, database view only */
  sql?: string;
  columns: string[];
  rows: unknown[][];
  /**
   * Encoded row key per row, when rows of the table are addressable.
   * Null for a row whose key holds a NULL or BLOB.
   */
  rowKeys?: (string | null)[];
}

export type ViewResult = Result<ViewData, QueryError>;

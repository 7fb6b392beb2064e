/**
 * Test fixtures: throwaway directories and SQLite files
 */

import Database from 'better-sqlite3';
import { mkdirSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { randomUUID } from 'crypto';

export function makeTempDir(): string {
  const dir = join(tmpdir(), `sqlpin-test-${randomUUID()}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Create a database file and run setup SQL against it
 */
export function createDatabase(filePath: string, sql: string): void {
  const db = new Database(filePath);
  try {
    db.exec(sql);
  } finally {
    db.close();
  }
}

/** Two tables: a compound-key table and a plain one */
export const SALES_SQL = `
  CREATE TABLE sales (
    id INTEGER,
    region TEXT,
    seq INTEGER,
    amount REAL,
    PRIMARY KEY (region, seq)
  );
  INSERT INTO sales VALUES (1, 'north', 1, 10.5);
  INSERT INTO sales VALUES (2, 'north', 2, 20);
  INSERT INTO sales VALUES (3, 'south west', 1, 7);
  CREATE TABLE notes (body TEXT);
  INSERT INTO notes VALUES ('first');
  INSERT INTO notes VALUES ('second');
`;

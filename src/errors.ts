/**
 * Error types shared by the registry, the connection cache and the views
 */

/**
 * Two discovered files map to the same logical database name.
 * Fatal to registry construction.
 */
export class DuplicateNameError extends Error {
  constructor(
    public readonly dbName: string,
    public readonly files: string[]
  ) {
    super(`Multiple files with same stem ${dbName}: ${files.join(', ')}`);
    this.name = 'DuplicateNameError';
  }
}

/**
 * Requested database, table row or record does not exist
 */
export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * Query text rejected by SQLite (syntax error, missing table, ...)
 */
export class QueryError extends Error {
  constructor(
    message: string,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'QueryError';
  }
}

/**
 * File read or connection open failure
 */
export class IOError extends Error {
  constructor(
    public readonly path: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'IOError';
  }
}

/**
 * Extract a message from an unknown thrown value
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

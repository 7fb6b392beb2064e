/**
 * Hono application: content-addressed database, table and row views
 */

import { Hono, type Context } from 'hono';
import { NotFoundError, errorMessage } from '../errors.js';
import { resolveAddress } from '../address/resolver.js';
import type { MetadataRegistry } from '../registry/registry.js';
import type { ConnectionCache } from '../db/connection-cache.js';
import { DEFAULT_DATABASE_SQL, DEFAULT_ROW_LIMIT, loadDatabaseView, loadRowView, loadTableView } from '../query/views.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { parseRequestPath } from './paths.js';
import { errorBody, viewBody } from './json.js';
import {
  renderDatabasePage,
  renderErrorPage,
  renderIndexPage,
  renderTablePage,
} from './templates/pages.js';

/** One year; a canonical address never changes content */
export const CACHE_CONTROL = `max-age=${365 * 24 * 60 * 60}`;

/**
 * Context variables available in all routes
 */
export type AppEnv = {
  Variables: {
    registry: MetadataRegistry;
    connections: ConnectionCache;
    logger: Logger;
    rowLimit: number;
  };
};

export interface AppOptions {
  registry: MetadataRegistry;
  connections: ConnectionCache;
  logger?: Logger;
  /** Rows shown by the table view */
  rowLimit?: number;
}

type ViewKind = 'database' | 'table' | 'row';

function wantsJson(c: Context<AppEnv>): boolean {
  return parseRequestPath(new URL(c.req.url).pathname).json;
}

/**
 * Resolve the address, then either redirect to the canonical form or
 * load and render the view
 */
function handleView(c: Context<AppEnv>, kind: ViewKind): Response {
  const registry = c.get('registry');
  const request = parseRequestPath(new URL(c.req.url).pathname);

  const resolution = resolveAddress(registry, request.dbName, {
    table: request.table,
    rowKey: request.rowKey,
    json: request.json,
  });

  if (resolution.kind === 'redirect') {
    // keep ?sql= and any other query parameters
    const location = resolution.location + new URL(c.req.url).search;
    return c.body(null, 302, {
      Location: location,
      Link: `<${location}>; rel=preload`,
      'Cache-Control': CACHE_CONTROL,
    });
  }

  const { address } = resolution;
  const db = c.get('connections').get(address.name);
  const table = request.table ?? '';
  const sql = c.req.query('sql') || DEFAULT_DATABASE_SQL;

  const result = kind === 'database'
    ? loadDatabaseView(db, address, sql)
    : kind === 'table'
      ? loadTableView(db, address, table, c.get('rowLimit'))
      : loadRowView(db, address, table, request.rowKey ?? '');

  c.header('Cache-Control', CACHE_CONTROL);

  if (request.json) {
    c.header('Access-Control-Allow-Origin', '*');
    return c.json(viewBody(result));
  }

  if (kind === 'database') {
    return c.html(renderDatabasePage(address, sql, result));
  }
  return c.html(renderTablePage(address, table, result));
}

/**
 * Create the Hono application with all routes
 */
export function createApp(options: AppOptions): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  const logger = options.logger ?? silentLogger;
  const rowLimit = options.rowLimit ?? DEFAULT_ROW_LIMIT;

  // Middleware: inject shared state into all requests
  app.use('*', async (c, next) => {
    c.set('registry', options.registry);
    c.set('connections', options.connections);
    c.set('logger', logger);
    c.set('rowLimit', rowLimit);
    await next();
  });

  // Middleware: request log
  app.use('*', async (c, next) => {
    const startedAt = Date.now();
    await next();
    logger.info({
      event: 'http_request',
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      latency_ms: Date.now() - startedAt,
    });
  });

  app.get('/', async (c) => {
    await options.registry.build(true);
    return c.html(renderIndexPage(options.registry.list()));
  });

  app.get('/favicon.ico', (c) => c.body(''));

  app.get('/:db', (c) => handleView(c, 'database'));
  app.get('/:db/:table', (c) => handleView(c, 'table'));
  app.get('/:db/:table/:key', (c) => handleView(c, 'row'));

  app.notFound((c) => {
    const message = `Not found: ${c.req.path}`;
    return wantsJson(c)
      ? c.json(errorBody(new NotFoundError(message)), 404)
      : c.html(renderErrorPage('Not found', message), 404);
  });

  app.onError((err, c) => {
    if (err instanceof NotFoundError) {
      return wantsJson(c)
        ? c.json(errorBody(err), 404)
        : c.html(renderErrorPage('Not found', err.message), 404);
    }

    logger.error({
      event: 'request_failed',
      method: c.req.method,
      path: c.req.path,
      error: errorMessage(err),
    });
    return wantsJson(c)
      ? c.json({ ok: false, error: 'Internal server error' }, 500)
      : c.html(renderErrorPage('Server error', 'Internal server error'), 500);
  });

  return app;
}

/**
 * HTTP surface tests (in-process, no socket)
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { unlinkSync } from 'fs';
import { createApp, CACHE_CONTROL } from '../app.js';
import { MetadataRegistry } from '../../registry/registry.js';
import { ConnectionCache } from '../../db/connection-cache.js';
import { HASH_PREFIX_LENGTH } from '../../registry/types.js';
import { createLogger, type LogEntry } from '../../utils/logger.js';
import { createDatabase, makeTempDir, removeDir, SALES_SQL } from '../../__tests__/fixtures.js';

describe('HTTP app', () => {
  let testDir: string;
  let registry: MetadataRegistry;
  let connections: ConnectionCache;
  let logs: LogEntry[];
  let app: ReturnType<typeof createApp>;
  let prefix: string;

  beforeEach(async () => {
    testDir = makeTempDir();
    createDatabase(join(testDir, 'sales.db'), SALES_SQL);
    createDatabase(join(testDir, 'my-data.db'), 'CREATE TABLE t (x); INSERT INTO t VALUES (1);');

    logs = [];
    const logger = createLogger((line) => logs.push(JSON.parse(line) as LogEntry));
    registry = new MetadataRegistry({ rootDir: testDir, logger });
    await registry.build(true);
    connections = new ConnectionCache(registry, { logger });
    app = createApp({ registry, connections, logger });
    prefix = registry.lookup('sales').digest.slice(0, HASH_PREFIX_LENGTH);
  });

  afterEach(() => {
    connections.close();
    removeDir(testDir);
  });

  describe('redirects', () => {
    it('should redirect a bare name to the hashed address', async () => {
      const res = await app.request('/sales');

      expect(res.status).toBe(302);
      expect(res.headers.get('Location')).toBe(`/sales-${prefix}`);
      expect(res.headers.get('Link')).toBe(`</sales-${prefix}>; rel=preload`);
      expect(res.headers.get('Cache-Control')).toBe(CACHE_CONTROL);
      expect(connections.size).toBe(0);
    });

    it('should redirect a stale hash on a table address', async () => {
      const res = await app.request('/sales-0000000/sales');

      expect(res.status).toBe(302);
      expect(res.headers.get('Location')).toBe(`/sales-${prefix}/sales`);
    });

    it('should keep the row key and json suffix when redirecting', async () => {
      const res = await app.request('/sales/sales/north,1.json');

      expect(res.status).toBe(302);
      expect(res.headers.get('Location')).toBe(`/sales-${prefix}/sales/north,1.json`);
    });

    it('should keep the query string when redirecting', async () => {
      const res = await app.request('/sales?sql=select%201');

      expect(res.status).toBe(302);
      expect(res.headers.get('Location')).toBe(`/sales-${prefix}?sql=select%201`);
      expect(res.headers.get('Link')).toBe(`</sales-${prefix}?sql=select%201>; rel=preload`);
    });

    it('should resolve hyphenated names', async () => {
      const hyphenPrefix = registry.lookup('my-data').digest.slice(0, HASH_PREFIX_LENGTH);

      const redirect = await app.request('/my-data');
      expect(redirect.headers.get('Location')).toBe(`/my-data-${hyphenPrefix}`);

      const res = await app.request(`/my-data-${hyphenPrefix}.json`);
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ database: 'my-data', database_hash: hyphenPrefix });
    });
  });

  describe('JSON views', () => {
    it('should serve the database view', async () => {
      const res = await app.request(`/sales-${prefix}.json`);

      expect(res.status).toBe(200);
      expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*');
      expect(res.headers.get('Cache-Control')).toBe(CACHE_CONTROL);
      const body = await res.json();
      expect(body).toMatchObject({
        database: 'sales',
        database_hash: prefix,
        columns: ['type', 'name', 'tbl_name', 'rootpage', 'sql'],
      });
    });

    it('should run a custom query', async () => {
      const sql = encodeURIComponent('select region, count(*) as n from sales group by region order by region');
      const res = await app.request(`/sales-${prefix}.json?sql=${sql}`);

      expect(await res.json()).toEqual({
        database: 'sales',
        database_hash: prefix,
        columns: ['region', 'n'],
        rows: [['north', 2], ['south west', 1]],
      });
    });

    it('should return query errors as a failure payload', async () => {
      const res = await app.request(`/sales-${prefix}.json?sql=${encodeURIComponent('select nope from sales')}`);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ ok: false, error: 'no such column: nope' });
    });

    it('should serve the table view', async () => {
      const res = await app.request(`/sales-${prefix}/sales.json`);

      expect(await res.json()).toEqual({
        database: 'sales',
        database_hash: prefix,
        table: 'sales',
        columns: ['id', 'region', 'seq', 'amount'],
        rows: [
          [1, 'north', 1, 10.5],
          [2, 'north', 2, 20],
          [3, 'south west', 1, 7],
        ],
      });
    });

    it('should honour the row limit', async () => {
      const limited = createApp({ registry, connections, rowLimit: 1 });
      const res = await limited.request(`/sales-${prefix}/sales.json`);

      const body = (await res.json()) as { rows: unknown[][] };
      expect(body.rows).toEqual([[1, 'north', 1, 10.5]]);
    });

    it('should serve a row by compound key', async () => {
      const res = await app.request(`/sales-${prefix}/sales/south+west,1.json`);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        database: 'sales',
        database_hash: prefix,
        table: 'sales',
        columns: ['id', 'region', 'seq', 'amount'],
        rows: [[3, 'south west', 1, 7]],
      });
    });

    it('should serve a keyless row by rowid', async () => {
      const res = await app.request(`/sales-${prefix}/notes/2.json`);

      expect(await res.json()).toMatchObject({ columns: ['rowid', 'body'], rows: [[2, 'second']] });
    });

    it('should serve integers beyond the double range as exact strings', async () => {
      createDatabase(
        join(testDir, 'big.db'),
        "CREATE TABLE big (id INTEGER PRIMARY KEY, label TEXT); INSERT INTO big VALUES (1, 'near'), (9007199254740993, 'far');"
      );
      await registry.build(true);
      const bigPrefix = registry.lookup('big').digest.slice(0, HASH_PREFIX_LENGTH);

      const table = await app.request(`/big-${bigPrefix}/big.json`);
      expect(await table.json()).toMatchObject({ rows: [[1, 'near'], ['9007199254740993', 'far']] });

      const row = await app.request(`/big-${bigPrefix}/big/9007199254740993.json`);
      expect(row.status).toBe(200);
      expect(await row.json()).toMatchObject({ rows: [['9007199254740993', 'far']] });
    });

    it('should return 404 for a missing row in an existing table', async () => {
      const res = await app.request(`/sales-${prefix}/sales/east,9.json`);

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ ok: false, error: 'Record not found: ["east","9"]' });
    });

    it('should return 404 for an unknown database', async () => {
      const res = await app.request('/unknown-name.json');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ ok: false, error: 'Database not found: unknown-name' });
    });
  });

  describe('HTML views', () => {
    it('should render the index after rebuilding the registry', async () => {
      const res = await app.request('/');
      const html = await res.text();

      expect(res.status).toBe(200);
      expect(html).toContain(`<a href="/sales-${prefix}">sales</a>`);
      expect(html).toContain(`<a href="/sales-${prefix}/sales">sales</a> (3 rows)`);
      expect(res.headers.get('Cache-Control')).toBeNull();
    });

    it('should pick up a changed file on the index and redirect old addresses', async () => {
      unlinkSync(join(testDir, 'sales.db'));
      createDatabase(join(testDir, 'sales.db'), 'CREATE TABLE other (x);');

      await app.request('/');
      const newPrefix = registry.lookup('sales').digest.slice(0, HASH_PREFIX_LENGTH);
      expect(newPrefix).not.toBe(prefix);

      const res = await app.request(`/sales-${prefix}`);
      expect(res.status).toBe(302);
      expect(res.headers.get('Location')).toBe(`/sales-${newPrefix}`);
    });

    it('should link table rows to their row pages', async () => {
      const res = await app.request(`/sales-${prefix}/sales`);
      const html = await res.text();

      expect(res.status).toBe(200);
      expect(res.headers.get('Content-Type')).toContain('text/html');
      expect(html).toContain(`href="/sales-${prefix}/sales/south+west,1"`);
    });

    it('should not link rows whose key holds a blob', async () => {
      createDatabase(
        join(testDir, 'blobs.db'),
        "CREATE TABLE b (k BLOB PRIMARY KEY); INSERT INTO b VALUES (x'0102'), ('plain');"
      );
      await registry.build(true);
      const blobPrefix = registry.lookup('blobs').digest.slice(0, HASH_PREFIX_LENGTH);

      const html = await (await app.request(`/blobs-${blobPrefix}/b`)).text();

      expect(html).toContain('<tr><td></td><td><span class="null">&lt;Binary: 2 bytes&gt;</span></td></tr>');
      expect(html).toContain(`<tr><td><a href="/blobs-${blobPrefix}/b/plain">view</a></td><td>plain</td></tr>`);
    });

    it('should escape query output', async () => {
      const res = await app.request(`/sales-${prefix}?sql=${encodeURIComponent("select '<b>' as x")}`);
      const html = await res.text();

      expect(html).toContain('<td>&lt;b&gt;</td>');
      expect(html).toContain('<textarea name="sql">select &#039;&lt;b&gt;&#039; as x</textarea>');
    });

    it('should show query errors on the page', async () => {
      const res = await app.request(`/sales-${prefix}?sql=${encodeURIComponent('select * from missing')}`);

      expect(res.status).toBe(200);
      expect(await res.text()).toContain('<div class="error">no such table: missing</div>');
    });

    it('should render a not found page', async () => {
      const res = await app.request('/unknown-name');

      expect(res.status).toBe(404);
      expect(await res.text()).toContain('Database not found: unknown-name');
    });

    it('should answer favicon requests with an empty body', async () => {
      const res = await app.request('/favicon.ico');

      expect(res.status).toBe(200);
      expect(await res.text()).toBe('');
    });
  });

  describe('connections and logging', () => {
    it('should open one connection for concurrent requests', async () => {
      const responses = await Promise.all([
        app.request(`/sales-${prefix}/sales.json`),
        app.request(`/sales-${prefix}/notes.json`),
        app.request(`/sales-${prefix}.json`),
      ]);

      expect(responses.map(r => r.status)).toEqual([200, 200, 200]);
      expect(connections.size).toBe(1);
      expect(logs.filter(l => l.event === 'connection_opened')).toHaveLength(1);
    });

    it('should log each request', async () => {
      await app.request('/sales');

      const entry = logs.find(l => l.event === 'http_request');
      expect(entry).toMatchObject({ method: 'GET', path: '/sales', status: 302 });
    });
  });
});

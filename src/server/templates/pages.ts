/**
 * Page templates for the index, database, table and row views
 */

import type { DatabaseRecord, CanonicalAddress } from '../../registry/types.js';
import { HASH_PREFIX_LENGTH } from '../../registry/types.js';
import type { ViewResult } from '../../query/types.js';
import { canonicalPath } from '../../address/resolver.js';
import { renderLayout, escapeHtml } from './layout.js';
import { renderRowsTable, renderError } from './components.js';

function addressHeading(address: CanonicalAddress, table?: string): string {
  const dbLink = `<a href="${escapeHtml(canonicalPath(address))}">${escapeHtml(address.name)}</a>`;
  const hash = `<span class="hash">${escapeHtml(address.hashPrefix)}</span>`;
  return table !== undefined ? `${dbLink} ${hash} / ${escapeHtml(table)}` : `${dbLink} ${hash}`;
}

/**
 * Index of every registered database
 */
export function renderIndexPage(records: readonly DatabaseRecord[]): string {
  const sections = records.map(record => {
    const address: CanonicalAddress = {
      name: record.name,
      hashPrefix: record.digest.slice(0, HASH_PREFIX_LENGTH),
    };
    const tables = Object.entries(record.tables).map(([table, count]) => {
      const href = canonicalPath(address, { table });
      return `<li><a href="${escapeHtml(href)}">${escapeHtml(table)}</a> (${count} rows)</li>`;
    }).join('\n');

    return `<section class="section">
  <h2 class="section-title"><a href="${escapeHtml(canonicalPath(address))}">${escapeHtml(record.name)}</a> <span class="hash">${escapeHtml(address.hashPrefix)}</span></h2>
  <p class="hash">${escapeHtml(record.file)}</p>
  <ul>
${tables}
  </ul>
</section>`;
  });

  const content = sections.length > 0
    ? sections.join('\n')
    : '<p>No databases found.</p>';

  return renderLayout({ title: 'Databases', heading: 'Databases', content });
}

/**
 * Database view: query form plus results
 */
export function renderDatabasePage(address: CanonicalAddress, sql: string, result: ViewResult): string {
  const form = `<form class="section" method="get" action="${escapeHtml(canonicalPath(address))}">
  <textarea name="sql">${escapeHtml(sql)}</textarea>
  <p><input type="submit" value="Run SQL"></p>
</form>`;

  const body = result.ok
    ? renderRowsTable(result.value.columns, result.value.rows)
    : renderError(result.error.message);

  return renderLayout({
    title: address.name,
    heading: addressHeading(address),
    content: `${form}\n${body}`,
  });
}

/**
 * Table and row views
 */
export function renderTablePage(address: CanonicalAddress, table: string, result: ViewResult): string {
  let body: string;
  if (result.ok) {
    const { columns, rows, rowKeys } = result.value;
    const rowLink = rowKeys
      ? (i: number) => {
          const key = rowKeys[i];
          return key === null ? null : `${canonicalPath(address, { table })}/${key}`;
        }
      : undefined;
    body = renderRowsTable(columns, rows, rowLink);
  } else {
    body = renderError(result.error.message);
  }

  return renderLayout({
    title: `${address.name}: ${table}`,
    heading: addressHeading(address, table),
    content: body,
  });
}

/**
 * Not found / server error page
 */
export function renderErrorPage(title: string, message: string): string {
  return renderLayout({
    title,
    heading: escapeHtml(title),
    content: renderError(message),
  });
}

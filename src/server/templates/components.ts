/**
 * Shared HTML fragments
 */

import { escapeHtml } from './layout.js';

/**
 * Render one cell value
 */
export function renderCell(value: unknown): string {
  if (value === null || value === undefined) {
    return '<span class="null">null</span>';
  }
  if (Buffer.isBuffer(value)) {
    return `<span class="null">&lt;Binary: ${value.length} bytes&gt;</span>`;
  }
  return escapeHtml(String(value));
}

/**
 * Render a result set as a table.
 * When `rowLink` is given, a leading column links each row.
 */
export function renderRowsTable(
  columns: readonly string[],
  rows: readonly (readonly unknown[])[],
  rowLink?: (index: number) => string | null
): string {
  const linkHeader = rowLink ? '<th>Link</th>' : '';
  const header = columns.map(c => `<th>${escapeHtml(c)}</th>`).join('');

  const body = rows.map((row, i) => {
    let linkCell = '';
    if (rowLink) {
      const href = rowLink(i);
      linkCell = href ? `<td><a href="${escapeHtml(href)}">view</a></td>` : '<td></td>';
    }
    const cells = row.map(v => `<td>${renderCell(v)}</td>`).join('');
    return `<tr>${linkCell}${cells}</tr>`;
  }).join('\n');

  return `<table class="rows">
  <thead><tr>${linkHeader}${header}</tr></thead>
  <tbody>
${body}
  </tbody>
</table>`;
}

/**
 * Render a failure notice
 */
export function renderError(message: string): string {
  return `<div class="error">${escapeHtml(message)}</div>`;
}

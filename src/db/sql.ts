/**
 * SQL text helpers
 */

/**
 * Quote an identifier (table or column name) for interpolation into SQL
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

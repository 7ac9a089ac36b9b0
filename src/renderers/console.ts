/**
 * Plain-text rendering of a table tree, one line per row:
 *
 * ```
 * - 0 {label: "Google", visits: 1550} {url: "http://google.com"} [subtable 3]
 * *- 0 {label: "analytics", visits: 200} {}
 * - -1 {label: -1, visits: 30} {}
 * ```
 *
 * Sub-table rows follow their parent row, prefixed with one `*` per level.
 */

import type { DataTable } from '../core/DataTable';
import { getDataTableConfig } from '../core/config';
import { RecursionLimitError } from '../core/errors';

function formatEntries(entries: Iterable<readonly [string, unknown]>): string {
  const parts = Array.from(entries, ([key, value]) => `${key}: ${JSON.stringify(value) ?? String(value)}`);
  return `{${parts.join(', ')}}`;
}

function renderLines(table: DataTable, depth: number, lines: string[]): void {
  const { maxDepth } = getDataTableConfig();
  if (depth > maxDepth) {
    throw new RecursionLimitError(maxDepth);
  }

  const prefix = '*'.repeat(depth);
  for (const [id, row] of table.getRowEntries()) {
    const subtableId = row.getSubtableId();
    const reference = subtableId === null ? '' : ` [subtable ${subtableId}]`;
    lines.push(`${prefix}- ${id} ${formatEntries(row.getColumnEntries())} ${formatEntries(Object.entries(row.getAllMetadata()))}${reference}`);

    const subtable = row.getSubtable();
    if (subtable) {
      renderLines(subtable, depth + 1, lines);
    }
  }
}

export function renderConsole(table: DataTable): string {
  if (table.getRowsCount() === 0) {
    return 'Empty table\n';
  }
  const lines: string[] = [];
  renderLines(table, 0, lines);
  return `${lines.join('\n')}\n`;
}

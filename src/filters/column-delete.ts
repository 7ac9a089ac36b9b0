/**
 * Delete columns from every row.
 *
 * - `columnsToRemove` are deleted (only where their value is zero or absent
 *   when `deleteIfZeroOnly` is set)
 * - when `columnsToKeep` is not empty, every other column is deleted too,
 *   except `label`
 *
 * Parameters: `[columnsToRemove, columnsToKeep = [], deleteIfZeroOnly = false]`
 */

import type { DataTable } from '../core/DataTable';
import type { Row } from '../core/Row';
import { LABEL_COLUMN } from '../core/types';
import { toNumber } from '../internals/aggregation';
import { Filter } from './Filter';

export class ColumnDelete extends Filter {
  private readonly columnsToKeep: ReadonlySet<string>;

  constructor(
    private readonly columnsToRemove: readonly string[],
    columnsToKeep: readonly string[] = [],
    private readonly deleteIfZeroOnly = false,
  ) {
    super();
    this.columnsToKeep = new Set(columnsToKeep);
  }

  filter(table: DataTable, depth = 0): void {
    for (const row of table.getRows()) {
      this.removeColumns(row);
      this.keepColumns(row);
      this.filterSubTable(row, depth);
    }
  }

  private removeColumns(row: Row): void {
    for (const column of this.columnsToRemove) {
      if (this.deleteIfZeroOnly) {
        const value = row.getColumn(column);
        if (value !== undefined && toNumber(value) !== 0) {
          continue;
        }
      }
      row.deleteColumn(column);
    }
  }

  private keepColumns(row: Row): void {
    if (this.columnsToKeep.size === 0) {
      return;
    }
    for (const column of row.getColumnNames()) {
      if (column !== LABEL_COLUMN && !this.columnsToKeep.has(column)) {
        row.deleteColumn(column);
      }
    }
  }
}

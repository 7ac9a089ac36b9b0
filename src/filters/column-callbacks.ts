/**
 * Filters that hand column values to a caller-supplied function.
 *
 * Each callback receives the column value(s) first, then `extraParams`.
 * All rows are visited, the summary row included.
 */

import type { DataTable } from '../core/DataTable';
import type { ColumnValue } from '../core/types';
import { InvalidFilterParameterError } from '../core/errors';
import { isColumnValue } from '../internals/serialization';
import { Filter } from './Filter';

export type ColumnCallback = (...args: unknown[]) => unknown;

function toColumnValue(filter: string, result: unknown): ColumnValue {
  if (!isColumnValue(result)) {
    throw new InvalidFilterParameterError(filter, `callback returned a non-scalar value (${typeof result})`);
  }
  return result;
}

/**
 * Delete every row for which `callback(value, ...extraParams)` is falsy.
 *
 * Parameters: `[column, callback, extraParams = []]`
 */
export class ColumnCallbackDeleteRow extends Filter {
  constructor(
    private readonly column: string,
    private readonly callback: ColumnCallback,
    private readonly extraParams: readonly unknown[] = [],
  ) {
    super();
  }

  filter(table: DataTable, depth = 0): void {
    for (const [id, row] of table.getRowEntries()) {
      if (!this.callback(row.getColumn(this.column), ...this.extraParams)) {
        table.deleteRow(id);
      } else {
        this.filterSubTable(row, depth);
      }
    }
  }
}

/**
 * Add `newColumn = callback(...sourceValues, ...extraParams)` to every row.
 *
 * Parameters: `[sourceColumns, newColumn, callback, extraParams = []]`
 */
export class ColumnCallbackAddColumn extends Filter {
  constructor(
    private readonly sourceColumns: readonly string[],
    private readonly newColumn: string,
    private readonly callback: ColumnCallback,
    private readonly extraParams: readonly unknown[] = [],
  ) {
    super();
  }

  filter(table: DataTable, depth = 0): void {
    for (const row of table.getRows()) {
      const values = this.sourceColumns.map(column => row.getColumn(column));
      row.setColumn(this.newColumn, toColumnValue('ColumnCallbackAddColumn', this.callback(...values, ...this.extraParams)));
      this.filterSubTable(row, depth);
    }
  }
}

/**
 * Replace the value of each listed column with `callback(value, ...extraParams)`.
 * Rows that lack a column are left alone for that column.
 *
 * Parameters: `[columns, callback, extraParams = []]`
 */
export class ColumnCallbackReplace extends Filter {
  constructor(
    private readonly columns: readonly string[],
    private readonly callback: ColumnCallback,
    private readonly extraParams: readonly unknown[] = [],
  ) {
    super();
  }

  filter(table: DataTable, depth = 0): void {
    for (const row of table.getRows()) {
      for (const column of this.columns) {
        if (!row.hasColumn(column)) {
          continue;
        }
        const replaced = this.callback(row.getColumn(column), ...this.extraParams);
        row.setColumn(column, toColumnValue('ColumnCallbackReplace', replaced));
      }
      this.filterSubTable(row, depth);
    }
  }
}

/**
 * Add `newColumn` holding each row's share of `column`, as a percentage
 * rounded to two decimals.
 *
 * The total defaults to the sum of `column` over every row of the table,
 * summary row included. A zero total yields 0 everywhere.
 *
 * Parameters: `[column, newColumn, total?]`
 */

import type { DataTable } from '../core/DataTable';
import type { ColumnValue } from '../core/types';
import { toNumber } from '../internals/aggregation';
import { Filter } from './Filter';

function numeric(value: ColumnValue | undefined): number {
  return value === undefined ? 0 : toNumber(value) ?? 0;
}

export class AddColumnPercentage extends Filter {
  constructor(
    private readonly column: string,
    private readonly newColumn: string,
    private readonly total?: number,
  ) {
    super();
  }

  filter(table: DataTable, depth = 0): void {
    const rows = table.getRows();
    const total = this.total ?? rows.reduce((sum, row) => sum + numeric(row.getColumn(this.column)), 0);

    for (const row of rows) {
      const share = total === 0 ? 0 : (numeric(row.getColumn(this.column)) / total) * 100;
      row.setColumn(this.newColumn, Math.round(share * 100) / 100);
      this.filterSubTable(row, depth);
    }
  }
}

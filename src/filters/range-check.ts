/**
 * Clamp a numeric column into `[min, max]`. Non-numeric and missing values
 * are left alone.
 *
 * Parameters: `[column, min, max]`
 */

import type { DataTable } from '../core/DataTable';
import { toNumber } from '../internals/aggregation';
import { Filter } from './Filter';

export class RangeCheck extends Filter {
  constructor(
    private readonly column: string,
    private readonly min: number,
    private readonly max: number,
  ) {
    super();
  }

  filter(table: DataTable, depth = 0): void {
    for (const row of table.getRows()) {
      const value = row.getColumn(this.column);
      const numeric = value === undefined ? null : toNumber(value);
      if (numeric !== null) {
        if (numeric < this.min) {
          row.setColumn(this.column, this.min);
        } else if (numeric > this.max) {
          row.setColumn(this.column, this.max);
        }
      }
      this.filterSubTable(row, depth);
    }
  }
}

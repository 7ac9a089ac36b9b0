/**
 * Delete the rows whose column is below `minimumValue`. A missing or
 * non-numeric value counts as 0.
 *
 * Parameters: `[column, minimumValue]`
 */

import type { DataTable } from '../core/DataTable';
import { toNumber } from '../internals/aggregation';
import { Filter } from './Filter';

export class ExcludeLowPopulation extends Filter {
  constructor(
    private readonly column: string,
    private readonly minimumValue: number,
  ) {
    super();
  }

  filter(table: DataTable, depth = 0): void {
    for (const [id, row] of table.getRowEntries()) {
      const value = row.getColumn(this.column);
      const population = value === undefined ? 0 : toNumber(value) ?? 0;
      if (population < this.minimumValue) {
        table.deleteRow(id);
      } else {
        this.filterSubTable(row, depth);
      }
    }
  }
}

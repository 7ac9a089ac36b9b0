/**
 * Set the label of the summary row, if the table has one.
 *
 * Parameters: `[label]`
 */

import type { DataTable } from '../core/DataTable';
import type { ColumnValue } from '../core/types';
import { LABEL_COLUMN } from '../core/types';
import { Filter } from './Filter';

export class ReplaceSummaryRowLabel extends Filter {
  constructor(private readonly label: ColumnValue) {
    super();
  }

  filter(table: DataTable, depth = 0): void {
    const summary = table.getSummaryRow();
    if (summary) {
      summary.setColumn(LABEL_COLUMN, this.label);
      // re-index under the new label
      table.addSummaryRow(summary);
    }
    for (const row of table.getRowsWithoutSummaryRow()) {
      this.filterSubTable(row, depth);
    }
  }
}

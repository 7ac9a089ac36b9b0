/**
 * Keep `limit` rows starting at `offset`.
 *
 * The row count before limiting is recorded on the table
 * (`getRowsCountBeforeLimitFilter`). A negative limit keeps everything after
 * the offset. The summary row is dropped unless `keepSummaryRow` is set.
 *
 * Parameters: `[offset, limit = -1, keepSummaryRow = false]`
 */

import type { DataTable } from '../core/DataTable';
import { ID_SUMMARY_ROW } from '../core/types';
import { Filter } from './Filter';

export class Limit extends Filter {
  constructor(
    private readonly offset: number,
    private readonly limit = -1,
    private readonly keepSummaryRow = false,
  ) {
    super();
  }

  filter(table: DataTable): void {
    table.setRowsCountBeforeLimitFilter();

    const summaryRow = this.keepSummaryRow ? table.getRowFromId(ID_SUMMARY_ROW) : null;

    if (this.offset > 0) {
      table.deleteRowsOffset(0, this.offset);
    }
    if (this.limit >= 0) {
      table.deleteRowsOffset(this.limit);
    }

    if (summaryRow) {
      table.addSummaryRow(summaryRow);
    }
  }
}

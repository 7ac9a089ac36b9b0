/**
 * Truncate - keep the first rows and fold the rest into the summary row
 * =====================================================================
 *
 * Given `truncateAfter = N - 1`, a table of more than N rows ends up with its
 * first N - 1 rows followed by a summary row holding the aggregate of every
 * row that was cut (an existing summary row is folded in too).
 *
 * The table is sorted descending by `sortColumn` first, when one is given.
 * The summary row is labelled `LABEL_SUMMARY_ROW`; any other requested label
 * is applied later by a queued `ReplaceSummaryRowLabel`, so that merges
 * between truncation and output still recognize the summary row.
 *
 * Parameters: `[truncateAfter, labelSummaryRow = -1, sortColumn?, filterRecursive = true]`
 */

import type { DataTable } from '../core/DataTable';
import type { ColumnValue } from '../core/types';
import { LABEL_COLUMN, LABEL_SUMMARY_ROW } from '../core/types';
import { Row } from '../core/Row';
import { Filter } from './Filter';
import { Limit } from './limit';
import { Sort } from './sort';

export class Truncate extends Filter {
  constructor(
    private readonly truncateAfter: number,
    private readonly labelSummaryRow: ColumnValue = LABEL_SUMMARY_ROW,
    private readonly sortColumn?: string,
    private readonly filterRecursive = true,
  ) {
    super();
  }

  filter(table: DataTable, depth = 0): void {
    this.addSummaryRow(table);

    if (this.labelSummaryRow !== LABEL_SUMMARY_ROW) {
      table.queueFilter('ReplaceSummaryRowLabel', [this.labelSummaryRow]);
    }

    if (this.filterRecursive) {
      for (const row of table.getRowsWithoutSummaryRow()) {
        this.descend(row, depth);
      }
    }
  }

  private addSummaryRow(table: DataTable): void {
    if (this.sortColumn !== undefined) {
      new Sort(this.sortColumn, 'desc').filter(table);
    }

    if (table.getRowsCount() <= this.truncateAfter + 1) {
      return;
    }

    const summary = new Row({ columns: { [LABEL_COLUMN]: LABEL_SUMMARY_ROW } });
    const aggregationOps = table.getColumnAggregationOperations();

    const rows = table.getRowsWithoutSummaryRow();
    for (const row of rows.slice(Math.max(0, this.truncateAfter))) {
      summary.sumRow(row, false, aggregationOps);
    }
    const existing = table.getSummaryRow();
    if (existing) {
      summary.sumRow(existing, false, aggregationOps);
    }

    new Limit(0, this.truncateAfter).filter(table);
    table.addSummaryRow(summary);
  }
}

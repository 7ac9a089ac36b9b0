/**
 * Filter - base class of named table transformations
 * ===================================================
 *
 * A filter mutates the table it is applied to: it can delete rows, add or
 * rename columns, sort, truncate...
 *
 * When recursion is enabled (see `DataTable.enableRecursiveFilters()`), a
 * filter re-applies itself to the sub-table of every row it keeps, by
 * calling `filterSubTable(row, depth)`.
 */

import type { DataTable } from '../core/DataTable';
import type { Row } from '../core/Row';
import { getDataTableConfig } from '../core/config';
import { RecursionLimitError } from '../core/errors';

export abstract class Filter {
  protected recursive = false;

  enableRecursive(enabled: boolean): void {
    this.recursive = enabled;
  }

  isRecursive(): boolean {
    return this.recursive;
  }

  /**
   * Apply to `table`. `depth` is the nesting level of `table` below the table
   * the filter was first applied to.
   */
  abstract filter(table: DataTable, depth?: number): void;

  /**
   * Apply to the row's sub-table when recursion is enabled.
   */
  protected filterSubTable(row: Row, depth: number): void {
    if (!this.recursive) {
      return;
    }
    this.descend(row, depth);
  }

  /**
   * Apply to the row's sub-table regardless of the recursion flag.
   * @throws RecursionLimitError past the configured maximum depth
   */
  protected descend(row: Row, depth: number): void {
    const subtable = row.getSubtable();
    if (!subtable) {
      return;
    }
    const { maxDepth } = getDataTableConfig();
    if (depth + 1 > maxDepth) {
      throw new RecursionLimitError(maxDepth);
    }
    this.filter(subtable, depth + 1);
    subtable.invalidateLabelIndex();
  }
}

/**
 * Regular-expression row filters.
 *
 * Patterns are case-insensitive. A row without the column is matched as the
 * empty string.
 */

import type { DataTable } from '../core/DataTable';
import type { ColumnValue } from '../core/types';
import { getDataTableConfig } from '../core/config';
import { RecursionLimitError } from '../core/errors';
import { Filter } from './Filter';

export function compilePattern(pattern: string): RegExp {
  return new RegExp(pattern, 'i');
}

export function matchesPattern(regex: RegExp, value: ColumnValue | undefined): boolean {
  return regex.test(value === undefined || value === null ? '' : String(value));
}

/**
 * Delete the rows whose column does not match (or, inverted, does match).
 *
 * Parameters: `[column, pattern, invert = false]`
 */
export class Pattern extends Filter {
  private readonly regex: RegExp;

  constructor(
    private readonly column: string,
    pattern: string,
    private readonly invert = false,
  ) {
    super();
    this.regex = compilePattern(pattern);
  }

  filter(table: DataTable, depth = 0): void {
    for (const [id, row] of table.getRowEntries()) {
      if (matchesPattern(this.regex, row.getColumn(this.column)) === this.invert) {
        table.deleteRow(id);
      } else {
        this.filterSubTable(row, depth);
      }
    }
  }
}

/**
 * Keep a row when its column matches, or when any row below it does.
 * Sub-tables are pruned the same way, always recursively.
 *
 * Parameters: `[column, pattern]`
 */
export class PatternRecursive extends Filter {
  private readonly regex: RegExp;

  constructor(
    private readonly column: string,
    pattern: string,
  ) {
    super();
    this.regex = compilePattern(pattern);
  }

  filter(table: DataTable, depth = 0): void {
    this.prune(table, depth);
  }

  /** Returns the number of rows left in `table` */
  private prune(table: DataTable, depth: number): number {
    for (const [id, row] of table.getRowEntries()) {
      let foundBelow = false;
      const subtable = row.getSubtable();
      if (subtable) {
        const { maxDepth } = getDataTableConfig();
        if (depth + 1 > maxDepth) {
          throw new RecursionLimitError(maxDepth);
        }
        foundBelow = this.prune(subtable, depth + 1) > 0;
      }
      if (!foundBelow && !matchesPattern(this.regex, row.getColumn(this.column))) {
        table.deleteRow(id);
      }
    }
    return table.getRowsCount();
  }
}

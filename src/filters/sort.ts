/**
 * Sort rows by a column.
 *
 * Numeric values compare numerically, other values as strings (natural
 * order by default, so "item 9" comes before "item 10"). Rows that lack the
 * column always come last. The summary row is never moved.
 *
 * Parameters: `[column, order = 'desc', naturalSort = true, recursiveSort = false]`
 */

import type { DataTable } from '../core/DataTable';
import type { Row } from '../core/Row';
import { Filter } from './Filter';
import { toNumber } from '../internals/aggregation';

export type SortOrder = 'asc' | 'desc';

const naturalCollator = new Intl.Collator(undefined, { numeric: true, sensitivity: 'base' });

export class Sort extends Filter {
  constructor(
    private readonly column: string,
    private readonly order: SortOrder = 'desc',
    private readonly naturalSort = true,
    private readonly recursiveSort = false,
  ) {
    super();
  }

  filter(table: DataTable): void {
    if (this.recursiveSort) {
      table.enableRecursiveSort();
    }
    table.sort((a, b) => this.compare(a, b), this.column);
  }

  private compare(a: Row, b: Row): number {
    const valueA = a.getColumn(this.column);
    const valueB = b.getColumn(this.column);

    if (valueA === undefined || valueB === undefined) {
      if (valueA === valueB) return 0;
      return valueA === undefined ? 1 : -1;
    }

    const direction = this.order === 'asc' ? 1 : -1;
    const numberA = toNumber(valueA);
    const numberB = toNumber(valueB);
    if (numberA !== null && numberB !== null) {
      return direction * (numberA - numberB);
    }

    const stringA = String(valueA);
    const stringB = String(valueB);
    if (this.naturalSort) {
      return direction * naturalCollator.compare(stringA, stringB);
    }
    if (stringA === stringB) return 0;
    return direction * (stringA < stringB ? -1 : 1);
  }
}

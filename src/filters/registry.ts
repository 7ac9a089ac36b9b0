/**
 * FilterRegistry - filter name → factory
 * ======================================
 *
 * `DataTable.filter('Sort', ['visits', 'asc'])` looks the name up here and
 * builds the filter from its positional parameters. The built-in filters are
 * registered when this module loads; custom ones can be added with
 * `register()`:
 *
 * ```ts
 * filterRegistry.register('Double', params => new DoubleColumn(params.string(0)));
 * table.filter('Double', ['visits']);
 * ```
 *
 * Built-in names are checked against `FilterParameters` at compile time;
 * custom names take untyped parameters, validated by their factory.
 */

import type { DataTable } from '../core/DataTable';
import type { ColumnValue } from '../core/types';
import { ErrorCode, LookupError } from '../core/errors';
import type { Filter } from './Filter';
import { FilterParams } from './params';
import type { FilterCallbackParameter } from './params';
import type { SortOrder } from './sort';
import { Sort } from './sort';
import { Limit } from './limit';
import { Truncate } from './truncate';
import { Pattern, PatternRecursive } from './pattern';
import { ColumnCallbackAddColumn, ColumnCallbackDeleteRow, ColumnCallbackReplace } from './column-callbacks';
import { ColumnDelete } from './column-delete';
import { ExcludeLowPopulation } from './exclude-low-population';
import { AddColumnPercentage } from './add-column-percentage';
import { ReplaceColumnNames } from './replace-column-names';
import { ReplaceSummaryRowLabel } from './replace-summary-row-label';
import { RangeCheck } from './range-check';
import { Where } from '../sql/where';

/** Callback receiving a column value followed by the extra parameters */
export type ColumnValueCallback = (value: ColumnValue | undefined, ...extraParams: never[]) => unknown;

/**
 * Positional parameters of each built-in filter.
 */
export interface FilterParameters {
  Sort: [column: string, order?: SortOrder, naturalSort?: boolean, recursiveSort?: boolean];
  Limit: [offset: number, limit?: number, keepSummaryRow?: boolean];
  Truncate: [truncateAfter: number, labelSummaryRow?: ColumnValue, sortColumn?: string | null, filterRecursive?: boolean];
  Pattern: [column: string, pattern: string, invert?: boolean];
  PatternRecursive: [column: string, pattern: string];
  ColumnCallbackDeleteRow: [column: string, callback: ColumnValueCallback, extraParams?: unknown[]];
  ColumnCallbackAddColumn: [sourceColumns: string | string[], newColumn: string, callback: FilterCallbackParameter, extraParams?: unknown[]];
  ColumnCallbackReplace: [columns: string | string[], callback: ColumnValueCallback, extraParams?: unknown[]];
  ColumnDelete: [columnsToRemove: string | string[], columnsToKeep?: string | string[], deleteIfZeroOnly?: boolean];
  ExcludeLowPopulation: [column: string, minimumValue: number];
  AddColumnPercentage: [column: string, newColumn: string, total?: number];
  ReplaceColumnNames: [mapping: Record<string, string>];
  ReplaceSummaryRowLabel: [label: ColumnValue];
  RangeCheck: [column: string, min: number, max: number];
  Where: [condition: string];
}

export type FilterName = keyof FilterParameters;

/** Builds a filter from validated positional parameters */
export type FilterFactory = (params: FilterParams, table: DataTable) => Filter;

export class FilterRegistry {
  private factories = new Map<string, FilterFactory>();

  /**
   * Register a filter. Registering an existing name replaces it.
   */
  register(name: string, factory: FilterFactory): void {
    this.factories.set(name, factory);
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  names(): string[] {
    return Array.from(this.factories.keys());
  }

  /**
   * Instantiate `name` for `table`.
   * @throws LookupError for an unknown name
   * @throws InvalidFilterParameterError for bad parameters
   */
  create(name: string, params: readonly unknown[], table: DataTable): Filter {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new LookupError(`Unknown filter "${name}"`, ErrorCode.FILTER_NOT_FOUND, { filter: name });
    }
    return factory(new FilterParams(name, params), table);
  }
}

// Singleton instance
export const filterRegistry = new FilterRegistry();

// ============ BUILT-IN FILTERS ============

filterRegistry.register('Sort', p => new Sort(
  p.string(0),
  p.oneOf<SortOrder>(1, ['asc', 'desc'], 'desc'),
  p.booleanOr(2, true),
  p.booleanOr(3, false),
));

filterRegistry.register('Limit', p => new Limit(
  p.numberOr(0, 0),
  p.numberOr(1, -1),
  p.booleanOr(2, false),
));

filterRegistry.register('Truncate', p => new Truncate(
  p.nonNegativeInteger(0),
  p.columnValueOr(1, -1),
  p.optionalString(2),
  p.booleanOr(3, true),
));

filterRegistry.register('Pattern', p => new Pattern(p.string(0), p.pattern(1), p.booleanOr(2, false)));

filterRegistry.register('PatternRecursive', p => new PatternRecursive(p.string(0), p.pattern(1)));

filterRegistry.register('ColumnCallbackDeleteRow', p => new ColumnCallbackDeleteRow(
  p.string(0),
  p.callback(1),
  p.listOr(2, []),
));

filterRegistry.register('ColumnCallbackAddColumn', p => new ColumnCallbackAddColumn(
  p.stringList(0),
  p.string(1),
  p.callback(2),
  p.listOr(3, []),
));

filterRegistry.register('ColumnCallbackReplace', p => new ColumnCallbackReplace(
  p.stringList(0),
  p.callback(1),
  p.listOr(2, []),
));

filterRegistry.register('ColumnDelete', p => new ColumnDelete(
  p.stringList(0),
  p.stringListOr(1, []),
  p.booleanOr(2, false),
));

filterRegistry.register('ExcludeLowPopulation', p => new ExcludeLowPopulation(p.string(0), p.number(1)));

filterRegistry.register('AddColumnPercentage', p => new AddColumnPercentage(
  p.string(0),
  p.string(1),
  p.optionalNumber(2),
));

filterRegistry.register('ReplaceColumnNames', p => new ReplaceColumnNames(p.stringRecord(0)));

filterRegistry.register('ReplaceSummaryRowLabel', p => new ReplaceSummaryRowLabel(p.columnValueOr(0, -1)));

filterRegistry.register('RangeCheck', p => new RangeCheck(p.string(0), p.number(1), p.number(2)));

filterRegistry.register('Where', p => new Where(p.string(0)));

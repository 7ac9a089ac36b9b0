/**
 * Filters - named table transformations
 *
 * @module
 */

export { Filter } from './Filter';
export { FilterParams } from './params';
export type { FilterCallbackParameter } from './params';
export { FilterRegistry, filterRegistry } from './registry';
export type { FilterFactory, FilterName, FilterParameters, ColumnValueCallback } from './registry';

export { Sort } from './sort';
export type { SortOrder } from './sort';
export { Limit } from './limit';
export { Truncate } from './truncate';
export { Pattern, PatternRecursive, compilePattern, matchesPattern } from './pattern';
export { ColumnCallbackDeleteRow, ColumnCallbackAddColumn, ColumnCallbackReplace } from './column-callbacks';
export type { ColumnCallback } from './column-callbacks';
export { ColumnDelete } from './column-delete';
export { ExcludeLowPopulation } from './exclude-low-population';
export { AddColumnPercentage } from './add-column-percentage';
export { ReplaceColumnNames } from './replace-column-names';
export { ReplaceSummaryRowLabel } from './replace-summary-row-label';
export { RangeCheck } from './range-check';

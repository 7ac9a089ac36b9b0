/**
 * Report DataTable
 * ================
 *
 * In-memory engine for analytics reports stored as trees of labelled rows.
 * Each row may reference a sub-table (a drill-down: "Search engines" →
 * "Keywords" per engine) through a process-wide table registry.
 *
 * ## Quick Start
 *
 * ```ts
 * import { DataTable } from 'report-datatable';
 *
 * const monday = DataTable.makeFromIndexedArray({ Google: { visits: 10 }, Bing: { visits: 4 } });
 * const tuesday = DataTable.makeFromIndexedArray({ Google: { visits: 7 } });
 *
 * monday.addDataTable(tuesday);
 * monday.filter('Sort', ['visits', 'desc']);
 * const blobs = monday.getSerialized(10);
 * const restored = DataTable.fromSerializedTree(blobs);
 * ```
 *
 * ## Core Concepts
 *
 * - **Row**: ordered columns, metadata, optional sub-table reference
 * - **DataTable**: rows plus one optional summary row, indexed by label
 * - **Summary row**: aggregate of the rows cut by a row limit (id and label -1)
 * - **Filter**: named transformation applied to a table, optionally recursively
 * - **Aggregation operator**: how two values of a column combine (sum, min, max, ...)
 *
 * @module
 */

// ═══════════════════════════════════════════════════════════════════════════════
// CORE
// ═══════════════════════════════════════════════════════════════════════════════

export * from './core';

// ═══════════════════════════════════════════════════════════════════════════════
// AGGREGATION
// ═══════════════════════════════════════════════════════════════════════════════

export {
  DEFAULT_AGGREGATION,
  registerAggregationOperation,
  hasAggregationOperation,
  resolveAggregation,
} from './internals/aggregation';

// ═══════════════════════════════════════════════════════════════════════════════
// FILTERS & SQL
// ═══════════════════════════════════════════════════════════════════════════════

export * from './filters';
export * from './sql';

// ═══════════════════════════════════════════════════════════════════════════════
// CONVERTERS & RENDERING
// ═══════════════════════════════════════════════════════════════════════════════

export { simpleArrayToRows, indexedArrayToRows } from './internals/simple-array';
export type { SimpleArray } from './internals/simple-array';
export { renderConsole } from './renderers/console';

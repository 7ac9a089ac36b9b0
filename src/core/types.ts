/**
 * DataTable Core Types
 * =====================
 *
 * Shared type definitions for rows, tables and their bulk-load shapes.
 *
 * ## Quick Start
 *
 * ```ts
 * const table = new DataTable();
 * table.addRowsFromArray([
 *   { columns: { label: 'Google', visits: 1550 }, metadata: { url: 'http://google.com' } },
 *   { columns: { label: 'Bing', visits: 310 } },
 * ]);
 * ```
 *
 * @module
 */

import type { DataTable } from './DataTable';
import type { Row } from './Row';

// ═══════════════════════════════════════════════════════════════════════════════
// VALUES
// ═══════════════════════════════════════════════════════════════════════════════

/** A single cell value */
export type ColumnValue = number | string | boolean | null;

/**
 * Column mapping as a plain record. Integer-like names such as `'2013'` are
 * listed first by any record, so order-sensitive code uses `ColumnEntries`.
 */
export type Columns = Record<string, ColumnValue>;

/** Columns as `[name, value]` pairs, in insertion order */
export type ColumnEntries = ReadonlyArray<readonly [string, ColumnValue]>;

/** Free-form metadata attached to a row or a table */
export type Metadata = Record<string, unknown>;

// ═══════════════════════════════════════════════════════════════════════════════
// RESERVED IDENTIFIERS
// ═══════════════════════════════════════════════════════════════════════════════

/** Row id under which the summary row is addressed */
export const ID_SUMMARY_ROW = -1;

/** Label given to the summary row */
export const LABEL_SUMMARY_ROW = -1;

/** Name of the column used for label lookups */
export const LABEL_COLUMN = 'label';

/** Table metadata: when the report was archived */
export const ARCHIVED_DATE_METADATA_NAME = 'archived_date';

/** Table metadata: columns that are empty and should not be shown */
export const EMPTY_COLUMNS_METADATA_NAME = 'empty_column';

/** Table metadata: nesting depth of a table inside a report tree */
export const DEPTH_METADATA_NAME = 'depth';

// ═══════════════════════════════════════════════════════════════════════════════
// AGGREGATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Combines the current value of a column with an incoming one.
 * `current` is never `undefined`: absent columns are copied, not combined.
 */
export type AggregationFunction = (current: ColumnValue, incoming: ColumnValue, column: string) => ColumnValue;

/** Either a registered operator name ("sum", "min", "max", ...) or a function */
export type AggregationOperation = string | AggregationFunction;

/** Column name → operator */
export type AggregationOperations = Record<string, AggregationOperation>;

// ═══════════════════════════════════════════════════════════════════════════════
// BULK-LOAD SHAPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Plain description of a row.
 *
 * `subtable` may be an in-memory table or the id of a registered one;
 * `subtableId` is the form produced by serialization.
 */
export interface RowSpec {
  columns?: Columns | ColumnEntries;
  metadata?: Metadata;
  subtable?: DataTable | number;
  subtableId?: number;
}

/** Row id → row (or row description). Row id -1 is the summary row. */
export type RowEntries =
  | ReadonlyArray<Row | RowSpec>
  | ReadonlyMap<number, Row | RowSpec>
  | Readonly<Record<string, Row | RowSpec>>;

/** Serialized form of one row inside a blob */
export interface SerializedRow {
  columns: Array<[string, ColumnValue]>;
  metadata?: Metadata;
  subtableId?: number;
}

/** Table id → blob. The root table is always keyed 0. */
export type SerializedTables = Map<number, string>;

// ═══════════════════════════════════════════════════════════════════════════════
// TABLE OPTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export interface DataTableOptions {
  /**
   * Maximum number of rows including the summary row.
   * Rows added beyond this are summed into the summary row.
   * 0 or undefined means unlimited.
   */
  maxAllowedRows?: number;

  /** Per-column aggregation operators (default is "sum") */
  columnAggregationOps?: AggregationOperations;

  /** Initial table metadata */
  metadata?: Metadata;
}

/** Result of walking a label path through a table tree */
export interface WalkPathResult {
  /** Row reached, or the summary row a new row was folded into; null on failure */
  row: Row | null;
  /** Table holding `row`, or the table where the walk stopped */
  table: DataTable;
  /** Path length on success; otherwise the index of the segment the walk stopped at */
  index: number;
}

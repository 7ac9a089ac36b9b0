/**
 * DataTable Core
 * ==============
 *
 * Rows, tables, the table registry, errors and configuration.
 *
 * ## Quick Start
 *
 * ```ts
 * import { DataTable, Row } from 'report-datatable/core';
 *
 * const engines = new DataTable();
 * engines.addRow(new Row({ columns: { label: 'Google', visits: 1550 } }));
 * engines.addRow(new Row({ columns: { label: 'Bing', visits: 310 } }));
 *
 * const yesterday = DataTable.makeFromIndexedArray({ Google: { visits: 20 } });
 * engines.addDataTable(yesterday);
 * engines.getRowFromLabel('Google')?.getColumn('visits'); // 1570
 * ```
 *
 * @module
 */

// ============ CORE CLASSES ============

export { DataTable } from './DataTable';
export type { FilterCallback, RowComparator } from './DataTable';

export { Row } from './Row';

export { TableRegistry, tableRegistry } from './registry';

// ============ CONFIGURATION ============

export {
  MAX_DEPTH_DEFAULT,
  configureDataTables,
  getDataTableConfig,
  resetDataTableConfig,
  setMaximumDepthLevelAllowedAtLeast,
} from './config';
export type { DataTableConfig } from './config';

// ============ ERRORS ============

export {
  ErrorCode,
  DataTableError,
  LookupError,
  RecursionLimitError,
  ConversionError,
  UnserializationError,
  UnknownRowError,
  InvalidFilterParameterError,
} from './errors';

// ============ TYPES ============

export {
  ID_SUMMARY_ROW,
  LABEL_SUMMARY_ROW,
  LABEL_COLUMN,
  ARCHIVED_DATE_METADATA_NAME,
  EMPTY_COLUMNS_METADATA_NAME,
  DEPTH_METADATA_NAME,
} from './types';
export type {
  ColumnValue,
  Columns,
  ColumnEntries,
  Metadata,
  AggregationFunction,
  AggregationOperation,
  AggregationOperations,
  RowSpec,
  RowEntries,
  SerializedRow,
  SerializedTables,
  DataTableOptions,
  WalkPathResult,
} from './types';

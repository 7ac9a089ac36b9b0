/**
 * DataTable - hierarchical report table
 * =====================================
 *
 * An ordered collection of rows plus at most one summary row. Rows may
 * reference sub-tables through the `tableRegistry`, so a report is a tree of
 * tables ("Search engines" → "Keywords" per engine).
 *
 * ## Quick Start
 *
 * ```ts
 * const table = new DataTable({ maxAllowedRows: 100 });
 * table.addRowsFromArray([
 *   { columns: { label: 'Google', visits: 1550 }, subtable: googleKeywords },
 *   { columns: { label: 'Bing', visits: 310 } },
 * ]);
 *
 * table.addDataTable(yesterday);            // sum rows with the same label
 * table.filter('Sort', ['visits', 'desc']);
 * const blobs = table.getSerialized(50, 20, 'visits');
 * ```
 *
 * ## Row ids
 *
 * Appended rows get increasing integer ids. Deleting a row leaves a gap;
 * sorting and offset deletion renumber the rows densely from 0. The summary
 * row is addressed by `ID_SUMMARY_ROW` (-1).
 *
 * ## Row limit
 *
 * With `maxAllowedRows` set, once the table holds `maxAllowedRows - 1` rows
 * every further row is folded into the summary row: the first overflowing row
 * becomes the summary row (label `LABEL_SUMMARY_ROW`), later ones are summed
 * into it without copying their metadata.
 *
 * @module
 */

import type {
  AggregationOperation,
  AggregationOperations,
  ColumnValue,
  Columns,
  DataTableOptions,
  Metadata,
  RowEntries,
  RowSpec,
  SerializedTables,
  WalkPathResult,
} from './types';
import { ID_SUMMARY_ROW, LABEL_COLUMN, LABEL_SUMMARY_ROW } from './types';
import { Row } from './Row';
import { tableRegistry } from './registry';
import { debugLog, getDataTableConfig, setMaximumDepthLevelAllowedAtLeast } from './config';
import { RecursionLimitError, UnknownRowError, UnserializationError } from './errors';
import { LabelIndex } from '../internals/label-index';
import { decodeRows, encodeRows } from '../internals/serialization';
import type { SimpleArray } from '../internals/simple-array';
import { indexedArrayToRows, simpleArrayToRows } from '../internals/simple-array';
import { filterRegistry } from '../filters/registry';
import type { FilterName, FilterParameters } from '../filters/registry';
import { renderConsole } from '../renderers/console';

/** Function applied by `filter()` with the table prepended to the parameters */
export type FilterCallback = (table: DataTable, ...params: never[]) => void;

/** Row comparator used by `sort()` */
export type RowComparator = (a: Row, b: Row) => number;

interface QueuedFilter {
  target: string | FilterCallback;
  params: readonly unknown[];
}

function isRowList(entries: RowEntries): entries is ReadonlyArray<Row | RowSpec> {
  return Array.isArray(entries);
}

function isRowMap(entries: RowEntries): entries is ReadonlyMap<number, Row | RowSpec> {
  return entries instanceof Map;
}

function entriesOf(entries: RowEntries): Array<[number, Row | RowSpec]> {
  if (isRowList(entries)) {
    return entries.map((entry, index): [number, Row | RowSpec] => [index, entry]);
  }
  if (isRowMap(entries)) {
    return Array.from(entries);
  }
  return Object.entries(entries).map(([key, entry]): [number, Row | RowSpec] => [Number(key), entry]);
}

function checkDepth(depth: number): void {
  const { maxDepth } = getDataTableConfig();
  if (depth > maxDepth) {
    throw new RecursionLimitError(maxDepth);
  }
}

export class DataTable {
  private readonly id: number;
  private rows = new Map<number, Row>();
  private nextRowId = 0;
  private summaryRow: Row | null = null;
  private readonly labelIndex = new LabelIndex();

  private maxAllowedRows: number;
  private columnAggregationOps: AggregationOperations;
  private metadata: Metadata;

  private queuedFilters: QueuedFilter[] = [];
  private recursiveSort = false;
  private recursiveFilters = false;
  private sortedByColumn: string | null = null;
  private rowsCountBeforeLimitFilter = 0;
  private destroyed = false;

  constructor(options: DataTableOptions = {}) {
    this.maxAllowedRows = options.maxAllowedRows ?? 0;
    this.columnAggregationOps = { ...options.columnAggregationOps };
    this.metadata = { ...options.metadata };
    this.id = tableRegistry.register(this);
  }

  // ============ LIFECYCLE ============

  getId(): number {
    return this.id;
  }

  /**
   * Release the rows and mark the id deleted in the registry.
   * Sub-tables are left registered.
   */
  destroy(): void {
    if (this.destroyed) {
      return;
    }
    this.rows.clear();
    this.summaryRow = null;
    this.labelIndex.invalidate();
    this.destroyed = true;
    tableRegistry.markDeleted(this.id);
  }

  isDestroyed(): boolean {
    return this.destroyed;
  }

  /**
   * Empty table with the same metadata and aggregation operators
   * (and queued filters, when `keepFilters` is set).
   */
  getEmptyClone(keepFilters = true): DataTable {
    const clone = new DataTable({
      metadata: this.metadata,
      columnAggregationOps: this.columnAggregationOps,
    });
    if (keepFilters) {
      clone.queuedFilters = [...this.queuedFilters];
    }
    return clone;
  }

  // ============ ROWS ============

  /** All rows, summary row last */
  getRows(): Row[] {
    const rows = Array.from(this.rows.values());
    if (this.summaryRow) {
      rows.push(this.summaryRow);
    }
    return rows;
  }

  getRowsWithoutSummaryRow(): Row[] {
    return Array.from(this.rows.values());
  }

  /** `[rowId, row]` pairs, summary row last under `ID_SUMMARY_ROW` */
  getRowEntries(): Array<[number, Row]> {
    const entries = Array.from(this.rows.entries());
    if (this.summaryRow) {
      entries.push([ID_SUMMARY_ROW, this.summaryRow]);
    }
    return entries;
  }

  getRowFromId(id: number): Row | null {
    const row = this.rows.get(id);
    if (row) {
      return row;
    }
    return id === ID_SUMMARY_ROW ? this.summaryRow : null;
  }

  /**
   * Row id for `label`, or null.
   *
   * The first lookup switches the index to continuous maintenance.
   * The summary label resolves to the summary row without the index.
   */
  getRowIdFromLabel(label: ColumnValue): number | null {
    this.labelIndex.enableContinuous();
    if (this.labelIndex.state === 'stale') {
      this.rebuildIndex();
    }

    if (label === LABEL_SUMMARY_ROW && this.summaryRow) {
      return ID_SUMMARY_ROW;
    }
    return this.labelIndex.get(label) ?? null;
  }

  getRowFromLabel(label: ColumnValue): Row | null {
    const id = this.getRowIdFromLabel(label);
    return id === null ? null : this.getRowFromId(id);
  }

  getRowFromIdSubDataTable(subtableId: number): Row | null {
    for (const row of this.rows.values()) {
      if (row.getSubtableId() === subtableId) {
        return row;
      }
    }
    return null;
  }

  getFirstRow(): Row | null {
    for (const row of this.rows.values()) {
      return row;
    }
    return this.summaryRow;
  }

  getLastRow(): Row | null {
    if (this.summaryRow) {
      return this.summaryRow;
    }
    const rows = this.getRowsWithoutSummaryRow();
    return rows.length > 0 ? rows[rows.length - 1] : null;
  }

  getSummaryRow(): Row | null {
    return this.summaryRow;
  }

  /**
   * Append a row, or fold it into the summary row when the table is full.
   * Returns the row that now holds the data.
   */
  addRow(row: Row): Row {
    if (this.maxAllowedRows > 0 && this.getRowsCount() >= this.maxAllowedRows - 1) {
      return this.foldIntoSummaryRow(row);
    }

    const rowId = this.nextRowId++;
    this.rows.set(rowId, row);
    this.labelIndex.onAppend(rowId, row.getColumn(LABEL_COLUMN));
    return row;
  }

  /** Set the summary row, replacing any existing one */
  addSummaryRow(row: Row): Row {
    this.summaryRow = row;
    const label = row.getColumn(LABEL_COLUMN);
    if (label !== undefined) {
      this.labelIndex.set(label, ID_SUMMARY_ROW);
    }
    return row;
  }

  /**
   * @throws UnknownRowError if there is no row with this id
   */
  deleteRow(id: number): void {
    if (id === ID_SUMMARY_ROW) {
      this.summaryRow = null;
      this.labelIndex.invalidate();
      return;
    }
    if (!this.rows.delete(id)) {
      throw new UnknownRowError(id);
    }
    this.labelIndex.invalidate();
  }

  deleteRows(ids: readonly number[]): void {
    for (const id of ids) {
      this.deleteRow(id);
    }
  }

  /**
   * Delete `limit` rows starting at position `offset` (all of them when no
   * limit is given). Deleting through the end drops the summary row too.
   * Remaining rows are renumbered. Returns the number of rows deleted.
   */
  deleteRowsOffset(offset: number, limit?: number): number {
    if (limit === 0) {
      return 0;
    }
    const count = this.getRowsCount();
    if (offset >= count) {
      return 0;
    }
    if (limit === undefined || limit >= count) {
      this.summaryRow = null;
    }

    const ordered = this.getRowsWithoutSummaryRow();
    const removed = limit === undefined ? ordered.splice(offset) : ordered.splice(offset, limit);
    this.renumber(ordered);
    return removed.length;
  }

  // ============ COUNTS ============

  getRowsCount(): number {
    return this.rows.size + (this.summaryRow ? 1 : 0);
  }

  getRowsCountWithoutSummaryRow(): number {
    return this.rows.size;
  }

  /** Rows of this table plus the rows of every sub-table below it */
  getRowsCountRecursive(): number {
    return this.countRecursive(0);
  }

  private countRecursive(depth: number): number {
    checkDepth(depth);
    let total = this.getRowsCount();
    for (const row of this.rows.values()) {
      const subtable = row.getSubtable();
      if (subtable) {
        total += subtable.countRecursive(depth + 1);
      }
    }
    return total;
  }

  /** Row count saved by the last `Limit`, or the current count if none ran */
  getRowsCountBeforeLimitFilter(): number {
    return this.rowsCountBeforeLimitFilter === 0 ? this.getRowsCount() : this.rowsCountBeforeLimitFilter;
  }

  setRowsCountBeforeLimitFilter(): void {
    this.rowsCountBeforeLimitFilter = this.getRowsCount();
  }

  // ============ COLUMNS ============

  /** Value of `name` in every row (undefined where absent) */
  getColumn(name: string): Array<ColumnValue | undefined> {
    return this.getRows().map(row => row.getColumn(name));
  }

  getColumnsStartingWith(prefix: string): ColumnValue[] {
    const values: ColumnValue[] = [];
    for (const row of this.getRows()) {
      for (const [name, value] of row.getColumnEntries()) {
        if (name.startsWith(prefix)) {
          values.push(value);
        }
      }
    }
    return values;
  }

  /** Column names of the first row that has any */
  getColumns(): string[] {
    for (const row of this.getRows()) {
      const names = row.getColumnNames();
      if (names.length > 0) {
        return names;
      }
    }
    return [];
  }

  getRowsMetadata(name: string): unknown[] {
    return this.getRows().map(row => row.getMetadata(name));
  }

  deleteColumn(name: string): void {
    this.deleteColumns([name]);
  }

  deleteColumns(names: readonly string[], deleteRecursiveInSubtables = false): void {
    this.deleteColumnsAt(names, deleteRecursiveInSubtables, 0);
  }

  private deleteColumnsAt(names: readonly string[], recursive: boolean, depth: number): void {
    checkDepth(depth);
    for (const row of this.getRows()) {
      for (const name of names) {
        row.deleteColumn(name);
      }
      const subtable = recursive ? row.getSubtable() : null;
      if (subtable) {
        subtable.deleteColumnsAt(names, recursive, depth + 1);
      }
    }
    if (names.includes(LABEL_COLUMN)) {
      this.labelIndex.invalidate();
    }
  }

  /** Rename a column in every row, sub-tables included */
  renameColumn(oldName: string, newName: string): void {
    this.renameColumnAt(oldName, newName, 0);
  }

  private renameColumnAt(oldName: string, newName: string, depth: number): void {
    checkDepth(depth);
    for (const row of this.getRows()) {
      row.renameColumn(oldName, newName);
      const subtable = row.getSubtable();
      if (subtable) {
        subtable.renameColumnAt(oldName, newName, depth + 1);
      }
    }
    if (oldName === LABEL_COLUMN || newName === LABEL_COLUMN) {
      this.labelIndex.invalidate();
    }
  }

  // ============ METADATA ============

  getAllTableMetadata(): Metadata {
    return { ...this.metadata };
  }

  getMetadata(name: string): unknown {
    return this.metadata[name];
  }

  setMetadata(name: string, value: unknown): void {
    this.metadata[name] = value;
  }

  // ============ SETTINGS ============

  /**
   * Maximum number of rows, summary row included. 0 means unlimited.
   */
  setMaximumAllowedRows(maxAllowedRows: number): void {
    this.maxAllowedRows = maxAllowedRows;
  }

  setColumnAggregationOperation(column: string, operation: AggregationOperation): void {
    this.columnAggregationOps[column] = operation;
  }

  /** Merge operators into the current ones */
  setColumnAggregationOperations(operations: AggregationOperations): void {
    for (const [column, operation] of Object.entries(operations)) {
      this.setColumnAggregationOperation(column, operation);
    }
  }

  getColumnAggregationOperations(): AggregationOperations {
    return { ...this.columnAggregationOps };
  }

  static setMaximumDepthLevelAllowedAtLeast(level: number): void {
    setMaximumDepthLevelAllowedAtLeast(level);
  }

  // ============ SORTING ============

  /**
   * Sort the rows (never the summary row) and renumber them.
   * With recursive sort enabled, every sub-table is sorted the same way.
   */
  sort(compare: RowComparator, columnSortedBy: string | null): void {
    this.sortAt(compare, columnSortedBy, 0);
  }

  private sortAt(compare: RowComparator, columnSortedBy: string | null, depth: number): void {
    checkDepth(depth);
    this.sortedByColumn = columnSortedBy;
    const ordered = this.getRowsWithoutSummaryRow().sort(compare);
    this.renumber(ordered);

    if (!this.recursiveSort) {
      return;
    }
    for (const row of ordered) {
      const subtable = row.getSubtable();
      if (subtable) {
        subtable.enableRecursiveSort();
        subtable.sortAt(compare, columnSortedBy, depth + 1);
      }
    }
  }

  getSortedByColumnName(): string | null {
    return this.sortedByColumn;
  }

  enableRecursiveSort(): void {
    this.recursiveSort = true;
  }

  // ============ FILTERS ============

  /** Filters applied from now on also apply to every sub-table */
  enableRecursiveFilters(): void {
    this.recursiveFilters = true;
  }

  /**
   * Apply a registered filter by name, or run `callback(table, ...params)`.
   *
   * ```ts
   * table.filter('Limit', [0, 10]);
   * table.filter((t, column: string) => t.deleteColumn(column), ['nb_hits']);
   * ```
   */
  filter<K extends FilterName>(name: K, params: FilterParameters[K]): void;
  filter(name: string, params?: readonly unknown[]): void;
  filter(callback: FilterCallback, params?: readonly unknown[]): void;
  filter(target: string | FilterCallback, params: readonly unknown[] = []): void {
    this.applyFilter(target, params);
  }

  /**
   * Defer a filter until `applyQueuedFilters()`.
   */
  queueFilter<K extends FilterName>(name: K, params: FilterParameters[K]): void;
  queueFilter(name: string, params?: readonly unknown[]): void;
  queueFilter(callback: FilterCallback, params?: readonly unknown[]): void;
  queueFilter(target: string | FilterCallback, params: readonly unknown[] = []): void {
    this.queuedFilters.push({ target, params: [...params] });
  }

  /**
   * Apply queued filters in the order they were queued. Filters queued while
   * applying (e.g. by `Truncate`) wait for the next call.
   */
  applyQueuedFilters(): void {
    const queued = this.queuedFilters;
    this.queuedFilters = [];
    for (const { target, params } of queued) {
      this.applyFilter(target, params);
    }
  }

  getQueuedFilterCount(): number {
    return this.queuedFilters.length;
  }

  private applyFilter(target: string | FilterCallback, params: readonly unknown[]): void {
    if (typeof target === 'function') {
      Reflect.apply(target, undefined, [this, ...params]);
      return;
    }
    const filter = filterRegistry.create(target, params, this);
    filter.enableRecursive(this.recursiveFilters);
    debugLog(`Filter:${target}`, `Applying to table ${this.id} (${this.getRowsCount()} rows)`);
    filter.filter(this);
    this.invalidateLabelIndex();
  }

  // ============ MERGING ============

  /**
   * Sum `other` into this table, matching rows by label.
   *
   * - rows whose label is new here are copied in (with a copy of their sub-table)
   * - rows with a known label are summed with `sumRow`, and their sub-tables merged
   * - rows only present here are left untouched
   *
   * @throws RecursionLimitError when sub-tables nest past the configured maximum depth
   */
  addDataTable(other: DataTable, depth = 0): void {
    checkDepth(depth);

    for (const row of other.getRows()) {
      const label = row.getColumn(LABEL_COLUMN);
      const found = label === undefined ? null : this.getRowFromLabel(label);

      if (!found) {
        const copy = this.copyRow(row, depth);
        if (label === LABEL_SUMMARY_ROW) {
          this.addSummaryRow(copy);
        } else {
          this.addRow(copy);
        }
        continue;
      }

      found.sumRow(row, true, this.columnAggregationOps);
      const subtable = row.getSubtable();
      if (subtable) {
        found.sumSubtable(subtable, this.columnAggregationOps, depth + 1);
      }
    }
  }

  /**
   * Table holding the rows of every sub-table of this table.
   *
   * With `labelColumn`, each copied row records its parent's label in that
   * column (or metadata entry, with `useMetadataColumn`). When `labelColumn`
   * is `label`, the copied label becomes `"<parent> - <child>"`. Summary rows
   * of the sub-tables are summed into one.
   */
  mergeSubtables(labelColumn?: string, useMetadataColumn = false): DataTable {
    const result = new DataTable();
    for (const row of this.getRows()) {
      const subtable = row.getSubtable();
      if (!subtable) {
        continue;
      }
      const parentLabel = row.getColumn(LABEL_COLUMN) ?? null;

      for (const [id, subRow] of subtable.getRowEntries()) {
        const copy = subRow.clone();

        if (id === ID_SUMMARY_ROW) {
          const existing = result.getSummaryRow();
          if (existing) {
            existing.sumRow(copy, true, this.columnAggregationOps);
          } else {
            result.addSummaryRow(copy);
          }
          continue;
        }

        if (labelColumn !== undefined) {
          const newLabel: ColumnValue = labelColumn === LABEL_COLUMN
            ? `${String(parentLabel)} - ${String(copy.getColumn(LABEL_COLUMN) ?? '')}`
            : parentLabel;
          if (useMetadataColumn) {
            copy.setMetadata(labelColumn, newLabel);
          } else {
            copy.setColumn(labelColumn, newLabel);
          }
        }
        result.addRow(copy);
      }
    }
    return result;
  }

  /**
   * Copy of `row` owning a copy of its sub-table, for adoption by this table.
   */
  private copyRow(row: Row, depth: number): Row {
    const copy = row.clone();
    const subtable = row.getSubtable();
    if (subtable) {
      copy.removeSubtable();
      copy.sumSubtable(subtable, this.columnAggregationOps, depth + 1);
    }
    return copy;
  }

  // ============ PATH WALKING ============

  /**
   * Follow a path of labels down the sub-tables.
   *
   * With `missingRowColumns`, missing rows are created (label first, then
   * the defaults) and so are missing sub-tables, capped at `maxSubtableRows`.
   * If a created row gets folded into a full table's summary row, the walk
   * stops there and returns that summary row.
   *
   * Without it, the walk fails with `row: null` and the index of the
   * segment it stopped at: the missing label, or the last matched label
   * when that row has no sub-table to descend into.
   */
  walkPath(path: readonly ColumnValue[], missingRowColumns?: Columns, maxSubtableRows = 0): WalkPathResult {
    let table: DataTable = this;
    let row: Row | null = null;

    for (let i = 0; i < path.length; i++) {
      const segment = path[i];
      let next = table.getRowFromLabel(segment);

      if (!next) {
        if (missingRowColumns === undefined) {
          return { row: null, table, index: i };
        }
        const columns: Array<[string, ColumnValue]> = [[LABEL_COLUMN, segment]];
        for (const [name, value] of Object.entries(missingRowColumns)) {
          if (name !== LABEL_COLUMN) {
            columns.push([name, value]);
          }
        }
        const created = new Row({ columns });
        next = table.addRow(created);
        if (next !== created) {
          next.deleteMetadata();
          return { row: next, table, index: i };
        }
      }

      row = next;
      if (i === path.length - 1) {
        break;
      }

      let subtable = next.getSubtable();
      if (!subtable) {
        if (missingRowColumns === undefined) {
          return { row: null, table, index: i };
        }
        subtable = new DataTable({
          maxAllowedRows: maxSubtableRows,
          columnAggregationOps: this.columnAggregationOps,
        });
        next.setSubtable(subtable);
        next.deleteMetadata();
      }
      table = subtable;
    }

    return { row, table, index: path.length };
  }

  // ============ SERIALIZATION ============

  /**
   * Serialize this table and every sub-table below it.
   *
   * Returns table id → blob; this table is always keyed 0. When
   * `maximumRowsInDataTable` is given (and positive), this table is truncated
   * to that many rows first, sub-tables to `maximumRowsInSubDataTable`.
   *
   * @throws RecursionLimitError past the configured maximum depth
   */
  getSerialized(
    maximumRowsInDataTable?: number,
    maximumRowsInSubDataTable?: number,
    columnToSortByBeforeTruncation?: string,
  ): SerializedTables {
    const serialized: SerializedTables = new Map();
    this.serializeInto(serialized, 0, maximumRowsInDataTable, maximumRowsInSubDataTable, columnToSortByBeforeTruncation);
    debugLog(`DataTable:${this.id}`, `Serialized ${serialized.size} tables`);
    return serialized;
  }

  private serializeInto(
    serialized: SerializedTables,
    depth: number,
    maxRows: number | undefined,
    maxSubRows: number | undefined,
    sortColumn: string | undefined,
  ): void {
    checkDepth(depth);

    if (maxRows !== undefined && maxRows > 0) {
      this.filter('Truncate', [maxRows - 1, LABEL_SUMMARY_ROW, sortColumn ?? null, false]);
    }

    for (const row of this.getRows()) {
      const subtable = row.getSubtable();
      if (subtable) {
        subtable.serializeInto(serialized, depth + 1, maxSubRows, maxSubRows, sortColumn);
      }
    }

    const key = depth === 0 ? 0 : this.id;
    serialized.set(key, encodeRows(this.getRowEntries().map(([id, row]) => [id, row.toSerializable()])));

    for (const row of this.getRows()) {
      row.cleanPostSerialize();
    }
  }

  /**
   * Load rows from one table's blob. Sub-tables are referenced by id only.
   * @throws UnserializationError if the blob cannot be decoded
   */
  addRowsFromSerializedArray(blob: string): void {
    this.addRowsFromArray(decodeRows(blob));
  }

  /**
   * Load rows from ready `Row`s or row descriptions. The entry keyed
   * `ID_SUMMARY_ROW` becomes the summary row; the others go through `addRow`.
   */
  addRowsFromArray(entries: RowEntries): void {
    for (const [key, entry] of entriesOf(entries)) {
      const row = entry instanceof Row ? entry : new Row(entry);
      if (key === ID_SUMMARY_ROW) {
        this.addSummaryRow(row);
      } else {
        this.addRow(row);
      }
    }
  }

  addRowFromArray(entry: Row | RowSpec): void {
    this.addRowsFromArray([entry]);
  }

  /**
   * Load rows from a simple structure (see `simpleArrayToRows`).
   * @throws ConversionError if the structure cannot be mapped without loss; no row is added then
   */
  addRowsFromSimpleArray(array: SimpleArray): void {
    for (const spec of simpleArrayToRows(array)) {
      this.addRow(new Row(spec));
    }
  }

  addRowFromSimpleArray(row: Readonly<Record<string, unknown>>): void {
    this.addRowsFromSimpleArray([row]);
  }

  // ============ INDEX ============

  /**
   * Force the label index to be rebuilt on the next lookup. Needed after
   * changing the `label` column of rows in place.
   */
  invalidateLabelIndex(): void {
    this.labelIndex.invalidate();
  }

  private rebuildIndex(): void {
    this.labelIndex.rebuild(
      this.getRowEntries().map(([id, row]): [number, ColumnValue | undefined] => [id, row.getColumn(LABEL_COLUMN)]),
    );
  }

  private renumber(ordered: readonly Row[]): void {
    this.rows = new Map(ordered.map((row, index): [number, Row] => [index, row]));
    this.nextRowId = ordered.length;
    this.labelIndex.invalidate();
  }

  private foldIntoSummaryRow(row: Row): Row {
    if (this.summaryRow) {
      this.summaryRow.sumRow(row, false, this.columnAggregationOps);
      return this.summaryRow;
    }
    debugLog(`DataTable:${this.id}`, `Row limit of ${this.maxAllowedRows} reached, folding into the summary row`);
    const summary = new Row({ columns: row.getColumnEntries() });
    summary.setColumn(LABEL_COLUMN, LABEL_SUMMARY_ROW);
    return this.addSummaryRow(summary);
  }

  toString(): string {
    return renderConsole(this);
  }

  // ============ FACTORIES ============

  /**
   * Same row count, and every row has a row-equal counterpart in `b`: the
   * row with the same label, or for unlabelled rows the row at the same
   * position.
   */
  static isEqual(a: DataTable, b: DataTable): boolean {
    if (a.getRowsCount() !== b.getRowsCount()) {
      return false;
    }
    a.rebuildIndex();
    b.rebuildIndex();

    const rowsB = b.getRows();
    return a.getRows().every((row, position) => {
      const label = row.getColumn(LABEL_COLUMN);
      const other = label === undefined ? rowsB[position] : b.getRowFromLabel(label);
      return other !== null && other !== undefined && Row.isEqual(row, other);
    });
  }

  /**
   * `{ Firefox: 155 }` → row `{ label: 'Firefox', value: 155 }`;
   * `{ Firefox: { visits: 155 } }` → row `{ label: 'Firefox', visits: 155 }`.
   */
  static makeFromIndexedArray(
    array: Readonly<Record<string, unknown>>,
    subtablePerLabel?: Readonly<Record<string, DataTable | number>>,
  ): DataTable {
    const table = new DataTable();
    for (const { label, columns } of indexedArrayToRows(array)) {
      const subtable = subtablePerLabel ? subtablePerLabel[label] : undefined;
      table.addRow(new Row({ columns, subtable }));
    }
    return table;
  }

  static makeFromSimpleArray(array: SimpleArray): DataTable {
    const table = new DataTable();
    table.addRowsFromSimpleArray(array);
    return table;
  }

  static fromSerializedArray(blob: string): DataTable {
    const table = new DataTable();
    table.addRowsFromSerializedArray(blob);
    return table;
  }

  /**
   * Rebuild a whole tree from a `getSerialized()` result. Sub-tables get new
   * registry ids.
   *
   * @throws UnserializationError if the root (key 0) or a referenced sub-table is missing
   * @throws RecursionLimitError if the references loop
   */
  static fromSerializedTree(serialized: ReadonlyMap<number, string>): DataTable {
    const root = serialized.get(0);
    if (root === undefined) {
      throw new UnserializationError('no root table under key 0');
    }
    return DataTable.loadTree(serialized, root, 0);
  }

  private static loadTree(serialized: ReadonlyMap<number, string>, blob: string, depth: number): DataTable {
    checkDepth(depth);
    const table = DataTable.fromSerializedArray(blob);
    for (const row of table.getRows()) {
      const subtableId = row.getSubtableId();
      if (subtableId === null) {
        continue;
      }
      const subBlob = serialized.get(subtableId);
      if (subBlob === undefined) {
        throw new UnserializationError(`sub-table ${subtableId} is missing`);
      }
      row.setSubtable(DataTable.loadTree(serialized, subBlob, depth + 1));
    }
    return table;
  }
}

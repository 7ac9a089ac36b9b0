/**
 * Row - a single record of a DataTable
 * =====================================
 *
 * A row holds:
 * - ordered columns (`label`, `visits`, ...)
 * - free-form metadata (`logo`, `url`, ...)
 * - optionally, the id of a sub-table registered in the `tableRegistry`
 *
 * The sub-table is referenced by id, never owned: destroying a row or its
 * table leaves the sub-table registered.
 *
 * ```ts
 * const google = new Row({
 *   columns: { label: 'Google', visits: 1550 },
 *   metadata: { url: 'http://google.com' },
 *   subtable: keywordsTable,
 * });
 * ```
 */

import type {
  AggregationOperations,
  ColumnEntries,
  ColumnValue,
  Columns,
  Metadata,
  RowSpec,
  SerializedRow,
} from './types';
import { LABEL_COLUMN } from './types';
import { resolveAggregation } from '../internals/aggregation';
import { tableRegistry } from './registry';
import type { DataTable } from './DataTable';

export class Row {
  private columns: Map<string, ColumnValue>;
  private metadata: Metadata;
  private subtableId: number | null = null;

  // Transient: resolved sub-table, dropped after serialization
  private subtableCache: DataTable | null = null;

  constructor(spec: RowSpec = {}) {
    this.columns = toColumnMap(spec.columns);
    this.metadata = { ...spec.metadata };

    if (spec.subtable !== undefined) {
      if (typeof spec.subtable === 'number') {
        this.subtableId = spec.subtable;
      } else {
        this.setSubtable(spec.subtable);
      }
    } else if (spec.subtableId !== undefined) {
      this.subtableId = spec.subtableId;
    }
  }

  // ============ COLUMNS ============

  getColumn(name: string): ColumnValue | undefined {
    return this.columns.get(name);
  }

  hasColumn(name: string): boolean {
    return this.columns.has(name);
  }

  /**
   * Copy of the columns as a record. A record lists integer-like names
   * first; use `getColumnNames` or `getColumnEntries` for the row's order.
   */
  getColumns(): Columns {
    return Object.fromEntries(this.columns);
  }

  /** Column names in insertion order */
  getColumnNames(): string[] {
    return Array.from(this.columns.keys());
  }

  /** `[name, value]` pairs in insertion order */
  getColumnEntries(): Array<[string, ColumnValue]> {
    return Array.from(this.columns);
  }

  setColumn(name: string, value: ColumnValue): void {
    this.columns.set(name, value);
  }

  /** Replace all columns */
  setColumns(columns: Columns | ColumnEntries): void {
    this.columns = toColumnMap(columns);
  }

  /** Returns false if the column did not exist */
  deleteColumn(name: string): boolean {
    return this.columns.delete(name);
  }

  /**
   * Rename a column, keeping its position.
   */
  renameColumn(oldName: string, newName: string): void {
    if (!this.hasColumn(oldName) || oldName === newName) {
      return;
    }
    const renamed = new Map<string, ColumnValue>();
    for (const [name, value] of this.columns) {
      if (name === oldName) {
        renamed.set(newName, value);
      } else if (name !== newName) {
        renamed.set(name, value);
      }
    }
    this.columns = renamed;
  }

  // ============ METADATA ============

  getMetadata(name: string): unknown {
    return this.metadata[name];
  }

  getAllMetadata(): Metadata {
    return { ...this.metadata };
  }

  setMetadata(name: string, value: unknown): void {
    this.metadata[name] = value;
  }

  /**
   * Delete one metadata entry, or all of them when no name is given.
   */
  deleteMetadata(name?: string): boolean {
    if (name === undefined) {
      this.metadata = {};
      return true;
    }
    if (!(name in this.metadata)) {
      return false;
    }
    delete this.metadata[name];
    return true;
  }

  // ============ SUB-TABLE ============

  getSubtableId(): number | null {
    return this.subtableId;
  }

  /**
   * Resolve the sub-table through the registry.
   * @throws LookupError if the referenced table was deleted
   */
  getSubtable(): DataTable | null {
    if (this.subtableId === null) {
      return null;
    }
    if (this.subtableCache && !this.subtableCache.isDestroyed()) {
      return this.subtableCache;
    }
    this.subtableCache = tableRegistry.get(this.subtableId);
    return this.subtableCache;
  }

  setSubtable(table: DataTable): DataTable {
    this.subtableId = table.getId();
    this.subtableCache = table;
    return table;
  }

  setSubtableId(id: number): void {
    this.subtableId = id;
    this.subtableCache = null;
  }

  removeSubtable(): void {
    this.subtableId = null;
    this.subtableCache = null;
  }

  // ============ AGGREGATION ============

  /**
   * Sum the columns of `other` into this row.
   *
   * - `label` is never combined
   * - columns missing here are copied from `other`
   * - other columns are combined with the operator configured for them (default "sum")
   * - metadata keys missing here are copied when `copyMetadataIfAbsent` is set
   */
  sumRow(other: Row, copyMetadataIfAbsent = true, aggregationOps: AggregationOperations = {}): void {
    for (const [name, incoming] of other.columns) {
      if (name === LABEL_COLUMN) {
        continue;
      }
      const current = this.columns.get(name);
      if (current === undefined) {
        this.columns.set(name, incoming);
        continue;
      }
      const operation = resolveAggregation(aggregationOps[name]);
      this.columns.set(name, operation(current, incoming, name));
    }

    if (copyMetadataIfAbsent) {
      for (const [name, value] of Object.entries(other.metadata)) {
        if (!(name in this.metadata)) {
          this.metadata[name] = value;
        }
      }
    }
  }

  /**
   * Merge `table` into this row's sub-table, creating the sub-table if needed.
   * The receiving sub-table uses `aggregationOps` from then on. `depth` is
   * the nesting level of that sub-table below the table being merged into.
   */
  sumSubtable(
    table: DataTable,
    aggregationOps: AggregationOperations = table.getColumnAggregationOperations(),
    depth = 0,
  ): void {
    const existing = this.getSubtable();
    if (existing) {
      existing.setColumnAggregationOperations(aggregationOps);
      existing.addDataTable(table, depth);
      return;
    }
    const created = table.getEmptyClone(false);
    created.setColumnAggregationOperations(aggregationOps);
    created.addDataTable(table, depth);
    this.setSubtable(created);
  }

  // ============ SERIALIZATION ============

  toSerializable(): SerializedRow {
    const serialized: SerializedRow = { columns: this.getColumnEntries() };
    if (Object.keys(this.metadata).length > 0) {
      serialized.metadata = { ...this.metadata };
    }
    if (this.subtableId !== null) {
      serialized.subtableId = this.subtableId;
    }
    return serialized;
  }

  /** Drop transient state after the row has been serialized */
  cleanPostSerialize(): void {
    this.subtableCache = null;
  }

  /**
   * Copy with the same columns, metadata and sub-table reference.
   */
  clone(): Row {
    return new Row({
      columns: this.getColumnEntries(),
      metadata: this.metadata,
      subtableId: this.subtableId ?? undefined,
    });
  }

  /**
   * Two rows are equal when their columns and metadata are equal, regardless of key order.
   */
  static isEqual(a: Row, b: Row): boolean {
    return recordsEqual(a.getColumns(), b.getColumns()) && recordsEqual(a.metadata, b.metadata);
  }
}

function toColumnMap(columns: Columns | ColumnEntries | undefined): Map<string, ColumnValue> {
  if (columns === undefined) {
    return new Map<string, ColumnValue>();
  }
  return new Map<string, ColumnValue>(isColumnEntries(columns) ? columns : Object.entries(columns));
}

function isColumnEntries(columns: Columns | ColumnEntries): columns is ColumnEntries {
  return Array.isArray(columns);
}

function recordsEqual(a: Record<string, unknown>, b: Record<string, unknown>): boolean {
  const keysA = Object.keys(a);
  if (keysA.length !== Object.keys(b).length) {
    return false;
  }
  return keysA.every(key => Object.prototype.hasOwnProperty.call(b, key) && valuesEqual(a[key], b[key]));
}

function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => valuesEqual(item, b[i]));
  }
  if (isPlainObject(a) && isPlainObject(b)) {
    return recordsEqual(a, b);
  }
  return false;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * TableRegistry - Process-wide store of DataTables
 * =================================================
 *
 * Every DataTable registers itself here on construction and receives an
 * integer id. Rows reference their sub-tables by that id, so a report tree is
 * really a forest of independently owned tables linked through the registry.
 *
 * ## Lifecycle
 *
 * - `register()` assigns the next id (ids start at 1 and are never reused)
 * - `markDeleted()` is called by `DataTable.destroy()`
 * - `deleteAll()` tears down everything created after a given id
 *
 * ## Usage
 *
 * ```ts
 * import { tableRegistry } from 'report-datatable/core';
 *
 * const table = tableRegistry.get(row.getSubtableId());
 * ```
 */

import type { DataTable } from './DataTable';
import { LookupError } from './errors';
import { debugLog } from './config';

export class TableRegistry {
  private tables = new Map<number, DataTable>();
  private deleted = new Set<number>();
  private nextTableId = 0;

  // ============ PUBLIC API ============

  /**
   * Store a table and return its id.
   */
  register(table: DataTable): number {
    const id = ++this.nextTableId;
    this.tables.set(id, table);
    return id;
  }

  /**
   * Resolve an id.
   * @throws LookupError when the id is unknown or was deleted
   */
  get(id: number): DataTable {
    const table = this.tables.get(id);
    if (!table || this.deleted.has(id)) {
      throw LookupError.tableNotFound(id);
    }
    return table;
  }

  has(id: number): boolean {
    return this.tables.has(id) && !this.deleted.has(id);
  }

  /**
   * Mark a table as deleted. Its id stays reserved.
   */
  markDeleted(id: number): void {
    if (this.tables.delete(id)) {
      this.deleted.add(id);
    }
  }

  isDeleted(id: number): boolean {
    return this.deleted.has(id);
  }

  /**
   * Destroy every live table whose id is greater than `greaterThanId`.
   */
  deleteAll(greaterThanId = 0): void {
    let count = 0;
    for (const [id, table] of Array.from(this.tables)) {
      if (id > greaterThanId) {
        table.destroy();
        count++;
      }
    }
    debugLog('TableRegistry', `Deleted ${count} tables with id > ${greaterThanId}`);
  }

  /** Id handed out most recently (0 before the first registration) */
  getMostRecentTableId(): number {
    return this.nextTableId;
  }

  /** Number of live tables */
  get size(): number {
    return this.tables.size;
  }

  /**
   * Row counts of all live tables (for debugging).
   */
  dumpTables(): Map<number, number> {
    const dump = new Map<number, number>();
    for (const [id, table] of this.tables) {
      dump.set(id, table.getRowsCount());
    }
    return dump;
  }
}

// Singleton instance
export const tableRegistry = new TableRegistry();

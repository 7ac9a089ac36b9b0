/**
 * Rename columns in every row, keeping their position.
 *
 * Parameters: `[mapping]` (old name → new name)
 */

import type { DataTable } from '../core/DataTable';
import { Filter } from './Filter';

export class ReplaceColumnNames extends Filter {
  constructor(private readonly mapping: Readonly<Record<string, string>>) {
    super();
  }

  filter(table: DataTable, depth = 0): void {
    for (const row of table.getRows()) {
      for (const [oldName, newName] of Object.entries(this.mapping)) {
        row.renameColumn(oldName, newName);
      }
      this.filterSubTable(row, depth);
    }
  }
}

import { describe, it, expect, afterEach } from 'vitest';
import { DataTable } from '../../core/DataTable';
import { Row } from '../../core/Row';
import { tableRegistry } from '../../core/registry';
import { ConversionError, UnknownRowError } from '../../core/errors';
import { ID_SUMMARY_ROW, LABEL_SUMMARY_ROW } from '../../core/types';
import type { RowSpec } from '../../core/types';

afterEach(() => {
  tableRegistry.deleteAll();
});

function labelsOf(table: DataTable): Array<unknown> {
  return table.getRows().map(row => row.getColumn('label'));
}

function tableOf(...rows: Array<[string, number]>): DataTable {
  const table = new DataTable();
  for (const [label, visits] of rows) {
    table.addRow(new Row({ columns: { label, visits } }));
  }
  return table;
}

describe('DataTable', () => {
  // ============ ROWS ============

  describe('rows', () => {
    it('should start empty', () => {
      const table = new DataTable();
      expect(table.getRowsCount()).toBe(0);
      expect(table.getFirstRow()).toBeNull();
      expect(table.getLastRow()).toBeNull();
      expect(table.getColumns()).toEqual([]);
    });

    it('should keep ids after a deletion and never reuse them', () => {
      const table = tableOf(['a', 1], ['b', 2], ['c', 3]);
      table.deleteRow(1);
      table.addRow(new Row({ columns: { label: 'd', visits: 4 } }));

      expect(table.getRowEntries().map(([id]) => id)).toEqual([0, 2, 3]);
      expect(table.getRowFromId(1)).toBeNull();
      expect(table.getRowFromId(3)?.getColumn('label')).toBe('d');
    });

    it('should place the summary row last', () => {
      const table = tableOf(['a', 1]);
      table.addSummaryRow(new Row({ columns: { label: LABEL_SUMMARY_ROW, visits: 9 } }));
      table.addRow(new Row({ columns: { label: 'b', visits: 2 } }));

      expect(labelsOf(table)).toEqual(['a', 'b', -1]);
      expect(table.getRowEntries().map(([id]) => id)).toEqual([0, 1, ID_SUMMARY_ROW]);
      expect(table.getLastRow()).toBe(table.getSummaryRow());
      expect(table.getRowsCountWithoutSummaryRow()).toBe(2);
      expect(table.getRowsCount()).toBe(3);
    });

    it('should return the summary row as first and last row when it is alone', () => {
      const table = new DataTable();
      const summary = table.addSummaryRow(new Row({ columns: { label: LABEL_SUMMARY_ROW } }));
      expect(table.getFirstRow()).toBe(summary);
      expect(table.getLastRow()).toBe(summary);
      expect(table.getRowFromId(ID_SUMMARY_ROW)).toBe(summary);
    });

    it('should throw UnknownRowError when deleting an unknown id', () => {
      const table = tableOf(['a', 1]);
      expect(() => table.deleteRow(99)).toThrow(UnknownRowError);
      expect(table.getRowsCount()).toBe(1);
    });

    it('should delete the summary row by its id', () => {
      const table = tableOf(['a', 1]);
      table.addSummaryRow(new Row({ columns: { label: LABEL_SUMMARY_ROW } }));
      table.deleteRow(ID_SUMMARY_ROW);
      expect(table.getSummaryRow()).toBeNull();
      expect(table.getRowsCount()).toBe(1);
    });

    it('should delete several rows', () => {
      const table = tableOf(['a', 1], ['b', 2], ['c', 3]);
      table.deleteRows([0, 2]);
      expect(labelsOf(table)).toEqual(['b']);
    });
  });

  describe('deleteRowsOffset', () => {
    function withSummary(): DataTable {
      const table = tableOf(['a', 1], ['b', 2], ['c', 3], ['d', 4]);
      table.addSummaryRow(new Row({ columns: { label: LABEL_SUMMARY_ROW, visits: 10 } }));
      return table;
    }

    it('should delete a slice and renumber the rest', () => {
      const table = withSummary();
      expect(table.deleteRowsOffset(1, 2)).toBe(2);
      expect(labelsOf(table)).toEqual(['a', 'd', -1]);
      expect(table.getRowEntries().map(([id]) => id)).toEqual([0, 1, ID_SUMMARY_ROW]);
    });

    it('should drop the summary row when deleting through the end', () => {
      const table = withSummary();
      expect(table.deleteRowsOffset(2)).toBe(2);
      expect(labelsOf(table)).toEqual(['a', 'b']);
      expect(table.getSummaryRow()).toBeNull();
    });

    it('should do nothing past the end or with a zero limit', () => {
      const table = withSummary();
      expect(table.deleteRowsOffset(10)).toBe(0);
      expect(table.deleteRowsOffset(0, 0)).toBe(0);
      expect(table.getRowsCount()).toBe(5);
    });

    it('should append after the renumbered rows', () => {
      const table = withSummary();
      table.deleteRowsOffset(0, 3);
      table.addRow(new Row({ columns: { label: 'e', visits: 5 } }));
      expect(table.getRowEntries().map(([id]) => id)).toEqual([0, 1, ID_SUMMARY_ROW]);
      expect(labelsOf(table)).toEqual(['d', 'e', -1]);
    });
  });

  // ============ LABEL INDEX ============

  describe('label lookup', () => {
    it('should find rows by label', () => {
      const table = tableOf(['a', 1], ['b', 2]);
      expect(table.getRowIdFromLabel('b')).toBe(1);
      expect(table.getRowFromLabel('a')?.getColumn('visits')).toBe(1);
      expect(table.getRowIdFromLabel('zzz')).toBeNull();
    });

    it('should resolve duplicate labels to the last row', () => {
      const table = tableOf(['a', 1], ['a', 2]);
      expect(table.getRowIdFromLabel('a')).toBe(1);

      table.addRow(new Row({ columns: { label: 'a', visits: 3 } }));
      expect(table.getRowIdFromLabel('a')).toBe(2);
    });

    it('should see rows appended after the first lookup', () => {
      const table = tableOf(['a', 1]);
      expect(table.getRowIdFromLabel('b')).toBeNull();
      table.addRow(new Row({ columns: { label: 'b', visits: 2 } }));
      expect(table.getRowIdFromLabel('b')).toBe(1);
    });

    it('should resolve the summary label to the summary row', () => {
      const table = tableOf(['a', 1]);
      expect(table.getRowIdFromLabel(LABEL_SUMMARY_ROW)).toBeNull();

      table.addSummaryRow(new Row({ columns: { label: LABEL_SUMMARY_ROW, visits: 3 } }));
      expect(table.getRowIdFromLabel(LABEL_SUMMARY_ROW)).toBe(ID_SUMMARY_ROW);
    });

    it('should forget deleted rows', () => {
      const table = tableOf(['a', 1], ['b', 2]);
      expect(table.getRowIdFromLabel('a')).toBe(0);
      table.deleteRow(0);
      expect(table.getRowIdFromLabel('a')).toBeNull();
      expect(table.getRowIdFromLabel('b')).toBe(1);
    });

    it('should tell null and boolean labels from their string forms', () => {
      const table = new DataTable();
      table.addRow(new Row({ columns: { label: null } }));
      table.addRow(new Row({ columns: { label: 'null' } }));
      table.addRow(new Row({ columns: { label: true } }));
      table.addRow(new Row({ columns: { label: 2013 } }));

      expect(table.getRowIdFromLabel(null)).toBe(0);
      expect(table.getRowIdFromLabel('null')).toBe(1);
      expect(table.getRowIdFromLabel(true)).toBe(2);
      expect(table.getRowIdFromLabel('true')).toBeNull();
      expect(table.getRowIdFromLabel('2013')).toBe(3);
    });

    it('should follow labels changed in place once invalidated', () => {
      const table = tableOf(['a', 1]);
      expect(table.getRowIdFromLabel('a')).toBe(0);
      table.getRowFromId(0)?.setColumn('label', 'z');
      table.invalidateLabelIndex();
      expect(table.getRowIdFromLabel('z')).toBe(0);
      expect(table.getRowIdFromLabel('a')).toBeNull();
    });
  });

  // ============ ROW LIMIT ============

  describe('row limit', () => {
    it('should fold rows past the limit into the summary row', () => {
      const table = new DataTable({ maxAllowedRows: 3 });
      for (let visits = 1; visits <= 6; visits++) {
        table.addRow(new Row({ columns: { label: `r${visits}`, visits } }));
      }

      expect(table.getRowsCount()).toBe(3);
      expect(labelsOf(table)).toEqual(['r1', 'r2', LABEL_SUMMARY_ROW]);
      expect(table.getSummaryRow()?.getColumn('visits')).toBe(18);
    });

    it('should make every row part of the summary with a limit of 1', () => {
      const table = new DataTable({ maxAllowedRows: 1 });
      table.addRow(new Row({ columns: { label: 'a', visits: 2 } }));
      table.addRow(new Row({ columns: { label: 'b', visits: 5 } }));

      expect(table.getRowsCount()).toBe(1);
      expect(table.getSummaryRow()?.getColumns()).toEqual({ label: -1, visits: 7 });
    });

    it('should return the row that now holds the data', () => {
      const table = new DataTable({ maxAllowedRows: 2 });
      const kept = new Row({ columns: { label: 'a', visits: 10 } });
      expect(table.addRow(kept)).toBe(kept);
      const folded = table.addRow(new Row({ columns: { label: 'b', visits: 5 } }));
      expect(folded).toBe(table.getSummaryRow());
    });

    it('should not copy metadata into the summary row', () => {
      const table = new DataTable({ maxAllowedRows: 2 });
      table.addRow(new Row({ columns: { label: 'a', visits: 10 } }));
      table.addRow(new Row({ columns: { label: 'b', visits: 5 }, metadata: { url: 'b' } }));
      table.addRow(new Row({ columns: { label: 'c', visits: 7 }, metadata: { url: 'c' } }));

      expect(table.getSummaryRow()?.getAllMetadata()).toEqual({});
      expect(table.getSummaryRow()?.getColumn('visits')).toBe(12);
    });

    it('should apply a limit set after construction', () => {
      const table = new DataTable();
      table.setMaximumAllowedRows(2);
      table.addRowsFromArray([
        { columns: { label: 'a', visits: 10 } },
        { columns: { label: 'b', visits: 5 } },
        { columns: { label: 'c', visits: 7 } },
      ]);
      expect(labelsOf(table)).toEqual(['a', LABEL_SUMMARY_ROW]);
    });
  });

  // ============ MERGING ============

  describe('addDataTable', () => {
    it('should copy rows with new labels', () => {
      const total = DataTable.makeFromIndexedArray({ a: { visits: 1 } });
      total.addDataTable(DataTable.makeFromIndexedArray({ b: { visits: 2 } }));

      expect(labelsOf(total)).toEqual(['a', 'b']);
      expect(total.getRowFromLabel('b')?.getColumn('visits')).toBe(2);
    });

    it('should sum rows with the same label', () => {
      const total = DataTable.makeFromIndexedArray({ a: { visits: 1, hits: 3 } });
      total.addDataTable(DataTable.makeFromIndexedArray({ a: { visits: 2, conversions: 1 } }));

      expect(total.getRowsCount()).toBe(1);
      expect(total.getRowFromLabel('a')?.getColumns()).toEqual({ label: 'a', visits: 3, hits: 3, conversions: 1 });
    });

    it('should not share copied rows with the source table', () => {
      const source = DataTable.makeFromIndexedArray({ a: { visits: 1 } });
      const total = new DataTable();
      total.addDataTable(source);
      total.addDataTable(source);

      expect(total.getRowFromLabel('a')?.getColumn('visits')).toBe(2);
      expect(source.getRowFromLabel('a')?.getColumn('visits')).toBe(1);
    });

    it('should use the configured aggregation operators', () => {
      const total = new DataTable({ columnAggregationOps: { max_actions: 'max' } });
      total.addDataTable(DataTable.makeFromIndexedArray({ a: { visits: 1, max_actions: 5 } }));
      total.addDataTable(DataTable.makeFromIndexedArray({ a: { visits: 2, max_actions: 3 } }));

      expect(total.getRowFromLabel('a')?.getColumns()).toEqual({ label: 'a', visits: 3, max_actions: 5 });
    });

    it('should sum summary rows together', () => {
      const day1 = tableOf(['a', 1]);
      day1.addSummaryRow(new Row({ columns: { label: LABEL_SUMMARY_ROW, visits: 5 } }));
      const day2 = tableOf(['a', 2]);
      day2.addSummaryRow(new Row({ columns: { label: LABEL_SUMMARY_ROW, visits: 3 } }));

      const total = new DataTable();
      total.addDataTable(day1);
      total.addDataTable(day2);

      expect(total.getRowsCount()).toBe(2);
      expect(total.getSummaryRow()?.getColumn('visits')).toBe(8);
      expect(total.getRowFromLabel('a')?.getColumn('visits')).toBe(3);
    });

    it('should merge sub-tables into a copy owned by the receiving row', () => {
      const keywords1 = DataTable.makeFromIndexedArray({ x: { visits: 1 }, y: { visits: 2 } });
      const day1 = DataTable.makeFromIndexedArray({ google: { visits: 3 } }, { google: keywords1 });
      const keywords2 = DataTable.makeFromIndexedArray({ y: { visits: 4 } });
      const day2 = DataTable.makeFromIndexedArray({ google: { visits: 4 } }, { google: keywords2 });

      const total = new DataTable();
      total.addDataTable(day1);
      total.addDataTable(day2);

      const merged = total.getRowFromLabel('google')?.getSubtable();
      expect(merged).not.toBe(keywords1);
      expect(merged?.getRowFromLabel('x')?.getColumn('visits')).toBe(1);
      expect(merged?.getRowFromLabel('y')?.getColumn('visits')).toBe(6);
      expect(keywords1.getRowFromLabel('y')?.getColumn('visits')).toBe(2);
    });

    it('should fold new rows into the summary row of a full table', () => {
      const total = new DataTable({ maxAllowedRows: 2 });
      total.addDataTable(tableOf(['a', 10], ['b', 5], ['c', 7]));
      expect(labelsOf(total)).toEqual(['a', LABEL_SUMMARY_ROW]);
      expect(total.getSummaryRow()?.getColumn('visits')).toBe(12);
    });
  });

  describe('mergeSubtables', () => {
    function tree(): DataTable {
      const subA = tableOf(['x', 1], ['y', 2]);
      subA.addSummaryRow(new Row({ columns: { label: LABEL_SUMMARY_ROW, visits: 2 } }));
      const subB = tableOf(['x', 3]);
      subB.addSummaryRow(new Row({ columns: { label: LABEL_SUMMARY_ROW, visits: 4 } }));

      const root = new DataTable();
      root.addRowsFromArray([
        { columns: { label: 'A', visits: 3 }, subtable: subA },
        { columns: { label: 'B', visits: 3 }, subtable: subB },
        { columns: { label: 'C', visits: 1 } },
      ]);
      return root;
    }

    it('should collect every sub-table row and sum their summary rows', () => {
      const merged = tree().mergeSubtables();
      expect(labelsOf(merged)).toEqual(['x', 'y', 'x', LABEL_SUMMARY_ROW]);
      expect(merged.getColumn('visits')).toEqual([1, 2, 3, 6]);
    });

    it('should prefix labels with the parent label', () => {
      const merged = tree().mergeSubtables('label');
      expect(labelsOf(merged)).toEqual(['A - x', 'A - y', 'B - x', LABEL_SUMMARY_ROW]);
    });

    it('should record the parent label in a column', () => {
      const merged = tree().mergeSubtables('parent');
      expect(merged.getColumn('parent')).toEqual(['A', 'A', 'B', undefined]);
    });

    it('should record the parent label in metadata', () => {
      const merged = tree().mergeSubtables('parent', true);
      expect(merged.getRowsMetadata('parent')).toEqual(['A', 'A', 'B', undefined]);
      expect(merged.getColumn('parent')).toEqual([undefined, undefined, undefined, undefined]);
    });
  });

  // ============ COLUMNS ============

  describe('columns', () => {
    it('should read column values across rows', () => {
      const table = new DataTable();
      table.addRowsFromArray([
        { columns: { label: 'a', nb_visits: 1, nb_hits: 2 } },
        { columns: { label: 'b', nb_visits: 3 } },
      ]);

      expect(table.getColumns()).toEqual(['label', 'nb_visits', 'nb_hits']);
      expect(table.getColumn('nb_hits')).toEqual([2, undefined]);
      expect(table.getColumnsStartingWith('nb_')).toEqual([1, 2, 3]);
    });

    it('should count rows of every sub-table', () => {
      const leaf = tableOf(['z', 1]);
      const sub = new DataTable();
      sub.addRowsFromArray([{ columns: { label: 'x' }, subtable: leaf }, { columns: { label: 'y' } }]);
      const root = new DataTable();
      root.addRowsFromArray([{ columns: { label: 'a' }, subtable: sub }, { columns: { label: 'b' } }]);

      expect(root.getRowsCountRecursive()).toBe(5);
    });

    it('should rename columns in sub-tables too', () => {
      const sub = tableOf(['x', 1]);
      const root = new DataTable();
      root.addRowFromArray({ columns: { label: 'a', visits: 2 }, subtable: sub });

      root.renameColumn('visits', 'nb_visits');

      expect(root.getColumns()).toEqual(['label', 'nb_visits']);
      expect(sub.getColumns()).toEqual(['label', 'nb_visits']);
    });

    it('should delete columns in sub-tables only when asked to', () => {
      const sub = tableOf(['x', 1]);
      const root = new DataTable();
      root.addRowFromArray({ columns: { label: 'a', visits: 2 }, subtable: sub });

      root.deleteColumns(['visits']);
      expect(root.getColumns()).toEqual(['label']);
      expect(sub.getColumns()).toEqual(['label', 'visits']);

      root.deleteColumns(['visits'], true);
      expect(sub.getColumns()).toEqual(['label']);
    });

    it('should find the row owning a sub-table', () => {
      const sub = new DataTable();
      const root = new DataTable();
      root.addRowsFromArray([{ columns: { label: 'a' } }, { columns: { label: 'b' }, subtable: sub }]);

      expect(root.getRowFromIdSubDataTable(sub.getId())?.getColumn('label')).toBe('b');
      expect(root.getRowFromIdSubDataTable(sub.getId() + 1000)).toBeNull();
    });
  });

  // ============ SORTING ============

  describe('sort', () => {
    const byVisits = (a: Row, b: Row): number => Number(a.getColumn('visits')) - Number(b.getColumn('visits'));

    it('should sort rows, renumber them and leave the summary row last', () => {
      const table = tableOf(['a', 3], ['b', 1], ['c', 2]);
      table.addSummaryRow(new Row({ columns: { label: LABEL_SUMMARY_ROW, visits: 0 } }));

      table.sort(byVisits, 'visits');

      expect(labelsOf(table)).toEqual(['b', 'c', 'a', LABEL_SUMMARY_ROW]);
      expect(table.getRowEntries().map(([id]) => id)).toEqual([0, 1, 2, ID_SUMMARY_ROW]);
      expect(table.getSortedByColumnName()).toBe('visits');
      expect(table.getRowIdFromLabel('a')).toBe(2);
    });

    it('should sort sub-tables when recursive sort is enabled', () => {
      const sub = tableOf(['x', 5], ['y', 1]);
      const root = new DataTable();
      root.addRowFromArray({ columns: { label: 'a', visits: 1 }, subtable: sub });

      root.sort(byVisits, 'visits');
      expect(labelsOf(sub)).toEqual(['x', 'y']);

      root.enableRecursiveSort();
      root.sort(byVisits, 'visits');
      expect(labelsOf(sub)).toEqual(['y', 'x']);
      expect(sub.getSortedByColumnName()).toBe('visits');
    });
  });

  // ============ PATH WALKING ============

  describe('walkPath', () => {
    it('should return the table itself for an empty path', () => {
      const table = tableOf(['a', 1]);
      const result = table.walkPath([]);
      expect(result.row).toBeNull();
      expect(result.table).toBe(table);
      expect(result.index).toBe(0);
    });

    it('should find existing rows down the tree', () => {
      const sub = tableOf(['x', 1]);
      const root = new DataTable();
      root.addRowFromArray({ columns: { label: 'a', visits: 1 }, subtable: sub });

      const result = root.walkPath(['a', 'x']);
      expect(result.row).toBe(sub.getRowFromLabel('x'));
      expect(result.table).toBe(sub);
      expect(result.index).toBe(2);
    });

    it('should report where a walk without creation stops', () => {
      const root = tableOf(['a', 1]);

      const missingRow = root.walkPath(['b']);
      expect(missingRow.row).toBeNull();
      expect(missingRow.table).toBe(root);
      expect(missingRow.index).toBe(0);

      const missingSubtable = root.walkPath(['a', 'x']);
      expect(missingSubtable.row).toBeNull();
      expect(missingSubtable.table).toBe(root);
      expect(missingSubtable.index).toBe(0);
    });

    it('should stop at the last matched label when its row has no sub-table', () => {
      const leaf = tableOf(['x', 1]);
      const root = new DataTable();
      root.addRowFromArray({ columns: { label: 'a', visits: 1 }, subtable: leaf });

      const result = root.walkPath(['a', 'x', 'y']);
      expect(result.row).toBeNull();
      expect(result.table).toBe(leaf);
      expect(result.index).toBe(1);
    });

    it('should create missing rows and sub-tables', () => {
      const root = new DataTable({ columnAggregationOps: { visits: 'max' } });
      const result = root.walkPath(['a', 'b'], { label: 'ignored', visits: 0 }, 5);

      expect(result.index).toBe(2);
      expect(result.row?.getColumns()).toEqual({ label: 'b', visits: 0 });

      const parent = root.getRowFromLabel('a');
      expect(parent?.getColumns()).toEqual({ label: 'a', visits: 0 });
      expect(parent?.getSubtable()).toBe(result.table);
      expect(result.table.getColumnAggregationOperations()).toEqual({ visits: 'max' });
    });

    it('should cap created sub-tables at the given row count', () => {
      const root = new DataTable();
      root.walkPath(['a', 'x'], { visits: 1 }, 2);
      const folded = root.walkPath(['a', 'y'], { visits: 1 }, 2);

      const sub = root.getRowFromLabel('a')?.getSubtable();
      expect(folded.row).toBe(sub?.getSummaryRow());
      expect(folded.index).toBe(1);
      expect(sub?.getSummaryRow()?.getColumns()).toEqual({ label: LABEL_SUMMARY_ROW, visits: 1 });
    });

    it('should stop at the summary row a created row was folded into', () => {
      const root = new DataTable({ maxAllowedRows: 2 });
      root.addRow(new Row({ columns: { label: 'x', visits: 1 } }));

      const result = root.walkPath(['y', 'deeper'], { visits: 1 });
      expect(result.row).toBe(root.getSummaryRow());
      expect(result.table).toBe(root);
      expect(result.index).toBe(0);
    });
  });

  // ============ COMPARISON & CLONING ============

  describe('isEqual', () => {
    it('should match rows by label regardless of order', () => {
      const a = tableOf(['x', 1], ['y', 2]);
      const b = tableOf(['y', 2], ['x', 1]);
      expect(DataTable.isEqual(a, b)).toBe(true);
    });

    it('should detect different values and counts', () => {
      const a = tableOf(['x', 1], ['y', 2]);
      expect(DataTable.isEqual(a, tableOf(['x', 1], ['y', 3]))).toBe(false);
      expect(DataTable.isEqual(a, tableOf(['x', 1]))).toBe(false);
      expect(DataTable.isEqual(a, tableOf(['x', 1], ['z', 2]))).toBe(false);
    });

    it('should compare unlabelled rows by position', () => {
      const a = DataTable.makeFromSimpleArray([3, 5]);
      expect(DataTable.isEqual(a, DataTable.makeFromSimpleArray([3, 5]))).toBe(true);
      expect(DataTable.isEqual(a, DataTable.makeFromSimpleArray([5, 3]))).toBe(false);
    });
  });

  describe('getEmptyClone', () => {
    it('should copy metadata, operators and queued filters', () => {
      const table = new DataTable({ metadata: { period: 'day' }, columnAggregationOps: { visits: 'max' } });
      table.addRow(new Row({ columns: { label: 'a' } }));
      table.queueFilter('Limit', [0, 1]);

      const clone = table.getEmptyClone();
      expect(clone.getRowsCount()).toBe(0);
      expect(clone.getAllTableMetadata()).toEqual({ period: 'day' });
      expect(clone.getColumnAggregationOperations()).toEqual({ visits: 'max' });
      expect(clone.getQueuedFilterCount()).toBe(1);
      expect(table.getEmptyClone(false).getQueuedFilterCount()).toBe(0);

      clone.setMetadata('period', 'week');
      expect(table.getMetadata('period')).toBe('day');
    });
  });

  // ============ LOADING ============

  describe('loading rows', () => {
    it('should load a map with the summary row under -1', () => {
      const table = new DataTable();
      table.addRowsFromArray(
        new Map<number, RowSpec>([
          [0, { columns: { label: 'a', visits: 1 } }],
          [ID_SUMMARY_ROW, { columns: { label: LABEL_SUMMARY_ROW, visits: 3 } }],
          [1, { columns: { label: 'b', visits: 2 } }],
        ]),
      );

      expect(labelsOf(table)).toEqual(['a', 'b', LABEL_SUMMARY_ROW]);
      expect(table.getSummaryRow()?.getColumn('visits')).toBe(3);
    });

    it('should load a record keyed by row id', () => {
      const table = new DataTable();
      table.addRowsFromArray({
        '0': { columns: { label: 'a' } },
        '-1': { columns: { label: LABEL_SUMMARY_ROW } },
      });
      expect(table.getRowsCountWithoutSummaryRow()).toBe(1);
      expect(table.getSummaryRow()).not.toBeNull();
    });

    it('should accept ready rows', () => {
      const row = new Row({ columns: { label: 'a' } });
      const table = new DataTable();
      table.addRowsFromArray([row]);
      expect(table.getFirstRow()).toBe(row);
    });

    it('should build rows from indexed arrays', () => {
      const sub = new DataTable();
      const table = DataTable.makeFromIndexedArray({ Firefox: 155, Chrome: { visits: 90 } }, { Firefox: sub });

      expect(table.getRows().map(row => row.getColumns())).toEqual([
        { label: 'Firefox', value: 155 },
        { label: 'Chrome', visits: 90 },
      ]);
      expect(table.getRowFromLabel('Firefox')?.getSubtable()).toBe(sub);
    });

    it('should put the label first in rows built from indexed arrays', () => {
      const table = DataTable.makeFromIndexedArray({ Firefox: { '2013': 5, '2014': 7 } });
      expect(table.getColumns()).toEqual(['label', '2013', '2014']);
    });

    it('should build rows from simple arrays', () => {
      expect(DataTable.makeFromSimpleArray([{ a: 1, b: 2 }, { a: 3, b: 4 }]).getColumn('b')).toEqual([2, 4]);
      expect(DataTable.makeFromSimpleArray({ name: 'x', visits: 3 }).getFirstRow()?.getColumns()).toEqual({
        name: 'x',
        visits: 3,
      });
      expect(DataTable.makeFromSimpleArray([3, 5]).getColumn('0')).toEqual([3, 5]);

      const table = new DataTable();
      table.addRowFromSimpleArray({ a: 1 });
      expect(table.getFirstRow()?.getColumns()).toEqual({ a: 1 });
    });

    it('should add no row when a simple array cannot be converted', () => {
      const table = tableOf(['a', 1]);
      expect(() => table.addRowsFromSimpleArray([{ a: 1 }, { b: { c: 1 } }])).toThrow(ConversionError);
      expect(table.getRowsCount()).toBe(1);
    });
  });

  // ============ FILTERS ============

  describe('filter callbacks and queue', () => {
    it('should call a callback with the table and parameters', () => {
      const table = tableOf(['a', 1]);
      table.filter((t: DataTable, column: string) => t.deleteColumn(column), ['visits']);
      expect(table.getColumns()).toEqual(['label']);
    });

    it('should apply queued filters in order, once', () => {
      const table = new DataTable();
      const order: number[] = [];
      const record = (_t: DataTable, n: number): void => {
        order.push(n);
      };
      table.queueFilter(record, [1]);
      table.queueFilter(record, [2]);
      expect(table.getQueuedFilterCount()).toBe(2);

      table.applyQueuedFilters();
      table.applyQueuedFilters();

      expect(order).toEqual([1, 2]);
      expect(table.getQueuedFilterCount()).toBe(0);
    });

    it('should keep filters queued while applying for the next call', () => {
      const table = new DataTable();
      table.queueFilter((t: DataTable) => t.queueFilter('Limit', [0, 1]));

      table.applyQueuedFilters();
      expect(table.getQueuedFilterCount()).toBe(1);
    });

    it('should report the current count when no limit ran', () => {
      const table = tableOf(['a', 1], ['b', 2]);
      expect(table.getRowsCountBeforeLimitFilter()).toBe(2);
    });
  });

  // ============ RENDERING ============

  describe('toString', () => {
    it('should render an empty table', () => {
      expect(new DataTable().toString()).toBe('Empty table\n');
    });

    it('should render rows, metadata, sub-tables and the summary row', () => {
      const sub = tableOf(['x', 2]);
      const table = new DataTable();
      table.addRowFromArray({ columns: { label: 'a', visits: 1 }, metadata: { url: 'u' }, subtable: sub });
      table.addSummaryRow(new Row({ columns: { label: LABEL_SUMMARY_ROW, visits: 3 } }));

      expect(table.toString()).toBe(
        `- 0 {label: "a", visits: 1} {url: "u"} [subtable ${sub.getId()}]\n` +
          '*- 0 {label: "x", visits: 2} {}\n' +
          '- -1 {label: -1, visits: 3} {}\n',
      );
    });
  });
});

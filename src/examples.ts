/**
 * DataTable Examples - Building, Merging and Storing Reports
 *
 * These examples show the typical life of a report: rows are loaded,
 * reports for several days are summed into one, the result is limited,
 * filtered and serialized for storage.
 */

import { DataTable } from './core/DataTable';
import { Row } from './core/Row';
import type { SerializedTables } from './core/types';

// ============================================================
// EXAMPLE 1: Merging daily reports
// ============================================================

/**
 * Two days of "search engines" reports, each engine with its keywords,
 * summed into a single report. `max_actions` keeps the highest value
 * instead of adding.
 */
export function mergeExample() {
  console.log('=== Example 1: Merging daily reports ===\n');

  const mondayKeywords = DataTable.makeFromIndexedArray({
    'report tool': { visits: 6 },
    datatable: { visits: 4 },
  });
  const monday = DataTable.makeFromIndexedArray(
    {
      Google: { visits: 10, bounces: 4, max_actions: 5 },
      Bing: { visits: 4, bounces: 1, max_actions: 2 },
    },
    { Google: mondayKeywords },
  );

  const tuesdayKeywords = DataTable.makeFromIndexedArray({
    datatable: { visits: 5 },
    pivot: { visits: 2 },
  });
  const tuesday = DataTable.makeFromIndexedArray(
    {
      Google: { visits: 7, bounces: 2, max_actions: 8 },
      DuckDuckGo: { visits: 3, bounces: 0, max_actions: 1 },
    },
    { Google: tuesdayKeywords },
  );

  const total = new DataTable({ columnAggregationOps: { max_actions: 'max' } });
  total.addDataTable(monday);
  total.addDataTable(tuesday);

  console.log('Total:');
  console.log(total.toString());

  return { monday, tuesday, total };
}

// ============================================================
// EXAMPLE 2: Row limit and summary row
// ============================================================

/**
 * A table capped at 3 rows: the first two rows are kept, every later row
 * is summed into the summary row, which is then relabelled "Others".
 */
export function rowLimitExample() {
  console.log('=== Example 2: Row limit ===\n');

  const browsers = new DataTable({ maxAllowedRows: 3 });
  const visits: Array<[string, number]> = [
    ['Firefox', 50],
    ['Chrome', 40],
    ['Safari', 20],
    ['Edge', 10],
    ['Opera', 5],
  ];
  for (const [label, count] of visits) {
    browsers.addRow(new Row({ columns: { label, visits: count } }));
  }

  browsers.filter('ReplaceSummaryRowLabel', ['Others']);

  console.log(`Rows: ${browsers.getRowsCount()}`);
  console.log(browsers.toString());

  return { browsers };
}

// ============================================================
// EXAMPLE 3: Serialization round trip
// ============================================================

/**
 * A report tree is stored as one blob per table, the root under key 0,
 * then loaded back.
 */
export function serializationExample() {
  console.log('=== Example 3: Serialization ===\n');

  const keywords = DataTable.makeFromIndexedArray({ datatable: { visits: 9 }, pivot: { visits: 2 } });
  const engines = new DataTable();
  engines.addRowsFromArray([
    { columns: { label: 'Google', visits: 11 }, metadata: { url: 'https://google.example' }, subtable: keywords },
    { columns: { label: 'Bing', visits: 4 } },
  ]);

  const serialized: SerializedTables = engines.getSerialized();
  console.log(`Blobs: ${Array.from(serialized.keys()).join(', ')}`);

  const restored = DataTable.fromSerializedTree(serialized);
  console.log(restored.toString());

  return { engines, keywords, serialized, restored };
}

// ============================================================
// EXAMPLE 4: Filter pipeline
// ============================================================

/**
 * Filters applied right away, then queued ones applied at output time.
 */
export function filterPipelineExample() {
  console.log('=== Example 4: Filters ===\n');

  const pages = DataTable.makeFromIndexedArray({
    '/home': { visits: 120 },
    '/pricing': { visits: 45 },
    '/blog/a': { visits: 30 },
    '/blog/b': { visits: 12 },
    '/about': { visits: 3 },
  });

  pages.filter('Where', ['visits >= 10']);
  pages.filter('AddColumnPercentage', ['visits', 'share']);

  pages.queueFilter('Sort', ['visits', 'asc']);
  pages.queueFilter('Limit', [0, 2]);
  pages.applyQueuedFilters();

  console.log(`Rows before limit: ${pages.getRowsCountBeforeLimitFilter()}`);
  console.log(pages.toString());

  return { pages };
}

// ============================================================
// EXAMPLE 5: Building a tree with walkPath
// ============================================================

/**
 * Visits are counted per country, then per city, creating rows and
 * sub-tables on the way.
 */
export function walkPathExample() {
  console.log('=== Example 5: walkPath ===\n');

  const visitsLog: string[][] = [
    ['France', 'Paris'],
    ['France', 'Lyon'],
    ['France', 'Paris'],
    ['Japan', 'Tokyo'],
  ];

  const countries = new DataTable();
  for (const path of visitsLog) {
    for (let depth = 1; depth <= path.length; depth++) {
      const { row } = countries.walkPath(path.slice(0, depth), { visits: 0 }, 10);
      if (row) {
        const current = row.getColumn('visits');
        row.setColumn('visits', (typeof current === 'number' ? current : 0) + 1);
      }
    }
  }

  console.log(countries.toString());

  return { countries };
}

// ============================================================
// Run All Examples
// ============================================================

export function runAllExamples() {
  mergeExample();
  console.log('\n' + '─'.repeat(60) + '\n');

  rowLimitExample();
  console.log('\n' + '─'.repeat(60) + '\n');

  serializationExample();
  console.log('\n' + '─'.repeat(60) + '\n');

  filterPipelineExample();
  console.log('\n' + '─'.repeat(60) + '\n');

  walkPathExample();
}

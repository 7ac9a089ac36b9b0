/**
 * Blob codec for one table's own rows.
 *
 * A blob is a JSON object keyed by row id. Each value is a SerializedRow
 * (`{ columns, metadata?, subtableId? }`); the summary row is keyed "-1".
 * Sub-tables are never embedded, only their ids.
 *
 * Columns are written as `[name, value]` pairs so that integer-like names
 * keep their place. A plain `{ name: value }` object is still read.
 */

import type { ColumnValue, Metadata, SerializedRow } from '../core/types';
import { UnserializationError } from '../core/errors';

/**
 * Encode `(rowId, row)` pairs.
 */
export function encodeRows(rows: Iterable<[number, SerializedRow]>): string {
  const payload: Record<string, SerializedRow> = {};
  for (const [rowId, row] of rows) {
    payload[String(rowId)] = row;
  }
  return JSON.stringify(payload);
}

/**
 * Decode a blob into row id → row, in row order (summary row last).
 * @throws UnserializationError on malformed input
 */
export function decodeRows(blob: string): Map<number, SerializedRow> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(blob);
  } catch (e) {
    throw new UnserializationError(e instanceof Error ? e.message : String(e));
  }

  if (!isRecord(parsed)) {
    throw new UnserializationError('blob is not an object of rows');
  }

  const rows = new Map<number, SerializedRow>();
  let summary: SerializedRow | undefined;
  for (const [key, value] of Object.entries(parsed)) {
    const rowId = Number(key);
    if (!Number.isInteger(rowId)) {
      throw new UnserializationError(`invalid row id "${key}"`);
    }
    const row = toSerializedRow(value);
    if (!row) {
      throw new UnserializationError(`invalid row at id ${key}`);
    }
    if (rowId === -1) {
      summary = row;
    } else {
      rows.set(rowId, row);
    }
  }
  if (summary) {
    rows.set(-1, summary);
  }
  return rows;
}

// ============ GUARDS ============

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isColumnValue(value: unknown): value is ColumnValue {
  return value === null || typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean';
}

function toColumns(value: unknown): Array<[string, ColumnValue]> | null {
  let pairs: unknown[];
  if (Array.isArray(value)) {
    pairs = value;
  } else if (isRecord(value)) {
    pairs = Object.entries(value);
  } else {
    return null;
  }
  const columns: Array<[string, ColumnValue]> = [];
  for (const pair of pairs) {
    if (!Array.isArray(pair) || pair.length !== 2) {
      return null;
    }
    const [name, cell]: unknown[] = pair;
    if (typeof name !== 'string' || !isColumnValue(cell)) {
      return null;
    }
    columns.push([name, cell]);
  }
  return columns;
}

function toSerializedRow(value: unknown): SerializedRow | null {
  if (!isRecord(value)) {
    return null;
  }
  const columns = toColumns(value.columns);
  if (!columns) {
    return null;
  }
  const row: SerializedRow = { columns };

  if (value.metadata !== undefined) {
    if (!isRecord(value.metadata)) {
      return null;
    }
    const metadata: Metadata = value.metadata;
    row.metadata = metadata;
  }
  if (value.subtableId !== undefined) {
    if (typeof value.subtableId !== 'number' || !Number.isInteger(value.subtableId)) {
      return null;
    }
    row.subtableId = value.subtableId;
  }
  return row;
}

/**
 * Converters from "simple" JavaScript structures to row descriptions.
 *
 * Two shapes are understood:
 *
 * 1. Simple arrays (`simpleArrayToRows`)
 *    - a flat record `{ name: 'x', visits: 3 }` → one row with those columns
 *    - a flat list `[3, 5]` → one row per value, in column "0"
 *    - a list of flat records/lists → one row per entry
 *    - a record mixing scalars and nested values → scalars become one-column rows,
 *      nested values under numeric keys become rows
 *
 * 2. Indexed arrays (`indexedArrayToRows`)
 *    - `{ Firefox: 155 }` → `{ label: 'Firefox', value: 155 }`
 *    - `{ Firefox: { visits: 155 } }` → `{ label: 'Firefox', visits: 155 }`
 *
 * Anything that cannot be mapped without losing information throws
 * ConversionError.
 */

import type { ColumnValue, RowSpec } from '../core/types';
import { LABEL_COLUMN } from '../core/types';
import { ConversionError } from '../core/errors';
import { isColumnValue, isRecord } from './serialization';

export type SimpleArray = readonly unknown[] | Readonly<Record<string, unknown>>;

type ColumnPairs = Array<[string, ColumnValue]>;

const NUMERIC_KEY = /^(0|[1-9]\d*)$/;

function isNested(value: unknown): boolean {
  return typeof value === 'object' && value !== null;
}

function entriesOf(input: SimpleArray): Array<[string, unknown]> {
  if (Array.isArray(input)) {
    return input.map((value, index): [string, unknown] => [String(index), value]);
  }
  return Object.entries(input);
}

function cell(value: unknown, key: string): ColumnValue {
  if (!isColumnValue(value)) {
    throw new ConversionError(`Value at "${key}" is not a scalar`, { key });
  }
  return value;
}

function flatColumns(value: unknown, key: string): ColumnPairs {
  if (!Array.isArray(value) && !isRecord(value)) {
    throw new ConversionError(`Value at "${key}" is not a row`, { key });
  }
  return entriesOf(value).map(([name, nested]): [string, ColumnValue] => {
    if (isNested(nested)) {
      throw new ConversionError(`Row "${key}" contains a nested structure at "${name}"`, { key, column: name });
    }
    return [name, cell(nested, `${key}.${name}`)];
  });
}

/**
 * @throws ConversionError when the structure cannot be mapped losslessly
 */
export function simpleArrayToRows(input: SimpleArray): RowSpec[] {
  const entries = entriesOf(input);
  if (entries.length === 0) {
    return [];
  }

  const hasNested = entries.some(([, value]) => isNested(value));
  if (!hasNested) {
    if (Array.isArray(input)) {
      return entries.map(([key, value]): RowSpec => ({ columns: [['0', cell(value, key)]] }));
    }
    return [{ columns: entries.map(([key, value]): [string, ColumnValue] => [key, cell(value, key)]) }];
  }

  return entries.map(([key, value]): RowSpec => {
    if (isNested(value)) {
      // a string key carries information we would lose
      if (!NUMERIC_KEY.test(key)) {
        throw new ConversionError(`Cannot convert row under non-numeric key "${key}"`, { key });
      }
      return { columns: flatColumns(value, key) };
    }
    return { columns: [[key, cell(value, key)]] };
  });
}

/**
 * Label-keyed input → rows with `label` as the first column.
 * @throws ConversionError when a row value is neither a scalar nor a flat record
 */
export function indexedArrayToRows(input: Readonly<Record<string, unknown>>): Array<{ label: string; columns: ColumnPairs }> {
  return Object.entries(input).map(([label, value]): { label: string; columns: ColumnPairs } => {
    if (!isNested(value)) {
      return { label, columns: [[LABEL_COLUMN, label], ['value', cell(value, label)]] };
    }
    return { label, columns: [[LABEL_COLUMN, label], ...flatColumns(value, label)] };
  });
}

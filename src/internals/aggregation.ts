/**
 * Column Aggregation Operators
 * =============================
 *
 * When two rows describe the same entity (same label), their columns are
 * combined column by column. The operator used for a column is looked up in
 * the table's aggregation operations and defaults to `sum`.
 *
 * ## Built-in operators
 *
 * | name | behaviour                                                       |
 * |------|-----------------------------------------------------------------|
 * | sum  | numeric addition; non-numeric values keep the current value     |
 * | min  | smaller of the two; an empty current value takes the incoming   |
 * | max  | larger of the two; an empty current value takes the incoming    |
 *
 * Custom operators are plain functions, either passed directly or registered
 * by name with `registerAggregationOperation`.
 */

import type { AggregationFunction, AggregationOperation, ColumnValue } from '../core/types';
import { ErrorCode, LookupError } from '../core/errors';

export const DEFAULT_AGGREGATION = 'sum';

/**
 * Numeric view of a cell: numbers and numeric strings convert, anything else is null.
 */
export function toNumber(value: ColumnValue | undefined): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/** Empty values are replaced outright by min/max */
function isEmpty(value: ColumnValue): boolean {
  return value === null || value === 0 || value === '' || value === false || value === '0';
}

const sum: AggregationFunction = (current, incoming) => {
  const a = toNumber(current);
  const b = toNumber(incoming);
  if (a === null || b === null) {
    if (current === null) return incoming;
    return current;
  }
  return a + b;
};

function extremum(pick: (a: number, b: number) => number): AggregationFunction {
  return (current, incoming) => {
    if (isEmpty(current)) return incoming;
    const a = toNumber(current);
    const b = toNumber(incoming);
    if (a === null || b === null) return current;
    return pick(a, b);
  };
}

const operations = new Map<string, AggregationFunction>([
  ['sum', sum],
  ['min', extremum(Math.min)],
  ['max', extremum(Math.max)],
]);

/**
 * Register a named operator usable in `setColumnAggregationOperation`.
 * Names are case-insensitive; registering an existing name replaces it.
 */
export function registerAggregationOperation(name: string, fn: AggregationFunction): void {
  operations.set(name.toLowerCase(), fn);
}

/** True if a named operator exists */
export function hasAggregationOperation(name: string): boolean {
  return operations.has(name.toLowerCase());
}

/**
 * Turn an operator (name or function) into a function.
 * @throws LookupError for an unknown name
 */
export function resolveAggregation(operation: AggregationOperation | undefined): AggregationFunction {
  if (operation === undefined) {
    return sum;
  }
  if (typeof operation === 'function') {
    return operation;
  }
  const fn = operations.get(operation.toLowerCase());
  if (!fn) {
    throw new LookupError(
      `Unknown aggregation operation "${operation}"`,
      ErrorCode.AGGREGATION_NOT_FOUND,
      { operation },
    );
  }
  return fn;
}

/**
 * Positional filter parameters, validated at instantiation.
 */

import type { ColumnValue } from '../core/types';
import { InvalidFilterParameterError } from '../core/errors';
import { isColumnValue, isRecord } from '../internals/serialization';

export type FilterCallbackParameter = (...args: never[]) => unknown;

type Callable = (...args: unknown[]) => unknown;

function isCallable(value: unknown): value is Callable {
  return typeof value === 'function';
}

export class FilterParams {
  constructor(
    private readonly filter: string,
    private readonly params: readonly unknown[],
  ) {}

  private fail(index: number, expected: string): never {
    throw new InvalidFilterParameterError(
      this.filter,
      `parameter #${index} must be ${expected} (got ${JSON.stringify(this.params[index]) ?? typeof this.params[index]})`,
    );
  }

  private isMissing(index: number): boolean {
    return this.params[index] === undefined || this.params[index] === null;
  }

  string(index: number): string {
    const value = this.params[index];
    return typeof value === 'string' ? value : this.fail(index, 'a string');
  }

  optionalString(index: number): string | undefined {
    return this.isMissing(index) ? undefined : this.string(index);
  }

  number(index: number): number {
    const value = this.params[index];
    return typeof value === 'number' && !Number.isNaN(value) ? value : this.fail(index, 'a number');
  }

  numberOr(index: number, fallback: number): number {
    return this.isMissing(index) ? fallback : this.number(index);
  }

  optionalNumber(index: number): number | undefined {
    return this.isMissing(index) ? undefined : this.number(index);
  }

  booleanOr(index: number, fallback: boolean): boolean {
    if (this.isMissing(index)) return fallback;
    const value = this.params[index];
    return typeof value === 'boolean' ? value : this.fail(index, 'a boolean');
  }

  columnValueOr(index: number, fallback: ColumnValue): ColumnValue {
    if (this.params[index] === undefined) return fallback;
    const value = this.params[index];
    return isColumnValue(value) ? value : this.fail(index, 'a scalar');
  }

  oneOf<T extends string>(index: number, allowed: readonly T[], fallback: T): T {
    if (this.isMissing(index)) return fallback;
    const value = this.params[index];
    const match = allowed.find(option => option === value);
    return match ?? this.fail(index, `one of ${allowed.join(', ')}`);
  }

  /** A single column name or a list of them */
  stringList(index: number): string[] {
    const value = this.params[index];
    if (typeof value === 'string') return [value];
    if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
      return value;
    }
    return this.fail(index, 'a string or a list of strings');
  }

  stringListOr(index: number, fallback: string[]): string[] {
    return this.isMissing(index) ? fallback : this.stringList(index);
  }

  stringRecord(index: number): Record<string, string> {
    const value = this.params[index];
    if (!isRecord(value)) return this.fail(index, 'a mapping of strings');
    const record: Record<string, string> = {};
    for (const [key, item] of Object.entries(value)) {
      if (typeof item !== 'string') return this.fail(index, 'a mapping of strings');
      record[key] = item;
    }
    return record;
  }

  /** A string that compiles as a regular expression */
  pattern(index: number): string {
    const source = this.string(index);
    try {
      new RegExp(source);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return this.fail(index, `a valid regular expression (${reason})`);
    }
    return source;
  }

  nonNegativeInteger(index: number): number {
    const value = this.number(index);
    return Number.isInteger(value) && value >= 0 ? value : this.fail(index, 'a non-negative integer');
  }

  callback(index: number): Callable {
    const value = this.params[index];
    return isCallable(value) ? value : this.fail(index, 'a function');
  }

  listOr(index: number, fallback: unknown[]): unknown[] {
    if (this.isMissing(index)) return fallback;
    const value = this.params[index];
    return Array.isArray(value) ? value : this.fail(index, 'a list');
  }
}

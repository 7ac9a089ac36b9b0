/**
 * SQL WHERE filter
 * ================
 *
 * Keeps the rows for which a SQL boolean expression holds. The expression is
 * parsed once with node-sql-parser (MySQL dialect) and compiled into a
 * predicate over row columns.
 *
 * ```ts
 * table.filter('Where', ["visits >= 10 AND label LIKE 'goo%'"]);
 * ```
 *
 * Supported: comparisons (`= != <> < <= > >=`), arithmetic (`+ - * / %`),
 * `AND` / `OR` / `NOT`, `[NOT] LIKE`, `[NOT] IN (...)`, `[NOT] BETWEEN`,
 * `IS [NOT] NULL`, and number, string, boolean and NULL literals.
 *
 * A column missing from a row reads as NULL, and any comparison involving
 * NULL is false.
 *
 * @module
 */

import pkg from 'node-sql-parser';
const { Parser } = pkg;

import type { DataTable } from '../core/DataTable';
import type { Row } from '../core/Row';
import type { ColumnValue } from '../core/types';
import { InvalidFilterParameterError } from '../core/errors';
import { debugLog } from '../core/config';
import { toNumber } from '../internals/aggregation';
import { isRecord } from '../internals/serialization';
import { Filter } from '../filters/Filter';

type SqlValue = ColumnValue | ColumnValue[];

/** Compiled expression */
type Expression = (row: Row) => SqlValue;

const parser = new Parser();

// ============ PARSING ============

function unsupported(node: unknown): never {
  const type = isRecord(node) ? String(node.type) : typeof node;
  throw new InvalidFilterParameterError('Where', `unsupported SQL expression: ${type}`);
}

/**
 * Parse a bare condition into node-sql-parser's AST.
 */
export function parseCondition(condition: string): unknown {
  let ast: unknown;
  try {
    ast = parser.astify(`SELECT * FROM t WHERE ${condition}`, { database: 'MySQL' });
  } catch (e) {
    console.error('[SQL] Parse error:', e);
    throw new InvalidFilterParameterError('Where', `cannot parse condition "${condition}"`);
  }
  const statement = Array.isArray(ast) ? ast[0] : ast;
  if (!isRecord(statement) || statement.type !== 'select' || !isRecord(statement.where)) {
    throw new InvalidFilterParameterError('Where', `cannot parse condition "${condition}"`);
  }
  return statement.where;
}

function columnName(node: Record<string, unknown>): string {
  const { column } = node;
  if (typeof column === 'string') {
    return column;
  }
  // { expr: { type: 'default', value: 'visits' } }
  if (isRecord(column) && isRecord(column.expr) && typeof column.expr.value === 'string') {
    return column.expr.value;
  }
  return unsupported(node);
}

// ============ EVALUATION HELPERS ============

function scalar(value: SqlValue): ColumnValue {
  return Array.isArray(value) ? null : value;
}

function isTrue(value: SqlValue): boolean {
  const v = scalar(value);
  if (v === null) return false;
  if (typeof v === 'number') return v !== 0;
  if (typeof v === 'string') return v !== '' && toNumber(v) !== 0;
  return v;
}

/** Numeric when both sides are numeric, string otherwise; null when either side is NULL */
function compare(left: ColumnValue, right: ColumnValue): number | null {
  if (left === null || right === null) {
    return null;
  }
  const a = toNumber(typeof left === 'boolean' ? Number(left) : left);
  const b = toNumber(typeof right === 'boolean' ? Number(right) : right);
  if (a !== null && b !== null) {
    return a - b;
  }
  const sa = String(left);
  const sb = String(right);
  return sa === sb ? 0 : sa < sb ? -1 : 1;
}

/**
 * Convert SQL LIKE pattern to regex: % → .*, _ → .
 */
function likeToRegex(pattern: string): RegExp {
  const escaped = pattern.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`^${escaped.replace(/%/g, '.*').replace(/_/g, '.')}$`, 'i');
}

function arithmetic(operator: string, left: ColumnValue, right: ColumnValue): ColumnValue {
  const a = toNumber(left);
  const b = toNumber(right);
  if (a === null || b === null) return null;
  switch (operator) {
    case '+': return a + b;
    case '-': return a - b;
    case '*': return a * b;
    case '/': return b === 0 ? null : a / b;
    case '%': return b === 0 ? null : a % b;
    default: return null;
  }
}

// ============ COMPILER ============

function compileList(node: Record<string, unknown>): Expression {
  if (node.type !== 'expr_list' || !Array.isArray(node.value)) {
    return unsupported(node);
  }
  const items: Expression[] = node.value.map(item => compile(item));
  return row => items.map(item => scalar(item(row)));
}

function compileBinary(node: Record<string, unknown>): Expression {
  const operator = String(node.operator).toUpperCase();
  const left = compile(node.left);

  switch (operator) {
    case 'AND': {
      const right = compile(node.right);
      return row => isTrue(left(row)) && isTrue(right(row));
    }
    case 'OR': {
      const right = compile(node.right);
      return row => isTrue(left(row)) || isTrue(right(row));
    }
    case 'IS':
    case 'IS NOT': {
      const right = compile(node.right);
      const negate = operator === 'IS NOT';
      return row => {
        const l = scalar(left(row));
        const r = scalar(right(row));
        return (r === null ? l === null : l === r) !== negate;
      };
    }
    case 'LIKE':
    case 'NOT LIKE': {
      const right = compile(node.right);
      const negate = operator === 'NOT LIKE';
      return row => {
        const l = scalar(left(row));
        const r = scalar(right(row));
        if (l === null || r === null) return false;
        return likeToRegex(String(r)).test(String(l)) !== negate;
      };
    }
    case 'IN':
    case 'NOT IN': {
      if (!isRecord(node.right)) return unsupported(node.right);
      const list = compileList(node.right);
      const negate = operator === 'NOT IN';
      return row => {
        const l = scalar(left(row));
        if (l === null) return false;
        const values = list(row);
        const found = Array.isArray(values) && values.some(v => compare(l, v) === 0);
        return found !== negate;
      };
    }
    case 'BETWEEN':
    case 'NOT BETWEEN': {
      if (!isRecord(node.right)) return unsupported(node.right);
      const bounds = compileList(node.right);
      const negate = operator === 'NOT BETWEEN';
      return row => {
        const l = scalar(left(row));
        const range = bounds(row);
        if (!Array.isArray(range) || range.length !== 2) return false;
        const low = compare(l, range[0]);
        const high = compare(l, range[1]);
        if (low === null || high === null) return false;
        return (low >= 0 && high <= 0) !== negate;
      };
    }
    case '=':
    case '!=':
    case '<>':
    case '<':
    case '<=':
    case '>':
    case '>=': {
      const right = compile(node.right);
      return row => {
        const result = compare(scalar(left(row)), scalar(right(row)));
        if (result === null) return false;
        switch (operator) {
          case '=': return result === 0;
          case '!=':
          case '<>': return result !== 0;
          case '<': return result < 0;
          case '<=': return result <= 0;
          case '>': return result > 0;
          default: return result >= 0;
        }
      };
    }
    case '+':
    case '-':
    case '*':
    case '/':
    case '%': {
      const right = compile(node.right);
      return row => arithmetic(operator, scalar(left(row)), scalar(right(row)));
    }
    default:
      return unsupported(node);
  }
}

function compile(node: unknown): Expression {
  if (!isRecord(node)) {
    return unsupported(node);
  }

  switch (node.type) {
    case 'column_ref': {
      const name = columnName(node);
      return row => row.getColumn(name) ?? null;
    }
    case 'number': {
      const value = toNumber(typeof node.value === 'number' || typeof node.value === 'string' ? node.value : null);
      if (value === null) return unsupported(node);
      return () => value;
    }
    case 'single_quote_string':
    case 'double_quote_string':
    case 'natural_string':
    case 'string': {
      const value = String(node.value);
      return () => value;
    }
    case 'bool':
    case 'boolean': {
      const value = node.value === true;
      return () => value;
    }
    case 'null':
      return () => null;
    case 'expr_list':
      return compileList(node);
    case 'unary_expr': {
      const operand = compile(node.expr);
      const operator = String(node.operator).toUpperCase();
      if (operator === 'NOT' || operator === '!') {
        return row => !isTrue(operand(row));
      }
      if (operator === '-') {
        return row => arithmetic('-', 0, scalar(operand(row)));
      }
      return unsupported(node);
    }
    case 'binary_expr':
      return compileBinary(node);
    default:
      return unsupported(node);
  }
}

/**
 * Compile a condition into a row predicate.
 * @throws InvalidFilterParameterError if the condition cannot be parsed or uses unsupported syntax
 */
export function compileCondition(condition: string): (row: Row) => boolean {
  const expression = compile(parseCondition(condition));
  return row => isTrue(expression(row));
}

// ============ FILTER ============

/**
 * Delete the rows for which `condition` does not hold.
 *
 * Parameters: `[condition]`
 */
export class Where extends Filter {
  private readonly predicate: (row: Row) => boolean;

  constructor(private readonly condition: string) {
    super();
    this.predicate = compileCondition(condition);
  }

  filter(table: DataTable, depth = 0): void {
    let deleted = 0;
    for (const [id, row] of table.getRowEntries()) {
      if (!this.predicate(row)) {
        table.deleteRow(id);
        deleted++;
      } else {
        this.filterSubTable(row, depth);
      }
    }
    debugLog('SQL', `WHERE ${this.condition}: deleted ${deleted} rows from table ${table.getId()}`);
  }
}

/**
 * SQL predicates over table rows
 *
 * @module
 */

export { Where, compileCondition, parseCondition } from './where';

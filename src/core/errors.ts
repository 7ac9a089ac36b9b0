/**
 * Typed errors for DataTable operations
 *
 * Error hierarchy:
 * - DataTableError: base class, carries an ErrorCode and structured details
 *   - LookupError: unknown table id (registry) or unknown name (filters, operators)
 *   - RecursionLimitError: sub-table nesting deeper than the configured maximum
 *   - ConversionError: a "simple" array cannot be mapped to rows without loss
 *   - UnserializationError: a stored blob could not be decoded
 *   - UnknownRowError: deleting a row id that does not exist
 *   - InvalidFilterParameterError: bad positional filter parameters
 *
 * @example
 * ```ts
 * try {
 *   tableRegistry.get(42);
 * } catch (error) {
 *   if (error instanceof LookupError) {
 *     console.warn(error.message, error.toLogContext());
 *   }
 * }
 * ```
 */

export enum ErrorCode {
  UNKNOWN = 'UNKNOWN',
  TABLE_NOT_FOUND = 'TABLE_NOT_FOUND',
  FILTER_NOT_FOUND = 'FILTER_NOT_FOUND',
  AGGREGATION_NOT_FOUND = 'AGGREGATION_NOT_FOUND',
  RECURSION_LIMIT = 'RECURSION_LIMIT',
  CONVERSION_FAILED = 'CONVERSION_FAILED',
  UNSERIALIZATION_FAILED = 'UNSERIALIZATION_FAILED',
  UNKNOWN_ROW = 'UNKNOWN_ROW',
  INVALID_FILTER_PARAMETER = 'INVALID_FILTER_PARAMETER',
}

export class DataTableError extends Error {
  /** Error code for programmatic identification */
  public readonly code: ErrorCode;

  /** Structured details for debugging */
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode = ErrorCode.UNKNOWN, details?: Record<string, unknown>) {
    super(message);
    this.name = 'DataTableError';
    this.code = code;
    this.details = details;
  }

  /**
   * Structured form for logging.
   */
  toLogContext(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
    };
  }
}

export class LookupError extends DataTableError {
  constructor(message: string, code: ErrorCode = ErrorCode.TABLE_NOT_FOUND, details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = 'LookupError';
  }

  static tableNotFound(id: number): LookupError {
    return new LookupError(`DataTable with id ${id} not found in the registry`, ErrorCode.TABLE_NOT_FOUND, { id });
  }
}

export class RecursionLimitError extends DataTableError {
  constructor(maxDepth: number) {
    super(
      `Maximum recursion level of ${maxDepth} reached. ` +
        'Maybe a row references a sub-table that is already one of its parent tables?',
      ErrorCode.RECURSION_LIMIT,
      { maxDepth },
    );
    this.name = 'RecursionLimitError';
  }
}

export class ConversionError extends DataTableError {
  constructor(message = 'Data structure is not convertible to a DataTable', details?: Record<string, unknown>) {
    super(message, ErrorCode.CONVERSION_FAILED, details);
    this.name = 'ConversionError';
  }
}

export class UnserializationError extends DataTableError {
  constructor(reason: string) {
    super(`The unserialization has failed: ${reason}`, ErrorCode.UNSERIALIZATION_FAILED, { reason });
    this.name = 'UnserializationError';
  }
}

export class UnknownRowError extends DataTableError {
  constructor(rowId: number) {
    super(`Trying to delete unknown row with id ${rowId}`, ErrorCode.UNKNOWN_ROW, { rowId });
    this.name = 'UnknownRowError';
  }
}

export class InvalidFilterParameterError extends DataTableError {
  constructor(filter: string, message: string) {
    super(`[${filter}] ${message}`, ErrorCode.INVALID_FILTER_PARAMETER, { filter });
    this.name = 'InvalidFilterParameterError';
  }
}

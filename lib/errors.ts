/**
 * Custom Error Classes for receipt-ledger
 *
 * Extraction problems are never errors: a field that cannot be found
 * degrades to an absent value with zero confidence. Errors are reserved
 * for bad queries and for writes that would break a record invariant.
 */

export class ReceiptLedgerError extends Error {
  constructor(
    message: string,
    public code: string,
    public recoverable: boolean = true
  ) {
    super(message);
    this.name = 'ReceiptLedgerError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A search/sort/aggregation request the caller got wrong.
 * `parameter` names the offending query parameter.
 */
export class QueryError extends ReceiptLedgerError {
  constructor(
    message: string,
    public parameter: string,
    code: string = 'QUERY_ERROR'
  ) {
    super(message, code, true);
    this.name = 'QueryError';
  }
}

export class PatternError extends QueryError {
  constructor(
    message: string,
    public pattern: string,
    parameter: string = 'pattern'
  ) {
    super(message, parameter, 'PATTERN_ERROR');
    this.name = 'PatternError';
  }
}

export class UnsupportedFieldError extends QueryError {
  constructor(
    public field: string,
    public strategy: string,
    parameter: string = 'field'
  ) {
    super(
      `Field "${field}" is not supported by the ${strategy} strategy`,
      parameter,
      'UNSUPPORTED_FIELD'
    );
    this.name = 'UnsupportedFieldError';
  }
}

export class InvalidQueryError extends QueryError {
  constructor(message: string, parameter: string) {
    super(message, parameter, 'INVALID_QUERY');
    this.name = 'InvalidQueryError';
  }
}

/**
 * A write that would leave a record violating its invariants
 * (negative amount, unknown category, confidence out of range,
 * edit of an immutable field). This is an integration bug, not
 * a user-facing condition.
 */
export class InvariantViolationError extends ReceiptLedgerError {
  constructor(
    message: string,
    public field: string
  ) {
    super(message, 'INVARIANT_VIOLATION', false);
    this.name = 'InvariantViolationError';
  }
}

/**
 * Handles errors in a standardized way
 */
export function handleError(error: unknown): string {
  if (error instanceof QueryError) {
    return `Invalid query parameter "${error.parameter}": ${error.message}`;
  }

  if (error instanceof ReceiptLedgerError) {
    return error.message;
  }

  if (error instanceof Error) {
    console.error('Unknown error:', error);
    return 'Something went wrong. Please try again.';
  }

  console.error('Unknown error:', error);
  return 'An unexpected error occurred.';
}

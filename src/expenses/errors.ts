// =============================================================================
// Expense Errors
// =============================================================================

export abstract class ExpenseError extends Error {
  abstract readonly code: string;
  abstract readonly httpStatus: number;
  readonly timestamp: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.timestamp = Date.now();
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      timestamp: this.timestamp,
    };
  }
}

export class InvalidDateError extends ExpenseError {
  readonly code = 'INVALID_DATE';
  readonly httpStatus = 400;

  constructor(public readonly input: string) {
    super(`Invalid date '${input}': expected a calendar date as YYYY-MM-DD`);
  }
}

export class InvalidAmountError extends ExpenseError {
  readonly code = 'INVALID_AMOUNT';
  readonly httpStatus = 400;

  constructor(
    public readonly input: string,
    reason: 'not_numeric' | 'negative' = 'not_numeric'
  ) {
    super(
      reason === 'negative'
        ? `Invalid amount '${input}': must not be negative`
        : `Invalid amount '${input}': not a number`
    );
  }
}

export class InvalidInputError extends ExpenseError {
  readonly code = 'INVALID_INPUT';
  readonly httpStatus = 400;

  constructor(public readonly issues: Array<{ path: string; message: string }>) {
    super(
      `Invalid input: ${issues.map(i => (i.path ? `${i.path}: ${i.message}` : i.message)).join(', ')}`
    );
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), issues: this.issues };
  }
}

/**
 * The backing store failed. An `add` that ends in this error may or may not
 * have been written, so callers must not retry it blindly.
 */
export class StorageError extends ExpenseError {
  readonly code = 'STORAGE_ERROR';
  readonly httpStatus = 500;

  constructor(
    public readonly operation: 'initialize' | 'add' | 'list' | 'totals',
    cause: unknown
  ) {
    super(
      `Expense store ${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
  }
}

export function isExpenseError(error: unknown): error is ExpenseError {
  return error instanceof ExpenseError;
}

export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}

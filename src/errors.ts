/**
 * Typed failures raised by the ledger core.
 * The presentation layer switches on `code` to pick the message it shows.
 */

export type FinanceErrorCode =
  | 'CORRUPT_DATA'
  | 'INVALID_AMOUNT'
  | 'INVALID_KIND'
  | 'INVALID_DATE'
  | 'INVALID_CATEGORY'
  | 'INVALID_PIN'
  | 'EMPTY_STORE'
  | 'AUTH_EXHAUSTED'
  | 'IO_FAILURE';

export class FinanceError extends Error {
  readonly code: FinanceErrorCode;

  constructor(code: FinanceErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** An existing data file could not be parsed into the expected shape. */
export class CorruptDataError extends FinanceError {
  readonly file: string;

  constructor(file: string, reason: string, options?: { cause?: unknown }) {
    super('CORRUPT_DATA', `${file} is corrupt: ${reason}`, options);
    this.file = file;
  }
}

/** Base for rejected user input. */
export class ValidationError extends FinanceError {}

export class InvalidAmountError extends ValidationError {
  constructor(message: string) {
    super('INVALID_AMOUNT', message);
  }
}

export class InvalidKindError extends ValidationError {
  constructor(value: string) {
    super('INVALID_KIND', `Type must be 'income' or 'expense', got '${value}'`);
  }
}

export class InvalidDateError extends ValidationError {
  constructor(value: string) {
    super('INVALID_DATE', `Invalid date '${value}'. Use YYYY-MM-DD.`);
  }
}

export class InvalidCategoryError extends ValidationError {
  constructor() {
    super('INVALID_CATEGORY', 'Category must not be empty');
  }
}

export class InvalidPinError extends ValidationError {
  constructor(message = 'PIN must not be empty') {
    super('INVALID_PIN', message);
  }
}

export class EmptyStoreError extends FinanceError {
  constructor() {
    super('EMPTY_STORE', 'Nothing to undo');
  }
}

export class AuthExhaustedError extends FinanceError {
  readonly attempts: number;

  constructor(attempts: number) {
    super('AUTH_EXHAUSTED', `Too many attempts (${attempts}). Session locked.`);
    this.attempts = attempts;
  }
}

/** Disk read/write/rename failed for a reason other than the file being absent. */
export class IoFailureError extends FinanceError {
  readonly file: string;

  constructor(file: string, operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('IO_FAILURE', `Failed to ${operation} ${file}: ${detail}`, { cause });
    this.file = file;
  }
}

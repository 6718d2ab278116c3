/**
 * Expense Domain Errors
 *
 * Validation errors are recoverable: the caller may retry with corrected input.
 * Store errors abort the current operation and are never retried.
 */

export class ExpenseError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ExpenseValidationError extends ExpenseError {}

export class InvalidDateError extends ExpenseValidationError {
  constructor(message = 'Date must use the YYYY-MM-DD format', options?: ErrorOptions) {
    super(message, options);
  }
}

export class InvalidCategoryError extends ExpenseValidationError {
  constructor(message = 'Category cannot be empty', options?: ErrorOptions) {
    super(message, options);
  }
}

export class InvalidDescriptionError extends ExpenseValidationError {
  constructor(message = 'Description is not valid', options?: ErrorOptions) {
    super(message, options);
  }
}

export class InvalidAmountError extends ExpenseValidationError {
  constructor(message = 'Amount must be a number', options?: ErrorOptions) {
    super(message, options);
  }
}

export class StoreError extends ExpenseError {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.filePath = filePath;
  }
}

export class CorruptStoreError extends StoreError {
  constructor(filePath: string, detail: string, options?: ErrorOptions) {
    super(filePath, `Expense file '${filePath}' is corrupt: ${detail}`, options);
  }
}

export class StoreIoError extends StoreError {
  constructor(filePath: string, action: 'read' | 'write', options?: ErrorOptions) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(filePath, `Failed to ${action} expense file '${filePath}'${reason}`, options);
  }
}

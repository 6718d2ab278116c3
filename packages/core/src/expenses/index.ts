/**
 * Expenses Domain
 *
 * Exports the ledger service, store, money type, parsers, errors, and types.
 */

export { ExpenseLedger } from './expense-ledger.js';
export type { ExpenseLedgerOptions } from './expense-ledger.js';

export { JsonFileExpenseStore } from './expense-store.js';
export type { ExpenseStore, JsonFileExpenseStoreOptions } from './expense-store.js';

export { Money, MAX_AMOUNT_CENTS } from './money.js';

export {
  parseExpenseDate,
  parseCategory,
  parseDescription,
  parseAmount,
  parseExpenseInput,
  createExpense,
} from './expense-parsers.js';

export {
  ExpenseError,
  ExpenseValidationError,
  InvalidDateError,
  InvalidCategoryError,
  InvalidDescriptionError,
  InvalidAmountError,
  StoreError,
  CorruptStoreError,
  StoreIoError,
} from './expense-errors.js';

export type { Expense, AddExpenseInput, ParseResult } from './expense-types.js';

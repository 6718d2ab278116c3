/**
 * Expense Domain Types
 */

import type { Money } from './money.js';

/**
 * Outcome of parsing one piece of user input
 * Same shape as zod's safeParse result, with a domain error on failure
 */
export type ParseResult<T, E extends Error> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * One validated spending record. Immutable once created.
 */
export interface Expense {
  /** Calendar date, YYYY-MM-DD */
  readonly date: string;
  readonly category: string;
  readonly description: string;
  readonly amount: Money;
}

/**
 * Raw text fields for a new expense, as typed on the command line
 */
export interface AddExpenseInput {
  date: string;
  category: string;
  description: string;
  amount: string;
}

/**
 * Expense Input Parsers
 *
 * Turn raw command-line text into validated expense fields. Each parser
 * returns a tagged result instead of throwing, so callers decide how to
 * report the failure.
 */

import type { ZodError } from 'zod';
import { CategorySchema, DescriptionSchema, ExpenseDateSchema } from '@expense-ledger/types';
import {
  InvalidCategoryError,
  InvalidDateError,
  InvalidDescriptionError,
  type InvalidAmountError,
  type ExpenseValidationError,
} from './expense-errors.js';
import type { AddExpenseInput, Expense, ParseResult } from './expense-types.js';
import { Money } from './money.js';

function firstIssueMessage(error: ZodError, fallback: string): string {
  return error.errors[0]?.message ?? fallback;
}

export function parseExpenseDate(text: string): ParseResult<string, InvalidDateError> {
  const result = ExpenseDateSchema.safeParse(text);
  if (!result.success) {
    const message = firstIssueMessage(result.error, 'Date is not valid');
    return { success: false, error: new InvalidDateError(`${message}, got "${text}"`) };
  }
  return { success: true, data: result.data };
}

export function parseCategory(text: string): ParseResult<string, InvalidCategoryError> {
  const result = CategorySchema.safeParse(text);
  if (!result.success) {
    return {
      success: false,
      error: new InvalidCategoryError(firstIssueMessage(result.error, 'Category is not valid')),
    };
  }
  return { success: true, data: result.data };
}

export function parseDescription(text: string): ParseResult<string, InvalidDescriptionError> {
  const result = DescriptionSchema.safeParse(text);
  if (!result.success) {
    return {
      success: false,
      error: new InvalidDescriptionError(firstIssueMessage(result.error, 'Description is not valid')),
    };
  }
  return { success: true, data: result.data };
}

export function parseAmount(text: string): ParseResult<Money, InvalidAmountError> {
  return Money.parse(text);
}

/**
 * Validate every field of a new expense, in date, category, description,
 * amount order, and build the frozen Expense. Stops at the first failure.
 */
export function parseExpenseInput(
  input: AddExpenseInput
): ParseResult<Expense, ExpenseValidationError> {
  const date = parseExpenseDate(input.date);
  if (!date.success) return date;

  const category = parseCategory(input.category);
  if (!category.success) return category;

  const description = parseDescription(input.description);
  if (!description.success) return description;

  const amount = parseAmount(input.amount);
  if (!amount.success) return amount;

  return {
    success: true,
    data: createExpense(date.data, category.data, description.data, amount.data),
  };
}

export function createExpense(
  date: string,
  category: string,
  description: string,
  amount: Money
): Expense {
  return Object.freeze({ date, category, description, amount });
}

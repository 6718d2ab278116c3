/**
 * Expense schemas for command input and the on-disk expense file
 * Used by the ledger parsers and by the JSON file store
 */

import { z } from 'zod';

export const EXPENSE_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
export const CATEGORY_MAX_LENGTH = 30;
export const DESCRIPTION_MAX_LENGTH = 120;

// C0 control characters (newline, tab, ...) and DEL
const CONTROL_CHARACTER_PATTERN = /[\u0000-\u001f\u007f]/;

function hasNoControlCharacters(value: string): boolean {
  return !CONTROL_CHARACTER_PATTERN.test(value);
}

/**
 * True when a YYYY-MM-DD string names a day that exists in the
 * proleptic Gregorian calendar (so 2024-02-29 passes, 2023-02-29 does not)
 */
export function isCalendarDate(value: string): boolean {
  const match = EXPENSE_DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (year < 1 || month < 1 || month > 12 || day < 1) {
    return false;
  }

  // setUTCFullYear keeps years below 100 literal, unlike Date.UTC
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

/**
 * Calendar date in YYYY-MM-DD form
 * - Surrounding whitespace is ignored
 * - Must name a real day (no 2024-13-40, no 2023-02-29)
 */
export const ExpenseDateSchema = z
  .string()
  .trim()
  .regex(EXPENSE_DATE_PATTERN, 'Date must use the YYYY-MM-DD format')
  .refine(isCalendarDate, 'Date is not a real calendar date');

/**
 * Free-form category label (1-30 characters, not blank, single line)
 * Stored exactly as given: no trimming, no case folding
 */
export const CategorySchema = z
  .string()
  .max(CATEGORY_MAX_LENGTH, `Category too long (max ${CATEGORY_MAX_LENGTH} characters)`)
  .refine((value) => value.trim().length > 0, 'Category cannot be empty')
  .refine(hasNoControlCharacters, 'Category cannot contain line breaks or control characters');

/**
 * Free-form description, may be empty (0-120 characters, single line)
 */
export const DescriptionSchema = z
  .string()
  .max(DESCRIPTION_MAX_LENGTH, `Description too long (max ${DESCRIPTION_MAX_LENGTH} characters)`)
  .refine(hasNoControlCharacters, 'Description cannot contain line breaks or control characters');

/**
 * One record as written to the expense file
 * Amount positivity and precision are checked again when the record becomes Money
 */
export const StoredExpenseSchema = z.object({
  date: ExpenseDateSchema,
  category: CategorySchema,
  description: DescriptionSchema,
  amount: z.number().finite('Amount must be a finite number').positive('Amount must be greater than 0'),
});

/**
 * Whole expense file: a JSON array of records in insertion order
 */
export const ExpenseFileSchema = z.array(StoredExpenseSchema);

export type StoredExpense = z.infer<typeof StoredExpenseSchema>;

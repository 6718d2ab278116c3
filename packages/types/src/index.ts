export {
  EXPENSE_DATE_PATTERN,
  CATEGORY_MAX_LENGTH,
  DESCRIPTION_MAX_LENGTH,
  isCalendarDate,
  ExpenseDateSchema,
  CategorySchema,
  DescriptionSchema,
  StoredExpenseSchema,
  ExpenseFileSchema,
} from './expense.schema.js';
export type { StoredExpense } from './expense.schema.js';

import type { Expense, Money } from '@expense-ledger/core';

/**
 * One row of the expense list:
 * `  1. 2024-01-15 | food         |      12.50 | lunch`
 */
export function formatExpenseRow(position: number, expense: Expense): string {
  const row = [
    `${String(position).padStart(3)}. ${expense.date}`,
    expense.category.padEnd(12),
    expense.amount.toString().padStart(10),
    expense.description,
  ].join(' | ');
  return row.trimEnd();
}

/**
 * Compact single-line summary used in confirmations
 */
export function formatExpense(expense: Expense): string {
  return [expense.date, expense.category, expense.amount.toString(), expense.description]
    .join(' | ')
    .trimEnd();
}

export function formatCategoryTotals(totals: Map<string, Money>): string[] {
  return [...totals].map(([category, amount]) => `${category}: ${amount.toString()}`);
}

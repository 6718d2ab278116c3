/**
 * Expense Ledger
 *
 * Business logic layer for expenses: validation, record construction and
 * aggregate queries. Every call reloads the full sequence from the store;
 * nothing is kept in memory between calls.
 */

import { silentLogger, type Logger } from '@expense-ledger/observability';
import type { ExpenseStore } from './expense-store.js';
import type { AddExpenseInput, Expense } from './expense-types.js';
import { parseExpenseInput } from './expense-parsers.js';
import { Money } from './money.js';

export interface ExpenseLedgerOptions {
  logger?: Logger;
}

export class ExpenseLedger {
  private store: ExpenseStore;
  private logger: Logger;

  constructor(store: ExpenseStore, options: ExpenseLedgerOptions = {}) {
    this.store = store;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Record a new expense
   *
   * All fields are validated before the store is touched, so a rejected
   * expense never changes the file.
   *
   * @returns The stored expense
   * @throws InvalidDateError | InvalidCategoryError | InvalidDescriptionError | InvalidAmountError
   * @throws StoreError if the current expenses cannot be loaded or saved
   */
  add(input: AddExpenseInput): Expense {
    const parsed = parseExpenseInput(input);
    if (!parsed.success) {
      throw parsed.error;
    }

    const expense = parsed.data;
    const expenses = this.store.load();
    this.store.save([...expenses, expense]);

    this.logger.info(
      {
        expense: {
          date: expense.date,
          category: expense.category,
          description: expense.description,
          amount: expense.amount.toString(),
        },
        count: expenses.length + 1,
      },
      'Expense added'
    );

    return expense;
  }

  /**
   * All expenses in insertion order
   */
  listAll(): Expense[] {
    return this.store.load();
  }

  /**
   * Exact sum of every amount; zero when the ledger is empty
   */
  total(): Money {
    return this.store.load().reduce((sum, expense) => sum.plus(expense.amount), Money.zero());
  }

  /**
   * Subtotal per category, keyed by the exact category string
   * (case-sensitive, no trimming) in first-seen order
   */
  totalsByCategory(): Map<string, Money> {
    const totals = new Map<string, Money>();
    for (const expense of this.store.load()) {
      const current = totals.get(expense.category) ?? Money.zero();
      totals.set(expense.category, current.plus(expense.amount));
    }
    return totals;
  }

  /**
   * Sum for one category, matched exactly; zero when the category is unknown
   */
  totalForCategory(category: string): Money {
    return this.store
      .load()
      .filter((expense) => expense.category === category)
      .reduce((sum, expense) => sum.plus(expense.amount), Money.zero());
  }

  /**
   * Remove every expense
   *
   * @returns Number of expenses removed
   */
  clear(): number {
    const removed = this.store.load().length;
    this.store.save([]);
    this.logger.info({ removed }, 'Expenses cleared');
    return removed;
  }
}

/**
 * Expense Store
 *
 * Durable round trip of the full expense sequence. The ledger only talks to
 * the ExpenseStore interface; JsonFileExpenseStore keeps the sequence in one
 * JSON file.
 *
 * Known limitation: there is no locking. If two processes save at the same
 * time, the last writer wins and the other update is lost.
 */

import { mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { ExpenseFileSchema, type StoredExpense } from '@expense-ledger/types';
import { silentLogger, type Logger } from '@expense-ledger/observability';
import { CorruptStoreError, StoreIoError } from './expense-errors.js';
import { createExpense } from './expense-parsers.js';
import type { Expense } from './expense-types.js';
import { Money } from './money.js';

export interface ExpenseStore {
  /** Every stored expense in insertion order; empty when nothing has been saved yet */
  load(): Expense[];
  /** Replace the stored sequence with `expenses` */
  save(expenses: readonly Expense[]): void;
}

export interface JsonFileExpenseStoreOptions {
  logger?: Logger;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function formatIssuePath(path: (string | number)[]): string {
  if (path.length === 0) {
    return 'root';
  }
  return path
    .map((segment) => (typeof segment === 'number' ? `[${segment}]` : `.${segment}`))
    .join('')
    .replace(/^\./, '');
}

export class JsonFileExpenseStore implements ExpenseStore {
  private readonly logger: Logger;

  constructor(
    readonly filePath: string,
    options: JsonFileExpenseStoreOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Read and validate the expense file
   *
   * @throws CorruptStoreError if the file is not a JSON array of valid records
   * @throws StoreIoError if the file exists but cannot be read
   */
  load(): Expense[] {
    let text: string;
    try {
      text = readFileSync(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.debug({ file: this.filePath }, 'Expense file not found, starting empty');
        return [];
      }
      throw new StoreIoError(this.filePath, 'read', { cause: error });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new CorruptStoreError(this.filePath, 'file is not valid JSON', { cause: error });
    }

    const result = ExpenseFileSchema.safeParse(raw);
    if (!result.success) {
      const issue = result.error.errors[0];
      const detail = issue ? `${formatIssuePath(issue.path)}: ${issue.message}` : 'unexpected content';
      throw new CorruptStoreError(this.filePath, detail, { cause: result.error });
    }

    const expenses = result.data.map((record, index) => this.toExpense(record, index));
    this.logger.debug({ file: this.filePath, count: expenses.length }, 'Loaded expenses');
    return expenses;
  }

  /**
   * Write the whole sequence to a sibling temporary file, then rename it
   * over the target so a failed write never leaves a half-written file.
   *
   * @throws StoreIoError if the directory, temporary file or rename fails
   */
  save(expenses: readonly Expense[]): void {
    const records: StoredExpense[] = expenses.map((expense) => ({
      date: expense.date,
      category: expense.category,
      description: expense.description,
      amount: expense.amount.toNumber(),
    }));
    const payload = `${JSON.stringify(records, null, 2)}\n`;
    const tempPath = `${this.filePath}.${process.pid}.tmp`;

    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(tempPath, payload, 'utf8');
      renameSync(tempPath, this.filePath);
    } catch (error) {
      rmSync(tempPath, { force: true });
      throw new StoreIoError(this.filePath, 'write', { cause: error });
    }

    this.logger.debug({ file: this.filePath, count: records.length }, 'Saved expenses');
  }

  private toExpense(record: StoredExpense, index: number): Expense {
    const amount = Money.parse(String(record.amount));
    if (!amount.success) {
      throw new CorruptStoreError(this.filePath, `[${index}].amount: ${amount.error.message}`, {
        cause: amount.error,
      });
    }
    return createExpense(record.date, record.category, record.description, amount.data);
  }
}

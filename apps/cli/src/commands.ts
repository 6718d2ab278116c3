import type { ExpenseLedger } from '@expense-ledger/core';
import { UsageError, type CommandOption, type ParsedArgs } from './args.js';
import { formatCategoryTotals, formatExpense, formatExpenseRow } from './format.js';

export interface OutputStream {
  write(chunk: string): unknown;
}

export type Confirm = (message: string) => Promise<boolean>;

export interface CommandContext {
  ledger: ExpenseLedger;
  args: ParsedArgs;
  stdout: OutputStream;
  confirm?: Confirm;
}

export interface Command {
  usage: string;
  summary: string;
  options: readonly CommandOption[];
  run(ctx: CommandContext): void | Promise<void>;
}

const EMPTY_LEDGER_MESSAGE = 'No expenses recorded yet.';

function writeLine(stream: OutputStream, line: string): void {
  stream.write(`${line}\n`);
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

function expectPositionals(ctx: CommandContext, command: Command, count: number): string[] {
  if (ctx.args.positionals.length !== count) {
    throw new UsageError(`Usage: expense-ledger ${command.usage}`);
  }
  return ctx.args.positionals;
}

const addExpense: Command = {
  usage: 'add-expense <date> <category> <description> <amount>',
  summary: 'Record an expense (date as YYYY-MM-DD, description may be "")',
  options: [],
  run(ctx) {
    const [date = '', category = '', description = '', amount = ''] = expectPositionals(ctx, addExpense, 4);
    const expense = ctx.ledger.add({ date, category, description, amount });
    writeLine(ctx.stdout, `Expense added: ${formatExpense(expense)}`);
  },
};

const listExpenses: Command = {
  usage: 'list-expenses',
  summary: 'Print every expense in the order it was added',
  options: [],
  run(ctx) {
    expectPositionals(ctx, listExpenses, 0);
    const expenses = ctx.ledger.listAll();
    if (expenses.length === 0) {
      writeLine(ctx.stdout, EMPTY_LEDGER_MESSAGE);
      return;
    }
    expenses.forEach((expense, index) => writeLine(ctx.stdout, formatExpenseRow(index + 1, expense)));
  },
};

const showTotal: Command = {
  usage: 'show-total [--category <name>]',
  summary: 'Print the grand total, or the total for one category (exact match)',
  options: ['category'],
  run(ctx) {
    expectPositionals(ctx, showTotal, 0);
    const { category } = ctx.args;
    if (category === undefined) {
      writeLine(ctx.stdout, `Total spending: ${ctx.ledger.total().toString()}`);
      return;
    }
    if (category.trim() === '') {
      throw new UsageError('--category must not be empty');
    }
    writeLine(
      ctx.stdout,
      `Total spending for '${category}': ${ctx.ledger.totalForCategory(category).toString()}`
    );
  },
};

const showTotalsByCategory: Command = {
  usage: 'show-totals-by-category',
  summary: 'Print the subtotal of each category, in first-seen order',
  options: [],
  run(ctx) {
    expectPositionals(ctx, showTotalsByCategory, 0);
    const lines = formatCategoryTotals(ctx.ledger.totalsByCategory());
    if (lines.length === 0) {
      writeLine(ctx.stdout, EMPTY_LEDGER_MESSAGE);
      return;
    }
    lines.forEach((line) => writeLine(ctx.stdout, line));
  },
};

const clearExpenses: Command = {
  usage: 'clear-expenses [--yes]',
  summary: 'Delete every expense (asks first unless --yes)',
  options: ['yes'],
  async run(ctx) {
    expectPositionals(ctx, clearExpenses, 0);
    const count = ctx.ledger.listAll().length;
    if (count === 0) {
      writeLine(ctx.stdout, EMPTY_LEDGER_MESSAGE);
      return;
    }

    if (!ctx.args.yes) {
      if (!ctx.confirm) {
        throw new UsageError('clear-expenses needs --yes when it cannot ask for confirmation');
      }
      const confirmed = await ctx.confirm(`Delete all ${plural(count, 'expense')}?`);
      if (!confirmed) {
        writeLine(ctx.stdout, 'Aborted.');
        return;
      }
    }

    const removed = ctx.ledger.clear();
    writeLine(ctx.stdout, `Removed ${plural(removed, 'expense')}.`);
  },
};

export const COMMANDS: ReadonlyMap<string, Command> = new Map([
  ['add-expense', addExpense],
  ['list-expenses', listExpenses],
  ['show-total', showTotal],
  ['show-totals-by-category', showTotalsByCategory],
  ['clear-expenses', clearExpenses],
]);

export function formatUsage(): string {
  const lines = ['Usage: expense-ledger <command> [options]', '', 'Commands:'];
  for (const command of COMMANDS.values()) {
    lines.push(`  ${command.usage}`, `      ${command.summary}`);
  }
  lines.push(
    '  help',
    '      Show this message',
    '',
    'Options:',
    '  --file <path>   Expense file (default: $EXPENSES_FILE or ./expenses.json)',
    ''
  );
  return lines.join('\n');
}

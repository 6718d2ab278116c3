import {
  ExpenseLedger,
  ExpenseValidationError,
  JsonFileExpenseStore,
  StoreError,
} from '@expense-ledger/core';
import { createLogger, silentLogger, type Logger } from '@expense-ledger/observability';
import { parseArgs, UsageError } from './args.js';
import { COMMANDS, formatUsage, type Confirm, type OutputStream } from './commands.js';
import { ConfigError, loadConfig } from './config.js';

export const EXIT_OK = 0;
/** Rejected input, bad usage or bad configuration */
export const EXIT_INVALID = 1;
/** Corrupt or unreadable/unwritable expense file */
export const EXIT_STORE_FAILURE = 2;

export interface CliDependencies {
  env: NodeJS.ProcessEnv;
  cwd: string;
  stdout: OutputStream;
  stderr: OutputStream;
  /** Interactive yes/no prompt; without it clear-expenses requires --yes */
  confirm?: Confirm;
  /** Overrides the logger built from LOG_LEVEL */
  logger?: Logger;
}

/**
 * Run one CLI invocation and return its exit code
 *
 * Every failure is reported on stderr as `Error: <message>`; nothing is thrown.
 */
export async function runCli(argv: readonly string[], deps: CliDependencies): Promise<number> {
  let logger: Logger = deps.logger ?? silentLogger;

  try {
    const args = parseArgs(argv);

    if (args.help || args.command === 'help') {
      deps.stdout.write(formatUsage());
      return EXIT_OK;
    }

    if (args.command === undefined) {
      deps.stderr.write(formatUsage());
      return EXIT_INVALID;
    }

    const command = COMMANDS.get(args.command);
    if (!command) {
      throw new UsageError(`Unknown command "${args.command}"`);
    }

    const unsupported = args.options.find((option) => !command.options.includes(option));
    if (unsupported) {
      throw new UsageError(`--${unsupported} is not valid for ${args.command}`);
    }

    const config = loadConfig(deps.env, deps.cwd, { file: args.file });
    logger = deps.logger ?? createLogger({ level: config.logLevel });
    logger.debug({ command: args.command, file: config.storePath }, 'Running command');

    const store = new JsonFileExpenseStore(config.storePath, { logger });
    const ledger = new ExpenseLedger(store, { logger });

    await command.run({ ledger, args, stdout: deps.stdout, confirm: deps.confirm });
    return EXIT_OK;
  } catch (error) {
    return reportFailure(error, deps.stderr, logger);
  }
}

function reportFailure(error: unknown, stderr: OutputStream, logger: Logger): number {
  if (error instanceof UsageError) {
    stderr.write(`Error: ${error.message}\nRun 'expense-ledger help' for usage.\n`);
    return EXIT_INVALID;
  }

  if (error instanceof ExpenseValidationError || error instanceof ConfigError) {
    logger.info({ err: error }, 'Command rejected');
    stderr.write(`Error: ${error.message}\n`);
    return EXIT_INVALID;
  }

  if (error instanceof StoreError) {
    logger.error({ err: error, file: error.filePath }, 'Expense store failure');
    stderr.write(`Error: ${error.message}\n`);
    return EXIT_STORE_FAILURE;
  }

  logger.error({ err: error }, 'Unexpected failure');
  stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
  return EXIT_INVALID;
}

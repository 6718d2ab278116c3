/**
 * @expense-ledger/observability
 *
 * Structured logging shared by the ledger core and the CLI.
 */

export { createLogger, silentLogger } from './logger.js';
export type { CreateLoggerOptions, Logger, LogLevel } from './logger.js';

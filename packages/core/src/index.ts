/**
 * @expense-ledger/core - Domain logic for the expense ledger
 *
 * Validation, persistence and aggregation of personal expenses. The CLI
 * consumes this package; nothing here writes to the terminal.
 */

export * from './expenses/index.js';

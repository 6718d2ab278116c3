import pino from 'pino';

export type Logger = pino.Logger;
export type LogLevel = pino.LevelWithSilent;

/**
 * Redact free-text expense descriptions from logs
 * - Top-level description fields
 * - Expenses logged under an `expense` key
 * - Expense lists logged under an `expenses` key
 */
const REDACTION_PATHS = ['description', 'expense.description', 'expenses[*].description'];

export interface CreateLoggerOptions extends pino.LoggerOptions {
  /** Where log lines go. Defaults to a synchronous stderr stream. */
  destination?: pino.DestinationStream;
}

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Environment-based log level (LOG_LEVEL, default `warn`)
 * - Output on stderr, so command output on stdout stays clean
 * - Redaction of expense descriptions
 * - ISO 8601 timestamps
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const { destination, ...loggerOptions } = options;

  return pino(
    {
      level: process.env.LOG_LEVEL || 'warn',
      redact: {
        paths: REDACTION_PATHS,
        censor: '[REDACTED]',
      },
      serializers: {
        err: pino.stdSerializers.err,
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      ...loggerOptions,
    },
    // Synchronous: every line is flushed before the command returns
    destination ?? pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Logger that discards everything, for callers that do not pass one
 */
export const silentLogger: Logger = pino({ level: 'silent' });

import { resolve } from 'node:path';
import { z } from 'zod';
import type { LogLevel } from '@expense-ledger/observability';

export const DEFAULT_EXPENSES_FILE = 'expenses.json';

export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const EnvSchema = z.object({
  EXPENSES_FILE: z
    .string()
    .trim()
    .min(1, 'EXPENSES_FILE must not be empty')
    .default(DEFAULT_EXPENSES_FILE),
  LOG_LEVEL: z
    .enum(LOG_LEVELS, {
      errorMap: () => ({ message: `LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}` }),
    })
    .default('warn'),
});

export type CliConfig = {
  /** Absolute path of the expense file */
  storePath: string;
  logLevel: LogLevel;
};

export type ConfigOverrides = {
  /** Value of the --file flag, resolved against cwd like EXPENSES_FILE */
  file?: string;
};

/**
 * Build the CLI configuration from the environment
 *
 * @throws ConfigError if a variable has an unusable value
 */
export function loadConfig(
  env: NodeJS.ProcessEnv,
  cwd: string,
  overrides: ConfigOverrides = {}
): CliConfig {
  const result = EnvSchema.safeParse({
    EXPENSES_FILE: overrides.file ?? env.EXPENSES_FILE,
    LOG_LEVEL: env.LOG_LEVEL || undefined,
  });

  if (!result.success) {
    const errors = result.error.errors.map((e) => e.message).join(', ');
    throw new ConfigError(`Invalid configuration: ${errors}`);
  }

  return {
    storePath: resolve(cwd, result.data.EXPENSES_FILE),
    logLevel: result.data.LOG_LEVEL,
  };
}

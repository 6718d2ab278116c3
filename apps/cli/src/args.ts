export class UsageError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type CommandOption = 'category' | 'yes';

export type ParsedArgs = {
  command: string | undefined;
  positionals: string[];
  file?: string;
  category?: string;
  yes: boolean;
  help: boolean;
  /** Command-specific options that were given, for per-command checks */
  options: CommandOption[];
};

type ValueFlag = '--file' | '--category';

function isValueFlag(flag: string): flag is ValueFlag {
  return flag === '--file' || flag === '--category';
}

/**
 * Split argv into command, positionals and flags
 *
 * - `--file <path>` / `--file=<path>` and `--category <name>` take a value
 * - `--yes` (`-y`) and `--help` (`-h`) are switches
 * - everything after `--` is positional, so descriptions may start with dashes
 * - a single leading dash followed by a digit (`-5`) is positional
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = { command: undefined, positionals: [], yes: false, help: false, options: [] };
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (arg === '--') {
      positionals.push(...argv.slice(i + 1));
      break;
    }

    if (arg === '--yes' || arg === '-y') {
      parsed.yes = true;
      parsed.options.push('yes');
      continue;
    }

    if (arg === '--help' || arg === '-h') {
      parsed.help = true;
      continue;
    }

    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      const flag = eq === -1 ? arg : arg.slice(0, eq);
      if (!isValueFlag(flag)) {
        throw new UsageError(`Unknown option "${arg}"`);
      }

      let value: string | undefined;
      if (eq !== -1) {
        value = arg.slice(eq + 1);
      } else {
        value = argv[i + 1];
        i++;
      }
      if (value === undefined) {
        throw new UsageError(`${flag} flag provided but no value specified`);
      }

      if (flag === '--file') {
        parsed.file = value;
      } else {
        parsed.category = value;
        parsed.options.push('category');
      }
      continue;
    }

    if (/^-[^\d.]/.test(arg)) {
      throw new UsageError(`Unknown option "${arg}"`);
    }

    positionals.push(arg);
  }

  parsed.command = positionals[0];
  parsed.positionals = positionals.slice(1);
  return parsed;
}

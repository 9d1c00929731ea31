/**
 * Command-line argument parsing for CLI commands.
 */

/**
 * Raised for malformed command lines.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * Options a command accepts.
 */
export interface ArgSpec {
  /** Options taking a value, without the leading dashes. May repeat. */
  readonly values: readonly string[];
  /** Options without a value. */
  readonly flags: readonly string[];
}

export interface ParsedArgs {
  readonly positionals: string[];
  readonly values: ReadonlyMap<string, readonly string[]>;
  readonly flags: ReadonlySet<string>;
}

/**
 * Parses `--name value`, `--name=value` and `--flag` forms. Everything after
 * `--` is positional.
 *
 * @throws CliUsageError for unknown options and missing values.
 */
export function parseArgs(args: readonly string[], argSpec: ArgSpec): ParsedArgs {
  const positionals: string[] = [];
  const values = new Map<string, string[]>();
  const flags = new Set<string>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) {
      continue;
    }
    if (arg === '--') {
      positionals.push(...args.slice(i + 1));
      break;
    }
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const equals = arg.indexOf('=');
    const name = arg.slice(2, equals === -1 ? undefined : equals);
    if (argSpec.flags.includes(name)) {
      if (equals !== -1) {
        throw new CliUsageError(`Option --${name} takes no value`);
      }
      flags.add(name);
      continue;
    }
    if (!argSpec.values.includes(name)) {
      throw new CliUsageError(`Unknown option: --${name}`);
    }

    let value: string | undefined;
    if (equals !== -1) {
      value = arg.slice(equals + 1);
    } else {
      value = args[i + 1];
      i += 1;
    }
    if (value === undefined) {
      throw new CliUsageError(`Option --${name} needs a value`);
    }
    values.set(name, [...(values.get(name) ?? []), value]);
  }

  return { positionals, values, flags };
}

/**
 * The last value given for an option, if any.
 */
export function lastValue(parsed: ParsedArgs, name: string): string | undefined {
  return parsed.values.get(name)?.at(-1);
}

// cli/src/args.ts - Per-command option parsing

/** Bad command line. Reported with the command's usage line, exit code 2. */
export class UsageError extends Error {
  constructor(message: string, readonly usage: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface ParsedArgs {
  options: Map<string, string>;
  positionals: string[];
}

/**
 * Split args into `--name value` / `--name=value` options and positionals.
 * Only `--` prefixes mark options, so "-41.27" stays a positional.
 * A bare `--` ends option parsing.
 */
export function parseArgs(args: string[], valueOptions: readonly string[], usage: string): ParsedArgs {
  const options = new Map<string, string>();
  const positionals: string[] = [];
  const queue = [...args];

  while (queue.length > 0) {
    const arg = queue.shift();
    if (arg === undefined) break;
    if (arg === '--') {
      positionals.push(...queue);
      break;
    }
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const eqIdx = arg.indexOf('=');
    const name = eqIdx === -1 ? arg.slice(2) : arg.slice(2, eqIdx);
    if (!valueOptions.includes(name)) {
      throw new UsageError(`Unknown option: --${name}`, usage);
    }
    const value = eqIdx === -1 ? queue.shift() : arg.slice(eqIdx + 1);
    if (value === undefined || value === '') {
      throw new UsageError(`Option --${name} requires a value`, usage);
    }
    options.set(name, value);
  }

  return { options, positionals };
}

/** Numeric option; range checks are left to the option schemas. */
export function numberOption(parsed: ParsedArgs, name: string, usage: string): number | undefined {
  const raw = parsed.options.get(name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new UsageError(`--${name} must be a number, got "${raw}"`, usage);
  }
  return value;
}

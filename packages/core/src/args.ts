import { UsageError } from './errors.js';

export function hasFlag(args: string[], name: string): boolean {
  return args.includes(name);
}

export interface ParsedArgv {
  positionals: string[];
  flags: Map<string, string | true>;
}

/**
 * Splits argv into positionals and `--flag [value]` pairs. `valueFlags`
 * lists the flags that take a value; any other `--flag` is boolean.
 */
export function parseArgs(argv: string[], valueFlags: readonly string[], booleanFlags: readonly string[] = []): ParsedArgv {
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? '';
    if (!arg.startsWith('-') || arg === '-') {
      positionals.push(arg);
      continue;
    }
    if (valueFlags.includes(arg)) {
      const value = argv[i + 1];
      if (!value || value.startsWith('--')) {
        throw new UsageError(`Missing value for ${arg}`);
      }
      flags.set(arg, value);
      i += 1;
      continue;
    }
    if (booleanFlags.includes(arg)) {
      flags.set(arg, true);
      continue;
    }
    throw new UsageError(`Unknown option: ${arg}`);
  }

  return { positionals, flags };
}

/**
 * Argument Parsing
 *
 * Splits argv into a command, positional arguments and --flags.
 * A flag followed by a non-flag token takes it as its value; otherwise
 * it is boolean and maps to the empty string.
 */

export interface ParsedArgs {
  command: string;
  positionals: string[];
  flags: Record<string, string>;
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const args = argv.slice(2);
  let command = args[0] ?? 'help';
  let start = 1;

  // "help score" → "help-score"
  const topic = args[1];
  if (command === 'help' && topic && !topic.startsWith('--')) {
    command = `help-${topic}`;
    start = 2;
  }

  const positionals: string[] = [];
  const flags: Record<string, string> = {};

  for (let i = start; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const next = args[i + 1];
      if (next !== undefined && !next.startsWith('--')) {
        flags[key] = next;
        i++;
      } else {
        flags[key] = '';
      }
    } else {
      positionals.push(arg);
    }
  }

  return { command, positionals, flags };
}

/** Parse a positive integer flag, or return `fallback` when absent. */
export function intFlag(flags: Record<string, string>, name: string, fallback: number): number {
  const raw = flags[name];
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`--${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/** Value of a flag that requires one. */
export function requireFlag(flags: Record<string, string>, name: string): string {
  const value = flags[name];
  if (!value) {
    throw new Error(`--${name} is required`);
  }
  return value;
}

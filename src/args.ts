import { PreconditionError } from './errors.js';

export interface ParsedArgs {
  command: string;
  positional: string;
  flags: Record<string, string>;
}

/** Flags that never take a value, so a following word stays positional. */
const BOOLEAN_FLAGS = new Set(['once', 'help']);

export function parseArgs(args: string[]): ParsedArgs {
  const command = args[0] ?? 'help';
  const flags: Record<string, string> = {};
  const positional: string[] = [];

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const next = args[i + 1];
      if (!BOOLEAN_FLAGS.has(key) && next && !next.startsWith('--')) {
        flags[key] = next;
        i++;
      } else {
        flags[key] = 'true';
      }
    } else if (arg === '-h') {
      flags['help'] = 'true';
    } else {
      positional.push(arg);
    }
  }

  return { command, positional: positional.join(' '), flags };
}

export function parseSeconds(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new PreconditionError(`--${flag} expects a positive number of seconds, got "${value}"`);
  }
  return seconds;
}

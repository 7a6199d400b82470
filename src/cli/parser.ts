export type FlagValue = string | boolean | string[];

export interface ParsedArgs {
  command: string | undefined;
  positionals: string[];
  flags: Record<string, FlagValue>;
}

// A leading dash followed by a number is a value, not a flag.
const NEGATIVE_NUMBER = /^-\d+(\.\d+)?$/;

// Switches never consume the next argument: `--json tips` runs `tips`.
const BOOLEAN_FLAGS: ReadonlySet<string> = new Set(['json', 'help', 'version', 'h', 'v']);

function isFlag(arg: string): boolean {
  return arg.startsWith('-') && arg !== '-' && !NEGATIVE_NUMBER.test(arg);
}

/**
 * Repeating a flag that takes a value collects the values in order:
 * `--issue a --issue b` gives `['a', 'b']`.
 */
function setFlag(flags: Record<string, FlagValue>, key: string, value: string | boolean): void {
  const existing = flags[key];
  if (typeof value === 'string' && existing !== undefined && typeof existing !== 'boolean') {
    flags[key] = Array.isArray(existing) ? [...existing, value] : [existing, value];
    return;
  }
  flags[key] = value;
}

export function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = {
    command: undefined,
    positionals: [],
    flags: {},
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;

    const next = args[i + 1];
    const nextIsValue = next !== undefined && next !== '' && !isFlag(next);

    if (arg.startsWith('--')) {
      const equalIndex = arg.indexOf('=');
      if (equalIndex !== -1) {
        setFlag(result.flags, arg.slice(2, equalIndex), arg.slice(equalIndex + 1));
      } else if (nextIsValue && !BOOLEAN_FLAGS.has(arg.slice(2))) {
        setFlag(result.flags, arg.slice(2), next);
        i++;
      } else {
        setFlag(result.flags, arg.slice(2), true);
      }
    } else if (isFlag(arg)) {
      const key = arg.slice(1);
      if (key.length > 1) {
        // -abc is -a -b -c
        for (const char of key) {
          setFlag(result.flags, char, true);
        }
      } else if (nextIsValue && !BOOLEAN_FLAGS.has(key)) {
        setFlag(result.flags, key, next);
        i++;
      } else {
        setFlag(result.flags, key, true);
      }
    } else if (result.command === undefined) {
      result.command = arg;
    } else {
      result.positionals.push(arg);
    }
  }

  return result;
}

export function getStringFlag(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags[name];
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return value[value.length - 1];
  return undefined;
}

export function getStringListFlag(args: ParsedArgs, name: string): string[] {
  const value = args.flags[name];
  if (typeof value === 'string') return [value];
  if (Array.isArray(value)) return value;
  return [];
}

export function getIntegerFlag(args: ParsedArgs, name: string): number | undefined {
  const value = getStringFlag(args, name);
  if (value === undefined) return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : Number.NaN;
}

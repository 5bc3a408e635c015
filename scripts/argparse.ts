// Command line argument parsing for cjseq: subcommand, flags and multi-value flags

// Custom error type for argument parsing errors
export class ArgsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgsError';
  }
}

// Argument parsing options interface
export interface ArgOpts<T> {
  required?: boolean;
  default?: T | undefined;
  validate?: (value: T) => void; // validates the parsed value
}

// Get command line arguments (excluding script name and node executable)
function getArgs(): string[] {
  return process.argv.slice(2);
}

// Convert argument name to flag format
export function argNameToFlag(argName: string): string {
  return (argName.length == 1 ? '-' : '--') + argName;
}

// Convert arg and alises to human-readable flag string
export function makeFlagString(argName: string, aliases?: string[]): string {
  let flagString = argNameToFlag(argName);
  if (aliases && aliases.length > 0) {
    flagString += ` (aliases: ${aliases.map(argNameToFlag).join(', ')})`;
  }
  return flagString;
}

// Subcommand: the first argument, when it is not a flag
export function getCommand(): string | undefined {
  const first = getArgs()[0];
  return first === undefined || first.startsWith('-') ? undefined : first;
}

// Arguments after the subcommand, up to the first flag
export function getPositionalArgs(): string[] {
  const rest = getArgs().slice(1);
  const firstFlag = rest.findIndex((s) => s.startsWith('-'));
  return firstFlag === -1 ? rest : rest.slice(0, firstFlag);
}

// Take the next `count` arguments verbatim, so values like "-5" are allowed
export function getArgValues(
  name: string,
  aliases: string[] = [],
  count: number
): string[] | undefined {
  const flags = [name, ...aliases].map(argNameToFlag);
  const args = getArgs();
  const index = args.findIndex((s) => flags.includes(s));
  if (index === -1) return undefined;

  const values = args.slice(index + 1, index + 1 + count);
  if (values.length < count) {
    throw new ArgsError(
      `${makeFlagString(name, aliases)} takes ${count} values, got ${values.length}`
    );
  }
  return values;
}

export function getNumberValues(
  name: string,
  aliases: string[] = [],
  count: number
): number[] | undefined {
  const values = getArgValues(name, aliases, count);
  if (!values) return undefined;
  return values.map((value) => {
    const num = Number(value);
    if (value.trim() === '' || !Number.isFinite(num)) {
      throw new ArgsError(
        `${makeFlagString(name, aliases)} expects numbers, got "${value}"`
      );
    }
    return num;
  });
}

// Core argument parsing function
export function getArg(name: string, aliases: string[] = []) {
  const allNames = [name, ...aliases];
  let flags = allNames.map(argNameToFlag);
  const args = getArgs();

  const arg = args.find((s) =>
    flags.some((flag) => s === flag || s.startsWith(flag + '='))
  );
  if (arg) {
    if (arg.includes('=')) return arg.split('=')[1];
    // Find the next argument as the value
    const index = args.indexOf(arg);
    if (index < args.length - 1 && !args[index + 1].startsWith('-')) {
      return args[index + 1];
    }
    // if next arg isn't a value, we have a "true" flag
    return true;
  }
  return undefined;
}

// Generic argument getter factory

interface GetterOpts<T> {
  default: T;
}

interface ArgConfig<T> {
  name: string;
  aliases?: string[];
  opts?: ArgOpts<T>;
}

export function makeArgGetter<T>(
  parse:
    | ((argString: string, argConfig: ArgConfig<T>) => T)
    | ((argString: string) => T),
  getterOpts?: GetterOpts<T>
) {
  return function (
    name: string,
    aliases: string[] = [],
    opts?: ArgOpts<T>
  ): T | undefined {
    try {
      let argValue = getArg(name, aliases);
      let value: T | undefined;
      const flagString = makeFlagString(name, aliases);

      if (typeof argValue === 'string') {
        value = parse(argValue, { name, aliases });
        if (opts?.validate) {
          opts.validate(value);
        }
        return value;
      } else if (argValue === true) {
        if (typeof getterOpts?.default === 'boolean') {
          return parse('true', { name });
        } else {
          throw new ArgsError(
            `Using ${flagString} requires passing a second argument`
          );
        }
      } else if (argValue === undefined) {
        if (opts?.default !== undefined) {
          return opts?.default;
        } else if (opts?.required) {
          throw new ArgsError(`${flagString} is required`);
        } else {
          return getterOpts?.default;
        }
      }
    } catch (e) {
      if (e instanceof ArgsError) {
        console.error(`❌ ${e.message}`);
        process.exit(1);
      }
      throw e;
    }
  };
}

// Common argument getter functions
export const getStringArg = makeArgGetter<string>(String);
export const getNumberArg = makeArgGetter<number>(Number);
export const getBoolArg = makeArgGetter<boolean>(() => true, {
  default: false,
});

/**
 * A command to run on the server: a program, its arguments and optional
 * standard input. Arguments are never concatenated into a shell string by
 * callers; {@link renderCommand} quotes each one.
 */
export interface RemoteCommand {
  readonly program: string;
  readonly args: readonly string[];
  readonly stdin?: string;
}

const SAFE_ARGUMENT = /^[A-Za-z0-9_\-./:=@%+,]+$/;
const PROGRAM_NAME = /^[A-Za-z0-9_\-./]+$/;

export function command(program: string, ...args: string[]): RemoteCommand {
  if (!PROGRAM_NAME.test(program)) {
    throw new Error(`Invalid program name: ${program}`);
  }
  return { program, args };
}

export function withStdin(base: RemoteCommand, stdin: string): RemoteCommand {
  return { ...base, stdin };
}

/**
 * POSIX single-quote escaping. Plain words are left as they are.
 */
export function quoteArgument(argument: string): string {
  if (argument !== '' && SAFE_ARGUMENT.test(argument)) {
    return argument;
  }
  return `'${argument.replace(/'/g, `'\\''`)}'`;
}

export function renderCommand(remote: RemoteCommand): string {
  return [remote.program, ...remote.args].map(quoteArgument).join(' ');
}

/**
 * Escapes a value for use inside a single-quoted SQL string literal.
 */
export function sqlLiteral(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "''")}'`;
}

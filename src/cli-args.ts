/**
 * Command Line Arguments
 */

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'run'; path: string | undefined; debug: boolean }
  | { kind: 'error'; message: string };

/**
 * Parse the arguments after the script name. `--` ends the options, so
 * a file whose name starts with '-' can follow it.
 */
export function parseCliArgs(args: readonly string[]): CliCommand {
  const positional: string[] = [];
  let debug = false;
  let optionsEnded = false;

  for (const arg of args) {
    if (optionsEnded || arg === '-' || !arg.startsWith('-')) {
      positional.push(arg);
      continue;
    }

    switch (arg) {
      case '--':
        optionsEnded = true;
        break;
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-v':
      case '--version':
        return { kind: 'version' };
      case '--debug':
        debug = true;
        break;
      default:
        return { kind: 'error', message: `unknown option '${arg}'` };
    }
  }

  if (positional.length > 1) {
    return { kind: 'error', message: `expected at most one file, got ${positional.length}` };
  }

  return { kind: 'run', path: positional[0], debug };
}

/**
 * Command-line argument parsing.
 *
 * @module cli/args
 */

export interface ParsedArgs {
  command: string;
  positionals: string[];
  flags: Record<string, boolean>;
  options: Record<string, string>;
}

/** Long options that take the following argument as their value. */
export const VALUE_FLAGS: ReadonlySet<string> = new Set(['config', 'out', 'layout', 'value', 'text', 'log-level']);

export function parseArgs(args: string[]): ParsedArgs {
  const flags: Record<string, boolean> = {};
  const options: Record<string, string> = {};
  const positionals: string[] = [];
  let command = '';

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--') {
      positionals.push(...args.slice(i + 1));
      break;
    }
    if (arg.startsWith('--')) {
      const body = arg.slice(2);
      const eq = body.indexOf('=');
      if (eq > 0 && VALUE_FLAGS.has(body.slice(0, eq))) {
        options[body.slice(0, eq)] = body.slice(eq + 1);
      } else if (VALUE_FLAGS.has(body) && i + 1 < args.length) {
        options[body] = args[++i];
      } else {
        flags[body] = true;
      }
    } else if (arg.startsWith('-') && arg.length > 1) {
      for (const f of arg.slice(1).split('')) {
        switch (f) {
          case 'q': flags['quiet'] = true; break;
          case 'h': flags['help'] = true; break;
          case 'v': flags['version'] = true; break;
        }
      }
    } else if (!command) {
      command = arg;
    } else {
      positionals.push(arg);
    }
  }

  return { command, positionals, flags, options };
}

/**
 * CLI argument parsing
 */

import { createRequire } from 'module';

import { createTokenStream } from '../script/tokens.js';
import { ACTIONS, ACTION_NAMES } from '../templates/actions.js';
import type { ParsedArgs, RunnerConfig } from '../types/runner.js';
import { CompileError } from '../utils/errors.js';

const require = createRequire(import.meta.url);
const pkg = require('../../package.json') as { version: string };

export function getVersion(): string {
  return pkg.version;
}

/**
 * Configuration taken from the environment
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env
): Partial<RunnerConfig> {
  const config: Partial<RunnerConfig> = {
    kde5: env['KDE_SESSION_VERSION'] === '5',
  };
  const logDir = env['KDOTOOL_LOG_DIR'];
  if (logDir) {
    config.logDir = logDir;
  }
  return config;
}

/**
 * Parse CLI arguments
 * Global options are only recognized before the first command; everything
 * from the first non-option token on is handed to the compiler.
 */
export function parseArgs(
  args: string[],
  env: NodeJS.ProcessEnv = process.env
): ParsedArgs {
  if (args.length === 0) {
    return { action: 'help' };
  }

  const config: Partial<RunnerConfig> = configFromEnv(env);
  const tokens = createTokenStream(args);

  while (tokens.nextIsOption()) {
    const arg = tokens.next() ?? '';
    if (arg === '-h' || arg === '--help') {
      return { action: 'help' };
    } else if (arg === '-V' || arg === '--version') {
      return { action: 'version' };
    } else if (arg === '-d' || arg === '--debug') {
      config.debug = true;
    } else if (arg === '-n' || arg === '--dry-run') {
      config.dryRun = true;
    } else if (arg === '--log') {
      config.enableLog = true;
    } else {
      throw new CompileError(`unknown option: ${arg}`, arg);
    }
  }

  const commandArgs: string[] = [];
  let token = tokens.next();
  while (token !== null) {
    commandArgs.push(token);
    token = tokens.next();
  }

  return { action: 'run', config, commandArgs };
}

/**
 * Print usage information
 */
export function printUsage(): void {
  const width = Math.max(...ACTION_NAMES.map((name) => name.length)) + 11;
  const actionLines = ACTION_NAMES.map(
    (name) =>
      `  ${`${name} <window>`.padEnd(width)}${ACTIONS[name].description}`
  ).join('\n');

  console.log(`
kdotool - xdotool-style window control for KDE Plasma

Usage:
  kdotool [options] <command> [args...] [<command> [args...]]...

Options:
  -h, --help       Show this help
  -V, --version    Show the version
  -d, --debug      Enable debug output
  -n, --dry-run    Don't run the script, just print it to stdout
  --log            Write a log file (directory: $KDOTOOL_LOG_DIR or ./logs)

Commands:
  ${'search <term>'.padEnd(width)}Windows whose title, class, name and role match <term>
  ${'getactivewindow'.padEnd(width)}The active window
${actionLines}

Window can be specified as:
  %1            the first window in the stack (default)
  %2            the second window in the stack
  %@            all windows in the stack
  <window id>   the window with the given ID
`);
}

/**
 * Runner configuration and result types
 */

import {
  DEFAULT_DBUS_TIMEOUT_MS,
  DEFAULT_LOG_DIR,
} from '../utils/constants.js';

/**
 * Runner configuration
 */
export interface RunnerConfig {
  /** Emit DEBUG lines from the script and [KDOTOOL] diagnostics */
  debug: boolean;
  /** Print the script instead of running it */
  dryRun: boolean;
  /** Target KWin 5 */
  kde5: boolean;
  enableLog: boolean;
  logDir: string;
  dbusTimeoutMs: number;
}

/**
 * Default runner configuration
 */
export const DEFAULT_CONFIG: RunnerConfig = {
  debug: false,
  dryRun: false,
  kde5: false,
  enableLog: false,
  logDir: DEFAULT_LOG_DIR,
  dbusTimeoutMs: DEFAULT_DBUS_TIMEOUT_MS,
};

/**
 * Parsed CLI arguments
 */
export type ParsedArgs =
  | { action: 'help' }
  | { action: 'version' }
  | {
      action: 'run';
      config: Partial<RunnerConfig>;
      /** Command tokens after the global options */
      commandArgs: string[];
    };

/**
 * Outcome of one invocation
 */
export interface RunOutcome {
  results: string[];
  errors: string[];
  /** The script's FINISH line was found in the log */
  finished: boolean;
}

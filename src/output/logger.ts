/**
 * Opt-in run log: the script, the raw journal and JSON events
 */

import * as fs from 'fs';
import * as path from 'path';

import { stripAnsi } from './colors.js';

/**
 * Run event for structured logging
 */
export interface KdotoolEvent {
  type: 'kdotool';
  event: string;
  timestamp: string;
  [key: string]: unknown;
}

export interface Logger {
  log(msg: string): void;
  logEvent(event: Omit<KdotoolEvent, 'type' | 'timestamp'>): void;
  close(): void;
}

const NOOP_LOGGER: Logger = {
  log: () => undefined,
  logEvent: () => undefined,
  close: () => undefined,
};

/**
 * Log file name for a run: <command>-<YYYY-MM-DDTHH-MM-SS>.log
 */
export function logFileName(
  commandName: string,
  date: Date = new Date()
): string {
  const stamp = date.toISOString().slice(0, 19).replace(/:/g, '-');
  const name = path.basename(commandName).replace(/[^\w.-]/g, '_');
  return `${name}-${stamp}.log`;
}

/**
 * Create a logger for one run; disabled loggers discard everything
 */
export function createLogger(
  enabled: boolean,
  logDir: string,
  commandName: string
): Logger {
  if (!enabled) {
    return NOOP_LOGGER;
  }

  fs.mkdirSync(logDir, { recursive: true });
  const stream = fs.createWriteStream(
    path.join(logDir, logFileName(commandName)),
    { flags: 'a' }
  );

  return {
    log(msg: string): void {
      stream.write(`${stripAnsi(msg)}\n`);
    },
    logEvent(eventData: Omit<KdotoolEvent, 'type' | 'timestamp'>): void {
      const event = {
        type: 'kdotool' as const,
        timestamp: new Date().toISOString(),
        ...eventData,
      };
      stream.write(`${JSON.stringify(event)}\n`);
    },
    close(): void {
      stream.end();
    },
  };
}

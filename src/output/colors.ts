/**
 * ANSI color codes for terminal output
 */

export const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  bold: '\x1b[1m',
  cyan: '\x1b[36m',
  yellow: '\x1b[33m',
  green: '\x1b[32m',
  red: '\x1b[31m',
  magenta: '\x1b[35m',
} as const;

/**
 * Strip ANSI escape codes from a string
 */
// eslint-disable-next-line no-control-regex -- ANSI escape codes require control characters
const ANSI_REGEX = /\x1b\[[0-9;?]*[a-zA-Z]|\x1b\][^\x07]*\x07/g;

export function stripAnsi(str: string): string {
  return str.replace(ANSI_REGEX, '');
}

/**
 * Format duration in human-readable form
 * Examples: 450ms, 2.5s
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  return `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Format current timestamp as HH:MM:SS.mmm
 */
export function formatTimestamp(date: Date = new Date()): string {
  const h = date.getHours().toString().padStart(2, '0');
  const m = date.getMinutes().toString().padStart(2, '0');
  const s = date.getSeconds().toString().padStart(2, '0');
  const ms = date.getMilliseconds().toString().padStart(3, '0');
  return `${h}:${m}:${s}.${ms}`;
}

/**
 * Get a timestamped prefix for output lines
 */
export function timestampPrefix(): string {
  return `${colors.dim}${formatTimestamp()}${colors.reset} `;
}

/**
 * Print a [KDOTOOL] diagnostic line with timestamp
 * Goes to stderr: stdout is reserved for results and dry-run scripts
 */
export function printDiagnostic(message: string): void {
  console.error(
    `${timestampPrefix()}${colors.magenta}[KDOTOOL]${colors.reset} ${message}`
  );
}

/**
 * Print a [KWIN] line relayed from the script's DEBUG channel
 */
export function printKWinDebug(message: string): void {
  console.error(
    `${timestampPrefix()}${colors.cyan}[KWIN]${colors.reset} ${message}`
  );
}

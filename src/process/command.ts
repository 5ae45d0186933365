/**
 * Process management for external helpers (gdbus, journalctl)
 */

import { spawn } from 'child_process';

export interface CommandOptions {
  cwd?: string;
  env?: Record<string, string | undefined>;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Render a command line for logs and error messages
 */
export function formatCommand(file: string, args: readonly string[]): string {
  return [file, ...args]
    .map((part) => (/^[\w@%+=:,./-]+$/.test(part) ? part : `'${part}'`))
    .join(' ');
}

/**
 * Spawn a command with piped output and collect stdout and stderr
 * Resolves once both pipes are drained; rejects only when the process
 * cannot be started
 */
export function runCommand(
  file: string,
  args: readonly string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const env: Record<string, string> = {};
    for (const [key, value] of Object.entries({
      ...process.env,
      ...options.env,
    })) {
      if (value !== undefined) {
        env[key] = value;
      }
    }

    const child = spawn(file, [...args], {
      cwd: options.cwd ?? process.cwd(),
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.on('error', reject);

    // 'close' comes after 'exit' and after both pipes have ended
    child.on('close', (code) => {
      resolve({
        exitCode: code ?? 1,
        stdout: Buffer.concat(stdout).toString('utf-8'),
        stderr: Buffer.concat(stderr).toString('utf-8'),
      });
    });
  });
}

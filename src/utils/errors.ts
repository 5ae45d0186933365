/**
 * Error types raised while compiling and running scripts
 */

/**
 * Malformed command line. Raised before any script text exists.
 */
export class CompileError extends Error {
  readonly token: string | null;

  constructor(message: string, token: string | null = null) {
    super(message);
    this.name = 'CompileError';
    this.token = token;
  }
}

/**
 * An external command (gdbus, journalctl) failed or replied with garbage
 */
export class TransportError extends Error {
  readonly command: string;
  readonly output: string;

  constructor(message: string, command: string, output = '') {
    super(message);
    this.name = 'TransportError';
    this.command = command;
    this.output = output;
  }
}

/**
 * KWin scripting client over D-Bus
 *
 * Talks to org.kde.KWin through `gdbus call`.
 */

import type { Logger } from '../output/logger.js';
import { formatCommand, runCommand } from '../process/command.js';
import {
  KWIN_DBUS_SERVICE,
  KWIN_SCRIPT_INTERFACE,
  KWIN_SCRIPTING_INTERFACE,
  KWIN_SCRIPTING_PATH,
  MS_PER_SECOND,
} from '../utils/constants.js';
import { TransportError } from '../utils/errors.js';

/**
 * Host that loads and executes generated scripts
 */
export interface ScriptHost {
  /** Load a script file, returning the host's script id */
  loadScript(filePath: string): Promise<number>;
  runScript(scriptId: number): Promise<void>;
  stopScript(scriptId: number): Promise<void>;
}

export interface KWinScriptHostOptions {
  /** Per-call timeout in ms (gdbus takes whole seconds) */
  timeoutMs: number;
  logger: Logger;
  /** D-Bus client binary */
  gdbus?: string;
}

/**
 * Object path of a loaded script
 */
export function scriptObjectPath(scriptId: number): string {
  return `${KWIN_SCRIPTING_PATH}/Script${scriptId}`;
}

/**
 * Extract the integer from a gdbus reply such as "(3,)" or "(int32 3,)"
 */
export function parseScriptId(reply: string): number | null {
  const match = /\((?:int32 )?(-?\d+),\)/.exec(reply);
  if (!match?.[1]) {
    return null;
  }
  return Number.parseInt(match[1], 10);
}

/**
 * Create a ScriptHost backed by KWin's D-Bus scripting interface
 */
export function createKWinScriptHost(
  options: KWinScriptHostOptions
): ScriptHost {
  const { logger } = options;
  const gdbus = options.gdbus ?? 'gdbus';
  const timeoutSeconds = Math.max(
    1,
    Math.ceil(options.timeoutMs / MS_PER_SECOND)
  );

  async function call(
    objectPath: string,
    method: string,
    args: string[] = []
  ): Promise<string> {
    const commandArgs = [
      'call',
      '--session',
      '--dest',
      KWIN_DBUS_SERVICE,
      '--object-path',
      objectPath,
      '--method',
      method,
      '--timeout',
      String(timeoutSeconds),
      ...args,
    ];
    const command = formatCommand(gdbus, commandArgs);
    logger.log(`$ ${command}`);

    const { exitCode, stdout, stderr } = await runCommand(gdbus, commandArgs);
    logger.log(`${stdout}${stderr}`.trimEnd());

    if (exitCode !== 0) {
      const detail = stderr.trim() || stdout.trim();
      throw new TransportError(
        `D-Bus call ${method} failed (exit ${exitCode}): ${detail}`,
        command,
        stderr
      );
    }
    return stdout;
  }

  return {
    async loadScript(filePath: string): Promise<number> {
      const reply = await call(
        KWIN_SCRIPTING_PATH,
        `${KWIN_SCRIPTING_INTERFACE}.loadScript`,
        [filePath]
      );
      const scriptId = parseScriptId(reply);
      if (scriptId === null) {
        throw new TransportError(
          `Unexpected reply from loadScript: ${reply.trim()}`,
          `${KWIN_SCRIPTING_INTERFACE}.loadScript`,
          reply
        );
      }
      if (scriptId < 0) {
        throw new TransportError(
          `KWin refused to load script: ${filePath}`,
          `${KWIN_SCRIPTING_INTERFACE}.loadScript`,
          reply
        );
      }
      logger.logEvent({ event: 'script_loaded', scriptId });
      return scriptId;
    },

    async runScript(scriptId: number): Promise<void> {
      await call(scriptObjectPath(scriptId), `${KWIN_SCRIPT_INTERFACE}.run`);
    },

    async stopScript(scriptId: number): Promise<void> {
      await call(scriptObjectPath(scriptId), `${KWIN_SCRIPT_INTERFACE}.stop`);
    },
  };
}

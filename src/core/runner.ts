/**
 * Core runner: compile, load into KWin, collect output from the journal
 */

import type { JournalReader } from '../kwin/journal.js';
import type { ScriptHost } from '../kwin/scripting.js';
import {
  formatDuration,
  printDiagnostic,
  printKWinDebug,
} from '../output/colors.js';
import type { Logger } from '../output/logger.js';
import { demultiplex } from '../output/protocol.js';
import { compileScript } from '../script/index.js';
import type { RunOutcome, RunnerConfig } from '../types/runner.js';
import { createScriptFile, type ScriptFile } from './script-file.js';

export interface RunnerContext {
  config: RunnerConfig;
  logger: Logger;
  host: ScriptHost;
  journal: JournalReader;
  /** Creates the temp script file; the default uses the OS temp dir */
  createScriptFile?: () => ScriptFile;
  /** Receives RESULT payloads (and the script on --dry-run) */
  stdout?: (line: string) => void;
  /** Receives ERROR payloads */
  stderr?: (line: string) => void;
}

function trace(context: RunnerContext, message: string): void {
  context.logger.log(message);
  if (context.config.debug) {
    printDiagnostic(message);
  }
}

/**
 * Compile the commands and run them inside KWin
 */
export async function runCommands(
  commandArgs: string[],
  context: RunnerContext
): Promise<RunOutcome> {
  const { config, logger, host, journal } = context;
  const stdout = context.stdout ?? ((line: string) => console.log(line));
  const stderr = context.stderr ?? ((line: string) => console.error(line));

  trace(context, '===== Generate KWin script =====');
  const scriptFile = (context.createScriptFile ?? createScriptFile)();

  try {
    const { steps, text } = compileScript(commandArgs, {
      marker: scriptFile.marker,
      debug: config.debug,
      kde5: config.kde5,
    });
    logger.logEvent({
      event: 'compiled',
      marker: scriptFile.marker,
      steps: steps.map((step) => step.type),
    });
    trace(context, `Script:\n${text}`);

    if (config.dryRun) {
      stdout(text);
      return { results: [], errors: [], finished: false };
    }

    scriptFile.write(text);
    const startTime = new Date();

    trace(context, '===== Load script into KWin =====');
    const scriptId = await host.loadScript(scriptFile.path);
    trace(context, `Script ID: ${scriptId}`);

    trace(context, '===== Run script =====');
    await host.runScript(scriptId);
    await host.stopScript(scriptId);

    const log = await journal.read(startTime);
    const output = demultiplex(log, scriptFile.marker);

    trace(context, '===== Output =====');
    if (config.debug) {
      for (const line of output.debug) {
        printKWinDebug(line);
      }
    }
    for (const line of output.results) {
      stdout(line);
    }
    for (const line of output.errors) {
      stderr(line);
    }

    if (!output.finished) {
      trace(
        context,
        `No FINISH line for ${scriptFile.marker} in the journal yet; output may be incomplete`
      );
    }
    logger.logEvent({
      event: 'finished',
      marker: scriptFile.marker,
      results: output.results.length,
      errors: output.errors.length,
      finished: output.finished,
      duration: formatDuration(Date.now() - startTime.getTime()),
    });

    return {
      results: output.results,
      errors: output.errors,
      finished: output.finished,
    };
  } finally {
    scriptFile.remove();
  }
}

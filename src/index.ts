#!/usr/bin/env node
/**
 * kdotool - xdotool-style window control for KDE Plasma
 * Compiles commands to a KWin script, runs it over D-Bus and reports the
 * results it left in the journal
 */

import { getVersion, parseArgs, printUsage } from './cli/args.js';
import { type RunnerContext, runCommands } from './core/runner.js';
import { createJournalReader, createKWinScriptHost } from './kwin/index.js';
import { createLogger } from './output/logger.js';
import { DEFAULT_CONFIG, type RunnerConfig } from './types/runner.js';

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const parsed = parseArgs(args);

  if (parsed.action === 'help') {
    printUsage();
    return;
  }
  if (parsed.action === 'version') {
    console.log(getVersion());
    return;
  }

  // Merge config with defaults
  const config: RunnerConfig = {
    ...DEFAULT_CONFIG,
    ...parsed.config,
  };

  const logger = createLogger(
    config.enableLog,
    config.logDir,
    parsed.commandArgs[0] ?? 'kdotool'
  );
  logger.logEvent({ event: 'run_start', args });

  const context: RunnerContext = {
    config,
    logger,
    host: createKWinScriptHost({ timeoutMs: config.dbusTimeoutMs, logger }),
    journal: createJournalReader({ logger }),
  };

  try {
    const outcome = await runCommands(parsed.commandArgs, context);
    process.exitCode = outcome.errors.length > 0 ? 1 : 0;
  } finally {
    logger.close();
  }
}

// Run main
main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Error: ${message}`);
  process.exit(1);
});

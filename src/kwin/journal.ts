/**
 * Reads the KWin log from the systemd user journal
 */

import type { Logger } from '../output/logger.js';
import { formatCommand, runCommand } from '../process/command.js';
import { KWIN_JOURNAL_UNITS } from '../utils/constants.js';
import { TransportError } from '../utils/errors.js';

export interface JournalReader {
  /** Log text written since the given time */
  read(since: Date): Promise<string>;
}

export interface JournalReaderOptions {
  logger: Logger;
  /** journalctl binary */
  journalctl?: string;
}

/**
 * Format a local time the way journalctl --since expects it
 * (YYYY-MM-DD HH:MM:SS)
 */
export function formatJournalTime(date: Date): string {
  const pad = (n: number): string => n.toString().padStart(2, '0');
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

/**
 * journalctl arguments selecting the KWin units since a point in time
 */
export function buildJournalArgs(since: Date): string[] {
  return [
    `--since=${formatJournalTime(since)}`,
    '--user',
    ...KWIN_JOURNAL_UNITS.map((unit) => `--unit=${unit}`),
    '--output=cat',
    '--no-pager',
  ];
}

export function createJournalReader(
  options: JournalReaderOptions
): JournalReader {
  const { logger } = options;
  const journalctl = options.journalctl ?? 'journalctl';

  return {
    async read(since: Date): Promise<string> {
      const args = buildJournalArgs(since);
      const command = formatCommand(journalctl, args);
      logger.log(`$ ${command}`);

      const { exitCode, stdout, stderr } = await runCommand(journalctl, args, {
        env: { SYSTEMD_COLORS: '0', SYSTEMD_PAGER: '' },
      });

      if (exitCode !== 0) {
        const detail = stderr.trim() || stdout.trim();
        throw new TransportError(
          `journalctl failed (exit ${exitCode}): ${detail}`,
          command,
          stderr
        );
      }

      logger.log(`KWin log from the systemd journal:\n${stdout.trimEnd()}`);
      return stdout;
    },
  };
}

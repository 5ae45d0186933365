/**
 * KWin integration: script host and journal access
 */

export type { JournalReader, JournalReaderOptions } from './journal.js';
export {
  buildJournalArgs,
  createJournalReader,
  formatJournalTime,
} from './journal.js';
export type { KWinScriptHostOptions, ScriptHost } from './scripting.js';
export {
  createKWinScriptHost,
  parseScriptId,
  scriptObjectPath,
} from './scripting.js';

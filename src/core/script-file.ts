/**
 * Temporary script file; its directory name doubles as the run marker
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { SCRIPT_FILE_NAME, TEMP_DIR_PREFIX } from '../utils/constants.js';

export interface ScriptFile {
  /** Unique per invocation, prefixed to every protocol line */
  marker: string;
  /** Absolute path of the script inside the temp directory */
  path: string;
  write(contents: string): void;
  /** Delete the temp directory. Safe to call more than once. */
  remove(): void;
}

/**
 * Create a uniquely named temp directory for one run
 */
export function createScriptFile(tmpDir: string = os.tmpdir()): ScriptFile {
  const dir = fs.mkdtempSync(path.join(tmpDir, TEMP_DIR_PREFIX));
  const filePath = path.join(dir, SCRIPT_FILE_NAME);

  return {
    marker: path.basename(dir),
    path: filePath,
    write(contents: string): void {
      fs.writeFileSync(filePath, contents, 'utf-8');
    },
    remove(): void {
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}

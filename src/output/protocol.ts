/**
 * Marker-tagged output protocol shared by the generated script and the
 * journal decoder.
 *
 * Every line the script prints has the form `<marker> <CHANNEL> <payload>`.
 * KWin writes it to its log behind a host prefix (`js: `), interleaved with
 * everything else the compositor and other kdotool runs log.
 */

import { KWIN_LOG_PREFIX } from '../utils/constants.js';
import { stripAnsi } from './colors.js';

export const CHANNELS = [
  'START',
  'DEBUG',
  'ERROR',
  'RESULT',
  'FINISH',
] as const;

export type Channel = (typeof CHANNELS)[number];

export interface ProtocolLine {
  channel: Channel;
  payload: string;
}

/**
 * Payloads recovered for one marker, in emission order
 */
export interface DecodedOutput {
  started: boolean;
  finished: boolean;
  results: string[];
  errors: string[];
  debug: string[];
}

export function isChannel(value: string): value is Channel {
  return CHANNELS.some((channel) => channel === value);
}

/**
 * Build a protocol line. START and FINISH carry no payload.
 */
export function encodeLine(
  marker: string,
  channel: Channel,
  payload?: string
): string {
  const head = `${marker} ${channel}`;
  return payload === undefined ? head : `${head} ${payload}`;
}

/**
 * Decode a line whose host prefix was already removed
 * Returns null for lines that belong to another marker or are not
 * protocol lines at all
 */
export function decodeLine(text: string, marker: string): ProtocolLine | null {
  if (!text.startsWith(`${marker} `)) {
    return null;
  }

  const rest = text.slice(marker.length + 1);
  const space = rest.indexOf(' ');
  const channel = space === -1 ? rest : rest.slice(0, space);
  if (!isChannel(channel)) {
    return null;
  }

  const payload = space === -1 ? '' : rest.slice(space + 1);
  return { channel, payload };
}

/**
 * Remove the host prefix from a raw log line
 * Returns null when the line was not written by a script
 */
export function stripHostPrefix(
  line: string,
  prefix: string = KWIN_LOG_PREFIX
): string | null {
  return line.startsWith(prefix) ? line.slice(prefix.length) : null;
}

/**
 * Split a shared log into the payloads of one marker
 */
export function demultiplex(
  log: string,
  marker: string,
  prefix: string = KWIN_LOG_PREFIX
): DecodedOutput {
  const output: DecodedOutput = {
    started: false,
    finished: false,
    results: [],
    errors: [],
    debug: [],
  };

  for (const rawLine of stripAnsi(log).split(/\r?\n/)) {
    const text = stripHostPrefix(rawLine, prefix);
    if (text === null) {
      continue;
    }
    const line = decodeLine(text, marker);
    if (!line) {
      continue;
    }

    switch (line.channel) {
      case 'START':
        output.started = true;
        break;
      case 'FINISH':
        output.finished = true;
        break;
      case 'RESULT':
        output.results.push(line.payload);
        break;
      case 'ERROR':
        output.errors.push(line.payload);
        break;
      case 'DEBUG':
        output.debug.push(line.payload);
        break;
    }
  }

  return output;
}

import { describe, expect, it } from 'vitest';

import {
  decodeLine,
  demultiplex,
  encodeLine,
  isChannel,
  stripHostPrefix,
} from '../../src/output/protocol.js';

const MARKER = 'kdotool-AbC123';

describe('encodeLine', () => {
  it('omits the payload for START and FINISH', () => {
    expect(encodeLine(MARKER, 'START')).toBe('kdotool-AbC123 START');
    expect(encodeLine(MARKER, 'FINISH')).toBe('kdotool-AbC123 FINISH');
  });

  it('appends the payload after a space', () => {
    expect(encodeLine(MARKER, 'RESULT', '{aaaa-0001}')).toBe(
      'kdotool-AbC123 RESULT {aaaa-0001}'
    );
  });
});

describe('isChannel', () => {
  it('accepts the five channels only', () => {
    expect(isChannel('RESULT')).toBe(true);
    expect(isChannel('DEBUG')).toBe(true);
    expect(isChannel('result')).toBe(false);
    expect(isChannel('WARN')).toBe(false);
  });
});

describe('decodeLine', () => {
  it('decodes its own marker', () => {
    expect(decodeLine('kdotool-AbC123 ERROR no such window', MARKER)).toEqual({
      channel: 'ERROR',
      payload: 'no such window',
    });
  });

  it('decodes payload-less lines', () => {
    expect(decodeLine('kdotool-AbC123 START', MARKER)).toEqual({
      channel: 'START',
      payload: '',
    });
  });

  it('keeps spaces inside the payload', () => {
    expect(decodeLine('kdotool-AbC123 RESULT   Position: 1,2', MARKER)).toEqual(
      { channel: 'RESULT', payload: '  Position: 1,2' }
    );
  });

  it('ignores other markers', () => {
    expect(decodeLine('kdotool-ZZZ999 RESULT x', MARKER)).toBeNull();
    expect(decodeLine('kdotool-AbC1234 RESULT x', MARKER)).toBeNull();
  });

  it('ignores unknown channels', () => {
    expect(decodeLine('kdotool-AbC123 NOTICE x', MARKER)).toBeNull();
  });
});

describe('stripHostPrefix', () => {
  it('removes the default prefix', () => {
    expect(stripHostPrefix('js: hello')).toBe('hello');
  });

  it('returns null without the prefix', () => {
    expect(stripHostPrefix('kwin_core: hello')).toBeNull();
  });

  it('accepts a custom prefix', () => {
    expect(stripHostPrefix('qml: hello', 'qml: ')).toBe('hello');
  });
});

describe('demultiplex', () => {
  it('collects payloads of one marker in order', () => {
    const log = [
      'kwin_wayland: some compositor chatter',
      'js: kdotool-AbC123 START',
      'js: kdotool-OTHER1 START',
      'js: kdotool-AbC123 DEBUG STEP search kate',
      'js: kdotool-AbC123 RESULT {bbbb-0001}',
      'js: kdotool-OTHER1 RESULT {ffff-0000}',
      'js: kdotool-AbC123 ERROR oops',
      'js: kdotool-AbC123 RESULT {bbbb-0002}',
      'js: kdotool-AbC123 FINISH',
      '',
    ].join('\n');

    expect(demultiplex(log, MARKER)).toEqual({
      started: true,
      finished: true,
      results: ['{bbbb-0001}', '{bbbb-0002}'],
      errors: ['oops'],
      debug: ['STEP search kate'],
    });
  });

  it('reports a run that never finished', () => {
    const log = 'js: kdotool-AbC123 START\njs: kdotool-AbC123 RESULT a\n';

    expect(demultiplex(log, MARKER)).toMatchObject({
      started: true,
      finished: false,
      results: ['a'],
    });
  });

  it('handles CRLF and ANSI colors', () => {
    const log =
      '\x1b[0mjs: kdotool-AbC123 RESULT a\r\njs: kdotool-AbC123 RESULT b\x1b[0m\r\n';

    expect(demultiplex(log, MARKER).results).toEqual(['a', 'b']);
  });

  it('skips marker lines without the host prefix', () => {
    expect(demultiplex('kdotool-AbC123 RESULT a', MARKER).results).toEqual([]);
  });

  it('returns empty output for an empty log', () => {
    expect(demultiplex('', MARKER)).toEqual({
      started: false,
      finished: false,
      results: [],
      errors: [],
      debug: [],
    });
  });
});

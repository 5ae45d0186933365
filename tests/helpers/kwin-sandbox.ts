/**
 * In-process stand-in for the KWin scripting host
 *
 * Runs a generated script in a fresh vm context with a fake `workspace`
 * and a `print` that records lines the way KWin logs them (arguments
 * joined by spaces).
 */

import * as vm from 'vm';

export interface FakeWindow {
  internalId: string;
  caption: string;
  resourceClass: string;
  resourceName: string;
  windowRole: string;
  pid: number;
  x: number;
  y: number;
  width: number;
  height: number;
  minimized: boolean;
  closed: boolean;
  killed: boolean;
  closeWindow(): void;
  killWindow(): void;
}

export type FakeWindowInit = Pick<FakeWindow, 'internalId'> &
  Partial<
    Omit<FakeWindow, 'internalId' | 'closeWindow' | 'killWindow'>
  >;

export function createFakeWindow(init: FakeWindowInit): FakeWindow {
  const window: FakeWindow = {
    caption: '',
    resourceClass: '',
    resourceName: '',
    windowRole: '',
    pid: 0,
    x: 0,
    y: 0,
    width: 0,
    height: 0,
    minimized: false,
    closed: false,
    killed: false,
    ...init,
    closeWindow(): void {
      window.closed = true;
    },
    killWindow(): void {
      window.killed = true;
    },
  };
  return window;
}

export interface FakeWorkspace {
  activeWindow: FakeWindow | null;
  /** Which enumeration calls the script made */
  listCalls: string[];
  /** internalIds passed to raiseWindow(), in order */
  raised: string[];
  windowList(): FakeWindow[];
  clientList(): FakeWindow[];
  raiseWindow(window: FakeWindow): void;
  setActiveWindow(window: FakeWindow): void;
}

export function createFakeWorkspace(
  windows: FakeWindow[],
  activeWindow: FakeWindow | null = null
): FakeWorkspace {
  const workspace: FakeWorkspace = {
    activeWindow,
    listCalls: [],
    raised: [],
    windowList(): FakeWindow[] {
      workspace.listCalls.push('windowList');
      return windows;
    },
    clientList(): FakeWindow[] {
      workspace.listCalls.push('clientList');
      return windows;
    },
    raiseWindow(window: FakeWindow): void {
      workspace.raised.push(window.internalId);
    },
    setActiveWindow(window: FakeWindow): void {
      workspace.activeWindow = window;
    },
  };
  return workspace;
}

/**
 * Execute a script and return the printed lines
 */
export function runInKWin(script: string, workspace: FakeWorkspace): string[] {
  const lines: string[] = [];
  const print = (...args: unknown[]): void => {
    lines.push(args.map((arg) => String(arg)).join(' '));
  };
  vm.runInNewContext(script, { print, workspace });
  return lines;
}

/**
 * Sample desktop used across execution tests
 */
export function createSampleWindows(): {
  browser: FakeWindow;
  privateBrowser: FakeWindow;
  editor: FakeWindow;
  editorTips: FakeWindow;
} {
  return {
    browser: createFakeWindow({
      internalId: '{aaaa-0001}',
      caption: 'Mozilla Firefox',
      resourceClass: 'firefox',
      resourceName: 'firefox',
      windowRole: 'firefox-browser',
      pid: 101,
      x: 10,
      y: 20,
      width: 800,
      height: 600,
    }),
    privateBrowser: createFakeWindow({
      internalId: '{aaaa-0002}',
      caption: 'Firefox Private Browsing',
      resourceClass: 'firefox',
      resourceName: 'firefox',
      windowRole: 'firefox-browser',
      pid: 102,
    }),
    editor: createFakeWindow({
      internalId: '{bbbb-0001}',
      caption: 'notes.txt - Kate',
      resourceClass: 'org.kde.kate',
      resourceName: 'kate',
      windowRole: 'kate-mainwindow#1',
      pid: 201,
    }),
    editorTips: createFakeWindow({
      internalId: '{bbbb-0002}',
      caption: 'firefox-tips.md - Kate',
      resourceClass: 'org.kde.kate',
      resourceName: 'kate',
      windowRole: 'kate-mainwindow#2',
      pid: 202,
    }),
  };
}

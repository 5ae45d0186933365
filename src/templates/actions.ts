/**
 * Action catalog: verb -> KWin script fragment
 *
 * Fragments operate on a window bound to `w` by the enclosing step.
 * Query actions report through output_result(); mutations only touch `w`.
 */

export type ActionKind = 'query' | 'mutation';

export interface ActionDefinition {
  kind: ActionKind;
  fragment: string;
  description: string;
}

export const ACTIONS = {
  getwindowname: {
    kind: 'query',
    fragment: 'output_result(w.caption);',
    description: 'Print the window title',
  },
  getwindowclassname: {
    kind: 'query',
    fragment: 'output_result(w.resourceClass);',
    description: 'Print the window class',
  },
  getwindowgeometry: {
    kind: 'query',
    fragment:
      'output_result(`Window ${w.internalId}`); ' +
      'output_result(`  Position: ${w.x},${w.y}`); ' +
      'output_result(`  Geometry: ${w.width}x${w.height}`);',
    description: 'Print the window position and size',
  },
  getwindowpid: {
    kind: 'query',
    fragment: 'output_result(w.pid);',
    description: 'Print the PID owning the window',
  },
  windowminimize: {
    kind: 'mutation',
    fragment: 'w.minimized = true;',
    description: 'Minimize the window',
  },
  windowraise: {
    kind: 'mutation',
    fragment: 'workspace.raiseWindow(w);',
    description: 'Raise the window to the top of the stacking order',
  },
  windowclose: {
    kind: 'mutation',
    fragment: 'w.closeWindow();',
    description: 'Close the window',
  },
  windowkill: {
    kind: 'mutation',
    fragment: 'w.killWindow();',
    description: 'Kill the client owning the window',
  },
  windowactivate: {
    kind: 'mutation',
    fragment: 'workspace.setActiveWindow(w);',
    description: 'Activate the window',
  },
} as const satisfies Record<string, ActionDefinition>;

export type ActionName = keyof typeof ACTIONS;

export function isActionName(value: string): value is ActionName {
  return Object.prototype.hasOwnProperty.call(ACTIONS, value);
}

export const ACTION_NAMES: ActionName[] =
  Object.keys(ACTIONS).filter(isActionName);

/**
 * Look up the script fragment for an action
 */
export function getActionFragment(name: ActionName): string {
  return ACTIONS[name].fragment;
}

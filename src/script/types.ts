/**
 * Types for parsed commands and lowered script steps
 */

import type { ActionName } from '../templates/actions.js';

/**
 * Window selector for an action verb
 * - window_id: a literal KWin internalId
 * - stack_index: 1-based position in the window stack (%N)
 * - stack_all: every window in the stack (%@)
 */
export type Selector =
  | { kind: 'window_id'; id: string }
  | { kind: 'stack_index'; index: number }
  | { kind: 'stack_all' };

/**
 * search <term>
 */
export interface SearchIntent {
  type: 'search';
  term: string;
}

/**
 * getactivewindow
 */
export interface GetActiveWindowIntent {
  type: 'getactivewindow';
}

/**
 * <action> [selector]
 */
export interface ActionIntent {
  type: 'action';
  verb: ActionName;
  selector: Selector;
}

/**
 * Union of all command intents
 */
export type CommandIntent =
  | SearchIntent
  | GetActiveWindowIntent
  | ActionIntent;

/**
 * One unit of generated script logic
 */
export type Step =
  | { type: 'search'; term: string; matchAny: boolean }
  | { type: 'getactivewindow' }
  | { type: 'action_on_id'; action: ActionName; windowId: string }
  | { type: 'action_on_stack_item'; action: ActionName; index: number }
  | { type: 'action_on_stack_all'; action: ActionName }
  | { type: 'final_output' };

export type StepType = Step['type'];

/**
 * Compile-time flags that change the rendered text
 */
export interface RenderContext {
  /** Per-invocation marker prefixed to every output line */
  marker: string;
  /** Emit DEBUG lines */
  debug: boolean;
  /** Target KWin 5 (workspace.clientList) instead of KWin 6 */
  kde5: boolean;
}

/**
 * Result of compiling a command line
 */
export interface CompiledScript {
  steps: Step[];
  text: string;
}

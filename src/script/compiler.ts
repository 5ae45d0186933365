/**
 * Lowers a command line into a KWin script
 *
 * Parsing and lowering run in the same left-to-right pass. The text is only
 * joined once every token was accepted, so a CompileError never leaves a
 * partial script behind.
 */

import {
  renderEpilogue,
  renderPrologue,
  renderStep,
} from '../templates/kwin.js';
import { parseNextIntent } from './parser.js';
import { createTokenStream } from './tokens.js';
import type {
  ActionIntent,
  CommandIntent,
  CompiledScript,
  RenderContext,
  Step,
} from './types.js';

/**
 * Whether an intent replaces the window stack
 */
export function isQueryIntent(intent: CommandIntent): boolean {
  return intent.type === 'search' || intent.type === 'getactivewindow';
}

function lowerAction(intent: ActionIntent): Step {
  const { verb, selector } = intent;
  switch (selector.kind) {
    case 'window_id':
      return { type: 'action_on_id', action: verb, windowId: selector.id };
    case 'stack_index':
      return {
        type: 'action_on_stack_item',
        action: verb,
        index: selector.index,
      };
    case 'stack_all':
      return { type: 'action_on_stack_all', action: verb };
  }
}

/**
 * Lower a single intent into its step
 */
export function lowerIntent(intent: CommandIntent): Step {
  switch (intent.type) {
    case 'search':
      // No command-line syntax selects "any field matches" yet
      return { type: 'search', term: intent.term, matchAny: false };
    case 'getactivewindow':
      return { type: 'getactivewindow' };
    case 'action':
      return lowerAction(intent);
  }
}

/**
 * Compile command-line tokens into a script
 *
 * @param tokens - Command tokens (global options already removed)
 * @param context - Marker and render flags
 */
export function compileScript(
  tokens: readonly string[],
  context: RenderContext
): CompiledScript {
  const stream = createTokenStream(tokens);
  const steps: Step[] = [];
  const chunks: string[] = [renderPrologue(context)];
  let lastStepIsQuery = false;

  let intent = parseNextIntent(stream);
  while (intent) {
    const step = lowerIntent(intent);
    steps.push(step);
    chunks.push(renderStep(step, context));
    lastStepIsQuery = isQueryIntent(intent);
    intent = parseNextIntent(stream);
  }

  // A trailing query prints the ids it found
  if (lastStepIsQuery) {
    const finalStep: Step = { type: 'final_output' };
    steps.push(finalStep);
    chunks.push(renderStep(finalStep, context));
  }

  chunks.push(renderEpilogue(context));

  return { steps, text: chunks.join('') };
}

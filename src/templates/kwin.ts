/**
 * KWin script templates
 *
 * The generated script keeps a `window_stack` inside run(). Query steps
 * replace it, action steps read it. Each step renders as its own block so
 * chained steps never redeclare each other's locals.
 */

import { encodeLine } from '../output/protocol.js';
import type { RenderContext, Step } from '../script/types.js';
import { type ActionName, getActionFragment } from './actions.js';

/**
 * Render a value as a JavaScript string literal
 * U+2028 and U+2029 are line terminators in pre-ES2019 string literals
 */
export function jsString(value: string): string {
  return JSON.stringify(value)
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
}

/**
 * Window enumeration call for the target KWin version
 */
export function windowListCall(context: RenderContext): string {
  return context.kde5 ? 'workspace.clientList()' : 'workspace.windowList()';
}

function debugLine(label: string): string {
  return `        output_debug(${jsString(label)});\n`;
}

export function renderPrologue(context: RenderContext): string {
  const { marker, debug } = context;
  const debugBody = debug
    ? `    print(${jsString(encodeLine(marker, 'DEBUG'))}, message);\n`
    : '';

  return `print(${jsString(encodeLine(marker, 'START'))});

function output_debug(message) {
${debugBody}}

function output_error(message) {
    print(${jsString(encodeLine(marker, 'ERROR'))}, message);
}

function output_result(message) {
    print(${jsString(encodeLine(marker, 'RESULT'))}, message);
}

function run() {
    var window_stack = [];
`;
}

export function renderEpilogue(context: RenderContext): string {
  return `}

run();

print(${jsString(encodeLine(context.marker, 'FINISH'))});
`;
}

function renderSearch(
  term: string,
  matchAny: boolean,
  context: RenderContext
): string {
  // "any" keeps a window on the first matching field, "all" drops it on the
  // first mismatch
  const filter = matchAny
    ? `            for (var j = 0; j < candidates.length; j++) {
                if (candidates[j].search(re) >= 0) {
                    window_stack.push(w);
                    break;
                }
            }
`
    : `            var mismatch = false;
            for (var j = 0; j < candidates.length; j++) {
                if (candidates[j].search(re) < 0) {
                    mismatch = true;
                    break;
                }
            }
            if (!mismatch) {
                window_stack.push(w);
            }
`;

  return `    {
${debugLine(`STEP search ${term}`)}        const re = new RegExp(${jsString(term)}, "i");
        const t = ${windowListCall(context)};
        window_stack = [];
        for (var i = 0; i < t.length; i++) {
            var w = t[i];
            var candidates = [w.caption, w.resourceClass, w.resourceName, w.windowRole];
            output_debug(candidates);
${filter}        }
    }
`;
}

function renderGetActiveWindow(): string {
  return `    {
${debugLine('STEP getactivewindow')}        window_stack = [workspace.activeWindow];
    }
`;
}

function renderActionOnId(
  action: ActionName,
  windowId: string,
  context: RenderContext
): string {
  return `    {
${debugLine(`STEP ${action}`)}        const t = ${windowListCall(context)};
        for (var i = 0; i < t.length; i++) {
            var w = t[i];
            if (w.internalId == ${jsString(windowId)}) {
                ${getActionFragment(action)}
                break;
            }
        }
    }
`;
}

function renderActionOnStackItem(action: ActionName, index: number): string {
  const message = `Invalid window stack selection '${index}' (out of range)`;
  return `    {
${debugLine(`STEP ${action}`)}        if (window_stack.length > 0) {
            if (${index} > window_stack.length || ${index} < 1) {
                output_error(${jsString(message)});
            } else {
                var w = window_stack[${index} - 1];
                ${getActionFragment(action)}
            }
        }
    }
`;
}

function renderActionOnStackAll(action: ActionName): string {
  return `    {
${debugLine(`STEP ${action}`)}        for (var i = 0; i < window_stack.length; i++) {
            var w = window_stack[i];
            ${getActionFragment(action)}
        }
    }
`;
}

function renderFinalOutput(): string {
  return `    {
        for (var i = 0; i < window_stack.length; i++) {
            output_result(window_stack[i].internalId);
        }
    }
`;
}

/**
 * Render one step as script text
 */
export function renderStep(step: Step, context: RenderContext): string {
  switch (step.type) {
    case 'search':
      return renderSearch(step.term, step.matchAny, context);
    case 'getactivewindow':
      return renderGetActiveWindow();
    case 'action_on_id':
      return renderActionOnId(step.action, step.windowId, context);
    case 'action_on_stack_item':
      return renderActionOnStackItem(step.action, step.index);
    case 'action_on_stack_all':
      return renderActionOnStackAll(step.action);
    case 'final_output':
      return renderFinalOutput();
  }
}

/**
 * Script module - command parsing and lowering to KWin scripts
 */

// Types
export type {
  ActionIntent,
  CommandIntent,
  CompiledScript,
  GetActiveWindowIntent,
  RenderContext,
  SearchIntent,
  Selector,
  Step,
  StepType,
} from './types.js';

// Tokens
export { createTokenStream, isOption } from './tokens.js';
export type { TokenStream } from './tokens.js';

// Parser
export {
  DEFAULT_SELECTOR,
  isVerb,
  parseIntents,
  parseNextIntent,
  parseSelector,
} from './parser.js';

// Compiler
export { compileScript, isQueryIntent, lowerIntent } from './compiler.js';

/**
 * Command grammar parser
 *
 * Grammar (xdotool style, commands chained left to right):
 * - search <term>
 * - getactivewindow
 * - <action> [options...] [window]
 *
 * where window is %N (stack position), %@ (whole stack) or a window id.
 */

import { isActionName } from '../templates/actions.js';
import { CompileError } from '../utils/errors.js';
import { isOption, type TokenStream } from './tokens.js';
import type { CommandIntent, Selector } from './types.js';

/** Selector used when an action is given no window argument */
export const DEFAULT_SELECTOR: Selector = { kind: 'stack_index', index: 1 };

const STACK_ALL_TOKEN = '%@';
const STACK_INDEX_PATTERN = /^%([+-]?\d+)$/;

/**
 * Whether a token names a command (and therefore starts the next one)
 */
export function isVerb(token: string): boolean {
  return (
    token === 'search' || token === 'getactivewindow' || isActionName(token)
  );
}

/**
 * Parse a window selector token
 */
export function parseSelector(token: string): Selector {
  if (token === STACK_ALL_TOKEN) {
    return { kind: 'stack_all' };
  }

  if (token.startsWith('%')) {
    const match = STACK_INDEX_PATTERN.exec(token);
    const index = match?.[1] !== undefined ? Number(match[1]) : NaN;
    if (!Number.isSafeInteger(index)) {
      throw new CompileError(`invalid window selector: ${token}`, token);
    }
    return { kind: 'stack_index', index };
  }

  return { kind: 'window_id', id: token };
}

/**
 * Parse the operand of `search`
 */
function parseSearchTerm(tokens: TokenStream): string {
  const term = tokens.peek();
  if (term === null || tokens.nextIsOption()) {
    throw new CompileError('missing search term', term);
  }
  tokens.next();

  try {
    new RegExp(term, 'i');
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new CompileError(`invalid search term: ${term} (${msg})`, term);
  }

  return term;
}

/**
 * Parse the optional window operand of an action
 * Leading option tokens are reserved and skipped
 */
function parseActionSelector(tokens: TokenStream): Selector {
  while (tokens.nextIsOption()) {
    tokens.next();
  }

  const token = tokens.peek();
  if (token === null || isVerb(token)) {
    return { ...DEFAULT_SELECTOR };
  }
  tokens.next();

  return parseSelector(token);
}

/**
 * Parse the next command from the stream
 * Returns null once the stream is exhausted
 */
export function parseNextIntent(tokens: TokenStream): CommandIntent | null {
  const verb = tokens.next();
  if (verb === null) {
    return null;
  }

  if (isOption(verb)) {
    throw new CompileError(`unexpected option: ${verb}`, verb);
  }

  if (verb === 'search') {
    return { type: 'search', term: parseSearchTerm(tokens) };
  }

  if (verb === 'getactivewindow') {
    return { type: 'getactivewindow' };
  }

  if (isActionName(verb)) {
    return { type: 'action', verb, selector: parseActionSelector(tokens) };
  }

  throw new CompileError(`unknown command: ${verb}`, verb);
}

/**
 * Parse every command in the stream
 */
export function parseIntents(tokens: TokenStream): CommandIntent[] {
  const intents: CommandIntent[] = [];
  let intent = parseNextIntent(tokens);
  while (intent) {
    intents.push(intent);
    intent = parseNextIntent(tokens);
  }
  return intents;
}

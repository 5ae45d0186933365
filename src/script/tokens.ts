/**
 * Cursor over command-line tokens with one token of lookahead
 */

export interface TokenStream {
  /** Next token without consuming it, or null at the end */
  peek(): string | null;
  /** Consume and return the next token, or null at the end */
  next(): string | null;
  /** True when every token has been consumed */
  done(): boolean;
  /** Whether the next token looks like an option (-x, --xyz) */
  nextIsOption(): boolean;
}

/**
 * Options start with a dash. A bare "-" counts as well.
 */
export function isOption(token: string): boolean {
  return token.startsWith('-');
}

export function createTokenStream(tokens: readonly string[]): TokenStream {
  let pos = 0;

  return {
    peek(): string | null {
      return tokens[pos] ?? null;
    },

    next(): string | null {
      const token = tokens[pos] ?? null;
      if (token !== null) {
        pos++;
      }
      return token;
    },

    done(): boolean {
      return pos >= tokens.length;
    },

    nextIsOption(): boolean {
      const token = tokens[pos];
      return token !== undefined && isOption(token);
    },
  };
}

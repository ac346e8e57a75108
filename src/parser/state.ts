/**
 * Parser State
 * Core state management and token navigation utilities
 */

import { parseError, type ParseError } from '../error-classes.js';
import type { SourceSpan } from '../source-location.js';
import { mergeSpans } from '../source-location.js';
import type { Token, TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: readonly Token[];
  pos: number;
}

export function createParserState(tokens: readonly Token[]): ParserState {
  const last = tokens[tokens.length - 1];
  if (last?.type !== TOKEN_TYPES.EOF) {
    throw new TypeError('Token stream must end with an EOF token');
  }
  return { tokens, pos: 0 };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token {
  return peek(state, 0);
}

/**
 * Token at `offset` from the cursor. Reads past the end yield the EOF token.
 * @internal
 */
export function peek(state: ParserState, offset = 0): Token {
  const token = state.tokens[state.pos + offset];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** Most recently consumed token @internal */
export function previous(state: ParserState): Token {
  const token = state.tokens[state.pos - 1];
  if (token) return token;
  return current(state);
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/**
 * Consume a token of `type` or fail with P001 at the current token.
 * @internal
 */
export function expect(
  state: ParserState,
  type: TokenType,
  message: string
): Token {
  if (check(state, type)) return advance(state);
  const token = current(state);
  const hint = generateHint(type, token);
  throw parseError(
    'P001',
    { expected: hint ? `${message}. ${hint}` : message },
    token.span
  );
}

// ============================================================
// ERROR HINTS
// ============================================================

/**
 * Generate contextual hints for common parse errors.
 * @internal
 */
function generateHint(
  expectedType: TokenType,
  actualToken: Token
): string | null {
  const actual = actualToken.type;

  if (actual === TOKEN_TYPES.EOF) {
    if (expectedType === TOKEN_TYPES.RPAREN) {
      return 'Hint: Check for unclosed parenthesis';
    }
    if (expectedType === TOKEN_TYPES.RBRACE) {
      return 'Hint: Check for unclosed brace';
    }
    if (expectedType === TOKEN_TYPES.RBRACKET) {
      return 'Hint: Check for unclosed bracket';
    }
  }

  if (actual === TOKEN_TYPES.IDENTIFIER) {
    const typoHints: Record<string, string> = {
      retrun: 'return',
      retrn: 'return',
      esle: 'else',
      whiel: 'while',
      fucn: 'fn',
      func: 'fn',
      function: 'fn',
      var: 'let',
    };
    const suggestion = Object.hasOwn(typoHints, actualToken.value)
      ? typoHints[actualToken.value]
      : undefined;
    if (suggestion) {
      return `Hint: Did you mean '${suggestion}'?`;
    }
  }

  // `let x = 1` without an annotation
  if (expectedType === TOKEN_TYPES.COLON && actual === TOKEN_TYPES.ASSIGN) {
    return 'Hint: Every binding needs a type annotation';
  }

  return null;
}

// ============================================================
// SPAN UTILITIES
// ============================================================

/** Span from the start of `first` to the end of `last` @internal */
export function spanBetween(
  first: { span: SourceSpan },
  last: { span: SourceSpan }
): SourceSpan {
  return mergeSpans(first.span, last.span);
}

/**
 * Tokenizer
 * Main tokenization logic
 */

import { parseError } from '../error-classes.js';
import { DEFAULT_SOURCE } from '../source-location.js';
import type { Token } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import {
  consumeToken,
  isDigit,
  isIdentifierStart,
  isWhitespace,
  makeToken,
} from './helpers.js';
import { matchOperator } from './operators.js';
import { readIdentifier, readNumber, readString } from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  readWhile,
  spanFrom,
} from './state.js';

export interface TokenizeOptions {
  /** Source label recorded in every span (default: <stdin>) */
  sourceName?: string;
}

/** Skip whitespace and `#` comments, which may alternate */
function skipTrivia(state: LexerState): void {
  while (!isAtEnd(state)) {
    if (isWhitespace(peek(state))) {
      advance(state);
    } else if (peek(state) === '#') {
      readWhile(state, (ch) => ch !== '\n');
    } else {
      return;
    }
  }
}

export function nextToken(state: LexerState): Token {
  skipTrivia(state);

  const start = currentLocation(state);
  if (isAtEnd(state)) {
    return makeToken(state, TOKEN_TYPES.EOF, '', start);
  }

  const ch = peek(state);

  if (ch === '"') {
    return readString(state);
  }

  // Number (positive only - unary minus handled by parser)
  if (isDigit(ch)) {
    return readNumber(state);
  }

  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  const operator = matchOperator(state);
  if (operator) {
    return consumeToken(state, operator.length, operator.type, start);
  }

  advance(state);
  const hint =
    ch === '&' ? "; did you mean '&&'?" : ch === '|' ? "; did you mean '||'?" : '';
  throw parseError('L002', { char: ch, hint }, spanFrom(state, start));
}

/**
 * Convert source text into tokens ending with EOF.
 * Throws ParseError (L001, L002) on the first lexical error.
 */
export function tokenize(source: string, options: TokenizeOptions = {}): Token[] {
  const state = createLexerState(source, options.sourceName ?? DEFAULT_SOURCE);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.EOF);

  return tokens;
}

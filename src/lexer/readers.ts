/**
 * Token Readers
 * Functions to read specific token types from source
 */

import { parseError } from '../error-classes.js';
import type { Token } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { isDigit, isIdentifierChar, makeToken } from './helpers.js';
import { KEYWORDS } from './operators.js';
import {
  advance,
  currentLocation,
  type LexerState,
  peek,
  readWhile,
  spanFrom,
} from './state.js';

/** Single-line string without escapes. The literal excludes the quotes. */
export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume opening "

  const value = readWhile(state, (ch) => ch !== '"' && ch !== '\n');
  if (peek(state) !== '"') {
    throw parseError('L001', {}, spanFrom(state, start));
  }
  advance(state); // consume closing "

  return makeToken(state, TOKEN_TYPES.STRING, `"${value}"`, start, value);
}

/** Integer, or float when a '.' is followed by a digit */
export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  const whole = readWhile(state, isDigit);

  // `1..5` is INT DOTDOT INT, so the dot must be followed by a digit
  if (peek(state) === '.' && isDigit(peek(state, 1))) {
    advance(state);
    const lexeme = `${whole}.${readWhile(state, isDigit)}`;
    return makeToken(
      state,
      TOKEN_TYPES.FLOAT,
      lexeme,
      start,
      Number.parseFloat(lexeme)
    );
  }

  return makeToken(state, TOKEN_TYPES.INT, whole, start, BigInt(whole));
}

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  const value = readWhile(state, isIdentifierChar);

  const keyword = Object.hasOwn(KEYWORDS, value) ? KEYWORDS[value] : undefined;
  if (keyword === TOKEN_TYPES.TRUE) {
    return makeToken(state, keyword, value, start, true);
  }
  if (keyword === TOKEN_TYPES.FALSE) {
    return makeToken(state, keyword, value, start, false);
  }
  return makeToken(state, keyword ?? TOKEN_TYPES.IDENTIFIER, value, start);
}

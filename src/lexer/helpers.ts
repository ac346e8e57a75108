/**
 * Lexer Helper Functions
 * Character classes and token construction
 */

import type { SourceLocation } from '../source-location.js';
import type { LiteralValue, Token, TokenType } from '../token-types.js';
import { advance, spanFrom, type LexerState } from './state.js';

// ASCII only: Tern identifiers are [A-Za-z_][A-Za-z0-9_]*
export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function isIdentifierStart(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
}

export function isIdentifierChar(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}

/** Newlines are trivia too; statements are not line-terminated */
export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n';
}

/** Token ending at the cursor */
export function makeToken(
  state: LexerState,
  type: TokenType,
  value: string,
  start: SourceLocation,
  literal?: LiteralValue
): Token {
  return { type, value, literal, span: spanFrom(state, start) };
}

/** Consume `length` characters as one token whose value is their text */
export function consumeToken(
  state: LexerState,
  length: number,
  type: TokenType,
  start: SourceLocation
): Token {
  const value = state.source.slice(state.pos, state.pos + length);
  for (let i = 0; i < length; i++) advance(state);
  return makeToken(state, type, value, start);
}

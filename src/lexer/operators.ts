/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { peekString, type LexerState } from './state.js';

/** Three-character operator lookup table */
export const THREE_CHAR_OPERATORS: Record<string, TokenType> = {
  '..=': TOKEN_TYPES.DOTDOT_EQ,
};

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: Record<string, TokenType> = {
  '->': TOKEN_TYPES.ARROW,
  '&&': TOKEN_TYPES.AND,
  '||': TOKEN_TYPES.OR,
  '==': TOKEN_TYPES.EQ,
  '!=': TOKEN_TYPES.NE,
  '<=': TOKEN_TYPES.LE,
  '>=': TOKEN_TYPES.GE,
  '..': TOKEN_TYPES.DOTDOT,
};

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Record<string, TokenType> = {
  '.': TOKEN_TYPES.DOT,
  ':': TOKEN_TYPES.COLON,
  ',': TOKEN_TYPES.COMMA,
  '!': TOKEN_TYPES.BANG,
  '=': TOKEN_TYPES.ASSIGN,
  '<': TOKEN_TYPES.LT,
  '>': TOKEN_TYPES.GT,
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
  '[': TOKEN_TYPES.LBRACKET,
  ']': TOKEN_TYPES.RBRACKET,
  '+': TOKEN_TYPES.PLUS,
  '-': TOKEN_TYPES.MINUS,
  '*': TOKEN_TYPES.STAR,
  '/': TOKEN_TYPES.SLASH,
  '%': TOKEN_TYPES.PERCENT,
};

const OPERATOR_TABLES = [
  [3, THREE_CHAR_OPERATORS],
  [2, TWO_CHAR_OPERATORS],
  [1, SINGLE_CHAR_OPERATORS],
] as const;

/**
 * Longest operator at the cursor, so `..=` wins over `..` and `..` over `.`.
 * Does not consume.
 */
export function matchOperator(
  state: LexerState
): { length: number; type: TokenType } | undefined {
  for (const [length, table] of OPERATOR_TABLES) {
    const type = table[peekString(state, length)];
    if (type !== undefined) return { length, type };
  }
  return undefined;
}

/** Keyword lookup table */
export const KEYWORDS: Record<string, TokenType> = {
  let: TOKEN_TYPES.LET,
  const: TOKEN_TYPES.CONST,
  fn: TOKEN_TYPES.FN,
  struct: TOKEN_TYPES.STRUCT,
  enum: TOKEN_TYPES.ENUM,
  import: TOKEN_TYPES.IMPORT,
  return: TOKEN_TYPES.RETURN,
  if: TOKEN_TYPES.IF,
  else: TOKEN_TYPES.ELSE,
  while: TOKEN_TYPES.WHILE,
  for: TOKEN_TYPES.FOR,
  in: TOKEN_TYPES.IN,
  break: TOKEN_TYPES.BREAK,
  continue: TOKEN_TYPES.CONTINUE,
  print: TOKEN_TYPES.PRINT,
  true: TOKEN_TYPES.TRUE,
  false: TOKEN_TYPES.FALSE,
  int: TOKEN_TYPES.INT_TYPE,
  float: TOKEN_TYPES.FLOAT_TYPE,
  bool: TOKEN_TYPES.BOOL_TYPE,
  str: TOKEN_TYPES.STR_TYPE,
  void: TOKEN_TYPES.VOID_TYPE,
};

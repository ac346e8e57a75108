import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  INT: 'INT',
  FLOAT: 'FLOAT',
  STRING: 'STRING',
  TRUE: 'TRUE',
  FALSE: 'FALSE',

  // Identifiers
  IDENTIFIER: 'IDENTIFIER',

  // Declaration keywords
  LET: 'LET',
  CONST: 'CONST',
  FN: 'FN',
  STRUCT: 'STRUCT',
  ENUM: 'ENUM',
  IMPORT: 'IMPORT',

  // Statement keywords
  RETURN: 'RETURN',
  IF: 'IF',
  ELSE: 'ELSE',
  WHILE: 'WHILE',
  FOR: 'FOR',
  IN: 'IN',
  BREAK: 'BREAK',
  CONTINUE: 'CONTINUE',
  PRINT: 'PRINT',

  // Type keywords
  INT_TYPE: 'INT_TYPE', // int
  FLOAT_TYPE: 'FLOAT_TYPE', // float
  BOOL_TYPE: 'BOOL_TYPE', // bool
  STR_TYPE: 'STR_TYPE', // str
  VOID_TYPE: 'VOID_TYPE', // void

  // Operators
  PLUS: 'PLUS', // +
  MINUS: 'MINUS', // -
  STAR: 'STAR', // *
  SLASH: 'SLASH', // /
  PERCENT: 'PERCENT', // %
  EQ: 'EQ', // ==
  NE: 'NE', // !=
  LT: 'LT', // <
  GT: 'GT', // >
  LE: 'LE', // <=
  GE: 'GE', // >=
  AND: 'AND', // &&
  OR: 'OR', // ||
  BANG: 'BANG', // !
  ASSIGN: 'ASSIGN', // =
  DOTDOT: 'DOTDOT', // ..
  DOTDOT_EQ: 'DOTDOT_EQ', // ..=
  DOT: 'DOT', // .
  ARROW: 'ARROW', // ->

  // Delimiters
  LPAREN: 'LPAREN',
  RPAREN: 'RPAREN',
  LBRACE: 'LBRACE',
  RBRACE: 'RBRACE',
  LBRACKET: 'LBRACKET',
  RBRACKET: 'RBRACKET',
  COMMA: 'COMMA',
  COLON: 'COLON',

  // Special
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

/** Literal payload carried by INT, FLOAT, STRING, TRUE and FALSE tokens */
/** INT literals are exact, so they are carried as bigint */
export type LiteralValue = bigint | number | string | boolean;

export interface Token {
  readonly type: TokenType;
  /** Raw lexeme as written in source */
  readonly value: string;
  readonly literal?: LiteralValue | undefined;
  readonly span: SourceSpan;
}

/**
 * Parser Helpers
 * Lookahead predicates shared by the parser extensions
 * @internal This module contains internal parser utilities
 */

import type { PrimitiveKind } from '../value-types.js';
import type { TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { type ParserState, check, peek } from './state.js';

// ============================================================
// TYPE KEYWORDS
// ============================================================

/** Type keyword tokens and the primitive they name @internal */
export const PRIMITIVE_TYPE_TOKENS: ReadonlyMap<TokenType, PrimitiveKind> =
  new Map<TokenType, PrimitiveKind>([
    [TOKEN_TYPES.INT_TYPE, 'int'],
    [TOKEN_TYPES.FLOAT_TYPE, 'float'],
    [TOKEN_TYPES.BOOL_TYPE, 'bool'],
    [TOKEN_TYPES.STR_TYPE, 'str'],
    [TOKEN_TYPES.VOID_TYPE, 'void'],
  ]);

/** Identifier that introduces a dictionary type annotation @internal */
export const DICT_TYPE_NAME = 'Dict';

/** Contextual keywords accepted as print keyword arguments @internal */
export const PRINT_KEYWORDS = ['sep', 'end'] as const;
export type PrintKeyword = (typeof PRINT_KEYWORDS)[number];

// ============================================================
// LOOKAHEAD PREDICATES
// ============================================================

/**
 * Cast call: one of the four value type keywords followed by `(`.
 * `void(` is not a cast.
 * @internal
 */
export function isCastCall(state: ParserState): boolean {
  return (
    check(
      state,
      TOKEN_TYPES.INT_TYPE,
      TOKEN_TYPES.FLOAT_TYPE,
      TOKEN_TYPES.BOOL_TYPE,
      TOKEN_TYPES.STR_TYPE
    ) && peek(state, 1).type === TOKEN_TYPES.LPAREN
  );
}

/**
 * Struct init after an identifier: `{ IDENT :`.
 * Called with the cursor on the `{`. Any other shape leaves the brace to
 * the enclosing statement, which is how `for x in items { ... }` parses.
 * @internal
 */
export function isStructInitStart(state: ParserState): boolean {
  return (
    check(state, TOKEN_TYPES.LBRACE) &&
    peek(state, 1).type === TOKEN_TYPES.IDENTIFIER &&
    peek(state, 2).type === TOKEN_TYPES.COLON
  );
}

/**
 * `sep =` or `end =` inside a print argument list.
 * @internal
 */
export function isPrintKeywordArg(state: ParserState): PrintKeyword | null {
  const token = peek(state, 0);
  if (token.type !== TOKEN_TYPES.IDENTIFIER) return null;
  if (peek(state, 1).type !== TOKEN_TYPES.ASSIGN) return null;
  return PRINT_KEYWORDS.find((keyword) => keyword === token.value) ?? null;
}

/** `Dict[` at the cursor @internal */
export function isDictTypeStart(state: ParserState): boolean {
  const token = peek(state, 0);
  return (
    token.type === TOKEN_TYPES.IDENTIFIER &&
    token.value === DICT_TYPE_NAME &&
    peek(state, 1).type === TOKEN_TYPES.LBRACKET
  );
}

/**
 * Parser Extension: Type Annotations
 * int | float | bool | str | void | [T] | Dict[K, V] | Name
 */

import { Parser } from './parser.js';
import type { TypeRef } from '../ast-nodes.js';
import { TOKEN_TYPES } from '../token-types.js';
import { PRIMITIVE_TYPE_TOKENS, isDictTypeStart } from './helpers.js';
import { advance, check, current, expect, spanBetween } from './state.js';
import { parseError } from '../error-classes.js';

declare module './parser.js' {
  interface Parser {
    parseTypeRef(): TypeRef;
  }
}

Parser.prototype.parseTypeRef = function (this: Parser): TypeRef {
  const token = current(this.state);

  const primitive = PRIMITIVE_TYPE_TOKENS.get(token.type);
  if (primitive) {
    advance(this.state);
    return { type: 'PrimitiveTypeRef', name: primitive, span: token.span };
  }

  if (check(this.state, TOKEN_TYPES.LBRACKET)) {
    advance(this.state);
    const element = this.parseTypeRef();
    const close = expect(
      this.state,
      TOKEN_TYPES.RBRACKET,
      "expected ']' after list element type"
    );
    return { type: 'ListTypeRef', element, span: spanBetween(token, close) };
  }

  if (isDictTypeStart(this.state)) {
    advance(this.state); // Dict
    advance(this.state); // [
    const key = this.parseTypeRef();
    expect(
      this.state,
      TOKEN_TYPES.COMMA,
      "expected ',' between dict key and value types"
    );
    const value = this.parseTypeRef();
    const close = expect(
      this.state,
      TOKEN_TYPES.RBRACKET,
      "expected ']' after dict value type"
    );
    return { type: 'DictTypeRef', key, value, span: spanBetween(token, close) };
  }

  if (check(this.state, TOKEN_TYPES.IDENTIFIER)) {
    advance(this.state);
    return { type: 'NamedTypeRef', name: token.value, span: token.span };
  }

  throw parseError('P001', { expected: 'expected type name' }, token.span);
};

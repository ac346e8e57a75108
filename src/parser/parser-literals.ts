/**
 * Parser Extension: Literal Parsing
 * Literals, identifiers, grouping, lists, dicts and struct init
 */

import { Parser } from './parser.js';
import type {
  DictEntryNode,
  DictLiteralNode,
  ExpressionNode,
  FieldInitNode,
  ListLiteralNode,
  StructInitNode,
} from '../ast-nodes.js';
import { parseError } from '../error-classes.js';
import type { Token } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { isCastCall, isStructInitStart } from './helpers.js';
import { advance, check, current, expect, spanBetween } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parsePrimary(): ExpressionNode;
    parseListLiteral(): ListLiteralNode;
    parseDictLiteral(): DictLiteralNode;
    parseStructInit(name: Token): StructInitNode;
  }
}

// ============================================================
// PRIMARY EXPRESSIONS
// ============================================================

/** Scanner-supplied literal, or the lexeme read exactly */
function intLiteral(token: Token): bigint {
  return typeof token.literal === 'bigint'
    ? token.literal
    : BigInt(token.value);
}

function floatLiteral(token: Token): number {
  return typeof token.literal === 'number'
    ? token.literal
    : Number(token.value);
}

/**
 * primary → INT | FLOAT | STRING | true | false | IDENT | IDENT struct-init
 *         | cast-keyword | "(" expr ")" | list | dict
 */
Parser.prototype.parsePrimary = function (this: Parser): ExpressionNode {
  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.INT:
      advance(this.state);
      return {
        type: 'IntLiteral',
        value: intLiteral(token),
        resolvedType: undefined,
        span: token.span,
      };

    case TOKEN_TYPES.FLOAT:
      advance(this.state);
      return {
        type: 'FloatLiteral',
        value: floatLiteral(token),
        resolvedType: undefined,
        span: token.span,
      };

    case TOKEN_TYPES.STRING:
      advance(this.state);
      return {
        type: 'StringLiteral',
        value: typeof token.literal === 'string' ? token.literal : token.value,
        resolvedType: undefined,
        span: token.span,
      };

    case TOKEN_TYPES.TRUE:
    case TOKEN_TYPES.FALSE:
      advance(this.state);
      return {
        type: 'BoolLiteral',
        value: token.type === TOKEN_TYPES.TRUE,
        resolvedType: undefined,
        span: token.span,
      };

    case TOKEN_TYPES.IDENTIFIER:
      advance(this.state);
      if (isStructInitStart(this.state)) {
        return this.parseStructInit(token);
      }
      return {
        type: 'Identifier',
        name: token.value,
        resolvedType: undefined,
        span: token.span,
      };

    case TOKEN_TYPES.LPAREN: {
      advance(this.state);
      const inner = this.parseExpression();
      expect(this.state, TOKEN_TYPES.RPAREN, "expected ')' after expression");
      return inner;
    }

    case TOKEN_TYPES.LBRACKET:
      return this.parseListLiteral();

    case TOKEN_TYPES.LBRACE:
      return this.parseDictLiteral();

    default:
      // int(x), str(x), ... are calls to cast builtins
      if (isCastCall(this.state)) {
        advance(this.state);
        return {
          type: 'Identifier',
          name: token.value,
          resolvedType: undefined,
          span: token.span,
        };
      }
      throw parseError(
        'P005',
        {
          lexeme:
            token.type === TOKEN_TYPES.EOF ? 'end of input' : token.value,
        },
        token.span
      );
  }
};

// ============================================================
// COLLECTIONS
// ============================================================

/** [ (expr ("," expr)* ","?)? ] */
Parser.prototype.parseListLiteral = function (this: Parser): ListLiteralNode {
  const open = advance(this.state);
  const elements: ExpressionNode[] = [];

  while (!check(this.state, TOKEN_TYPES.RBRACKET)) {
    elements.push(this.parseExpression());
    if (!check(this.state, TOKEN_TYPES.COMMA)) break;
    advance(this.state);
  }
  const close = expect(
    this.state,
    TOKEN_TYPES.RBRACKET,
    "expected ']' after list elements"
  );

  return {
    type: 'ListLiteral',
    elements,
    resolvedType: undefined,
    span: spanBetween(open, close),
  };
};

/** { (key ":" value ("," key ":" value)* ","?)? } */
Parser.prototype.parseDictLiteral = function (this: Parser): DictLiteralNode {
  const open = advance(this.state);
  const entries: DictEntryNode[] = [];

  while (!check(this.state, TOKEN_TYPES.RBRACE)) {
    const key = this.parseExpression();
    expect(this.state, TOKEN_TYPES.COLON, "expected ':' after dict key");
    const value = this.parseExpression();
    entries.push({
      type: 'DictEntry',
      key,
      value,
      span: spanBetween(key, value),
    });
    if (!check(this.state, TOKEN_TYPES.COMMA)) break;
    advance(this.state);
  }
  const close = expect(
    this.state,
    TOKEN_TYPES.RBRACE,
    "expected '}' after dict entries"
  );

  return {
    type: 'DictLiteral',
    entries,
    resolvedType: undefined,
    span: spanBetween(open, close),
  };
};

// ============================================================
// STRUCT INIT
// ============================================================

/**
 * Name { field: expr ("," field: expr)* ","? }
 * Called with the name consumed and the cursor on `{`.
 */
Parser.prototype.parseStructInit = function (
  this: Parser,
  name: Token
): StructInitNode {
  advance(this.state); // {
  const fields: FieldInitNode[] = [];

  while (!check(this.state, TOKEN_TYPES.RBRACE)) {
    const fieldName = expect(
      this.state,
      TOKEN_TYPES.IDENTIFIER,
      'expected field name'
    );
    expect(this.state, TOKEN_TYPES.COLON, "expected ':' after field name");
    const value = this.parseExpression();
    fields.push({
      type: 'FieldInit',
      name: fieldName.value,
      value,
      span: spanBetween(fieldName, value),
    });
    if (!check(this.state, TOKEN_TYPES.COMMA)) break;
    advance(this.state);
  }
  const close = expect(
    this.state,
    TOKEN_TYPES.RBRACE,
    "expected '}' after struct fields"
  );

  return {
    type: 'StructInit',
    name: name.value,
    fields,
    resolvedType: undefined,
    span: spanBetween(name, close),
  };
};

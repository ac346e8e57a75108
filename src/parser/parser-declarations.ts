/**
 * Parser Extension: Declarations
 * Variables, constants, functions, structs, enums and imports
 */

import { Parser } from './parser.js';
import type {
  ConstDeclNode,
  EnumDeclNode,
  EnumVariantNode,
  FnDeclNode,
  ImportDeclNode,
  ParamNode,
  StructDeclNode,
  StructFieldNode,
  TypeRef,
  VarDeclNode,
} from '../ast-nodes.js';
import { TOKEN_TYPES } from '../token-types.js';
import { advance, check, expect, previous, spanBetween } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseVarDecl(): VarDeclNode;
    parseConstDecl(): ConstDeclNode;
    parseFnDecl(): FnDeclNode;
    parseParam(): ParamNode;
    parseStructDecl(): StructDeclNode;
    parseEnumDecl(): EnumDeclNode;
    parseImportDecl(): ImportDeclNode;
  }
}

// ============================================================
// BINDINGS
// ============================================================

/** let name: T = value */
Parser.prototype.parseVarDecl = function (this: Parser): VarDeclNode {
  const keyword = advance(this.state);
  const name = expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    "expected variable name after 'let'"
  );
  expect(this.state, TOKEN_TYPES.COLON, "expected ':' after variable name");
  const annotation = this.parseTypeRef();
  expect(this.state, TOKEN_TYPES.ASSIGN, "expected '=' after type annotation");
  const value = this.parseExpression();

  return {
    type: 'VarDecl',
    name: name.value,
    annotation,
    value,
    span: spanBetween(keyword, value),
  };
};

/** const NAME: T = value */
Parser.prototype.parseConstDecl = function (this: Parser): ConstDeclNode {
  const keyword = advance(this.state);
  const name = expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    "expected constant name after 'const'"
  );
  expect(this.state, TOKEN_TYPES.COLON, "expected ':' after constant name");
  const annotation = this.parseTypeRef();
  expect(this.state, TOKEN_TYPES.ASSIGN, "expected '=' after type annotation");
  const value = this.parseExpression();

  return {
    type: 'ConstDecl',
    name: name.value,
    annotation,
    value,
    span: spanBetween(keyword, value),
  };
};

// ============================================================
// FUNCTIONS
// ============================================================

/**
 * fn name(p: T, ...) -> R { body }
 * A missing `-> R` declares a void function.
 */
Parser.prototype.parseFnDecl = function (this: Parser): FnDeclNode {
  const keyword = advance(this.state);
  const name = expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    "expected function name after 'fn'"
  );
  expect(this.state, TOKEN_TYPES.LPAREN, "expected '(' after function name");

  const params: ParamNode[] = [];
  if (!check(this.state, TOKEN_TYPES.RPAREN)) {
    params.push(this.parseParam());
    while (check(this.state, TOKEN_TYPES.COMMA)) {
      advance(this.state);
      params.push(this.parseParam());
    }
  }
  const closeParen = expect(
    this.state,
    TOKEN_TYPES.RPAREN,
    "expected ')' after parameters"
  );

  let returnType: TypeRef;
  if (check(this.state, TOKEN_TYPES.ARROW)) {
    advance(this.state);
    returnType = this.parseTypeRef();
  } else {
    returnType = {
      type: 'PrimitiveTypeRef',
      name: 'void',
      span: closeParen.span,
    };
  }

  const body = this.parseBlock();

  return {
    type: 'FnDecl',
    name: name.value,
    params,
    returnType,
    body,
    span: spanBetween(keyword, body),
  };
};

Parser.prototype.parseParam = function (this: Parser): ParamNode {
  const name = expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    'expected parameter name'
  );
  expect(this.state, TOKEN_TYPES.COLON, "expected ':' after parameter name");
  const annotation = this.parseTypeRef();

  return {
    type: 'Param',
    name: name.value,
    annotation,
    span: spanBetween(name, annotation),
  };
};

// ============================================================
// TYPE DECLARATIONS
// ============================================================

/** struct Name { field: T, ... } */
Parser.prototype.parseStructDecl = function (this: Parser): StructDeclNode {
  const keyword = advance(this.state);
  const name = expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    "expected struct name after 'struct'"
  );
  expect(this.state, TOKEN_TYPES.LBRACE, "expected '{' after struct name");

  const fields: StructFieldNode[] = [];
  while (!check(this.state, TOKEN_TYPES.RBRACE)) {
    const fieldName = expect(
      this.state,
      TOKEN_TYPES.IDENTIFIER,
      'expected field name'
    );
    expect(this.state, TOKEN_TYPES.COLON, "expected ':' after field name");
    const annotation = this.parseTypeRef();
    fields.push({
      type: 'StructField',
      name: fieldName.value,
      annotation,
      span: spanBetween(fieldName, annotation),
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
    type: 'StructDecl',
    name: name.value,
    fields,
    span: spanBetween(keyword, close),
  };
};

/** enum Name { A, B, ... } */
Parser.prototype.parseEnumDecl = function (this: Parser): EnumDeclNode {
  const keyword = advance(this.state);
  const name = expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    "expected enum name after 'enum'"
  );
  expect(this.state, TOKEN_TYPES.LBRACE, "expected '{' after enum name");

  const variants: EnumVariantNode[] = [];
  while (!check(this.state, TOKEN_TYPES.RBRACE)) {
    const variant = expect(
      this.state,
      TOKEN_TYPES.IDENTIFIER,
      'expected variant name'
    );
    variants.push({
      type: 'EnumVariant',
      name: variant.value,
      span: variant.span,
    });
    if (!check(this.state, TOKEN_TYPES.COMMA)) break;
    advance(this.state);
  }
  const close = expect(
    this.state,
    TOKEN_TYPES.RBRACE,
    "expected '}' after enum variants"
  );

  return {
    type: 'EnumDecl',
    name: name.value,
    variants,
    span: spanBetween(keyword, close),
  };
};

// ============================================================
// IMPORTS
// ============================================================

/** import name | import "./path.tern" */
Parser.prototype.parseImportDecl = function (this: Parser): ImportDeclNode {
  const keyword = advance(this.state);

  if (check(this.state, TOKEN_TYPES.STRING)) {
    const path = advance(this.state);
    return {
      type: 'ImportDecl',
      module: typeof path.literal === 'string' ? path.literal : path.value,
      isLocal: true,
      span: spanBetween(keyword, path),
    };
  }

  expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    "expected module name or path after 'import'"
  );
  const name = previous(this.state);
  return {
    type: 'ImportDecl',
    module: name.value,
    isLocal: false,
    span: spanBetween(keyword, name),
  };
};

/**
 * Parser Extension: Control Flow Parsing
 * Blocks, conditionals, loops, return and print
 */

import { Parser } from './parser.js';
import type {
  BlockNode,
  DeclarationNode,
  ExpressionNode,
  ForStmtNode,
  IfStmtNode,
  PrintStmtNode,
  ReturnStmtNode,
  WhileStmtNode,
} from '../ast-nodes.js';
import { parseError } from '../error-classes.js';
import { TOKEN_TYPES } from '../token-types.js';
import { isPrintKeywordArg } from './helpers.js';
import {
  advance,
  check,
  current,
  expect,
  isAtEnd,
  spanBetween,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseBlock(): BlockNode;
    parseIf(): IfStmtNode;
    parseWhile(): WhileStmtNode;
    parseFor(): ForStmtNode;
    parseReturn(): ReturnStmtNode;
    parsePrint(): PrintStmtNode;
  }
}

// ============================================================
// BLOCKS
// ============================================================

/** { declaration* } */
Parser.prototype.parseBlock = function (this: Parser): BlockNode {
  const open = expect(this.state, TOKEN_TYPES.LBRACE, "expected '{'");

  const declarations: DeclarationNode[] = [];
  while (!check(this.state, TOKEN_TYPES.RBRACE) && !isAtEnd(this.state)) {
    declarations.push(this.parseDeclaration());
  }

  const close = expect(
    this.state,
    TOKEN_TYPES.RBRACE,
    "expected '}' after block"
  );

  return { type: 'Block', declarations, span: spanBetween(open, close) };
};

// ============================================================
// CONDITIONALS
// ============================================================

/**
 * if cond { } (else { } | else if ...)?
 * `else if` becomes an else block holding the nested if.
 */
Parser.prototype.parseIf = function (this: Parser): IfStmtNode {
  const keyword = advance(this.state);
  const condition = this.parseExpression();
  const thenBlock = this.parseBlock();

  let elseBlock: BlockNode | null = null;
  if (check(this.state, TOKEN_TYPES.ELSE)) {
    advance(this.state);
    if (check(this.state, TOKEN_TYPES.IF)) {
      const nested = this.parseIf();
      elseBlock = {
        type: 'Block',
        declarations: [nested],
        span: nested.span,
      };
    } else {
      elseBlock = this.parseBlock();
    }
  }

  return {
    type: 'IfStmt',
    condition,
    thenBlock,
    elseBlock,
    span: spanBetween(keyword, elseBlock ?? thenBlock),
  };
};

// ============================================================
// LOOPS
// ============================================================

/** while cond { } */
Parser.prototype.parseWhile = function (this: Parser): WhileStmtNode {
  const keyword = advance(this.state);
  const condition = this.parseExpression();
  const body = this.parseBlock();

  return {
    type: 'WhileStmt',
    condition,
    body,
    span: spanBetween(keyword, body),
  };
};

/** for name in iterable { } */
Parser.prototype.parseFor = function (this: Parser): ForStmtNode {
  const keyword = advance(this.state);
  const variable = expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    "expected variable name after 'for'"
  );
  expect(this.state, TOKEN_TYPES.IN, "expected 'in' after variable name");
  const iterable = this.parseExpression();
  const body = this.parseBlock();

  return {
    type: 'ForStmt',
    variable: variable.value,
    variableSpan: variable.span,
    iterable,
    body,
    span: spanBetween(keyword, body),
  };
};

// ============================================================
// RETURN
// ============================================================

/** return expr | return (bare, directly before `}` or end of input) */
Parser.prototype.parseReturn = function (this: Parser): ReturnStmtNode {
  const keyword = advance(this.state);

  if (check(this.state, TOKEN_TYPES.RBRACE) || isAtEnd(this.state)) {
    return { type: 'ReturnStmt', value: null, span: keyword.span };
  }

  const value = this.parseExpression();
  return { type: 'ReturnStmt', value, span: spanBetween(keyword, value) };
};

// ============================================================
// PRINT
// ============================================================

/**
 * print(arg (, arg)* (, sep = expr)? (, end = expr)?)
 * At least one positional argument is required.
 */
Parser.prototype.parsePrint = function (this: Parser): PrintStmtNode {
  const keyword = advance(this.state);
  expect(this.state, TOKEN_TYPES.LPAREN, "expected '(' after 'print'");

  if (check(this.state, TOKEN_TYPES.RPAREN)) {
    throw parseError(
      'P001',
      { expected: 'print requires at least one argument' },
      current(this.state).span
    );
  }

  const args: ExpressionNode[] = [this.parseExpression()];
  let sep: ExpressionNode | null = null;
  let end: ExpressionNode | null = null;

  while (check(this.state, TOKEN_TYPES.COMMA)) {
    advance(this.state);
    const keywordArg = isPrintKeywordArg(this.state);
    if (keywordArg === null) {
      if (sep !== null || end !== null) {
        throw parseError(
          'P001',
          { expected: 'positional arguments must come before sep and end' },
          current(this.state).span
        );
      }
      args.push(this.parseExpression());
      continue;
    }

    const nameToken = advance(this.state);
    advance(this.state); // =
    const value = this.parseExpression();
    if ((keywordArg === 'sep' ? sep : end) !== null) {
      throw parseError(
        'P001',
        { expected: `duplicate '${keywordArg}' argument` },
        nameToken.span
      );
    }
    if (keywordArg === 'sep') {
      sep = value;
    } else {
      end = value;
    }
  }

  const close = expect(
    this.state,
    TOKEN_TYPES.RPAREN,
    "expected ')' after print arguments"
  );

  return {
    type: 'PrintStmt',
    args,
    sep,
    end,
    span: spanBetween(keyword, close),
  };
};

/**
 * Parser Extension: Expression Parsing
 * Precedence chain (range → || → && → equality → relational → additive →
 * multiplicative → unary → postfix)
 */

import { Parser } from './parser.js';
import type {
  BinaryOp,
  ExpressionNode,
  UnaryOp,
} from '../ast-nodes.js';
import { parseError } from '../error-classes.js';
import type { TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { advance, check, current, expect, spanBetween } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): ExpressionNode;
    parseRange(): ExpressionNode;
    parseLogicalOr(): ExpressionNode;
    parseLogicalAnd(): ExpressionNode;
    parseEquality(): ExpressionNode;
    parseRelational(): ExpressionNode;
    parseAdditive(): ExpressionNode;
    parseMultiplicative(): ExpressionNode;
    parseUnary(): ExpressionNode;
    parsePostfix(): ExpressionNode;
    parseArguments(): ExpressionNode[];
  }
}

// ============================================================
// OPERATOR TABLES
// ============================================================

const LOGICAL_OR_OPS: ReadonlyMap<TokenType, BinaryOp> = new Map<
  TokenType,
  BinaryOp
>([[TOKEN_TYPES.OR, '||']]);

const LOGICAL_AND_OPS: ReadonlyMap<TokenType, BinaryOp> = new Map<
  TokenType,
  BinaryOp
>([[TOKEN_TYPES.AND, '&&']]);

const EQUALITY_OPS: ReadonlyMap<TokenType, BinaryOp> = new Map<
  TokenType,
  BinaryOp
>([
  [TOKEN_TYPES.EQ, '=='],
  [TOKEN_TYPES.NE, '!='],
]);

const RELATIONAL_OPS: ReadonlyMap<TokenType, BinaryOp> = new Map<
  TokenType,
  BinaryOp
>([
  [TOKEN_TYPES.LT, '<'],
  [TOKEN_TYPES.GT, '>'],
  [TOKEN_TYPES.LE, '<='],
  [TOKEN_TYPES.GE, '>='],
]);

const ADDITIVE_OPS: ReadonlyMap<TokenType, BinaryOp> = new Map<
  TokenType,
  BinaryOp
>([
  [TOKEN_TYPES.PLUS, '+'],
  [TOKEN_TYPES.MINUS, '-'],
]);

const MULTIPLICATIVE_OPS: ReadonlyMap<TokenType, BinaryOp> = new Map<
  TokenType,
  BinaryOp
>([
  [TOKEN_TYPES.STAR, '*'],
  [TOKEN_TYPES.SLASH, '/'],
  [TOKEN_TYPES.PERCENT, '%'],
]);

const UNARY_OPS: ReadonlyMap<TokenType, UnaryOp> = new Map<
  TokenType,
  UnaryOp
>([
  [TOKEN_TYPES.BANG, '!'],
  [TOKEN_TYPES.MINUS, '-'],
]);

/**
 * One left-associative precedence level.
 * @internal
 */
function parseBinaryLevel(
  parser: Parser,
  ops: ReadonlyMap<TokenType, BinaryOp>,
  next: () => ExpressionNode
): ExpressionNode {
  let left = next();

  for (;;) {
    const op = ops.get(current(parser.state).type);
    if (op === undefined) return left;
    advance(parser.state);
    const right = next();
    left = {
      type: 'BinaryExpr',
      op,
      left,
      right,
      resolvedType: undefined,
      span: spanBetween(left, right),
    };
  }
}

// ============================================================
// PRECEDENCE CHAIN
// ============================================================

Parser.prototype.parseExpression = function (this: Parser): ExpressionNode {
  return this.parseRange();
};

/**
 * range → or ((".." | "..=") or)?
 * Non-associative: a second range operator is a syntax error.
 */
Parser.prototype.parseRange = function (this: Parser): ExpressionNode {
  const start = this.parseLogicalOr();

  if (!check(this.state, TOKEN_TYPES.DOTDOT, TOKEN_TYPES.DOTDOT_EQ)) {
    return start;
  }
  const operator = advance(this.state);
  const end = this.parseLogicalOr();

  if (check(this.state, TOKEN_TYPES.DOTDOT, TOKEN_TYPES.DOTDOT_EQ)) {
    throw parseError('P004', {}, current(this.state).span);
  }

  return {
    type: 'RangeExpr',
    start,
    end,
    inclusive: operator.type === TOKEN_TYPES.DOTDOT_EQ,
    resolvedType: undefined,
    span: spanBetween(start, end),
  };
};

Parser.prototype.parseLogicalOr = function (this: Parser): ExpressionNode {
  return parseBinaryLevel(this, LOGICAL_OR_OPS, () => this.parseLogicalAnd());
};

Parser.prototype.parseLogicalAnd = function (this: Parser): ExpressionNode {
  return parseBinaryLevel(this, LOGICAL_AND_OPS, () => this.parseEquality());
};

Parser.prototype.parseEquality = function (this: Parser): ExpressionNode {
  return parseBinaryLevel(this, EQUALITY_OPS, () => this.parseRelational());
};

Parser.prototype.parseRelational = function (this: Parser): ExpressionNode {
  return parseBinaryLevel(this, RELATIONAL_OPS, () => this.parseAdditive());
};

Parser.prototype.parseAdditive = function (this: Parser): ExpressionNode {
  return parseBinaryLevel(this, ADDITIVE_OPS, () =>
    this.parseMultiplicative()
  );
};

Parser.prototype.parseMultiplicative = function (
  this: Parser
): ExpressionNode {
  return parseBinaryLevel(this, MULTIPLICATIVE_OPS, () => this.parseUnary());
};

/** unary → ("!" | "-") unary | postfix (right-associative) */
Parser.prototype.parseUnary = function (this: Parser): ExpressionNode {
  const op = UNARY_OPS.get(current(this.state).type);
  if (op === undefined) return this.parsePostfix();

  const operator = advance(this.state);
  const operand = this.parseUnary();
  return {
    type: 'UnaryExpr',
    op,
    operand,
    resolvedType: undefined,
    span: spanBetween(operator, operand),
  };
};

// ============================================================
// POSTFIX CHAIN
// ============================================================

/**
 * postfix → primary ( "(" args ")" | "[" expr "]" | "." name ( "(" args ")" )? )*
 * A call's callee must already be a bare identifier.
 */
Parser.prototype.parsePostfix = function (this: Parser): ExpressionNode {
  let expr = this.parsePrimary();

  for (;;) {
    if (check(this.state, TOKEN_TYPES.LPAREN)) {
      if (expr.type !== 'Identifier') {
        throw parseError('P003', {}, expr.span);
      }
      advance(this.state);
      const args = this.parseArguments();
      const close = expect(
        this.state,
        TOKEN_TYPES.RPAREN,
        "expected ')' after arguments"
      );
      expr = {
        type: 'CallExpr',
        callee: expr.name,
        calleeSpan: expr.span,
        args,
        resolvedType: undefined,
        span: spanBetween(expr, close),
      };
    } else if (check(this.state, TOKEN_TYPES.LBRACKET)) {
      advance(this.state);
      const index = this.parseExpression();
      const close = expect(
        this.state,
        TOKEN_TYPES.RBRACKET,
        "expected ']' after index"
      );
      expr = {
        type: 'IndexExpr',
        target: expr,
        index,
        resolvedType: undefined,
        span: spanBetween(expr, close),
      };
    } else if (check(this.state, TOKEN_TYPES.DOT)) {
      advance(this.state);
      const name = expect(
        this.state,
        TOKEN_TYPES.IDENTIFIER,
        "expected field name after '.'"
      );
      if (check(this.state, TOKEN_TYPES.LPAREN)) {
        advance(this.state);
        const args = this.parseArguments();
        const close = expect(
          this.state,
          TOKEN_TYPES.RPAREN,
          "expected ')' after method arguments"
        );
        expr = {
          type: 'MethodCall',
          object: expr,
          method: name.value,
          args,
          resolvedType: undefined,
          span: spanBetween(expr, close),
        };
      } else {
        expr = {
          type: 'MemberAccess',
          object: expr,
          member: name.value,
          resolvedType: undefined,
          span: spanBetween(expr, name),
        };
      }
    } else {
      return expr;
    }
  }
};

/** Comma-separated arguments up to (not including) `)` */
Parser.prototype.parseArguments = function (this: Parser): ExpressionNode[] {
  const args: ExpressionNode[] = [];
  if (check(this.state, TOKEN_TYPES.RPAREN)) return args;

  args.push(this.parseExpression());
  while (check(this.state, TOKEN_TYPES.COMMA)) {
    advance(this.state);
    args.push(this.parseExpression());
  }
  return args;
};

/**
 * Parser Extension: Program and Statement Dispatch
 * Top-level program, declaration dispatch, assignment vs expression statements
 */

import { Parser } from './parser.js';
import type {
  DeclarationNode,
  ProgramNode,
  StatementNode,
} from '../ast-nodes.js';
import { parseError } from '../error-classes.js';
import { TOKEN_TYPES } from '../token-types.js';
import {
  advance,
  check,
  current,
  isAtEnd,
  previous,
  spanBetween,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseProgram(): ProgramNode;
    parseDeclaration(): DeclarationNode;
    parseStatement(): StatementNode;
    parseAssignmentOrExpression(): StatementNode;
  }
}

// ============================================================
// PROGRAM
// ============================================================

Parser.prototype.parseProgram = function (this: Parser): ProgramNode {
  const first = current(this.state);
  const declarations: DeclarationNode[] = [];

  while (!isAtEnd(this.state)) {
    declarations.push(this.parseDeclaration());
  }

  // Empty programs span the EOF token
  const last = declarations.length > 0 ? previous(this.state) : first;
  return {
    type: 'Program',
    declarations,
    span: spanBetween(first, last),
  };
};

// ============================================================
// DECLARATIONS
// ============================================================

/**
 * declaration → let | const | fn | struct | enum | import | statement
 */
Parser.prototype.parseDeclaration = function (this: Parser): DeclarationNode {
  switch (current(this.state).type) {
    case TOKEN_TYPES.LET:
      return this.parseVarDecl();
    case TOKEN_TYPES.CONST:
      return this.parseConstDecl();
    case TOKEN_TYPES.FN:
      return this.parseFnDecl();
    case TOKEN_TYPES.STRUCT:
      return this.parseStructDecl();
    case TOKEN_TYPES.ENUM:
      return this.parseEnumDecl();
    case TOKEN_TYPES.IMPORT:
      return this.parseImportDecl();
    default:
      return this.parseStatement();
  }
};

// ============================================================
// STATEMENTS
// ============================================================

Parser.prototype.parseStatement = function (this: Parser): StatementNode {
  switch (current(this.state).type) {
    case TOKEN_TYPES.IF:
      return this.parseIf();
    case TOKEN_TYPES.WHILE:
      return this.parseWhile();
    case TOKEN_TYPES.FOR:
      return this.parseFor();
    case TOKEN_TYPES.RETURN:
      return this.parseReturn();
    case TOKEN_TYPES.BREAK:
      return { type: 'BreakStmt', span: advance(this.state).span };
    case TOKEN_TYPES.CONTINUE:
      return { type: 'ContinueStmt', span: advance(this.state).span };
    case TOKEN_TYPES.PRINT:
      return this.parsePrint();
    case TOKEN_TYPES.LBRACE:
      return this.parseBlock();
    default:
      return this.parseAssignmentOrExpression();
  }
};

/**
 * Parse a full expression, then decide on a following `=`:
 * identifier → AssignStmt, index → IndexAssignStmt,
 * member access → MemberAssignStmt, otherwise "invalid assignment target".
 */
Parser.prototype.parseAssignmentOrExpression = function (
  this: Parser
): StatementNode {
  const expression = this.parseExpression();

  if (!check(this.state, TOKEN_TYPES.ASSIGN)) {
    return { type: 'ExpressionStmt', expression, span: expression.span };
  }
  advance(this.state);
  const value = this.parseExpression();
  const span = spanBetween(expression, value);

  switch (expression.type) {
    case 'Identifier':
      return {
        type: 'AssignStmt',
        target: expression.name,
        targetSpan: expression.span,
        value,
        span,
      };
    case 'IndexExpr':
      return { type: 'IndexAssignStmt', target: expression, value, span };
    case 'MemberAccess':
      return { type: 'MemberAssignStmt', target: expression, value, span };
    default:
      throw parseError('P002', {}, expression.span);
  }
};

/**
 * Analyzer Extension: Statements
 * Blocks, control flow, returns, assignments and print
 */

import { Analyzer, mismatch } from './analyzer.js';
import {
  assertNever,
  type AssignStmtNode,
  type BlockNode,
  type ExpressionNode,
  type ForStmtNode,
  type IfStmtNode,
  type IndexAssignStmtNode,
  type MemberAssignStmtNode,
  type PrintStmtNode,
  type ReturnStmtNode,
  type StatementNode,
  type TypedExpression,
  type WhileStmtNode,
} from '../ast-nodes.js';
import { semanticError } from '../error-classes.js';
import {
  ANY,
  BOOL,
  STR,
  formatType,
  isAssignable,
  type Type,
} from '../value-types.js';

// Declaration merging to add methods to Analyzer interface
declare module './analyzer.js' {
  interface Analyzer {
    analyzeStatement(stmt: StatementNode): StatementNode<Type>;
    analyzeBlock(block: BlockNode): BlockNode<Type>;
    analyzeBlockContents(block: BlockNode): BlockNode<Type>;
    analyzeCondition(condition: ExpressionNode): TypedExpression;
    analyzeIf(stmt: IfStmtNode): IfStmtNode<Type>;
    analyzeWhile(stmt: WhileStmtNode): WhileStmtNode<Type>;
    analyzeFor(stmt: ForStmtNode): ForStmtNode<Type>;
    analyzeReturn(stmt: ReturnStmtNode): ReturnStmtNode<Type>;
    analyzeAssign(stmt: AssignStmtNode): AssignStmtNode<Type>;
    analyzeIndexAssign(stmt: IndexAssignStmtNode): IndexAssignStmtNode<Type>;
    analyzeMemberAssign(
      stmt: MemberAssignStmtNode
    ): MemberAssignStmtNode<Type>;
    analyzePrint(stmt: PrintStmtNode): PrintStmtNode<Type>;
  }
}

Analyzer.prototype.analyzeStatement = function (
  this: Analyzer,
  stmt: StatementNode
): StatementNode<Type> {
  switch (stmt.type) {
    case 'Block':
      return this.analyzeBlock(stmt);
    case 'ExpressionStmt':
      return { ...stmt, expression: this.analyzeExpression(stmt.expression) };
    case 'IfStmt':
      return this.analyzeIf(stmt);
    case 'WhileStmt':
      return this.analyzeWhile(stmt);
    case 'ForStmt':
      return this.analyzeFor(stmt);
    case 'ReturnStmt':
      return this.analyzeReturn(stmt);
    case 'BreakStmt':
      if (this.loopDepth === 0) throw semanticError('E0200', {}, stmt.span);
      return stmt;
    case 'ContinueStmt':
      if (this.loopDepth === 0) throw semanticError('E0201', {}, stmt.span);
      return stmt;
    case 'AssignStmt':
      return this.analyzeAssign(stmt);
    case 'IndexAssignStmt':
      return this.analyzeIndexAssign(stmt);
    case 'MemberAssignStmt':
      return this.analyzeMemberAssign(stmt);
    case 'PrintStmt':
      return this.analyzePrint(stmt);
    default:
      return assertNever(stmt, 'statement');
  }
};

// ============================================================
// BLOCKS AND CONTROL FLOW
// ============================================================

/** Nested block with its own scope frame */
Analyzer.prototype.analyzeBlock = function (
  this: Analyzer,
  block: BlockNode
): BlockNode<Type> {
  return this.symbols.withScope(() => this.analyzeBlockContents(block));
};

/** Block declarations in the current scope frame */
Analyzer.prototype.analyzeBlockContents = function (
  this: Analyzer,
  block: BlockNode
): BlockNode<Type> {
  return {
    ...block,
    declarations: block.declarations.map((decl) =>
      this.analyzeDeclaration(decl)
    ),
  };
};

Analyzer.prototype.analyzeCondition = function (
  this: Analyzer,
  condition: ExpressionNode
): TypedExpression {
  const typed = this.analyzeExpression(condition);
  if (!isAssignable(BOOL, typed.resolvedType)) {
    throw semanticError(
      'E0101',
      { actual: formatType(typed.resolvedType) },
      condition.span
    );
  }
  return typed;
};

Analyzer.prototype.analyzeIf = function (
  this: Analyzer,
  stmt: IfStmtNode
): IfStmtNode<Type> {
  const condition = this.analyzeCondition(stmt.condition);
  const thenBlock = this.analyzeBlock(stmt.thenBlock);
  const elseBlock =
    stmt.elseBlock === null ? null : this.analyzeBlock(stmt.elseBlock);
  return { ...stmt, condition, thenBlock, elseBlock };
};

Analyzer.prototype.analyzeWhile = function (
  this: Analyzer,
  stmt: WhileStmtNode
): WhileStmtNode<Type> {
  const condition = this.analyzeCondition(stmt.condition);
  const body = this.inLoop(() => this.analyzeBlock(stmt.body));
  return { ...stmt, condition, body };
};

/**
 * Ranges bind int and lists bind their element type. The loop variable
 * lives in a frame around the body's own frame.
 */
Analyzer.prototype.analyzeFor = function (
  this: Analyzer,
  stmt: ForStmtNode
): ForStmtNode<Type> {
  const iterable = this.analyzeExpression(stmt.iterable);
  const iterableType = iterable.resolvedType;

  let elementType: Type;
  if (iterableType.kind === 'list') {
    elementType = iterableType.element;
  } else if (iterableType.kind === 'any') {
    elementType = ANY;
  } else {
    throw semanticError(
      'E0505',
      { actual: formatType(iterableType) },
      stmt.iterable.span
    );
  }

  const body = this.symbols.withScope(() => {
    this.bindName(stmt.variable, 'variable', elementType, stmt.variableSpan);
    return this.inLoop(() => this.analyzeBlock(stmt.body));
  });
  return { ...stmt, iterable, body };
};

Analyzer.prototype.analyzeReturn = function (
  this: Analyzer,
  stmt: ReturnStmtNode
): ReturnStmtNode<Type> {
  const fn = this.currentFunction;
  if (fn === null) {
    throw semanticError('E0304', {}, stmt.span);
  }
  const expected = fn.returnType;

  if (stmt.value === null) {
    if (expected.kind !== 'void') {
      const detail = `function '${fn.name}' must return ${formatType(expected)}`;
      throw semanticError('E0302', { detail }, stmt.span);
    }
    return { ...stmt, value: null };
  }

  if (expected.kind === 'void') {
    throw semanticError(
      'E0302',
      { detail: `void function '${fn.name}' cannot return a value` },
      stmt.value.span
    );
  }
  const value = this.analyzeExpression(stmt.value, expected);
  if (!isAssignable(expected, value.resolvedType)) {
    const { expected: want, actual } = mismatch(expected, value.resolvedType);
    throw semanticError(
      'E0302',
      { detail: `return type mismatch: expected ${want}, got ${actual}` },
      stmt.value.span
    );
  }
  return { ...stmt, value };
};

// ============================================================
// ASSIGNMENTS
// ============================================================

Analyzer.prototype.analyzeAssign = function (
  this: Analyzer,
  stmt: AssignStmtNode
): AssignStmtNode<Type> {
  const symbol = this.symbols.lookup(stmt.target);
  if (!symbol) {
    throw semanticError('E0001', { name: stmt.target }, stmt.targetSpan);
  }
  if (symbol.isConst) {
    throw semanticError('E0003', { name: stmt.target }, stmt.targetSpan);
  }

  const value = this.analyzeExpression(stmt.value, symbol.type);
  if (!isAssignable(symbol.type, value.resolvedType)) {
    throw semanticError(
      'E0100',
      mismatch(symbol.type, value.resolvedType),
      stmt.value.span
    );
  }
  return { ...stmt, value };
};

/** xs[i] = v checks the element type; d[k] = v the value type */
Analyzer.prototype.analyzeIndexAssign = function (
  this: Analyzer,
  stmt: IndexAssignStmtNode
): IndexAssignStmtNode<Type> {
  const target = this.analyzeIndexExpr(stmt.target);
  const container = target.target.resolvedType;
  const value = this.analyzeExpression(stmt.value, target.resolvedType);

  if (!isAssignable(target.resolvedType, value.resolvedType)) {
    if (container.kind === 'dict') {
      throw semanticError(
        'E1004',
        mismatch(container.value, value.resolvedType),
        stmt.value.span
      );
    }
    throw semanticError(
      'E0503',
      {
        actual: formatType(value.resolvedType),
        target: formatType(container),
      },
      stmt.value.span
    );
  }
  return { ...stmt, target, value };
};

Analyzer.prototype.analyzeMemberAssign = function (
  this: Analyzer,
  stmt: MemberAssignStmtNode
): MemberAssignStmtNode<Type> {
  const target = this.analyzeMemberAccess(stmt.target);
  const objectType = target.object.resolvedType;
  if (objectType.kind !== 'struct' && objectType.kind !== 'any') {
    throw semanticError(
      'E0807',
      { actual: formatType(objectType) },
      stmt.target.span
    );
  }

  const fieldType = target.resolvedType;
  const value = this.analyzeExpression(stmt.value, fieldType);
  if (!isAssignable(fieldType, value.resolvedType)) {
    throw semanticError(
      'E0809',
      {
        actual: formatType(value.resolvedType),
        field: stmt.target.member,
        expected: formatType(fieldType),
      },
      stmt.value.span
    );
  }
  return { ...stmt, target, value };
};

// ============================================================
// PRINT
// ============================================================

/** Number of `{}` placeholders once `{{` and `}}` escapes are removed */
export function countPlaceholders(format: string): number {
  const unescaped = format.replaceAll('{{', '').replaceAll('}}', '');
  return unescaped.split('{}').length - 1;
}

/**
 * Any value may be printed. A leading string literal with placeholders
 * is a format string when more arguments follow it.
 */
Analyzer.prototype.analyzePrint = function (
  this: Analyzer,
  stmt: PrintStmtNode
): PrintStmtNode<Type> {
  const args = stmt.args.map((arg) => this.analyzeExpression(arg));

  const sep = stmt.sep === null ? null : this.analyzeExpression(stmt.sep);
  if (sep !== null && !isAssignable(STR, sep.resolvedType)) {
    throw semanticError(
      'E0402',
      { actual: formatType(sep.resolvedType) },
      sep.span
    );
  }
  const end = stmt.end === null ? null : this.analyzeExpression(stmt.end);
  if (end !== null && !isAssignable(STR, end.resolvedType)) {
    throw semanticError(
      'E0403',
      { actual: formatType(end.resolvedType) },
      end.span
    );
  }

  const [first] = stmt.args;
  if (args.length >= 2 && first?.type === 'StringLiteral') {
    const placeholders = countPlaceholders(first.value);
    const provided = args.length - 1;
    if (placeholders > 0 && placeholders !== provided) {
      throw semanticError(
        placeholders > provided ? 'E0410' : 'E0411',
        { placeholders, args: provided },
        first.span
      );
    }
  }

  return { ...stmt, args, sep, end };
};

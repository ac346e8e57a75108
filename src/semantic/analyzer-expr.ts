/**
 * Analyzer Extension: Expressions
 * Dispatch, identifiers, operators, ranges, index and member access
 */

import { Analyzer, isEmptyLiteral, mismatch } from './analyzer.js';
import {
  assertNever,
  type BinaryExprNode,
  type BinaryOp,
  type ExpressionNode,
  type IdentifierNode,
  type IndexExprNode,
  type MemberAccessNode,
  type RangeExprNode,
  type TypedExpression,
  type UnaryExprNode,
} from '../ast-nodes.js';
import { semanticError } from '../error-classes.js';
import {
  ANY,
  BOOL,
  FLOAT,
  INT,
  STR,
  formatType,
  isAssignable,
  isNumeric,
  listOf,
  typesEqual,
  type Type,
} from '../value-types.js';

// Declaration merging to add methods to Analyzer interface
declare module './analyzer.js' {
  interface Analyzer {
    analyzeExpression(expr: ExpressionNode, expected?: Type): TypedExpression;
    analyzeIdentifier(expr: IdentifierNode): IdentifierNode<Type>;
    analyzeBinary(expr: BinaryExprNode): BinaryExprNode<Type>;
    analyzeUnary(expr: UnaryExprNode): UnaryExprNode<Type>;
    analyzeRange(expr: RangeExprNode): RangeExprNode<Type>;
    analyzeIndexExpr(expr: IndexExprNode): IndexExprNode<Type>;
    analyzeMemberAccess(expr: MemberAccessNode): MemberAccessNode<Type>;
  }
}

// ============================================================
// DISPATCH
// ============================================================

/**
 * Type an expression. `expected` is the type of the slot the value flows
 * into, when there is one; only empty collection literals consult it.
 */
Analyzer.prototype.analyzeExpression = function (
  this: Analyzer,
  expr: ExpressionNode,
  expected?: Type
): TypedExpression {
  switch (expr.type) {
    case 'IntLiteral':
      return { ...expr, resolvedType: INT };
    case 'FloatLiteral':
      return { ...expr, resolvedType: FLOAT };
    case 'StringLiteral':
      return { ...expr, resolvedType: STR };
    case 'BoolLiteral':
      return { ...expr, resolvedType: BOOL };
    case 'Identifier':
      return this.analyzeIdentifier(expr);
    case 'ListLiteral':
      return this.analyzeListLiteral(expr, expected);
    case 'DictLiteral':
      return this.analyzeDictLiteral(expr, expected);
    case 'StructInit':
      return this.analyzeStructInit(expr);
    case 'BinaryExpr':
      return this.analyzeBinary(expr);
    case 'UnaryExpr':
      return this.analyzeUnary(expr);
    case 'CallExpr':
      return this.analyzeCall(expr);
    case 'MethodCall':
      return this.analyzeMethodCall(expr);
    case 'IndexExpr':
      return this.analyzeIndexExpr(expr);
    case 'MemberAccess':
      return this.analyzeMemberAccess(expr);
    case 'RangeExpr':
      return this.analyzeRange(expr);
    default:
      return assertNever(expr, 'expression');
  }
};

Analyzer.prototype.analyzeIdentifier = function (
  this: Analyzer,
  expr: IdentifierNode
): IdentifierNode<Type> {
  const symbol = this.symbols.lookup(expr.name);
  if (!symbol) {
    throw semanticError('E0001', { name: expr.name }, expr.span);
  }
  if (symbol.isFunction) {
    throw semanticError('E0308', { name: expr.name }, expr.span);
  }
  return { ...expr, resolvedType: symbol.type };
};

// ============================================================
// OPERATORS
// ============================================================

type OperatorClass = 'arithmetic' | 'equality' | 'relational' | 'logical';

function classify(op: BinaryOp): OperatorClass {
  switch (op) {
    case '+':
    case '-':
    case '*':
    case '/':
    case '%':
      return 'arithmetic';
    case '==':
    case '!=':
      return 'equality';
    case '<':
    case '>':
    case '<=':
    case '>=':
      return 'relational';
    case '&&':
    case '||':
      return 'logical';
    default:
      return assertNever(op, 'binary operator');
  }
}

function isLiteralZero(expr: ExpressionNode): boolean {
  if (expr.type === 'IntLiteral') return expr.value === 0n;
  return expr.type === 'FloatLiteral' && expr.value === 0;
}

/** @internal */
function arithmeticType(expr: BinaryExprNode, left: Type, right: Type): Type {
  const { op } = expr;
  if ((op === '/' || op === '%') && isLiteralZero(expr.right)) {
    throw semanticError(
      'E0104',
      { detail: 'division by zero' },
      expr.right.span
    );
  }
  if (left.kind === 'any' || right.kind === 'any') return ANY;

  if (left.kind === 'str' && right.kind === 'str') {
    if (op === '+') return STR;
    throw semanticError(
      'E0102',
      { detail: `operator '${op}' is not supported for str` },
      expr.span
    );
  }
  if (isNumeric(left) && isNumeric(right)) {
    if (typesEqual(left, right)) return left;
    throw semanticError(
      'E0102',
      {
        detail: `cannot mix ${formatType(left)} and ${formatType(right)} in arithmetic`,
      },
      expr.span
    );
  }
  throw semanticError(
    'E0102',
    {
      detail: `operator '${op}' cannot be applied to ${formatType(left)} and ${formatType(right)}`,
    },
    expr.span
  );
}

/** @internal */
function relationalType(expr: BinaryExprNode, left: Type, right: Type): Type {
  const { op } = expr;
  if (left.kind === 'any' || right.kind === 'any') return BOOL;

  const enumSide = left.kind === 'enum' ? left : right;
  if (enumSide.kind === 'enum') {
    throw semanticError('E1205', { op, name: enumSide.name }, expr.span);
  }
  if (left.kind === 'str' || right.kind === 'str') {
    throw semanticError(
      'E0103',
      { detail: `operator '${op}' is not supported for str` },
      expr.span
    );
  }
  if (!typesEqual(left, right)) {
    const detail = `cannot compare ${formatType(left)} with ${formatType(right)}`;
    throw semanticError('E0102', { detail }, expr.span);
  }
  if (!isNumeric(left)) {
    throw semanticError(
      'E0103',
      {
        detail: `operator '${op}' requires numeric operands, got ${formatType(left)}`,
      },
      expr.span
    );
  }
  return BOOL;
}

/** @internal */
function equalityType(expr: BinaryExprNode, left: Type, right: Type): Type {
  if (left.kind === 'any' || right.kind === 'any') return BOOL;

  if (left.kind === 'enum' || right.kind === 'enum') {
    if (!typesEqual(left, right)) {
      throw semanticError(
        'E1204',
        { left: formatType(left), right: formatType(right) },
        expr.span
      );
    }
    return BOOL;
  }
  if (!isAssignable(left, right) && !isAssignable(right, left)) {
    const detail = `cannot compare ${formatType(left)} with ${formatType(right)}`;
    throw semanticError('E0102', { detail }, expr.span);
  }
  return BOOL;
}

/** @internal */
function logicalType(expr: BinaryExprNode, left: Type, right: Type): Type {
  const operands: [ExpressionNode, Type][] = [
    [expr.left, left],
    [expr.right, right],
  ];
  for (const [operand, type] of operands) {
    if (!isAssignable(BOOL, type)) {
      throw semanticError(
        'E0104',
        {
          detail: `operator '${expr.op}' requires bool operands, got ${formatType(type)}`,
        },
        operand.span
      );
    }
  }
  return BOOL;
}

function binaryType(expr: BinaryExprNode, left: Type, right: Type): Type {
  const operatorClass = classify(expr.op);
  switch (operatorClass) {
    case 'arithmetic':
      return arithmeticType(expr, left, right);
    case 'relational':
      return relationalType(expr, left, right);
    case 'equality':
      return equalityType(expr, left, right);
    case 'logical':
      return logicalType(expr, left, right);
    default:
      return assertNever(operatorClass, 'operator class');
  }
}

Analyzer.prototype.analyzeBinary = function (
  this: Analyzer,
  expr: BinaryExprNode
): BinaryExprNode<Type> {
  // An empty literal compared for equality takes the other side's type
  const comparing = classify(expr.op) === 'equality';
  let left = this.analyzeExpression(expr.left);
  const right = this.analyzeExpression(
    expr.right,
    comparing ? left.resolvedType : undefined
  );
  if (comparing && isEmptyLiteral(left)) {
    left = this.analyzeExpression(expr.left, right.resolvedType);
  }
  const leftType = left.resolvedType;
  const rightType = right.resolvedType;

  const resolvedType = binaryType(expr, leftType, rightType);
  return { ...expr, left, right, resolvedType };
};

Analyzer.prototype.analyzeUnary = function (
  this: Analyzer,
  expr: UnaryExprNode
): UnaryExprNode<Type> {
  const operand = this.analyzeExpression(expr.operand);
  const type = operand.resolvedType;

  if (expr.op === '!') {
    if (!isAssignable(BOOL, type)) {
      const detail = `operator '!' requires a bool operand, got ${formatType(type)}`;
      throw semanticError('E0104', { detail }, expr.operand.span);
    }
    return { ...expr, operand, resolvedType: BOOL };
  }

  if (type.kind !== 'any' && !isNumeric(type)) {
    throw semanticError(
      'E0102',
      {
        detail: `operator '-' requires a numeric operand, got ${formatType(type)}`,
      },
      expr.operand.span
    );
  }
  return { ...expr, operand, resolvedType: type };
};

/** A range is a list of int for iteration and assignment */
Analyzer.prototype.analyzeRange = function (
  this: Analyzer,
  expr: RangeExprNode
): RangeExprNode<Type> {
  const start = this.analyzeExpression(expr.start);
  const end = this.analyzeExpression(expr.end);

  const bounds: ['start' | 'end', TypedExpression][] = [
    ['start', start],
    ['end', end],
  ];
  for (const [bound, typed] of bounds) {
    if (!isAssignable(INT, typed.resolvedType)) {
      throw semanticError(
        'E0504',
        { bound, actual: formatType(typed.resolvedType) },
        typed.span
      );
    }
  }
  return { ...expr, start, end, resolvedType: listOf(INT) };
};

// ============================================================
// ACCESS
// ============================================================

/** xs[int] yields the element type; d[K] yields the value type */
Analyzer.prototype.analyzeIndexExpr = function (
  this: Analyzer,
  expr: IndexExprNode
): IndexExprNode<Type> {
  const target = this.analyzeExpression(expr.target);
  const container = target.resolvedType;

  switch (container.kind) {
    case 'list': {
      const index = this.analyzeExpression(expr.index, INT);
      if (!isAssignable(INT, index.resolvedType)) {
        throw semanticError(
          'E0501',
          { actual: formatType(index.resolvedType) },
          expr.index.span
        );
      }
      return { ...expr, target, index, resolvedType: container.element };
    }
    case 'dict': {
      const index = this.analyzeExpression(expr.index, container.key);
      if (!isAssignable(container.key, index.resolvedType)) {
        throw semanticError(
          'E1003',
          mismatch(container.key, index.resolvedType),
          expr.index.span
        );
      }
      return { ...expr, target, index, resolvedType: container.value };
    }
    case 'any':
      return {
        ...expr,
        target,
        index: this.analyzeExpression(expr.index),
        resolvedType: ANY,
      };
    default:
      throw semanticError(
        'E0502',
        { actual: formatType(container) },
        expr.target.span
      );
  }
};

/**
 * Struct field access, or `Enum.Variant` when the object is a bare name
 * that only the type namespace binds.
 */
Analyzer.prototype.analyzeMemberAccess = function (
  this: Analyzer,
  expr: MemberAccessNode
): MemberAccessNode<Type> {
  const { object, member } = expr;

  if (object.type === 'Identifier' && !this.symbols.lookup(object.name)) {
    const named = this.types.get(object.name);
    if (named?.kind === 'enum') {
      if (!named.variants.includes(member)) {
        throw semanticError(
          'E1202',
          { name: named.name, variant: member },
          expr.span
        );
      }
      return {
        ...expr,
        object: { ...object, resolvedType: named },
        resolvedType: named,
      };
    }
  }

  const typedObject = this.analyzeExpression(object);
  const objectType = typedObject.resolvedType;

  if (objectType.kind === 'any') {
    return { ...expr, object: typedObject, resolvedType: ANY };
  }
  if (objectType.kind !== 'struct') {
    throw semanticError(
      'E0807',
      { actual: formatType(objectType) },
      expr.span
    );
  }

  const field = objectType.fields.find((f) => f.name === member);
  if (!field) {
    throw semanticError(
      'E0808',
      { name: objectType.name, field: member },
      expr.span
    );
  }
  return { ...expr, object: typedObject, resolvedType: field.type };
};

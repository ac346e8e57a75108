/**
 * Analyzer Extension: Calls
 * Free builtins, casts, user functions, methods and static namespaces
 */

import { Analyzer } from './analyzer.js';
import type {
  CallExprNode,
  ExpressionNode,
  MethodCallNode,
  TypedExpression,
} from '../ast-nodes.js';
import { semanticError } from '../error-classes.js';
import {
  ANY,
  INT,
  STR,
  VOID,
  formatType,
  isAssignable,
  listOf,
  type Type,
} from '../value-types.js';
import {
  CAST_FUNCTIONS,
  STATIC_NAMESPACES,
  methodsFor,
  type MethodSignature,
} from './builtins.js';

// Declaration merging to add methods to Analyzer interface
declare module './analyzer.js' {
  interface Analyzer {
    analyzeCall(expr: CallExprNode): CallExprNode<Type>;
    analyzeBuiltinCall(expr: CallExprNode): CallExprNode<Type> | undefined;
    analyzeUserCall(expr: CallExprNode): CallExprNode<Type>;
    analyzeMethodCall(expr: MethodCallNode): MethodCallNode<Type>;
    analyzeMethodArgs(
      expr: MethodCallNode,
      signature: MethodSignature,
      argumentCode: 'E1100' | 'E1107'
    ): TypedExpression[];
    analyzeArgument(
      arg: ExpressionNode,
      param: Type,
      onMismatch: (actual: string, expected: string) => Error
    ): TypedExpression;
  }
}

function callOf(
  expr: CallExprNode,
  args: TypedExpression[],
  resolvedType: Type
): CallExprNode<Type> {
  return { ...expr, args, resolvedType };
}

// ============================================================
// FREE FUNCTIONS
// ============================================================

Analyzer.prototype.analyzeCall = function (
  this: Analyzer,
  expr: CallExprNode
): CallExprNode<Type> {
  return this.analyzeBuiltinCall(expr) ?? this.analyzeUserCall(expr);
};

/** Builtins take precedence over any binding of the same name */
Analyzer.prototype.analyzeBuiltinCall = function (
  this: Analyzer,
  expr: CallExprNode
): CallExprNode<Type> | undefined {
  const { callee } = expr;
  const count = expr.args.length;
  const analyzeAll = (): TypedExpression[] =>
    expr.args.map((arg) => this.analyzeExpression(arg));

  const castTarget = CAST_FUNCTIONS.get(callee);
  if (castTarget) {
    if (count !== 1) {
      const context = { name: callee, actual: count };
      throw semanticError('E0602', context, expr.span);
    }
    return callOf(expr, analyzeAll(), castTarget);
  }

  switch (callee) {
    case 'len': {
      const [arg] = expr.args;
      if (count !== 1 || !arg) {
        const detail = `len() takes exactly 1 argument (${count} given)`;
        throw semanticError('E0507', { detail }, expr.span);
      }
      const typed = this.analyzeExpression(arg);
      const argType = typed.resolvedType;
      if (
        argType.kind !== 'list' &&
        argType.kind !== 'dict' &&
        argType.kind !== 'any'
      ) {
        const detail = `len() requires a list or dict, got ${formatType(argType)}`;
        throw semanticError('E0507', { detail }, arg.span);
      }
      return callOf(expr, [typed], INT);
    }

    case 'push': {
      const [listArg, valueArg] = expr.args;
      if (count !== 2 || !listArg || !valueArg) {
        const detail = `push() takes exactly 2 arguments (${count} given)`;
        throw semanticError('E0506', { detail }, expr.span);
      }
      const list = this.analyzeExpression(listArg);
      const listType = list.resolvedType;
      if (listType.kind === 'any') {
        return callOf(expr, [list, this.analyzeExpression(valueArg)], VOID);
      }
      if (listType.kind !== 'list') {
        const detail = `push() requires a list, got ${formatType(listType)}`;
        throw semanticError('E0506', { detail }, listArg.span);
      }
      const value = this.analyzeExpression(valueArg, listType.element);
      if (!isAssignable(listType.element, value.resolvedType)) {
        const detail = `cannot push ${formatType(value.resolvedType)} onto ${formatType(listType)}`;
        throw semanticError('E0506', { detail }, valueArg.span);
      }
      return callOf(expr, [list, value], VOID);
    }

    case 'input': {
      if (count > 1) {
        throw semanticError('E0600', { actual: count }, expr.span);
      }
      const args = analyzeAll();
      const [prompt] = args;
      if (prompt && !isAssignable(STR, prompt.resolvedType)) {
        throw semanticError(
          'E0601',
          { actual: formatType(prompt.resolvedType) },
          prompt.span
        );
      }
      return callOf(expr, args, STR);
    }

    case 'keys':
    case 'values': {
      const [arg] = expr.args;
      if (count !== 1 || !arg) {
        const context = { name: callee, actual: count };
        throw semanticError('E0602', context, expr.span);
      }
      const dict = this.analyzeExpression(arg);
      const dictType = dict.resolvedType;
      if (dictType.kind === 'any') return callOf(expr, [dict], ANY);
      if (dictType.kind !== 'dict') {
        throw semanticError(
          callee === 'keys' ? 'E1005' : 'E1006',
          { actual: formatType(dictType) },
          arg.span
        );
      }
      const element = callee === 'keys' ? dictType.key : dictType.value;
      return callOf(expr, [dict], listOf(element));
    }

    default:
      return undefined;
  }
};

/**
 * Calls to user functions check arity, then each argument in order.
 * Calling an imported module yields `any`.
 */
Analyzer.prototype.analyzeUserCall = function (
  this: Analyzer,
  expr: CallExprNode
): CallExprNode<Type> {
  const name = expr.callee;
  const symbol = this.symbols.lookup(name);
  if (!symbol) {
    throw semanticError('E0001', { name }, expr.calleeSpan);
  }
  if (symbol.kind === 'module') {
    const args = expr.args.map((arg) => this.analyzeExpression(arg));
    return callOf(expr, args, ANY);
  }
  if (!symbol.signature) {
    throw semanticError('E0307', { name }, expr.calleeSpan);
  }

  const { params, returnType } = symbol.signature;
  if (expr.args.length !== params.length) {
    throw semanticError(
      'E0305',
      { name, expected: params.length, actual: expr.args.length },
      expr.span
    );
  }

  const args = expr.args.map((arg, index) =>
    this.analyzeArgument(arg, params[index] ?? ANY, (actual, expected) =>
      semanticError(
        'E0306',
        { position: index + 1, name, expected, actual },
        arg.span
      )
    )
  );
  return callOf(expr, args, returnType);
};

// ============================================================
// METHODS
// ============================================================

/**
 * `File.exists(path)` style calls resolve against the static namespace
 * registry; everything else against the receiver type's methods.
 */
Analyzer.prototype.analyzeMethodCall = function (
  this: Analyzer,
  expr: MethodCallNode
): MethodCallNode<Type> {
  const { object, method } = expr;

  if (object.type === 'Identifier') {
    const namespace = STATIC_NAMESPACES.get(object.name);
    if (namespace) {
      const signature = namespace.get(method);
      if (!signature) {
        const detail = `module '${object.name}' has no function '${method}'`;
        throw semanticError('E1105', { detail }, expr.span);
      }
      const args = this.analyzeMethodArgs(expr, signature, 'E1107');
      return {
        ...expr,
        object: { ...object, resolvedType: ANY },
        args,
        resolvedType: signature.returnType,
      };
    }
  }

  const receiver = this.analyzeExpression(object);
  const receiverType = receiver.resolvedType;
  if (receiverType.kind === 'any') {
    const args = expr.args.map((arg) => this.analyzeExpression(arg));
    return { ...expr, object: receiver, args, resolvedType: ANY };
  }

  const methods = methodsFor(receiverType);
  const typeName = formatType(receiverType);
  if (!methods) {
    const detail = `type '${typeName}' has no methods`;
    throw semanticError('E1105', { detail }, expr.span);
  }
  const signature = methods.get(method);
  if (!signature) {
    const detail = `type '${typeName}' has no method '${method}'`;
    throw semanticError('E1105', { detail }, expr.span);
  }

  const args = this.analyzeMethodArgs(
    expr,
    signature,
    receiverType.kind === 'str' ? 'E1107' : 'E1100'
  );
  if (
    method === 'join' &&
    receiverType.kind === 'list' &&
    !isAssignable(STR, receiverType.element)
  ) {
    throw semanticError('E1102', { actual: typeName }, expr.span);
  }

  return {
    ...expr,
    object: receiver,
    args,
    resolvedType: signature.returnType,
  };
};

/** Arity first, then each argument against its parameter type */
Analyzer.prototype.analyzeMethodArgs = function (
  this: Analyzer,
  expr: MethodCallNode,
  signature: MethodSignature,
  argumentCode: 'E1100' | 'E1107'
): TypedExpression[] {
  const { method } = expr;
  const { params } = signature;
  if (expr.args.length !== params.length) {
    throw semanticError(
      'E1106',
      { method, expected: params.length, actual: expr.args.length },
      expr.span
    );
  }

  return expr.args.map((arg, index) =>
    this.analyzeArgument(arg, params[index] ?? ANY, (actual, expected) =>
      semanticError(
        argumentCode,
        { method, position: index + 1, expected, actual },
        arg.span
      )
    )
  );
};

// ============================================================
// ARGUMENTS
// ============================================================

Analyzer.prototype.analyzeArgument = function (
  this: Analyzer,
  arg: ExpressionNode,
  param: Type,
  onMismatch: (actual: string, expected: string) => Error
): TypedExpression {
  const typed = this.analyzeExpression(arg, param);
  if (!isAssignable(param, typed.resolvedType)) {
    throw onMismatch(formatType(typed.resolvedType), formatType(param));
  }
  return typed;
};

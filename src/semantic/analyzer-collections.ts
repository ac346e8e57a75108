/**
 * Analyzer Extension: Collection and Struct Literals
 * Homogeneous lists and dicts, struct initializers
 */

import { Analyzer, isEmptyLiteral, mismatch } from './analyzer.js';
import type {
  DictEntryNode,
  DictLiteralNode,
  FieldInitNode,
  ListLiteralNode,
  StructInitNode,
  TypedExpression,
} from '../ast-nodes.js';
import { semanticError } from '../error-classes.js';
import {
  VOID,
  dictOf,
  formatType,
  isAssignable,
  isHashable,
  listOf,
  type Type,
} from '../value-types.js';

// Declaration merging to add methods to Analyzer interface
declare module './analyzer.js' {
  interface Analyzer {
    analyzeListLiteral(
      expr: ListLiteralNode,
      expected?: Type
    ): ListLiteralNode<Type>;
    analyzeDictLiteral(
      expr: DictLiteralNode,
      expected?: Type
    ): DictLiteralNode<Type>;
    analyzeStructInit(expr: StructInitNode): StructInitNode<Type>;
  }
}

/**
 * Element type after seeing one more element. While every element so far
 * is an empty literal, the first concrete collection of the same shape
 * replaces it.
 */
function unify(
  current: Type,
  next: Type,
  onlyEmptySoFar: boolean
): Type | undefined {
  if (isAssignable(current, next)) return current;
  if (onlyEmptySoFar && current.kind === next.kind) return next;
  return undefined;
}

// ============================================================
// LISTS
// ============================================================

/**
 * Elements share one type. `[]` takes the expected list type when there
 * is one, `[void]` otherwise.
 */
Analyzer.prototype.analyzeListLiteral = function (
  this: Analyzer,
  expr: ListLiteralNode,
  expected?: Type
): ListLiteralNode<Type> {
  const expectedElement =
    expected?.kind === 'list' ? expected.element : undefined;

  if (expr.elements.length === 0) {
    return {
      ...expr,
      elements: [],
      resolvedType: expected?.kind === 'list' ? expected : listOf(VOID),
    };
  }

  let elementType: Type | undefined;
  let onlyEmpty = true;
  const elements: TypedExpression[] = [];
  for (const element of expr.elements) {
    const typed = this.analyzeExpression(
      element,
      elementType ?? expectedElement
    );
    const actual = typed.resolvedType;
    const unified =
      elementType === undefined
        ? actual
        : unify(elementType, actual, onlyEmpty);
    if (unified === undefined) {
      throw semanticError(
        'E0500',
        mismatch(elementType ?? actual, actual),
        element.span
      );
    }
    elementType = unified;
    onlyEmpty = onlyEmpty && isEmptyLiteral(typed);
    elements.push(typed);
  }

  return { ...expr, elements, resolvedType: listOf(elementType ?? VOID) };
};

// ============================================================
// DICTS
// ============================================================

/**
 * Keys share one hashable type and values share one type. `{}` takes the
 * expected dict type when there is one, `Dict[void, void]` otherwise.
 */
Analyzer.prototype.analyzeDictLiteral = function (
  this: Analyzer,
  expr: DictLiteralNode,
  expected?: Type
): DictLiteralNode<Type> {
  if (expr.entries.length === 0) {
    return {
      ...expr,
      entries: [],
      resolvedType: expected?.kind === 'dict' ? expected : dictOf(VOID, VOID),
    };
  }

  const expectedKey = expected?.kind === 'dict' ? expected.key : undefined;
  const expectedValue =
    expected?.kind === 'dict' ? expected.value : undefined;
  let keyType: Type | undefined;
  let valueType: Type | undefined;
  let onlyEmptyValues = true;
  const entries: DictEntryNode<Type>[] = [];

  for (const entry of expr.entries) {
    const key = this.analyzeExpression(entry.key, keyType ?? expectedKey);
    if (keyType === undefined) {
      if (key.resolvedType.kind !== 'any' && !isHashable(key.resolvedType)) {
        throw semanticError(
          'E1002',
          { actual: formatType(key.resolvedType) },
          entry.key.span
        );
      }
      keyType = key.resolvedType;
    } else if (!isAssignable(keyType, key.resolvedType)) {
      throw semanticError(
        'E1000',
        mismatch(keyType, key.resolvedType),
        entry.key.span
      );
    }

    const value = this.analyzeExpression(
      entry.value,
      valueType ?? expectedValue
    );
    const unified =
      valueType === undefined
        ? value.resolvedType
        : unify(valueType, value.resolvedType, onlyEmptyValues);
    if (unified === undefined) {
      throw semanticError(
        'E1001',
        mismatch(valueType ?? value.resolvedType, value.resolvedType),
        entry.value.span
      );
    }
    valueType = unified;
    onlyEmptyValues = onlyEmptyValues && isEmptyLiteral(value);
    entries.push({ ...entry, key, value });
  }

  return {
    ...expr,
    entries,
    resolvedType: dictOf(keyType ?? VOID, valueType ?? VOID),
  };
};

// ============================================================
// STRUCTS
// ============================================================

/** Every field exactly once, each with its declared type */
Analyzer.prototype.analyzeStructInit = function (
  this: Analyzer,
  expr: StructInitNode
): StructInitNode<Type> {
  const struct = this.types.get(expr.name);
  if (struct?.kind !== 'struct') {
    throw semanticError('E0803', { name: expr.name }, expr.span);
  }

  const fields: FieldInitNode<Type>[] = [];
  for (const init of expr.fields) {
    const declared = struct.fields.find((f) => f.name === init.name);
    if (!declared) {
      throw semanticError(
        'E0805',
        { field: init.name, name: struct.name },
        init.span
      );
    }
    if (fields.some((f) => f.name === init.name)) {
      throw semanticError(
        'E0801',
        { field: init.name, name: struct.name },
        init.span
      );
    }

    const value = this.analyzeExpression(init.value, declared.type);
    if (!isAssignable(declared.type, value.resolvedType)) {
      throw semanticError(
        'E0806',
        { field: init.name, ...mismatch(declared.type, value.resolvedType) },
        init.value.span
      );
    }
    fields.push({ ...init, value });
  }

  const missing = struct.fields
    .map((f) => f.name)
    .filter((name) => !fields.some((f) => f.name === name))
    .sort();
  if (missing.length > 0) {
    throw semanticError(
      'E0804',
      { name: struct.name, fields: missing.join(', ') },
      expr.span
    );
  }

  return { ...expr, fields, resolvedType: struct };
};

/**
 * Tern Type System
 * Closed set of value types and the pure predicates the analyzer relies on.
 */

// ============================================================
// TYPE VALUES
// ============================================================

export type PrimitiveKind = 'int' | 'float' | 'bool' | 'str' | 'void';

export interface PrimitiveType {
  readonly kind: PrimitiveKind;
}

export interface ListType {
  readonly kind: 'list';
  readonly element: Type;
}

export interface DictType {
  readonly kind: 'dict';
  readonly key: Type;
  readonly value: Type;
}

export interface StructField {
  readonly name: string;
  readonly type: Type;
}

export interface StructType {
  readonly kind: 'struct';
  readonly name: string;
  /** Fields in declaration order */
  readonly fields: readonly StructField[];
}

export interface EnumType {
  readonly kind: 'enum';
  readonly name: string;
  readonly variants: readonly string[];
}

/**
 * Opaque type of members reached through an imported host module.
 * Accepted wherever any other type is expected.
 */
export interface AnyType {
  readonly kind: 'any';
}

/** Placeholder for an expression whose type could not be resolved */
export interface ErrorType {
  readonly kind: 'error';
}

export type Type =
  | PrimitiveType
  | ListType
  | DictType
  | StructType
  | EnumType
  | AnyType
  | ErrorType;

export const INT: PrimitiveType = { kind: 'int' };
export const FLOAT: PrimitiveType = { kind: 'float' };
export const BOOL: PrimitiveType = { kind: 'bool' };
export const STR: PrimitiveType = { kind: 'str' };
export const VOID: PrimitiveType = { kind: 'void' };
export const ANY: AnyType = { kind: 'any' };
export const ERROR_TYPE: ErrorType = { kind: 'error' };

export function listOf(element: Type): ListType {
  return { kind: 'list', element };
}

export function dictOf(key: Type, value: Type): DictType {
  return { kind: 'dict', key, value };
}

// ============================================================
// PREDICATES
// ============================================================

/**
 * Type equality. Structural for lists and dicts, nominal for structs and
 * enums, by kind for everything else. No numeric widening.
 */
export function typesEqual(a: Type, b: Type): boolean {
  switch (a.kind) {
    case 'list':
      return b.kind === 'list' && typesEqual(a.element, b.element);
    case 'dict':
      return (
        b.kind === 'dict' &&
        typesEqual(a.key, b.key) &&
        typesEqual(a.value, b.value)
      );
    case 'struct':
    case 'enum':
      return b.kind === a.kind && b.name === a.name;
    default:
      return a.kind === b.kind;
  }
}

/** Types permitted as dictionary keys */
export function isHashable(type: Type): boolean {
  return (
    type.kind === 'int' ||
    type.kind === 'float' ||
    type.kind === 'bool' ||
    type.kind === 'str'
  );
}

export function isNumeric(type: Type): boolean {
  return type.kind === 'int' || type.kind === 'float';
}

/**
 * Whether a value of `actual` may flow where `expected` is declared.
 * Equality, plus `any` on either side. Empty collection literals are not
 * special here: they take the expected type while being analyzed.
 */
export function isAssignable(expected: Type, actual: Type): boolean {
  if (expected.kind === 'any' || actual.kind === 'any') return true;
  return typesEqual(expected, actual);
}

// ============================================================
// FORMATTING
// ============================================================

/** Render a type the way it is written in source */
export function formatType(type: Type): string {
  switch (type.kind) {
    case 'list':
      return `[${formatType(type.element)}]`;
    case 'dict':
      return `Dict[${formatType(type.key)}, ${formatType(type.value)}]`;
    case 'struct':
    case 'enum':
      return type.name;
    default:
      return type.kind;
  }
}

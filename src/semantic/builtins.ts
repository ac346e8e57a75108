/**
 * Builtin Registry
 * Free builtin functions, static namespaces and per-type method signatures
 */

import type { Type } from '../value-types.js';
import {
  BOOL,
  FLOAT,
  INT,
  STR,
  VOID,
  listOf,
} from '../value-types.js';

/** Parameter and return types of a builtin method or namespace member */
export interface MethodSignature {
  readonly params: readonly Type[];
  readonly returnType: Type;
}

function sig(params: readonly Type[], returnType: Type): MethodSignature {
  return { params, returnType };
}

// ============================================================
// FREE FUNCTIONS
// ============================================================

/** Casts: target type by function name */
export const CAST_FUNCTIONS: ReadonlyMap<string, Type> = new Map<
  string,
  Type
>([
  ['int', INT],
  ['float', FLOAT],
  ['str', STR],
  ['bool', BOOL],
]);

/** Names user functions may not take */
export const BUILTIN_FUNCTIONS: ReadonlySet<string> = new Set([
  'len',
  'push',
  'input',
  'keys',
  'values',
  ...CAST_FUNCTIONS.keys(),
]);

export function isBuiltinFunction(name: string): boolean {
  return BUILTIN_FUNCTIONS.has(name);
}

// ============================================================
// STATIC NAMESPACES
// ============================================================

/**
 * Host namespaces that are always in scope. Their names can never be
 * declared by a program.
 */
export const STATIC_NAMESPACES: ReadonlyMap<
  string,
  ReadonlyMap<string, MethodSignature>
> = new Map([
  ['File', new Map([['exists', sig([STR], BOOL)]])],
  [
    'Env',
    new Map([
      ['get', sig([STR, STR], STR)],
      ['args', sig([], listOf(STR))],
    ]),
  ],
]);

export function isReservedName(name: string): boolean {
  return STATIC_NAMESPACES.has(name);
}

// ============================================================
// METHODS
// ============================================================

const STRING_METHODS: ReadonlyMap<string, MethodSignature> = new Map([
  ['len', sig([], INT)],
  ['upper', sig([], STR)],
  ['lower', sig([], STR)],
  ['trim', sig([], STR)],
  ['replace', sig([STR, STR], STR)],
  ['split', sig([STR], listOf(STR))],
  ['contains', sig([STR], BOOL)],
  ['starts_with', sig([STR], BOOL)],
  ['ends_with', sig([STR], BOOL)],
  ['to_int', sig([], INT)],
  ['to_float', sig([], FLOAT)],
]);

function listMethods(element: Type): ReadonlyMap<string, MethodSignature> {
  return new Map([
    ['len', sig([], INT)],
    ['push', sig([element], VOID)],
    ['pop', sig([], element)],
    ['contains', sig([element], BOOL)],
    ['reverse', sig([], VOID)],
    ['clear', sig([], VOID)],
    ['join', sig([STR], STR)],
  ]);
}

function dictMethods(
  key: Type,
  value: Type
): ReadonlyMap<string, MethodSignature> {
  return new Map([
    ['len', sig([], INT)],
    ['has_key', sig([key], BOOL)],
    ['get', sig([key, value], value)],
    ['remove', sig([key], value)],
    ['clear', sig([], VOID)],
    ['keys', sig([], listOf(key))],
    ['values', sig([], listOf(value))],
  ]);
}

/**
 * Methods available on a receiver type, or undefined when the type has
 * none at all.
 */
export function methodsFor(
  receiver: Type
): ReadonlyMap<string, MethodSignature> | undefined {
  switch (receiver.kind) {
    case 'str':
      return STRING_METHODS;
    case 'list':
      return listMethods(receiver.element);
    case 'dict':
      return dictMethods(receiver.key, receiver.value);
    default:
      return undefined;
  }
}

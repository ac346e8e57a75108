/**
 * Analyzer Extension: Declarations
 * Program walk with function hoisting, bindings, types and imports
 */

import { basename, extname } from 'node:path';
import { Analyzer, mismatch } from './analyzer.js';
import {
  assertNever,
  type ConstDeclNode,
  type DeclarationNode,
  type EnumDeclNode,
  type FnDeclNode,
  type ImportDeclNode,
  type ProgramNode,
  type StructDeclNode,
  type TypeRef,
  type TypedDeclaration,
  type TypedProgram,
  type VarDeclNode,
} from '../ast-nodes.js';
import { semanticError } from '../error-classes.js';
import {
  ANY,
  BOOL,
  FLOAT,
  INT,
  STR,
  VOID,
  dictOf,
  formatType,
  isAssignable,
  isHashable,
  listOf,
  type EnumType,
  type PrimitiveKind,
  type PrimitiveType,
  type StructField,
  type StructType,
  type Type,
} from '../value-types.js';
import { isReservedName } from './builtins.js';
import { definitelyReturns } from './return-flow.js';

// Declaration merging to add methods to Analyzer interface
declare module './analyzer.js' {
  interface Analyzer {
    analyzeProgram(program: ProgramNode): TypedProgram;
    analyzeDeclaration(decl: DeclarationNode): TypedDeclaration;
    analyzeVarDecl(decl: VarDeclNode): VarDeclNode<Type>;
    analyzeConstDecl(decl: ConstDeclNode): ConstDeclNode<Type>;
    declareFunction(decl: FnDeclNode): void;
    analyzeFunctionBody(decl: FnDeclNode): FnDeclNode<Type>;
    declareStruct(decl: StructDeclNode): void;
    declareEnum(decl: EnumDeclNode): void;
    analyzeImport(decl: ImportDeclNode): void;
    resolveTypeRef(ref: TypeRef, position?: TypePosition): Type;
  }
}

/** Where an annotation appears; `void` is only legal as a return type */
type TypePosition = 'value' | 'return';

const PRIMITIVES: Readonly<Record<PrimitiveKind, PrimitiveType>> = {
  int: INT,
  float: FLOAT,
  bool: BOOL,
  str: STR,
  void: VOID,
};

// ============================================================
// PROGRAM
// ============================================================

/**
 * Top-level types are registered first, in declaration order, then every
 * top-level function signature, so calls may precede the callee.
 */
Analyzer.prototype.analyzeProgram = function (
  this: Analyzer,
  program: ProgramNode
): TypedProgram {
  for (const decl of program.declarations) {
    if (decl.type === 'StructDecl') this.declareStruct(decl);
    if (decl.type === 'EnumDecl') this.declareEnum(decl);
  }
  for (const decl of program.declarations) {
    if (decl.type === 'FnDecl') this.declareFunction(decl);
  }

  const declarations = program.declarations.map(
    (decl): TypedDeclaration => {
      switch (decl.type) {
        case 'StructDecl':
        case 'EnumDecl':
          return decl;
        case 'FnDecl':
          return this.analyzeFunctionBody(decl);
        default:
          return this.analyzeDeclaration(decl);
      }
    }
  );

  return { ...program, declarations };
};

Analyzer.prototype.analyzeDeclaration = function (
  this: Analyzer,
  decl: DeclarationNode
): TypedDeclaration {
  switch (decl.type) {
    case 'VarDecl':
      return this.analyzeVarDecl(decl);
    case 'ConstDecl':
      return this.analyzeConstDecl(decl);
    case 'FnDecl':
      this.declareFunction(decl);
      return this.analyzeFunctionBody(decl);
    case 'StructDecl':
      this.declareStruct(decl);
      return decl;
    case 'EnumDecl':
      this.declareEnum(decl);
      return decl;
    case 'ImportDecl':
      this.analyzeImport(decl);
      return decl;
    default:
      return this.analyzeStatement(decl);
  }
};

// ============================================================
// BINDINGS
// ============================================================

Analyzer.prototype.analyzeVarDecl = function (
  this: Analyzer,
  decl: VarDeclNode
): VarDeclNode<Type> {
  const declared = this.resolveTypeRef(decl.annotation);
  const value = this.analyzeExpression(decl.value, declared);
  if (!isAssignable(declared, value.resolvedType)) {
    throw semanticError(
      'E0100',
      mismatch(declared, value.resolvedType),
      decl.value.span
    );
  }

  this.bindName(decl.name, 'variable', declared, decl.span);
  return { ...decl, value };
};

Analyzer.prototype.analyzeConstDecl = function (
  this: Analyzer,
  decl: ConstDeclNode
): ConstDeclNode<Type> {
  const declared = this.resolveTypeRef(decl.annotation);
  const value = this.analyzeExpression(decl.value, declared);
  if (!isAssignable(declared, value.resolvedType)) {
    throw semanticError(
      'E0100',
      mismatch(declared, value.resolvedType),
      decl.value.span
    );
  }

  this.bindName(decl.name, 'constant', declared, decl.span);
  return { ...decl, value };
};

// ============================================================
// FUNCTIONS
// ============================================================

/** Bind the function name in the enclosing scope */
Analyzer.prototype.declareFunction = function (
  this: Analyzer,
  decl: FnDeclNode
): void {
  const params = decl.params.map((param) =>
    this.resolveTypeRef(param.annotation)
  );
  const returnType = this.resolveTypeRef(decl.returnType, 'return');
  this.bindName(decl.name, 'function', returnType, decl.span, {
    params,
    returnType,
  });
};

/**
 * Parameters and the body's top-level declarations share one scope.
 * Non-void functions must return on every path.
 */
Analyzer.prototype.analyzeFunctionBody = function (
  this: Analyzer,
  decl: FnDeclNode
): FnDeclNode<Type> {
  const returnType = this.resolveTypeRef(decl.returnType, 'return');
  const outerFunction = this.currentFunction;
  const outerLoopDepth = this.loopDepth;
  this.currentFunction = { name: decl.name, returnType };
  this.loopDepth = 0;

  try {
    const body = this.symbols.withScope(() => {
      for (const param of decl.params) {
        this.bindName(
          param.name,
          'parameter',
          this.resolveTypeRef(param.annotation),
          param.span
        );
      }
      return this.analyzeBlockContents(decl.body);
    });

    if (returnType.kind !== 'void' && !definitelyReturns(body.declarations)) {
      throw semanticError('E0303', { name: decl.name }, decl.span);
    }
    return { ...decl, body };
  } finally {
    this.currentFunction = outerFunction;
    this.loopDepth = outerLoopDepth;
  }
};

// ============================================================
// TYPE DECLARATIONS
// ============================================================

/** First named type in a reference that is not yet declared */
function unknownTypeName(
  ref: TypeRef,
  known: ReadonlyMap<string, unknown>
): string | undefined {
  switch (ref.type) {
    case 'PrimitiveTypeRef':
      return undefined;
    case 'ListTypeRef':
      return unknownTypeName(ref.element, known);
    case 'DictTypeRef':
      return (
        unknownTypeName(ref.key, known) ?? unknownTypeName(ref.value, known)
      );
    case 'NamedTypeRef':
      return known.has(ref.name) ? undefined : ref.name;
    default:
      return assertNever(ref, 'type reference');
  }
}

/** Field types resolve against types declared so far; no self reference */
Analyzer.prototype.declareStruct = function (
  this: Analyzer,
  decl: StructDeclNode
): void {
  const { name } = decl;
  if (isReservedName(name)) {
    throw semanticError('E0205', { name }, decl.span);
  }
  const existing = this.types.get(name);
  if (existing) {
    throw semanticError(
      existing.kind === 'struct' ? 'E0800' : 'E1200',
      { name },
      decl.span
    );
  }

  const fields: StructField[] = [];
  for (const field of decl.fields) {
    if (fields.some((f) => f.name === field.name)) {
      throw semanticError('E0801', { field: field.name, name }, field.span);
    }
    const typeName = unknownTypeName(field.annotation, this.types);
    if (typeName !== undefined) {
      throw semanticError(
        'E0802',
        { typeName, field: field.name, name },
        field.annotation.span
      );
    }
    fields.push({
      name: field.name,
      type: this.resolveTypeRef(field.annotation),
    });
  }

  const type: StructType = { kind: 'struct', name, fields };
  this.types.set(name, type);
  this.options.observability.onDeclare?.({ name, kind: 'struct', type });
};

Analyzer.prototype.declareEnum = function (
  this: Analyzer,
  decl: EnumDeclNode
): void {
  const { name } = decl;
  if (isReservedName(name)) {
    throw semanticError('E0205', { name }, decl.span);
  }
  if (this.types.has(name)) {
    throw semanticError('E1200', { name }, decl.span);
  }

  const variants: string[] = [];
  for (const variant of decl.variants) {
    if (variants.includes(variant.name)) {
      throw semanticError(
        'E1201',
        { variant: variant.name, name },
        variant.span
      );
    }
    variants.push(variant.name);
  }

  const type: EnumType = { kind: 'enum', name, variants };
  this.types.set(name, type);
  this.options.observability.onDeclare?.({ name, kind: 'enum', type });
};

// ============================================================
// IMPORTS
// ============================================================

/**
 * Host modules bind by name; local modules by file basename without its
 * extension. Either way the binding is an `any` constant.
 */
Analyzer.prototype.analyzeImport = function (
  this: Analyzer,
  decl: ImportDeclNode
): void {
  const name = decl.isLocal
    ? basename(decl.module, extname(decl.module))
    : decl.module;

  const existing = this.symbols.lookup(name);
  if (existing?.kind === 'module') {
    throw semanticError('E0900', { name }, decl.span);
  }

  if (decl.isLocal) {
    const path =
      extname(decl.module) === ''
        ? `${decl.module}${this.options.moduleExtension}`
        : decl.module;
    if (!this.options.moduleExists(path)) {
      throw semanticError('E0901', { module: path }, decl.span);
    }
  }

  this.bindName(name, 'module', ANY, decl.span);
};

// ============================================================
// TYPE ANNOTATIONS
// ============================================================

/**
 * Nested positions (list elements, dict keys and values) always resolve
 * as values, so `-> [void]` is rejected like `let x: void`.
 */
Analyzer.prototype.resolveTypeRef = function (
  this: Analyzer,
  ref: TypeRef,
  position: TypePosition = 'value'
): Type {
  switch (ref.type) {
    case 'PrimitiveTypeRef':
      if (ref.name === 'void' && position !== 'return') {
        throw semanticError('E0105', {}, ref.span);
      }
      return PRIMITIVES[ref.name];
    case 'ListTypeRef':
      return listOf(this.resolveTypeRef(ref.element));
    case 'DictTypeRef': {
      const key = this.resolveTypeRef(ref.key);
      if (!isHashable(key)) {
        throw semanticError(
          'E1002',
          { actual: formatType(key) },
          ref.key.span
        );
      }
      return dictOf(key, this.resolveTypeRef(ref.value));
    }
    case 'NamedTypeRef': {
      const named = this.types.get(ref.name);
      if (!named) {
        throw semanticError('E0803', { name: ref.name }, ref.span);
      }
      return named;
    }
    default:
      return assertNever(ref, 'type reference');
  }
};

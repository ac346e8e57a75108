/**
 * Analyzer Class - Core
 *
 * Defines the Analyzer class structure and the state carried across the
 * walk. Methods are added via prototype extension from separate modules,
 * using TypeScript declaration merging for type safety.
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import type {
  ProgramNode,
  TypedExpression,
  TypedProgram,
} from '../ast-nodes.js';
import { semanticError } from '../error-classes.js';
import type { SourceSpan } from '../source-location.js';
import type { EnumType, StructType, Type } from '../value-types.js';
import { formatType } from '../value-types.js';
import { isBuiltinFunction, isReservedName } from './builtins.js';
import {
  type FunctionSignature,
  type SymbolKind,
  SymbolTable,
} from './symbol-table.js';
import type { AnalyzerOptions, ObservabilityCallbacks } from './types.js';

/** Function whose body is currently being analyzed */
export interface FunctionContext {
  readonly name: string;
  readonly returnType: Type;
}

/** Options with defaults applied */
export interface ResolvedAnalyzerOptions {
  readonly moduleExists: (path: string) => boolean;
  readonly moduleExtension: string;
  readonly observability: ObservabilityCallbacks;
}

export const DEFAULT_MODULE_EXTENSION = '.tern';

/** Diagnostic context for an expected/actual type pair */
export function mismatch(
  expected: Type,
  actual: Type
): { expected: string; actual: string } {
  return { expected: formatType(expected), actual: formatType(actual) };
}

/**
 * `[]` or `{}` as written. Only these literals may stand in for a
 * collection of another element type; a value that merely has type
 * `[void]` may not.
 */
export function isEmptyLiteral(expr: TypedExpression): boolean {
  return (
    (expr.type === 'ListLiteral' && expr.elements.length === 0) ||
    (expr.type === 'DictLiteral' && expr.entries.length === 0)
  );
}

/**
 * Single-pass, fail-fast type checker producing a new typed tree.
 *
 * Methods are organized across multiple files:
 * - analyzer-declarations.ts: Program, let, const, fn, struct, enum, import
 * - analyzer-statements.ts: Blocks, control flow, assignments, print
 * - analyzer-expr.ts: Dispatch, identifiers, operators, index and member access
 * - analyzer-collections.ts: List, dict and struct literals
 * - analyzer-calls.ts: Builtins, user function calls, method calls
 *
 * The first violation is thrown as SemanticError.
 *
 * @example
 * ```typescript
 * const analyzer = new Analyzer();
 * const typed = analyzer.analyze(program);
 * ```
 */
export class Analyzer {
  readonly symbols: SymbolTable;
  /** Struct and enum declarations; a namespace separate from values */
  readonly types = new Map<string, StructType | EnumType>();
  readonly options: ResolvedAnalyzerOptions;
  /** Nesting depth of enclosing while/for bodies */
  loopDepth = 0;
  /** null at top level */
  currentFunction: FunctionContext | null = null;

  constructor(options: AnalyzerOptions = {}) {
    const observability = options.observability ?? {};
    const moduleRoot = options.moduleRoot ?? process.cwd();

    this.options = {
      moduleExists:
        options.moduleExists ??
        ((path: string) => existsSync(resolve(moduleRoot, path))),
      moduleExtension: options.moduleExtension ?? DEFAULT_MODULE_EXTENSION,
      observability,
    };
    this.symbols = new SymbolTable({
      onEnter: (depth) => observability.onScopeEnter?.({ depth }),
      onExit: (depth) => observability.onScopeExit?.({ depth }),
    });
  }

  /**
   * Analyze a parsed program into a typed program. The input is not
   * modified.
   */
  analyze(program: ProgramNode): TypedProgram {
    return this.analyzeProgram(program);
  }

  /**
   * Bind a value name in the current scope.
   * Reserved namespace names and same-frame duplicates are rejected.
   */
  bindName(
    name: string,
    kind: SymbolKind,
    type: Type,
    span: SourceSpan,
    signature?: FunctionSignature
  ): void {
    if (isReservedName(name)) {
      throw semanticError('E0205', { name }, span);
    }
    if (kind === 'function' && isBuiltinFunction(name)) {
      throw semanticError('E0002', { name }, span);
    }

    const defined = this.symbols.define({
      name,
      type,
      kind,
      isConst: kind !== 'variable' && kind !== 'parameter',
      isFunction: kind === 'function',
      signature,
      span,
    });
    if (!defined) {
      throw semanticError('E0002', { name }, span);
    }
    this.options.observability.onDeclare?.({ name, kind, type });
  }

  /** Run `fn` with the loop counter raised */
  inLoop<R>(fn: () => R): R {
    this.loopDepth++;
    try {
      return fn();
    } finally {
      this.loopDepth--;
    }
  }
}

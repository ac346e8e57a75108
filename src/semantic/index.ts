/**
 * Tern Semantic Analyzer
 * Main entry point and re-exports
 */

import type { ProgramNode } from '../ast-nodes.js';
import { SemanticError } from '../error-classes.js';
import { Analyzer } from './analyzer.js';
import type { AnalyzeResult, AnalyzerOptions } from './types.js';

// Import extension modules to register prototype methods on Analyzer.
// These must be imported AFTER analyzer.js to ensure the class is defined.
import './analyzer-declarations.js';
import './analyzer-statements.js';
import './analyzer-expr.js';
import './analyzer-collections.js';
import './analyzer-calls.js';

// ============================================================
// MAIN ENTRY POINT
// ============================================================

/**
 * Type-check a parsed program.
 *
 * Stops at the first semantic error and returns it, after reporting it to
 * `observability.onDiagnostic`. Other exceptions are invariant violations
 * and propagate.
 *
 * @example
 * ```typescript
 * const result = analyze(program);
 * if (!result.success) console.error(result.error.format());
 * ```
 */
export function analyze(
  program: ProgramNode,
  options: AnalyzerOptions = {}
): AnalyzeResult {
  try {
    return { success: true, program: new Analyzer(options).analyze(program) };
  } catch (err) {
    if (err instanceof SemanticError) {
      options.observability?.onDiagnostic?.(err);
      return { success: false, error: err };
    }
    throw err;
  }
}

// ============================================================
// RE-EXPORTS
// ============================================================

export type {
  AnalyzeResult,
  AnalyzerOptions,
  DeclarationKind,
  DeclareEvent,
  ObservabilityCallbacks,
  ScopeEvent,
} from './types.js';

export {
  SymbolTable,
  type FunctionSignature,
  type ScopeHooks,
  type SymbolInfo,
  type SymbolKind,
} from './symbol-table.js';

export {
  BUILTIN_FUNCTIONS,
  STATIC_NAMESPACES,
  isReservedName,
  methodsFor,
  type MethodSignature,
} from './builtins.js';

export { definitelyReturns } from './return-flow.js';

export { Analyzer, DEFAULT_MODULE_EXTENSION } from './analyzer.js';

/**
 * Analyzer Types
 * Options, observability callbacks and result union
 */

import type { TypedProgram } from '../ast-nodes.js';
import type { SemanticError } from '../error-classes.js';
import type { Type } from '../value-types.js';
import type { SymbolKind } from './symbol-table.js';

// ============================================================
// OBSERVABILITY
// ============================================================

/** Kinds reported through onDeclare */
export type DeclarationKind = SymbolKind | 'struct' | 'enum';

/** Event emitted when a scope frame is pushed or popped */
export interface ScopeEvent {
  /** Depth of the frame entered or left (global scope is 0) */
  readonly depth: number;
}

/** Event emitted after a name is bound */
export interface DeclareEvent {
  readonly name: string;
  readonly kind: DeclarationKind;
  readonly type: Type;
}

/** Observability callbacks for monitoring analysis */
export interface ObservabilityCallbacks {
  /** Called after a scope frame is pushed */
  onScopeEnter?: (event: ScopeEvent) => void;
  /** Called after a scope frame is popped */
  onScopeExit?: (event: ScopeEvent) => void;
  /** Called after a variable, constant, function, type or module is bound */
  onDeclare?: (event: DeclareEvent) => void;
  /** Called with the diagnostic that stops analysis */
  onDiagnostic?: (error: SemanticError) => void;
}

// ============================================================
// OPTIONS
// ============================================================

export interface AnalyzerOptions {
  /**
   * Resolves a local import. Receives the path as written in source with
   * the module extension applied. Defaults to a file check under moduleRoot.
   */
  moduleExists?: (path: string) => boolean;
  /** Base directory for local imports (default: process.cwd()) */
  moduleRoot?: string;
  /** Appended to local imports written without an extension (default: .tern) */
  moduleExtension?: string;
  /** Observability callbacks for monitoring analysis */
  observability?: ObservabilityCallbacks;
}

// ============================================================
// RESULT
// ============================================================

/** Outcome of analysis: the typed program, or the first semantic error */
export type AnalyzeResult =
  | { readonly success: true; readonly program: TypedProgram }
  | { readonly success: false; readonly error: SemanticError };

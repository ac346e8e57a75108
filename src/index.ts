/**
 * Tern Front End
 * Exports lexer, parser, analyzer, diagnostics and AST types
 */

export { tokenize, type TokenizeOptions } from './lexer/index.js';
export { parse, parseSource, type ParseResult } from './parser/index.js';
export {
  analyze,
  type AnalyzeResult,
  type AnalyzerOptions,
  type DeclarationKind,
  type DeclareEvent,
  type ObservabilityCallbacks,
  type ScopeEvent,
  SymbolTable,
  type SymbolInfo,
  type SymbolKind,
} from './semantic/index.js';
export {
  compile,
  type CompileOptions,
  type CompileResult,
} from './compile.js';

// Diagnostics
export {
  TernError,
  ParseError,
  SemanticError,
  createError,
  formatDiagnostic,
  type TernErrorData,
} from './error-classes.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
} from './error-registry.js';

// Configuration
export {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
  type ModuleConfig,
  type TernConfig,
} from './config.js';

// Types and spans
export * from './value-types.js';
export type * from './ast-nodes.js';
export { assertNever } from './ast-nodes.js';
export {
  DEFAULT_SOURCE,
  formatLocation,
  type SourceLocation,
  type SourceSpan,
} from './source-location.js';
export {
  TOKEN_TYPES,
  type LiteralValue,
  type Token,
  type TokenType,
} from './token-types.js';

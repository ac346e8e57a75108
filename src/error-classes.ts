/**
 * Tern Error Classes and Factory
 * Structured diagnostics with registry-based error codes
 */

import type { SourceSpan } from './source-location.js';
import { formatLocation } from './source-location.js';
import type { ErrorCategory } from './error-registry.js';
import { ERROR_REGISTRY, renderMessage } from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured diagnostic data for host applications */
export interface TernErrorData {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly message: string;
  readonly span: SourceSpan;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base class for every front-end diagnostic.
 * `message` holds the bare message; `format()` adds the location prefix.
 */
export class TernError extends Error {
  readonly errorId: string;
  readonly category: ErrorCategory;
  readonly span: SourceSpan;
  readonly context: Record<string, unknown> | undefined;

  constructor(
    errorId: string,
    message: string,
    span: SourceSpan,
    context?: Record<string, unknown>
  ) {
    const definition = ERROR_REGISTRY.get(errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${errorId}`);
    }

    super(message);
    this.name = 'TernError';
    this.errorId = errorId;
    this.category = definition.category;
    this.span = span;
    this.context = context;
  }

  /** Stable diagnostic code */
  get code(): string {
    return this.errorId;
  }

  /** Get structured error data for custom formatting */
  toData(): TernErrorData {
    return {
      code: this.errorId,
      category: this.category,
      message: this.message,
      span: this.span,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: TernErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return `${formatLocation(this.span)}: ${this.errorId}: ${this.message}`;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Lexer and parser diagnostics */
export class ParseError extends TernError {
  constructor(
    errorId: string,
    message: string,
    span: SourceSpan,
    context?: Record<string, unknown>
  ) {
    super(errorId, message, span, context);

    if (this.category !== 'lexer' && this.category !== 'parse') {
      throw new TypeError(`Expected lexer or parse error ID, got: ${errorId}`);
    }
    this.name = 'ParseError';
  }

  /** `<source>:<line>:<col>: syntax error: <message>` */
  override format(formatter?: (data: TernErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return `${formatLocation(this.span)}: syntax error: ${this.message}`;
  }
}

/** Semantic analyzer diagnostics */
export class SemanticError extends TernError {
  constructor(
    errorId: string,
    message: string,
    span: SourceSpan,
    context?: Record<string, unknown>
  ) {
    super(errorId, message, span, context);

    if (this.category !== 'semantic') {
      throw new TypeError(`Expected semantic error ID, got: ${errorId}`);
    }
    this.name = 'SemanticError';
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create a diagnostic from the registry template.
 *
 * @example
 * createError('E0001', { name: 'x' }, span)
 * // SemanticError: "use of undeclared identifier 'x'"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  span: SourceSpan
): TernError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const message = renderMessage(definition.messageTemplate, context);
  if (definition.category === 'semantic') {
    return new SemanticError(errorId, message, span, context);
  }
  return new ParseError(errorId, message, span, context);
}

/** Typed shorthand for semantic diagnostics */
export function semanticError(
  errorId: string,
  context: Record<string, unknown>,
  span: SourceSpan
): SemanticError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  return new SemanticError(
    errorId,
    renderMessage(definition.messageTemplate, context),
    span,
    context
  );
}

/** Typed shorthand for lexer and parser diagnostics */
export function parseError(
  errorId: string,
  context: Record<string, unknown>,
  span: SourceSpan
): ParseError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  return new ParseError(
    errorId,
    renderMessage(definition.messageTemplate, context),
    span,
    context
  );
}

/** Display form of any diagnostic */
export function formatDiagnostic(error: TernError): string {
  return error.format();
}

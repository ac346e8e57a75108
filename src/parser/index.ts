/**
 * Tern Parser
 * Main entry point and re-exports
 */

import type { ProgramNode } from '../ast-nodes.js';
import { ParseError } from '../error-classes.js';
import { tokenize, type TokenizeOptions } from '../lexer/index.js';
import type { Token } from '../token-types.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-declarations.js';
import './parser-types.js';
import './parser-control.js';
import './parser-expr.js';
import './parser-literals.js';

// ============================================================
// RESULT TYPES
// ============================================================

/** Outcome of parsing: the program, or the first syntax error */
export type ParseResult =
  | { readonly success: true; readonly program: ProgramNode }
  | { readonly success: false; readonly error: ParseError };

// ============================================================
// MAIN ENTRY POINTS
// ============================================================

/**
 * Parse a token stream into an AST.
 *
 * Stops at the first syntax error and returns it; other exceptions are
 * invariant violations and propagate.
 *
 * @example
 * ```typescript
 * const result = parse(tokenize('let x: int = 1'));
 * if (result.success) console.log(result.program.declarations.length);
 * ```
 */
export function parse(tokens: readonly Token[]): ParseResult {
  try {
    return { success: true, program: new Parser(tokens).parse() };
  } catch (err) {
    if (err instanceof ParseError) return { success: false, error: err };
    throw err;
  }
}

/**
 * Tokenize and parse source text. Lexer errors are reported the same way
 * as syntax errors.
 */
export function parseSource(
  source: string,
  options: TokenizeOptions = {}
): ParseResult {
  let tokens: Token[];
  try {
    tokens = tokenize(source, options);
  } catch (err) {
    if (err instanceof ParseError) return { success: false, error: err };
    throw err;
  }
  return parse(tokens);
}

// ============================================================
// RE-EXPORTS
// ============================================================

// State (for advanced usage)
export { createParserState, type ParserState } from './state.js';

// Parser class (for advanced usage)
export { Parser } from './parser.js';

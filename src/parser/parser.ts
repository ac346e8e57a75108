/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ProgramNode } from '../ast-nodes.js';
import type { Token } from '../token-types.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Recursive-descent parser that converts tokens into an AST.
 *
 * Methods are organized across multiple files:
 * - parser-script.ts: Program, declaration dispatch, assignment statements
 * - parser-declarations.ts: let, const, fn, struct, enum, import
 * - parser-types.ts: Type annotations
 * - parser-control.ts: Blocks, if, while, for, return, break, continue, print
 * - parser-expr.ts: Precedence chain, unary and postfix operators
 * - parser-literals.ts: Literals, identifiers, lists, dicts, struct init
 *
 * Parsing stops at the first syntax error, which is thrown as ParseError.
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokens);
 * const program = parser.parse();
 * ```
 */
export class Parser {
  /** Token cursor */
  state: ParserState;

  constructor(tokens: readonly Token[]) {
    this.state = createParserState(tokens);
  }

  /**
   * Parse tokens into a complete AST.
   */
  parse(): ProgramNode {
    return this.parseProgram();
  }
}

/**
 * Compile Pipeline
 * Source text through tokenize, parse and analyze in one call
 */

import type { TypedProgram } from './ast-nodes.js';
import type { TernError } from './error-classes.js';
import { parseSource } from './parser/index.js';
import { analyze, type AnalyzerOptions } from './semantic/index.js';

export interface CompileOptions extends AnalyzerOptions {
  /** Source label recorded in every span (default: <stdin>) */
  sourceName?: string;
}

/** Typed program, or the first lexer, syntax or semantic diagnostic */
export type CompileResult =
  | { readonly success: true; readonly program: TypedProgram }
  | { readonly success: false; readonly error: TernError };

/**
 * @example
 * ```typescript
 * const result = compile('let x: int = 1', { sourceName: 'main.tern' });
 * ```
 */
export function compile(
  source: string,
  options: CompileOptions = {}
): CompileResult {
  const { sourceName, ...analyzerOptions } = options;
  const parsed = parseSource(
    source,
    sourceName === undefined ? {} : { sourceName }
  );
  if (!parsed.success) return parsed;
  return analyze(parsed.program, analyzerOptions);
}

/**
 * Lexer State
 * Cursor over the source text plus the label every span carries
 */

import type { SourceLocation, SourceSpan } from '../source-location.js';

export interface LexerState {
  readonly source: string;
  /** Label copied into every token span */
  readonly sourceName: string;
  pos: number;
  line: number;
  column: number;
}

export function createLexerState(
  source: string,
  sourceName: string
): LexerState {
  return { source, sourceName, pos: 0, line: 1, column: 1 };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.pos };
}

/** Labeled span from `start` up to the cursor */
export function spanFrom(state: LexerState, start: SourceLocation): SourceSpan {
  return { start, end: currentLocation(state), source: state.sourceName };
}

/** Character at the cursor (or `offset` past it); '' past the end */
export function peek(state: LexerState, offset = 0): string {
  return state.source[state.pos + offset] ?? '';
}

export function peekString(state: LexerState, length: number): string {
  return state.source.slice(state.pos, state.pos + length);
}

export function advance(state: LexerState): string {
  const ch = peek(state);
  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

/** Consume characters while `accept` holds and return them */
export function readWhile(
  state: LexerState,
  accept: (ch: string) => boolean
): string {
  const from = state.pos;
  while (!isAtEnd(state) && accept(peek(state))) {
    advance(state);
  }
  return state.source.slice(from, state.pos);
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}

// ============================================================
// SOURCE LOCATION
// ============================================================

/** A point in source text. Line and column are 1-indexed, offset 0-indexed. */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

/**
 * A range in source text. `end` is the location just past the last
 * character; `source` names the file or buffer the range belongs to.
 */
export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
  readonly source: string;
}

/** Source label used when the caller does not name one */
export const DEFAULT_SOURCE = '<stdin>';

/** Span covering both arguments, from the start of `first` to the end of `last` */
export function mergeSpans(first: SourceSpan, last: SourceSpan): SourceSpan {
  return { start: first.start, end: last.end, source: first.source };
}

/** `source:line:column` of the span start */
export function formatLocation(span: SourceSpan): string {
  return `${span.source}:${span.start.line}:${span.start.column}`;
}

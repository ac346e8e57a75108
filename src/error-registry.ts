/**
 * Error Registry
 * Central diagnostic definitions loaded from data/error-codes.json, with
 * template rendering.
 */

import { readFileSync } from 'node:fs';

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Pipeline stage that raises the error */
export type ErrorCategory = 'lexer' | 'parse' | 'semantic';

const CATEGORIES: readonly ErrorCategory[] = ['lexer', 'parse', 'semantic'];

/** Registry entry containing all metadata for a single diagnostic */
export interface ErrorDefinition {
  /** L001 (lexer), P001 (parse) or E0001 (semantic) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Short human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Registry of all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      if (idMap.has(def.errorId)) {
        throw new Error(`Duplicate error ID in registry: ${def.errorId}`);
      }
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

// ============================================================
// LOADING
// ============================================================

function isCategory(value: unknown): value is ErrorCategory {
  return CATEGORIES.some((category) => category === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** @internal */
export function toDefinition(entry: unknown, index: number): ErrorDefinition {
  if (!isRecord(entry)) {
    throw new Error(`Invalid error definition at index ${index}`);
  }
  const { errorId, category, description, messageTemplate, resolution } =
    entry;
  if (
    typeof errorId !== 'string' ||
    typeof description !== 'string' ||
    typeof messageTemplate !== 'string'
  ) {
    throw new Error(`Invalid error definition at index ${index}`);
  }
  if (!isCategory(category)) {
    throw new Error(
      `Invalid error definition ${errorId}: unknown category "${String(category)}"`
    );
  }
  return {
    errorId,
    category,
    description,
    messageTemplate,
    resolution: typeof resolution === 'string' ? resolution : undefined,
  };
}

function loadDefinitions(): ErrorDefinition[] {
  const url = new URL('../data/error-codes.json', import.meta.url);
  const data: unknown = JSON.parse(readFileSync(url, 'utf-8'));
  if (!Array.isArray(data)) {
    throw new Error('Invalid error registry: expected an array');
  }
  return data.map((entry: unknown, index) => toDefinition(entry, index));
}

/** All error definitions indexed by error ID */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  loadDefinitions()
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Replace {placeholder} occurrences in a template with context values.
 *
 * Missing context values render as empty string. Non-string values are
 * coerced via String(). An unclosed brace returns the template unchanged.
 *
 * @example
 * renderMessage("expected {expected}, got {actual}", { expected: "int", actual: "str" })
 * // Returns: "expected int, got str"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      const close = template.indexOf('}', i + 1);
      if (close === -1) return template;

      const value = context[template.slice(i + 1, close)];
      if (value !== undefined) result += String(value);
      i = close + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}

/**
 * Tern Tests: Diagnostics
 * Error registry, template rendering and error classes
 */

import { describe, expect, it } from 'vitest';
import {
  createError,
  ERROR_REGISTRY,
  formatDiagnostic,
  ParseError,
  renderMessage,
  SemanticError,
  TernError,
  type SourceSpan,
} from '../src/index.js';
import { toDefinition } from '../src/error-registry.js';

const SPAN: SourceSpan = {
  start: { line: 3, column: 5, offset: 20 },
  end: { line: 3, column: 6, offset: 21 },
  source: 'main.tern',
};

describe('Tern Error Registry', () => {
  it('categorizes codes by prefix', () => {
    for (const [id, definition] of ERROR_REGISTRY.entries()) {
      const expected = id.startsWith('L')
        ? 'lexer'
        : id.startsWith('P')
          ? 'parse'
          : 'semantic';
      expect(definition.category).toBe(expected);
    }
  });

  it('contains the lexer, parser and core semantic codes', () => {
    for (const id of ['L001', 'L002', 'P001', 'P005', 'E0001', 'E1205']) {
      expect(ERROR_REGISTRY.has(id)).toBe(true);
    }
    expect(ERROR_REGISTRY.get('E9999')).toBeUndefined();
  });

  it('keeps resolutions where present', () => {
    expect(ERROR_REGISTRY.get('E0308')?.resolution).toBe(
      'Call the function with parentheses.'
    );
    expect(ERROR_REGISTRY.get('E0001')?.resolution).toBeUndefined();
  });

  it('validates raw definitions', () => {
    expect(() => toDefinition('E0001', 4)).toThrow(
      'Invalid error definition at index 4'
    );
    expect(() =>
      toDefinition(
        {
          errorId: 'X001',
          category: 'runtime',
          description: 'd',
          messageTemplate: 'm',
        },
        0
      )
    ).toThrow('Invalid error definition X001: unknown category "runtime"');
  });
});

describe('renderMessage', () => {
  it('fills placeholders from the context', () => {
    expect(
      renderMessage('expected {expected}, got {actual}', {
        expected: 'int',
        actual: 'str',
      })
    ).toBe('expected int, got str');
  });

  it('coerces non-string values', () => {
    expect(renderMessage('{n} given', { n: 2 })).toBe('2 given');
  });

  it('renders missing values as empty', () => {
    expect(renderMessage("'{char}'{hint}", { char: '@' })).toBe("'@'");
  });

  it('returns a template with an unclosed brace unchanged', () => {
    expect(renderMessage('open {brace', { brace: 'x' })).toBe('open {brace');
  });
});

describe('Tern Error Classes', () => {
  it('creates semantic errors from the registry', () => {
    const err = createError('E0001', { name: 'x' }, SPAN);
    expect(err).toBeInstanceOf(SemanticError);
    expect(err).toBeInstanceOf(TernError);
    expect(err.name).toBe('SemanticError');
    expect(err.code).toBe('E0001');
    expect(err.message).toBe("use of undeclared identifier 'x'");
    expect(err.format()).toBe(
      "main.tern:3:5: E0001: use of undeclared identifier 'x'"
    );
  });

  it('creates parse errors for lexer and parser codes', () => {
    const err = createError('P003', {}, SPAN);
    expect(err).toBeInstanceOf(ParseError);
    expect(err.category).toBe('parse');
    expect(formatDiagnostic(err)).toBe(
      'main.tern:3:5: syntax error: can only call functions'
    );
    expect(createError('L001', {}, SPAN).category).toBe('lexer');
  });

  it('rejects unknown codes', () => {
    expect(() => createError('E9999', {}, SPAN)).toThrow(
      'Unknown error ID: E9999'
    );
  });

  it('rejects a code of the wrong category', () => {
    expect(() => new SemanticError('P001', 'm', SPAN)).toThrow(
      'Expected semantic error ID, got: P001'
    );
    expect(() => new ParseError('E0001', 'm', SPAN)).toThrow(
      'Expected lexer or parse error ID, got: E0001'
    );
  });

  it('exposes structured data', () => {
    const err = createError('E0305', { name: 'f', expected: 2, actual: 1 }, SPAN);
    expect(err.toData()).toEqual({
      code: 'E0305',
      category: 'semantic',
      message: "function 'f' expects 2 argument(s), got 1",
      span: SPAN,
      context: { name: 'f', expected: 2, actual: 1 },
    });
  });

  it('formats through a host formatter', () => {
    const err = createError('E0200', {}, SPAN);
    expect(err.format((data) => `[${data.code}] ${data.message}`)).toBe(
      "[E0200] 'break' outside of loop"
    );
  });
});

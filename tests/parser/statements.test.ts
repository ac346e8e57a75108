/**
 * Tern Parser Tests: Statements and Declarations
 */

import { describe, expect, it } from 'vitest';
import {
  parse,
  tokenize,
  type DeclarationNode,
} from '../../src/index.js';
import { parseFail, parseOk } from '../helpers/pipeline.js';

function only(source: string): DeclarationNode {
  const { declarations } = parseOk(source);
  expect(declarations).toHaveLength(1);
  const [decl] = declarations;
  if (!decl) throw new Error('no declaration');
  return decl;
}

describe('Tern Parser: Declarations', () => {
  it('parses an empty program', () => {
    const program = parseOk('');
    expect(program.type).toBe('Program');
    expect(program.declarations).toEqual([]);
  });

  it('parses let with a primitive annotation', () => {
    expect(only('let count: int = 0')).toMatchObject({
      type: 'VarDecl',
      name: 'count',
      annotation: { type: 'PrimitiveTypeRef', name: 'int' },
      value: { type: 'IntLiteral', value: 0n },
    });
  });

  it('parses const with list and dict annotations', () => {
    expect(only('const NAMES: [str] = []')).toMatchObject({
      type: 'ConstDecl',
      annotation: {
        type: 'ListTypeRef',
        element: { type: 'PrimitiveTypeRef', name: 'str' },
      },
    });
    expect(only('let ages: Dict[str, [int]] = {}')).toMatchObject({
      annotation: {
        type: 'DictTypeRef',
        key: { type: 'PrimitiveTypeRef', name: 'str' },
        value: {
          type: 'ListTypeRef',
          element: { type: 'PrimitiveTypeRef', name: 'int' },
        },
      },
      value: { type: 'DictLiteral', entries: [] },
    });
  });

  it('parses a named annotation', () => {
    expect(only('let p: Point = q')).toMatchObject({
      annotation: { type: 'NamedTypeRef', name: 'Point' },
    });
  });

  it('parses functions with parameters and a return type', () => {
    expect(only('fn add(a: int, b: int) -> int { return a + b }')).toMatchObject(
      {
        type: 'FnDecl',
        name: 'add',
        params: [
          { type: 'Param', name: 'a' },
          { type: 'Param', name: 'b' },
        ],
        returnType: { type: 'PrimitiveTypeRef', name: 'int' },
        body: {
          type: 'Block',
          declarations: [{ type: 'ReturnStmt' }],
        },
      }
    );
  });

  it('defaults a missing return type to void', () => {
    expect(only('fn hello() { print("hi") }')).toMatchObject({
      params: [],
      returnType: { type: 'PrimitiveTypeRef', name: 'void' },
    });
  });

  it('parses structs and enums with trailing commas', () => {
    expect(only('struct Point { x: int, y: int, }')).toMatchObject({
      type: 'StructDecl',
      name: 'Point',
      fields: [
        { type: 'StructField', name: 'x' },
        { type: 'StructField', name: 'y' },
      ],
    });
    expect(only('enum Color { Red, Green, Blue, }')).toMatchObject({
      type: 'EnumDecl',
      name: 'Color',
      variants: [{ name: 'Red' }, { name: 'Green' }, { name: 'Blue' }],
    });
  });

  it('parses host and local imports', () => {
    expect(only('import math')).toMatchObject({
      type: 'ImportDecl',
      module: 'math',
      isLocal: false,
    });
    expect(only('import "./lib/util.tern"')).toMatchObject({
      type: 'ImportDecl',
      module: './lib/util.tern',
      isLocal: true,
    });
  });
});

describe('Tern Parser: Statements', () => {
  it('parses if with else if as a nested if in the else block', () => {
    const decl = only('if a { x = 1 } else if b { x = 2 } else { x = 3 }');
    expect(decl).toMatchObject({
      type: 'IfStmt',
      condition: { type: 'Identifier', name: 'a' },
      elseBlock: {
        type: 'Block',
        declarations: [
          {
            type: 'IfStmt',
            condition: { type: 'Identifier', name: 'b' },
            elseBlock: { type: 'Block' },
          },
        ],
      },
    });
  });

  it('parses if without else', () => {
    expect(only('if ok { print(1) }')).toMatchObject({
      type: 'IfStmt',
      elseBlock: null,
    });
  });

  it('parses while and for loops', () => {
    expect(only('while i < 10 { i = i + 1 }')).toMatchObject({
      type: 'WhileStmt',
      condition: { type: 'BinaryExpr', op: '<' },
    });
    expect(only('for i in 0..10 { continue }')).toMatchObject({
      type: 'ForStmt',
      variable: 'i',
      iterable: { type: 'RangeExpr', inclusive: false },
      body: { declarations: [{ type: 'ContinueStmt' }] },
    });
  });

  it('leaves the brace after a for iterable to the body', () => {
    expect(only('for item in items { break }')).toMatchObject({
      type: 'ForStmt',
      iterable: { type: 'Identifier', name: 'items' },
      body: { declarations: [{ type: 'BreakStmt' }] },
    });
  });

  it('parses bare and valued returns', () => {
    const fn = only('fn f() { return }');
    expect(fn).toMatchObject({
      body: { declarations: [{ type: 'ReturnStmt', value: null }] },
    });
    const g = only('fn g() -> int { return 1 }');
    expect(g).toMatchObject({
      body: {
        declarations: [
          { type: 'ReturnStmt', value: { type: 'IntLiteral', value: 1n } },
        ],
      },
    });
  });

  it('treats a brace at statement start as a block', () => {
    expect(only('{ let x: int = 1 }')).toMatchObject({
      type: 'Block',
      declarations: [{ type: 'VarDecl', name: 'x' }],
    });
  });

  it('classifies assignment targets', () => {
    expect(only('x = 1')).toMatchObject({ type: 'AssignStmt', target: 'x' });
    expect(only('xs[0] = 1')).toMatchObject({
      type: 'IndexAssignStmt',
      target: { type: 'IndexExpr' },
    });
    expect(only('p.x = 1')).toMatchObject({
      type: 'MemberAssignStmt',
      target: { type: 'MemberAccess', member: 'x' },
    });
  });

  it('parses expression statements', () => {
    expect(only('push(xs, 1)')).toMatchObject({
      type: 'ExpressionStmt',
      expression: { type: 'CallExpr', callee: 'push' },
    });
  });

  it('parses print with sep and end', () => {
    expect(only('print(a, b, sep = ", ", end = "!")')).toMatchObject({
      type: 'PrintStmt',
      args: [
        { type: 'Identifier', name: 'a' },
        { type: 'Identifier', name: 'b' },
      ],
      sep: { type: 'StringLiteral', value: ', ' },
      end: { type: 'StringLiteral', value: '!' },
    });
    expect(only('print(a)')).toMatchObject({ sep: null, end: null });
  });

  it('parses statements separated only by newlines', () => {
    const program = parseOk('let a: int = 1\nlet b: int = a\nprint(b)');
    expect(program.declarations.map((d) => d.type)).toEqual([
      'VarDecl',
      'VarDecl',
      'PrintStmt',
    ]);
  });
});

describe('Tern Parser: Syntax Errors', () => {
  it('rejects an invalid assignment target with P002', () => {
    const err = parseFail('f() = 1');
    expect(err.code).toBe('P002');
    expect(err.message).toBe('invalid assignment target');
  });

  it('hints at a missing annotation', () => {
    const err = parseFail('let x = 1');
    expect(err.code).toBe('P001');
    expect(err.message).toBe(
      "expected ':' after variable name. Hint: Every binding needs a type annotation"
    );
    expect(err.span.start.column).toBe(7);
  });

  it('hints at an unclosed block', () => {
    expect(parseFail('fn f() { print(1)').message).toBe(
      "expected '}' after block. Hint: Check for unclosed brace"
    );
  });

  it('suggests keywords for common typos', () => {
    expect(parseFail('fn f(a: int var b: int) {}').message).toBe(
      "expected ')' after parameters. Hint: Did you mean 'let'?"
    );
  });

  it('requires at least one print argument', () => {
    expect(parseFail('print()').message).toBe(
      'print requires at least one argument'
    );
  });

  it('rejects positional print arguments after sep', () => {
    expect(parseFail('print(a, sep = " ", b)').message).toBe(
      'positional arguments must come before sep and end'
    );
  });

  it('rejects a duplicate sep', () => {
    expect(parseFail('print(a, sep = " ", sep = ",")').message).toBe(
      "duplicate 'sep' argument"
    );
  });

  it('reports an unknown type annotation token', () => {
    expect(parseFail('let x: 5 = 5').message).toBe('expected type name');
  });

  it('displays syntax errors with location', () => {
    expect(parseFail('while ) { }').format()).toBe(
      "test.tern:1:7: syntax error: expected expression, got ')'"
    );
  });

  it('accepts an externally built token stream', () => {
    const result = parse(tokenize('print(1)'));
    expect(result.success).toBe(true);
  });

  it('rejects a token stream without EOF as a programmer error', () => {
    expect(() => parse([])).toThrow(TypeError);
  });
});

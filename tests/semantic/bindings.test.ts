/**
 * Tern Analyzer Tests: Bindings and Scopes
 * Declarations, assignment, shadowing and reserved names
 */

import { describe, expect, it } from 'vitest';
import { analyze, INT, listOf, STR } from '../../src/index.js';
import {
  checkFail,
  checkOk,
  codeOf,
  initializerOf,
  messageOf,
  parseOk,
} from '../helpers/pipeline.js';

describe('Tern Analyzer: Bindings', () => {
  describe('declarations', () => {
    it('accepts an initializer of the declared type', () => {
      expect(initializerOf('let x: int = 1 + 2').resolvedType).toEqual(INT);
      expect(initializerOf('const NAME: str = "tern"').resolvedType).toEqual(
        STR
      );
    });

    it('rejects a float initializer for an int binding', () => {
      const err = checkFail('let x: int = 3.14');
      expect(err.code).toBe('E0100');
      expect(err.message).toBe('type mismatch: expected int, got float');
      expect(err.format()).toBe(
        'test.tern:1:14: E0100: type mismatch: expected int, got float'
      );
    });

    it('does not coerce between numeric types', () => {
      expect(messageOf('let f: float = 1')).toBe(
        'type mismatch: expected float, got int'
      );
    });

    it('rejects an undeclared identifier', () => {
      const err = checkFail('let y: int = x');
      expect(err.code).toBe('E0001');
      expect(err.message).toBe("use of undeclared identifier 'x'");
    });

    it('does not see a binding inside its own initializer', () => {
      expect(codeOf('let x: int = x')).toBe('E0001');
    });

    it('rejects redeclaration in the same scope', () => {
      const err = checkFail('let x: int = 1\nlet x: int = 2');
      expect(err.code).toBe('E0002');
      expect(err.message).toBe("redeclaration of 'x' in the same scope");
      expect(err.span.start.line).toBe(2);
    });

    it('rejects a constant redeclared as a variable', () => {
      expect(codeOf('const A: int = 1\nlet A: int = 2')).toBe('E0002');
    });
  });

  describe('assignment', () => {
    it('accepts assignment of the declared type', () => {
      checkOk('let x: int = 1\nx = x + 1');
    });

    it('rejects assignment of another type', () => {
      expect(messageOf('let x: int = 1\nx = "s"')).toBe(
        'type mismatch: expected int, got str'
      );
    });

    it('rejects assignment to a constant', () => {
      const err = checkFail('const LIMIT: int = 1\nLIMIT = 2');
      expect(err.code).toBe('E0003');
      expect(err.message).toBe("cannot assign to constant 'LIMIT'");
    });

    it('rejects assignment to a function name', () => {
      expect(codeOf('fn f() { }\nf = 1')).toBe('E0003');
    });

    it('rejects assignment to an undeclared name', () => {
      expect(messageOf('y = 1')).toBe("use of undeclared identifier 'y'");
    });

    it('lets an empty list adopt the variable type on reassignment', () => {
      checkOk('let xs: [int] = [1]\nxs = []');
    });
  });

  describe('scopes', () => {
    it('allows a parameter to be shadowed in a nested block', () => {
      checkOk(`
fn f(x: int) -> int {
  if x > 0 {
    let x: str = "inner"
    print(x)
  }
  return x
}`);
    });

    it('rejects a name declared twice in the same nested block', () => {
      const err = checkFail(`
fn f(x: int) {
  if x > 0 {
    let y: int = 1
    let y: int = 2
  }
}`);
      expect(err.code).toBe('E0002');
      expect(err.span.start.line).toBe(5);
    });

    it('shares one scope between parameters and the function body', () => {
      expect(codeOf('fn f(x: int) { let x: int = 1 }')).toBe('E0002');
    });

    it('rejects duplicate parameters', () => {
      expect(codeOf('fn f(a: int, a: int) { }')).toBe('E0002');
    });

    it('drops block bindings at the end of the block', () => {
      expect(messageOf('{ let a: int = 1 }\nprint(a)')).toBe(
        "use of undeclared identifier 'a'"
      );
    });

    it('uses the innermost binding for its type', () => {
      checkOk(`
let v: int = 1
{
  let v: str = "s"
  let w: str = v
}
let z: int = v`);
    });
  });

  describe('reserved names', () => {
    it('rejects File and Env in every declaration form', () => {
      const sources = [
        'let File: int = 1',
        'const Env: int = 1',
        'fn File() { }',
        'fn f(Env: int) { }',
        'for File in [1] { }',
        'struct Env { a: int }',
        'enum File { A }',
        'fn f() { let Env: str = "x" }',
      ];
      for (const source of sources) {
        expect(codeOf(source)).toBe('E0205');
      }
    });

    it('names the namespace in the message', () => {
      expect(messageOf('let File: int = 1')).toBe(
        "cannot shadow builtin module 'File'"
      );
    });
  });

  describe('functions as values', () => {
    it('rejects a function name used as a value', () => {
      const err = checkFail('fn f() -> int { return 1 }\nlet g: int = f');
      expect(err.code).toBe('E0308');
      expect(err.message).toBe("function 'f' cannot be used as a value");
    });

    it('rejects a user function that reuses a builtin name', () => {
      expect(messageOf('fn len(x: int) -> int { return x }')).toBe(
        "redeclaration of 'len' in the same scope"
      );
    });

    it('allows a variable named like a builtin function', () => {
      checkOk('let len: int = 1\nlet xs: [int] = [len]\nlet n: int = len(xs)');
    });
  });

  describe('void annotations', () => {
    it('rejects void as a variable type', () => {
      const err = checkFail('fn f() { }\nlet x: void = f()');
      expect(err.code).toBe('E0105');
      expect(err.format()).toBe(
        "test.tern:2:8: E0105: 'void' is only allowed as a function return type"
      );
    });

    it('rejects void as a constant or parameter type', () => {
      expect(codeOf('const C: void = 1')).toBe('E0105');
      const err = checkFail('fn g(p: void) { }');
      expect(err.code).toBe('E0105');
      expect(err.span.start.column).toBe(9);
    });

    it('rejects void inside a collection type', () => {
      expect(checkFail('let a: [void] = []').span.start.column).toBe(9);
      expect(codeOf('let d: Dict[str, void] = {}')).toBe('E0105');
      expect(codeOf('fn f() -> [void] { return [] }')).toBe('E0105');
    });

    it('allows void as a declared return type', () => {
      checkOk('fn f() -> void { }\nf()');
    });
  });

  describe('typed tree', () => {
    it('annotates nested expressions', () => {
      const value = initializerOf('let xs: [int] = [1, 2 * 3]');
      expect(value.resolvedType).toEqual(listOf(INT));
      if (value.type !== 'ListLiteral') throw new Error('expected list');
      expect(value.elements.map((e) => e.resolvedType)).toEqual([INT, INT]);
    });

    it('does not modify the parsed program', () => {
      const program = parseOk('let x: int = 1 + 2\nprint(x)');
      const before = structuredClone(program);
      const result = analyze(program);
      expect(result.success).toBe(true);
      expect(program).toEqual(before);
      const [decl] = program.declarations;
      if (decl?.type !== 'VarDecl') throw new Error('expected let');
      expect(decl.value.resolvedType).toBeUndefined();
    });
  });
});

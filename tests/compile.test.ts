/**
 * Tern Tests: Compile Pipeline
 */

import { describe, expect, it } from 'vitest';
import { compile, ParseError, SemanticError } from '../src/index.js';

describe('Tern compile', () => {
  it('returns the typed program', () => {
    const result = compile('let x: int = 1');
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.program.declarations).toHaveLength(1);
  });

  it('labels spans with <stdin> by default', () => {
    const result = compile('print(y)');
    if (result.success) throw new Error('expected failure');
    expect(result.error.format()).toBe(
      "<stdin>:1:7: E0001: use of undeclared identifier 'y'"
    );
  });

  it('stops at a lexer error', () => {
    const result = compile('let a: int = 1 $', { sourceName: 'a.tern' });
    if (result.success) throw new Error('expected failure');
    expect(result.error).toBeInstanceOf(ParseError);
    expect(result.error.code).toBe('L002');
  });

  it('stops at a syntax error before analysis', () => {
    const result = compile('let a: int = = y', { sourceName: 'a.tern' });
    if (result.success) throw new Error('expected failure');
    expect(result.error.code).toBe('P005');
  });

  it('reports the first semantic error', () => {
    const result = compile('let a: int = "x"\nlet b: str = 1', {
      sourceName: 'a.tern',
    });
    if (result.success) throw new Error('expected failure');
    expect(result.error).toBeInstanceOf(SemanticError);
    expect(result.error.format()).toBe(
      'a.tern:1:14: E0100: type mismatch: expected int, got str'
    );
  });

  it('passes analyzer options through', () => {
    const result = compile('import "./lib"', { moduleExists: () => false });
    if (result.success) throw new Error('expected failure');
    expect(result.error.message).toBe("module not found: './lib.tern'");
  });

  it('type-checks a complete program', () => {
    const result = compile(`
import math

struct Item { name: str, price: float }
enum Status { Open, Closed }

const TAX: float = 0.2

fn total(items: [Item]) -> float {
  let sum: float = 0.0
  for item in items {
    sum = sum + item.price
  }
  return sum * (1.0 + TAX)
}

fn main() {
  let cart: [Item] = []
  push(cart, Item { name: "pen", price: 1.5 })
  let counts: Dict[str, int] = {}
  counts["pen"] = 1
  let status: Status = Status.Open
  if status == Status.Open && len(cart) > 0 {
    print("total: {}", total(cart), end = "!")
  } else {
    print("empty")
  }
  let names: [str] = keys(counts)
  print(names.join(", "), math.floor(2.5))
}
`);
    if (!result.success) throw new Error(result.error.format());
    expect(result.program.declarations.map((d) => d.type)).toEqual([
      'ImportDecl',
      'StructDecl',
      'EnumDecl',
      'ConstDecl',
      'FnDecl',
      'FnDecl',
    ]);
  });
});

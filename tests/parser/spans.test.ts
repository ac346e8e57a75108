/**
 * Tern Parser Tests: Spans
 * Every composite node encloses the spans of its children
 */

import { describe, expect, it } from 'vitest';
import type { SourceSpan } from '../../src/index.js';
import { parseExpr, parseOk } from '../helpers/pipeline.js';

interface SpannedNode {
  readonly type: string;
  readonly span: SourceSpan;
}

function isSpannedNode(value: unknown): value is SpannedNode {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    typeof value.type === 'string' &&
    'span' in value
  );
}

function childNodes(node: SpannedNode): SpannedNode[] {
  const children: SpannedNode[] = [];
  const values: unknown[] = Object.values(node);
  for (const value of values) {
    if (Array.isArray(value)) {
      children.push(...value.filter(isSpannedNode));
    } else if (isSpannedNode(value)) {
      children.push(value);
    }
  }
  return children;
}

/** Walk the tree; returns violations as "Parent > Child" strings */
function containmentViolations(root: SpannedNode): {
  visited: number;
  violations: string[];
} {
  const violations: string[] = [];
  let visited = 0;
  const visit = (node: SpannedNode): void => {
    visited++;
    for (const child of childNodes(node)) {
      if (
        child.span.start.offset < node.span.start.offset ||
        child.span.end.offset > node.span.end.offset
      ) {
        violations.push(`${node.type} > ${child.type}`);
      }
      visit(child);
    }
  };
  visit(root);
  return { visited, violations };
}

const PROGRAM = `
import math
import "./util.tern"

struct Point { x: int, y: int }
enum Color { Red, Green }

const LIMIT: int = 10

fn dist(p: Point, q: Point) -> int {
  let dx: int = p.x - q.x
  if dx < 0 { return -dx } else if dx == 0 { return 0 } else { return dx }
}

fn main() {
  let pts: [Point] = [Point { x: 1, y: 2 }, Point { x: 3, y: 4 }]
  let ages: Dict[str, int] = { "ann": 31, "bob": 42 }
  for i in 0..=LIMIT {
    while i > 5 { break }
    pts[0].x = i
    ages["ann"] = len(pts)
  }
  print("{} {}", dist(pts[0], pts[1]), "a b".split(" ").len(), sep = "", end = "")
  return
}
`;

describe('Tern Parser: Spans', () => {
  it('nests every child span inside its parent span', () => {
    const { visited, violations } = containmentViolations(parseOk(PROGRAM));
    expect(violations).toEqual([]);
    expect(visited).toBeGreaterThan(50);
  });

  it('spans a binary expression from its left to its right operand', () => {
    const expr = parseExpr('alpha + beta * 2');
    expect(expr.span.start).toEqual({ line: 1, column: 1, offset: 0 });
    expect(expr.span.end).toEqual({ line: 1, column: 17, offset: 16 });
  });

  it('starts a unary expression at its operator', () => {
    const expr = parseExpr('x + -y');
    if (expr.type !== 'BinaryExpr') throw new Error('expected binary');
    expect(expr.right.span.start.column).toBe(5);
    expect(expr.right.span.end.column).toBe(7);
  });

  it('spans a function declaration from fn to the closing brace', () => {
    const [decl] = parseOk('\n  fn f() {\n  }').declarations;
    expect(decl?.span.start).toEqual({ line: 2, column: 3, offset: 3 });
    expect(decl?.span.end).toEqual({ line: 3, column: 4, offset: 15 });
  });

  it('spans a program from its first to its last token', () => {
    const program = parseOk('  let a: int = 1\nprint(a)  ');
    expect(program.span.start.offset).toBe(2);
    expect(program.span.end.offset).toBe(25);
  });

  it('spans an empty program on the EOF token', () => {
    const program = parseOk('   ');
    expect(program.span.start.offset).toBe(3);
    expect(program.span.end.offset).toBe(3);
  });
});

/**
 * Tern Parser Tests: Expressions
 * Precedence, associativity, postfix chains and literals
 */

import { describe, expect, it } from 'vitest';
import type { ExpressionNode } from '../../src/index.js';
import { parseExpr, parseFail } from '../helpers/pipeline.js';

/** Compact prefix rendering of an expression tree */
function show(expr: ExpressionNode): string {
  switch (expr.type) {
    case 'IntLiteral':
    case 'FloatLiteral':
      return String(expr.value);
    case 'StringLiteral':
      return JSON.stringify(expr.value);
    case 'BoolLiteral':
      return String(expr.value);
    case 'Identifier':
      return expr.name;
    case 'BinaryExpr':
      return `(${expr.op} ${show(expr.left)} ${show(expr.right)})`;
    case 'UnaryExpr':
      return `(${expr.op} ${show(expr.operand)})`;
    case 'RangeExpr':
      return `(${expr.inclusive ? '..=' : '..'} ${show(expr.start)} ${show(expr.end)})`;
    case 'CallExpr':
      return `${expr.callee}(${expr.args.map(show).join(', ')})`;
    case 'MethodCall':
      return `${show(expr.object)}.${expr.method}(${expr.args.map(show).join(', ')})`;
    case 'MemberAccess':
      return `${show(expr.object)}.${expr.member}`;
    case 'IndexExpr':
      return `${show(expr.target)}[${show(expr.index)}]`;
    case 'ListLiteral':
      return `[${expr.elements.map(show).join(', ')}]`;
    case 'DictLiteral':
      return `{${expr.entries.map((e) => `${show(e.key)}: ${show(e.value)}`).join(', ')}}`;
    case 'StructInit':
      return `${expr.name} {${expr.fields.map((f) => `${f.name}: ${show(f.value)}`).join(', ')}}`;
  }
}

function shape(source: string): string {
  return show(parseExpr(source));
}

describe('Tern Parser: Expressions', () => {
  describe('precedence', () => {
    it('binds * tighter than +', () => {
      expect(shape('1 + 2 * 3')).toBe('(+ 1 (* 2 3))');
    });

    it('is left-associative for binary operators', () => {
      expect(shape('1 - 2 - 3')).toBe('(- (- 1 2) 3)');
      expect(shape('8 / 4 % 3')).toBe('(% (/ 8 4) 3)');
    });

    it('applies unary minus before addition', () => {
      expect(shape('-a + b')).toBe('(+ (- a) b)');
    });

    it('nests unary operators to the right', () => {
      expect(shape('!!done')).toBe('(! (! done))');
      expect(shape('- -x')).toBe('(- (- x))');
    });

    it('orders comparison, equality and logical operators', () => {
      expect(shape('a < b == c > d')).toBe('(== (< a b) (> c d))');
      expect(shape('a || b && c')).toBe('(|| a (&& b c))');
      expect(shape('a == b && c != d')).toBe('(&& (== a b) (!= c d))');
    });

    it('gives ranges the lowest precedence', () => {
      expect(shape('0..n + 1')).toBe('(.. 0 (+ n 1))');
      expect(shape('1..=10')).toBe('(..= 1 10)');
    });

    it('respects parentheses', () => {
      expect(shape('(1 + 2) * 3')).toBe('(* (+ 1 2) 3)');
    });
  });

  describe('postfix chains', () => {
    it('parses calls with arguments', () => {
      expect(shape('add(1, x * 2)')).toBe('add(1, (* x 2))');
      expect(shape('now()')).toBe('now()');
    });

    it('parses casts as calls', () => {
      expect(shape('int("42")')).toBe('int("42")');
      expect(shape('str(1.5)')).toBe('str(1.5)');
    });

    it('records the callee span', () => {
      const expr = parseExpr('total(1)');
      if (expr.type !== 'CallExpr') throw new Error('expected call');
      expect(expr.calleeSpan.start.column).toBe(1);
      expect(expr.calleeSpan.end.column).toBe(6);
    });

    it('parses index, member and method chains left to right', () => {
      expect(shape('grid[1][2]')).toBe('grid[1][2]');
      expect(shape('p.pos.x')).toBe('p.pos.x');
      expect(shape('name.trim().upper()')).toBe('name.trim().upper()');
      expect(shape('items[0].len()')).toBe('items[0].len()');
    });

    it('parses static namespace calls as method calls', () => {
      expect(shape('File.exists("a.txt")')).toBe('File.exists("a.txt")');
    });

    it('binds postfix tighter than unary', () => {
      expect(shape('-xs[0]')).toBe('(- xs[0])');
    });
  });

  describe('literals', () => {
    it('parses scalar literals', () => {
      expect(parseExpr('7')).toMatchObject({ type: 'IntLiteral', value: 7n });
      expect(parseExpr('2.5')).toMatchObject({
        type: 'FloatLiteral',
        value: 2.5,
      });
      expect(parseExpr('"hi"')).toMatchObject({
        type: 'StringLiteral',
        value: 'hi',
      });
      expect(parseExpr('false')).toMatchObject({
        type: 'BoolLiteral',
        value: false,
      });
    });

    it('keeps integer literals exact beyond 2^53', () => {
      expect(parseExpr('9007199254740993')).toMatchObject({
        type: 'IntLiteral',
        value: 9007199254740993n,
      });
      expect(parseExpr('99999999999999999999999')).toMatchObject({
        type: 'IntLiteral',
        value: 99999999999999999999999n,
      });
    });

    it('leaves resolvedType empty in parser output', () => {
      expect(parseExpr('1 + 2').resolvedType).toBeUndefined();
    });

    it('parses list literals with a trailing comma', () => {
      expect(shape('[1, 2, 3,]')).toBe('[1, 2, 3]');
      expect(shape('[]')).toBe('[]');
    });

    it('parses dict literals in expression position', () => {
      expect(shape('f({"a": 1, "b": 2})')).toBe('f({"a": 1, "b": 2})');
      expect(shape('f({})')).toBe('f({})');
    });

    it('parses struct initializers after an identifier', () => {
      expect(shape('Point { x: 1, y: 2 }')).toBe('Point {x: 1, y: 2}');
    });
  });

  describe('errors', () => {
    it('rejects chained ranges with P004', () => {
      const err = parseFail('1..2..3');
      expect(err.code).toBe('P004');
      expect(err.message).toBe('range expressions cannot be chained');
    });

    it('rejects a call on a non-identifier with P003', () => {
      const err = parseFail('xs[0](1)');
      expect(err.code).toBe('P003');
      expect(err.message).toBe('can only call functions');
    });

    it('rejects a token that cannot start an expression with P005', () => {
      const err = parseFail('let x: int = )');
      expect(err.code).toBe('P005');
      expect(err.message).toBe("expected expression, got ')'");
      expect(err.format()).toBe(
        "test.tern:1:14: syntax error: expected expression, got ')'"
      );
    });

    it('names end of input in P005', () => {
      expect(parseFail('let x: int =').message).toBe(
        "expected expression, got 'end of input'"
      );
    });

    it('reports an unclosed call with a hint', () => {
      const err = parseFail('f(1, 2');
      expect(err.code).toBe('P001');
      expect(err.message).toBe(
        "expected ')' after arguments. Hint: Check for unclosed parenthesis"
      );
    });
  });
});

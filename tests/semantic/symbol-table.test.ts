/**
 * Tern Analyzer Tests: Symbol Table and Return Flow
 */

import { describe, expect, it } from 'vitest';
import {
  DEFAULT_SOURCE,
  INT,
  STR,
  SymbolTable,
  type SymbolInfo,
} from '../../src/index.js';
import { definitelyReturns } from '../../src/semantic/index.js';
import { parseOk } from '../helpers/pipeline.js';

const SPAN = {
  start: { line: 1, column: 1, offset: 0 },
  end: { line: 1, column: 2, offset: 1 },
  source: DEFAULT_SOURCE,
};

function variable(name: string, type = INT): SymbolInfo {
  return {
    name,
    type,
    kind: 'variable',
    isConst: false,
    isFunction: false,
    span: SPAN,
  };
}

describe('Tern SymbolTable', () => {
  it('starts at the global scope', () => {
    expect(new SymbolTable().depth).toBe(0);
  });

  it('rejects a second definition in the same frame', () => {
    const table = new SymbolTable();
    expect(table.define(variable('a'))).toBe(true);
    expect(table.define(variable('a', STR))).toBe(false);
    expect(table.lookup('a')?.type).toEqual(INT);
  });

  it('shadows outer bindings and restores them on exit', () => {
    const table = new SymbolTable();
    table.define(variable('a'));
    table.enterScope();
    expect(table.define(variable('a', STR))).toBe(true);
    expect(table.lookup('a')?.type).toEqual(STR);
    expect(table.lookupCurrentScope('a')?.type).toEqual(STR);
    table.exitScope();
    expect(table.lookup('a')?.type).toEqual(INT);
  });

  it('searches outward but not inward', () => {
    const table = new SymbolTable();
    table.define(variable('outer'));
    table.enterScope();
    expect(table.lookup('outer')?.name).toBe('outer');
    expect(table.lookupCurrentScope('outer')).toBeUndefined();
    table.define(variable('inner'));
    table.exitScope();
    expect(table.lookup('inner')).toBeUndefined();
  });

  it('never pops the global frame', () => {
    const table = new SymbolTable();
    table.define(variable('g'));
    table.exitScope();
    expect(table.depth).toBe(0);
    expect(table.lookup('g')?.name).toBe('g');
  });

  it('pops the frame of withScope when the callback throws', () => {
    const exits: number[] = [];
    const table = new SymbolTable({ onExit: (depth) => exits.push(depth) });
    expect(() =>
      table.withScope(() => {
        throw new Error('stop');
      })
    ).toThrow('stop');
    expect(table.depth).toBe(0);
    expect(exits).toEqual([1]);
  });

  it('reports the depth of each frame entered and left', () => {
    const log: string[] = [];
    const table = new SymbolTable({
      onEnter: (depth) => log.push(`+${depth}`),
      onExit: (depth) => log.push(`-${depth}`),
    });
    table.withScope(() => table.withScope(() => undefined));
    expect(log).toEqual(['+1', '+2', '-2', '-1']);
  });
});

describe('Tern definitelyReturns', () => {
  function bodyOf(source: string): boolean {
    const [decl] = parseOk(source).declarations;
    if (decl?.type !== 'FnDecl') throw new Error('expected fn');
    return definitelyReturns(decl.body.declarations);
  }

  it('is false for an empty body', () => {
    expect(bodyOf('fn f() { }')).toBe(false);
  });

  it('only looks at the last statement', () => {
    expect(bodyOf('fn f() { return 1\nprint(2) }')).toBe(false);
    expect(bodyOf('fn f() { print(2)\nreturn 1 }')).toBe(true);
  });

  it('requires both branches of an if', () => {
    expect(bodyOf('fn f() { if a { return 1 } }')).toBe(false);
    expect(bodyOf('fn f() { if a { return 1 } else { return 2 } }')).toBe(true);
    expect(bodyOf('fn f() { if a { return 1 } else { print(1) } }')).toBe(
      false
    );
  });

  it('looks into nested blocks but not loops', () => {
    expect(bodyOf('fn f() { { return 1 } }')).toBe(true);
    expect(bodyOf('fn f() { while a { return 1 } }')).toBe(false);
    expect(bodyOf('fn f() { for x in xs { return 1 } }')).toBe(false);
  });
});

/**
 * Symbol Table
 * Stack of lexical scope frames with shadowing across frames
 */

import type { SourceSpan } from '../source-location.js';
import type { Type } from '../value-types.js';

// ============================================================
// SYMBOLS
// ============================================================

export type SymbolKind =
  | 'variable'
  | 'constant'
  | 'parameter'
  | 'function'
  | 'module';

/** Parameter and return types of a user function */
export interface FunctionSignature {
  readonly params: readonly Type[];
  readonly returnType: Type;
}

export interface SymbolInfo {
  readonly name: string;
  /** Value type; the return type for functions */
  readonly type: Type;
  readonly kind: SymbolKind;
  /** Constants, functions and imported modules cannot be reassigned */
  readonly isConst: boolean;
  readonly isFunction: boolean;
  readonly signature?: FunctionSignature | undefined;
  readonly span: SourceSpan;
}

/** Fired after a frame is pushed and after a frame is popped */
export interface ScopeHooks {
  onEnter?: (depth: number) => void;
  onExit?: (depth: number) => void;
}

// ============================================================
// SYMBOL TABLE
// ============================================================

/**
 * Frame 0 is the global scope and is never popped.
 *
 * @example
 * ```typescript
 * const table = new SymbolTable();
 * table.withScope(() => table.define(symbol));
 * ```
 */
export class SymbolTable {
  private readonly frames: Map<string, SymbolInfo>[] = [new Map()];
  private readonly hooks: ScopeHooks;

  constructor(hooks: ScopeHooks = {}) {
    this.hooks = hooks;
  }

  /** Current nesting depth; 0 at global scope */
  get depth(): number {
    return this.frames.length - 1;
  }

  enterScope(): void {
    this.frames.push(new Map());
    this.hooks.onEnter?.(this.depth);
  }

  exitScope(): void {
    if (this.frames.length <= 1) return;
    const depth = this.depth;
    this.frames.pop();
    this.hooks.onExit?.(depth);
  }

  /**
   * Run `fn` inside a fresh frame. The frame is popped even when `fn`
   * throws, so a diagnostic never leaves the stack unbalanced.
   */
  withScope<R>(fn: () => R): R {
    this.enterScope();
    try {
      return fn();
    } finally {
      this.exitScope();
    }
  }

  /** False iff the name already exists in the current frame */
  define(symbol: SymbolInfo): boolean {
    const frame = this.currentFrame();
    if (frame.has(symbol.name)) return false;
    frame.set(symbol.name, symbol);
    return true;
  }

  /** Innermost binding of `name`, searching outward */
  lookup(name: string): SymbolInfo | undefined {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const found = this.frames[i]?.get(name);
      if (found) return found;
    }
    return undefined;
  }

  lookupCurrentScope(name: string): SymbolInfo | undefined {
    return this.currentFrame().get(name);
  }

  private currentFrame(): Map<string, SymbolInfo> {
    const frame = this.frames[this.frames.length - 1];
    if (!frame) {
      throw new Error('Symbol table has no scope frame');
    }
    return frame;
  }
}

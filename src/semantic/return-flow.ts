/**
 * Definite-return analysis over typed blocks
 */

import type { DeclarationNode, TypeSlot } from '../ast-nodes.js';

/**
 * Whether every path through a statement sequence reaches a `return`.
 *
 * Only the last statement counts. An `if` returns when both branches do;
 * loops never do, since their body may run zero times.
 */
export function definitelyReturns<T extends TypeSlot>(
  declarations: readonly DeclarationNode<T>[]
): boolean {
  const last = declarations[declarations.length - 1];
  if (last === undefined) return false;

  switch (last.type) {
    case 'ReturnStmt':
      return true;
    case 'IfStmt':
      return (
        last.elseBlock !== null &&
        definitelyReturns(last.thenBlock.declarations) &&
        definitelyReturns(last.elseBlock.declarations)
      );
    case 'Block':
      return definitelyReturns(last.declarations);
    default:
      return false;
  }
}

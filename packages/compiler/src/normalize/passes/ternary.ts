/**
 * The conditional operator `COND ? A : B`, right associative.
 *
 * @module normalize/passes/ternary
 */

import { isPending, type NormalizedNode, type WorkNode } from '../../ast/normalized.js';
import { isOperator, isTernaryBoundary, rebuild, spansBetween, splice, unwrapGroup } from '../operators.js';
import type { NormalizerPass } from '../pass.js';

interface Parsed {
  node: NormalizedNode;
  next: number;
}

function conditional(items: readonly WorkNode[], position: number): Parsed | undefined {
  const head = items[position];
  if (head === undefined || isPending(head)) return undefined;
  if (!isOperator(items[position + 1], '?')) {
    return { node: unwrapGroup(head), next: position + 1 };
  }
  const whenTrue = conditional(items, position + 2);
  if (!whenTrue || !isOperator(items[whenTrue.next], ':')) return undefined;
  const whenFalse = conditional(items, whenTrue.next + 1);
  if (!whenFalse) return undefined;
  return {
    node: { kind: 'ternary', condition: unwrapGroup(head), whenTrue: whenTrue.node, whenFalse: whenFalse.node },
    next: whenFalse.next,
  };
}

export const ternaryPass: NormalizerPass = {
  name: 'Ternary',
  tier: 'Medium',
  apply(node) {
    if (!isPending(node) || node.type !== 'statement') return node;
    let items: WorkNode[] = node.children;
    let changed = false;
    for (const span of spansBetween(items, isTernaryBoundary).reverse()) {
      const run = items.slice(span.start, span.end);
      if (!run.some((item) => isOperator(item, '?'))) continue;
      const parsed = conditional(run, 0);
      if (parsed && parsed.next === run.length) {
        items = splice(items, span, parsed.node);
        changed = true;
      }
    }
    return changed ? rebuild(node, items) : node;
  },
};

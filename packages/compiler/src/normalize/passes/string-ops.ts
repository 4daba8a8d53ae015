/**
 * String concatenation chains and repetition.
 *
 * A run made only of `.` operators becomes one n-ary `concat`, so
 * `"a" . "b" . "c"` is a single node with three parts. `A x N` becomes a
 * `repeat`. Mixed runs are left to the binary-operator pass.
 *
 * @module normalize/passes/string-ops
 */

import { isPending, type NormalizedNode, type WorkNode } from '../../ast/normalized.js';
import { isOperator, isRunBoundary, rebuild, spansBetween, splice, unwrapGroup } from '../operators.js';
import type { NormalizerPass } from '../pass.js';

function operands(items: readonly WorkNode[], operator: string): NormalizedNode[] | undefined {
  if (items.length < 3 || items.length % 2 === 0) return undefined;
  const out: NormalizedNode[] = [];
  for (let i = 0; i < items.length; i++) {
    const item = items[i];
    if (i % 2 === 1) {
      if (!isOperator(item, operator)) return undefined;
    } else {
      if (isPending(item)) return undefined;
      out.push(unwrapGroup(item));
    }
  }
  return out;
}

function match(items: readonly WorkNode[]): NormalizedNode | undefined {
  const parts = operands(items, '.');
  if (parts) {
    return { kind: 'concat', parts: parts.flatMap((part) => (part.kind === 'concat' ? part.parts : [part])) };
  }
  const repeated = items.length === 3 ? operands(items, 'x') : undefined;
  if (repeated) {
    return { kind: 'repeat', value: repeated[0], count: repeated[1] };
  }
  return undefined;
}

export const stringOpsPass: NormalizerPass = {
  name: 'StringOps',
  tier: 'Medium',
  apply(node) {
    if (!isPending(node) || node.type !== 'statement') return node;
    let items: WorkNode[] = node.children;
    let changed = false;
    for (const span of spansBetween(items, isRunBoundary).reverse()) {
      const replacement = match(items.slice(span.start, span.end));
      if (replacement) {
        items = splice(items, span, replacement);
        changed = true;
      }
    }
    return changed ? rebuild(node, items) : node;
  },
};

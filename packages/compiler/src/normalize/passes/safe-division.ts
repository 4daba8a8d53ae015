/**
 * The guarded-division idiom `X ? N / X : 0`.
 *
 * @module normalize/passes/safe-division
 */

import { isPending, type NormalizedNode, type WorkNode } from '../../ast/normalized.js';
import { treesEqual } from '../../ast/serialize.js';
import { isOperator, isTernaryBoundary, rebuild, spansBetween, splice, unwrapGroup } from '../operators.js';
import type { NormalizerPass } from '../pass.js';

function isZero(node: NormalizedNode): boolean {
  return node.kind === 'literal' && (node.value === 0 || node.value === '0');
}

function match(items: readonly WorkNode[]): NormalizedNode | undefined {
  if (items.length !== 7) return undefined;
  const [guard, question, numerator, slash, divisor, colon, otherwise] = items;
  if (!isOperator(question, '?') || !isOperator(slash, '/') || !isOperator(colon, ':')) return undefined;
  if (isPending(guard) || isPending(numerator) || isPending(divisor) || isPending(otherwise)) return undefined;
  const denominator = unwrapGroup(guard);
  if (!treesEqual(denominator, unwrapGroup(divisor)) || !isZero(otherwise)) return undefined;
  return { kind: 'safeDivision', numerator: unwrapGroup(numerator), denominator };
}

export const safeDivisionPass: NormalizerPass = {
  name: 'SafeDivision',
  tier: 'High',
  apply(node) {
    if (!isPending(node) || node.type !== 'statement') return node;
    let items: WorkNode[] = node.children;
    let changed = false;
    for (const span of spansBetween(items, isTernaryBoundary).reverse()) {
      const replacement = match(items.slice(span.start, span.end));
      if (replacement) {
        items = splice(items, span, replacement);
        changed = true;
      }
    }
    return changed ? rebuild(node, items) : node;
  },
};

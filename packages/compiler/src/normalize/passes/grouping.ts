/**
 * Parenthesized groups: `( ... )` becomes a `list` of its items.
 *
 * @module normalize/passes/grouping
 */

import { isPending, type NormalizedNode } from '../../ast/normalized.js';
import { isStatementEnd } from '../operators.js';
import type { NormalizerPass } from '../pass.js';

export const groupingPass: NormalizerPass = {
  name: 'Grouping',
  tier: 'High',
  apply(node) {
    if (!isPending(node) || node.type !== 'list') return node;
    const inner = node.children.filter((child) => !isStatementEnd(child));
    if (inner.length === 0) return { kind: 'list', items: [] };
    if (inner.length > 1) return node;
    const only = inner[0];
    if (isPending(only)) return node;
    const items: NormalizedNode[] = only.kind === 'list' ? only.items : [only];
    return { kind: 'list', items };
  },
};

/**
 * Documents: one statement is that statement; several become a sequence
 * whose last statement is the result.
 *
 * @module normalize/passes/sequence
 */

import { isPending, type NormalizedNode } from '../../ast/normalized.js';
import { isStatementEnd } from '../operators.js';
import type { NormalizerPass } from '../pass.js';

export const sequencePass: NormalizerPass = {
  name: 'Sequence',
  tier: 'Low',
  apply(node) {
    if (!isPending(node) || node.type !== 'document') return node;
    const statements: NormalizedNode[] = [];
    for (const child of node.children) {
      if (isStatementEnd(child)) continue;
      if (isPending(child)) return node;
      statements.push(child);
    }
    if (statements.length === 0) return node;
    if (statements.length === 1) return statements[0];
    return { kind: 'sequence', statements: statements.slice(0, -1), result: statements[statements.length - 1] };
  },
};

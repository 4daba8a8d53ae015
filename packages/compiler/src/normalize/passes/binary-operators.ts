/**
 * Symbolic operators from `**` down to `||`/`//`, grouped by precedence
 * climbing over each separator-delimited run of a statement.
 *
 * @module normalize/passes/binary-operators
 */

import { isPending, type WorkNode } from '../../ast/normalized.js';
import { isRunBoundary, parseRun, rebuild, spansBetween, splice } from '../operators.js';
import type { NormalizerPass } from '../pass.js';

export const binaryOperatorsPass: NormalizerPass = {
  name: 'BinaryOperators',
  tier: 'Medium',
  apply(node) {
    if (!isPending(node) || node.type !== 'statement') return node;
    let items: WorkNode[] = node.children;
    let changed = false;
    for (const span of spansBetween(items, isRunBoundary).reverse()) {
      const run = items.slice(span.start, span.end);
      const parsed = parseRun(run);
      if (parsed !== undefined && !(run.length === 1 && run[0] === parsed)) {
        items = splice(items, span, parsed);
        changed = true;
      }
    }
    // A statement holding a single term is that term.
    const result = rebuild(node, items);
    return changed || !isPending(result) ? result : node;
  },
};

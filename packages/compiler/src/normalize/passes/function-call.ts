/**
 * Bareword function calls, which bind as tightly as terms.
 *
 * `name(ARGS)` becomes a call with the group's items as arguments. A named
 * unary operator without parentheses (`length $val`) takes the operand run
 * up to the first operator binding looser than itself, so in
 * `length $val ? 1/$val : 0` the call wraps `$val` only.
 *
 * @module normalize/passes/function-call
 */

import { isPending, type WorkNode } from '../../ast/normalized.js';
import { buildCall, NAMED_UNARY, RESERVED_WORDS } from '../compose.js';
import { namedUnaryOperandEnd, parseRun, rebuild, splice, wordText } from '../operators.js';
import type { NormalizerPass } from '../pass.js';

export const functionCallPass: NormalizerPass = {
  name: 'FunctionCall',
  tier: 'High',
  apply(node) {
    if (!isPending(node) || node.type !== 'statement') return node;
    let items: WorkNode[] = node.children;
    let changed = false;

    // Right to left, so `uc lc $val` nests the inner call first.
    for (let i = items.length - 1; i >= 0; i--) {
      const name = wordText(items[i]);
      if (name === undefined || RESERVED_WORDS.has(name)) continue;

      const next = items[i + 1];
      if (next !== undefined && !isPending(next) && next.kind === 'list') {
        items = splice(items, { start: i, end: i + 2 }, buildCall(name, next.items));
        changed = true;
        continue;
      }

      if (NAMED_UNARY.has(name)) {
        const end = namedUnaryOperandEnd(items, i + 1);
        if (end === i + 1) continue;
        const operand = parseRun(items.slice(i + 1, end));
        if (operand === undefined) continue;
        items = splice(items, { start: i, end }, buildCall(name, [operand]));
        changed = true;
      }
    }

    return changed ? rebuild(node, items) : node;
  },
};

/**
 * List operators without parentheses and comma lists.
 *
 * `sprintf "%.1f mm", $val` takes everything to its right up to the next
 * low-precedence word or statement keyword as its argument list. A bare
 * comma-separated run becomes a `list`.
 *
 * @module normalize/passes/formatted-print
 */

import { isPending, type NormalizedNode, type WorkNode } from '../../ast/normalized.js';
import { buildCall, LIST_OPERATORS } from '../compose.js';
import { isComma, isListBoundary, rebuild, spansBetween, splice, wordText } from '../operators.js';
import type { NormalizerPass } from '../pass.js';

/** `A, B, C` (a trailing comma is allowed). */
function commaItems(items: readonly WorkNode[]): NormalizedNode[] | undefined {
  const out: NormalizedNode[] = [];
  for (let i = 0; i < items.length; i++) {
    const item = items[i];
    if (i % 2 === 1) {
      if (!isComma(item)) return undefined;
    } else {
      if (isPending(item)) return undefined;
      out.push(item);
    }
  }
  return out.length > 0 ? out : undefined;
}

function boundaryAfter(items: readonly WorkNode[], start: number): number {
  let i = start;
  while (i < items.length && !isListBoundary(items[i])) i++;
  return i;
}

export const formattedPrintPass: NormalizerPass = {
  name: 'FormattedPrint',
  tier: 'Low',
  apply(node) {
    if (!isPending(node) || node.type !== 'statement') return node;
    let items: WorkNode[] = node.children;
    let changed = false;

    for (let i = items.length - 1; i >= 0; i--) {
      const name = wordText(items[i]);
      if (name === undefined || !LIST_OPERATORS.has(name)) continue;
      const end = boundaryAfter(items, i + 1);
      const args = commaItems(items.slice(i + 1, end));
      if (!args) continue;
      items = splice(items, { start: i, end }, buildCall(name, args));
      changed = true;
    }

    for (const span of spansBetween(items, isListBoundary).reverse()) {
      const run = items.slice(span.start, span.end);
      if (!run.some(isComma)) continue;
      const listItems = commaItems(run);
      if (listItems) {
        items = splice(items, span, { kind: 'list', items: listItems });
        changed = true;
      }
    }

    return changed ? rebuild(node, items) : node;
  },
};

/**
 * Low-precedence word logic: `not` binds tighter than `and`, which binds
 * tighter than `or` and `xor`.
 *
 * @module normalize/passes/logical-words
 */

import { isPending, type NormalizedNode, type WorkNode } from '../../ast/normalized.js';
import {
  isStatementEnd,
  rebuild,
  spansBetween,
  splice,
  statementKeyword,
  unwrapGroup,
  wordOperator,
} from '../operators.js';
import type { NormalizerPass } from '../pass.js';

function parseWords(items: readonly WorkNode[]): NormalizedNode | undefined {
  let position = 0;

  const negation = (): NormalizedNode | undefined => {
    const item = items[position];
    if (item === undefined) return undefined;
    if (wordOperator(item) === 'not') {
      position++;
      const operand = negation();
      return operand === undefined ? undefined : { kind: 'unary', operator: 'not', operand };
    }
    if (isPending(item)) return undefined;
    position++;
    return unwrapGroup(item);
  };

  const conjunction = (): NormalizedNode | undefined => {
    let left = negation();
    while (left !== undefined && wordOperator(items[position]) === 'and') {
      position++;
      const right = negation();
      left = right === undefined ? undefined : { kind: 'binary', operator: 'and', left, right };
    }
    return left;
  };

  const disjunction = (): NormalizedNode | undefined => {
    let left = conjunction();
    for (;;) {
      const operator = wordOperator(items[position]);
      if (left === undefined || (operator !== 'or' && operator !== 'xor')) break;
      position++;
      const right = conjunction();
      left = right === undefined ? undefined : { kind: 'binary', operator, left, right };
    }
    return left;
  };

  const result = disjunction();
  return result !== undefined && position === items.length ? result : undefined;
}

function isBoundary(node: WorkNode): boolean {
  return statementKeyword(node) !== undefined || isStatementEnd(node);
}

export const logicalWordsPass: NormalizerPass = {
  name: 'LogicalWords',
  tier: 'Low',
  apply(node) {
    if (!isPending(node) || node.type !== 'statement') return node;
    let items: WorkNode[] = node.children;
    let changed = false;
    for (const span of spansBetween(items, isBoundary).reverse()) {
      const run = items.slice(span.start, span.end);
      if (!run.some((item) => wordOperator(item) !== undefined)) continue;
      const parsed = parseWords(run);
      if (parsed) {
        items = splice(items, span, parsed);
        changed = true;
      }
    }
    return changed ? rebuild(node, items) : node;
  },
};

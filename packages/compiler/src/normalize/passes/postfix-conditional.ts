/**
 * Statement modifiers and `return`:
 *
 *   EXPR if COND / EXPR unless COND
 *   return EXPR if COND / return EXPR unless COND
 *   return EXPR
 *
 * @module normalize/passes/postfix-conditional
 */

import { isPending, type NormalizedNode, type WorkNode } from '../../ast/normalized.js';
import { isStatementEnd, statementKeyword } from '../operators.js';
import type { NormalizerPass } from '../pass.js';

function match(items: readonly WorkNode[]): NormalizedNode | undefined {
  const returns = statementKeyword(items[0]) === 'return';
  const rest = returns ? items.slice(1) : items;
  const [body, modifier, condition] = rest;

  if (returns && rest.length === 1 && !isPending(body)) return body;
  if (rest.length !== 3 || isPending(body) || isPending(condition)) return undefined;

  const keyword = statementKeyword(modifier);
  if (keyword !== 'if' && keyword !== 'unless') return undefined;
  return { kind: 'postfixConditional', body, condition, negated: keyword === 'unless', returns };
}

export const postfixConditionalPass: NormalizerPass = {
  name: 'PostfixConditional',
  tier: 'Low',
  apply(node) {
    if (!isPending(node) || node.type !== 'statement') return node;
    return match(node.children.filter((child) => !isStatementEnd(child))) ?? node;
  },
};

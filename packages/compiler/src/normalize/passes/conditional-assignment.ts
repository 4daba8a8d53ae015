/**
 * Assignments to a variable, optionally guarded:
 *
 *   $val OP= V
 *   my $x = V                  (also my @parts = LIST)
 *   COND and $val OP= V        (or: runs when COND is false)
 *   $val OP= V if COND         (unless: runs when COND is false)
 *
 * Together with the sequence pass this covers multi-statement forms such
 * as `$val > 1 and $val -= 1; $val * 2`.
 *
 * @module normalize/passes/conditional-assignment
 */

import {
  isPending,
  type AssignmentOperator,
  type ConditionalAssignmentNode,
  type NormalizedNode,
  type WorkNode,
} from '../../ast/normalized.js';
import {
  ASSIGNMENT_OPERATORS,
  isStatementEnd,
  operatorText,
  statementKeyword,
  wordOperator,
  wordText,
} from '../operators.js';
import type { NormalizerPass } from '../pass.js';

function isAssignmentOperator(text: string | undefined): text is AssignmentOperator {
  return text !== undefined && ASSIGNMENT_OPERATORS.has(text);
}

function assignment(items: readonly WorkNode[]): ConditionalAssignmentNode | undefined {
  const declared = wordText(items[0]) === 'my';
  const rest = declared ? items.slice(1) : items;
  if (rest.length !== 3) return undefined;
  const [target, op, value] = rest;
  const operator = operatorText(op);
  if (isPending(target) || target.kind !== 'symbol' || !isAssignmentOperator(operator) || isPending(value)) {
    return undefined;
  }
  const node: ConditionalAssignmentNode = {
    kind: 'conditionalAssignment',
    target: target.name,
    operator,
    value,
    negated: false,
  };
  if (declared) node.declared = true;
  if (target.list) node.list = true;
  return node;
}

function guarded(base: ConditionalAssignmentNode, condition: NormalizedNode, negated: boolean): NormalizedNode {
  return { ...base, condition, negated };
}

function match(items: readonly WorkNode[]): NormalizedNode | undefined {
  const plain = assignment(items);
  if (plain) return plain;
  if (items.length < 5) return undefined;

  const leading = wordOperator(items[1]);
  const prefixCondition = items[0];
  if ((leading === 'and' || leading === 'or') && !isPending(prefixCondition)) {
    const body = assignment(items.slice(2));
    if (body) return guarded(body, prefixCondition, leading === 'or');
  }

  const keyword = statementKeyword(items[items.length - 2]);
  const suffixCondition = items[items.length - 1];
  if ((keyword === 'if' || keyword === 'unless') && !isPending(suffixCondition)) {
    const body = assignment(items.slice(0, -2));
    if (body) return guarded(body, suffixCondition, keyword === 'unless');
  }
  return undefined;
}

export const conditionalAssignmentPass: NormalizerPass = {
  name: 'ConditionalAssignment',
  tier: 'Low',
  apply(node) {
    if (!isPending(node) || node.type !== 'statement') return node;
    const items = node.children.filter((child) => !isStatementEnd(child));
    return match(items) ?? node;
  },
};

/**
 * Builders shared by the passes that turn a bareword and its arguments
 * into a call.
 *
 * @module normalize/compose
 */

import { repeat, str } from 'tagexpr-runtime';
import type { LiteralNode, NormalizedNode } from '../ast/normalized.js';

/**
 * Functions that parse as named unary operators: without parentheses they
 * take one operand binding tighter than comparison operators.
 */
export const NAMED_UNARY: ReadonlySet<string> = new Set([
  'abs',
  'chr',
  'cos',
  'defined',
  'exp',
  'hex',
  'int',
  'lc',
  'lcfirst',
  'length',
  'log',
  'oct',
  'ord',
  'sin',
  'sqrt',
  'uc',
  'ucfirst',
]);

/** Functions that take a comma-separated list when called without parentheses. */
export const LIST_OPERATORS: ReadonlySet<string> = new Set([
  'atan2',
  'index',
  'join',
  'pack',
  'reverse',
  'split',
  'sprintf',
  'substr',
  'unpack',
]);

/** Barewords that never start a function call. */
export const RESERVED_WORDS: ReadonlySet<string> = new Set([
  'and',
  'cmp',
  'eq',
  'ge',
  'gt',
  'if',
  'le',
  'local',
  'lt',
  'my',
  'ne',
  'not',
  'or',
  'our',
  'return',
  'unless',
  'x',
  'xor',
]);

function isLiteral(node: NormalizedNode): node is LiteralNode {
  return node.kind === 'literal';
}

/** Largest repetition count folded into a literal format. */
const MAX_FOLDED_REPEAT = 64;

function foldableCount(node: NormalizedNode): number | undefined {
  if (node.kind !== 'literal' || typeof node.value !== 'number') return undefined;
  const count = Math.trunc(node.value);
  return Number.isFinite(count) && count >= 0 && count <= MAX_FOLDED_REPEAT ? count : undefined;
}

/**
 * Fold a format argument built only from literals (`"%d " x 3`,
 * `"%s" . "-"`) into one literal. Only the argument itself is inspected;
 * anything else, including a repetition whose count is not a small
 * non-negative number, is left for the runtime.
 */
export function precompose(node: NormalizedNode): NormalizedNode {
  switch (node.kind) {
    case 'concat':
      if (node.parts.every(isLiteral)) {
        return { kind: 'literal', value: node.parts.map((part) => str(part.value)).join('') };
      }
      return node;
    case 'repeat': {
      const count = foldableCount(node.count);
      if (node.value.kind === 'literal' && count !== undefined) {
        return { kind: 'literal', value: repeat(node.value.value, count) };
      }
      return node;
    }
    default:
      return node;
  }
}

export function buildCall(name: string, args: NormalizedNode[]): NormalizedNode {
  if (name === 'sprintf' && args.length > 0) {
    return { kind: 'sprintf', format: precompose(args[0]), args: args.slice(1) };
  }
  return { kind: 'call', name, args };
}

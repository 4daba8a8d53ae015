/**
 * Normalized tree: the closed set of shapes the code generator is written
 * against, plus the pending form raw nodes take while passes run.
 *
 * @module ast/normalized
 */

import type { RawKind, RawNode } from './raw.js';

export type BinaryOperator =
  | '**'
  | '*'
  | '/'
  | '%'
  | '+'
  | '-'
  | '<<'
  | '>>'
  | '<'
  | '>'
  | '<='
  | '>='
  | 'lt'
  | 'gt'
  | 'le'
  | 'ge'
  | '=='
  | '!='
  | '<=>'
  | 'eq'
  | 'ne'
  | 'cmp'
  | '&'
  | '|'
  | '^'
  | '&&'
  | '||'
  | '//'
  | '=~'
  | '!~'
  | 'and'
  | 'or'
  | 'xor';

export type UnaryOperator = '-' | '!' | '~' | 'not';

export type AssignmentOperator =
  | '='
  | '+='
  | '-='
  | '*='
  | '/='
  | '%='
  | '**='
  | '.='
  | 'x='
  | '&='
  | '|='
  | '^='
  | '<<='
  | '>>='
  | '&&='
  | '||='
  | '//=';

export interface LiteralNode {
  kind: 'literal';
  value: number | string;
}

/**
 * A variable: `$val`, a local, or any other name the gate context
 * supplies. `list` marks an array variable (`@parts`).
 */
export interface SymbolNode {
  kind: 'symbol';
  name: string;
  list?: true;
}

/** `$$self{Name}`: a field of the processing state. */
export interface FieldNode {
  kind: 'field';
  name: string;
}

/** `$val[N]`: an element of a list-valued variable. */
export interface ElementNode {
  kind: 'element';
  name: string;
  index: number;
}

export interface RegexNode {
  kind: 'regex';
  pattern: string;
  flags: string;
}

/** `s/PATTERN/REPLACEMENT/FLAGS`. The replacement is kept as written. */
export interface SubstitutionNode {
  kind: 'substitution';
  pattern: string;
  replacement: string;
  flags: string;
}

/** `tr/SEARCH/REPLACEMENT/FLAGS` (also `y///`). Ranges are expanded at run time. */
export interface TransliterationNode {
  kind: 'transliteration';
  search: string;
  replacement: string;
  flags: string;
}

export type EditNode = SubstitutionNode | TransliterationNode;

export interface UnaryNode {
  kind: 'unary';
  operator: UnaryOperator;
  operand: NormalizedNode;
}

export interface BinaryNode {
  kind: 'binary';
  operator: BinaryOperator;
  left: NormalizedNode;
  right: NormalizedNode;
}

/** N-ary string concatenation: `a . b . c` is one node with three parts. */
export interface ConcatNode {
  kind: 'concat';
  parts: NormalizedNode[];
}

export interface RepeatNode {
  kind: 'repeat';
  value: NormalizedNode;
  count: NormalizedNode;
}

export interface TernaryNode {
  kind: 'ternary';
  condition: NormalizedNode;
  whenTrue: NormalizedNode;
  whenFalse: NormalizedNode;
}

/** `X ? N / X : 0`. */
export interface SafeDivisionNode {
  kind: 'safeDivision';
  numerator: NormalizedNode;
  denominator: NormalizedNode;
}

export interface CallNode {
  kind: 'call';
  name: string;
  args: NormalizedNode[];
}

/** Formatted print: `sprintf(FORMAT, LIST)`. */
export interface SprintfNode {
  kind: 'sprintf';
  format: NormalizedNode;
  args: NormalizedNode[];
}

/** `EXPR if COND`, `EXPR unless COND`, `return EXPR if COND`. */
export interface PostfixConditionalNode {
  kind: 'postfixConditional';
  body: NormalizedNode;
  condition: NormalizedNode;
  negated: boolean;
  returns: boolean;
}

/**
 * `$val OP= VALUE`, optionally guarded: `COND and $val -= 4`. `declared`
 * marks a `my` declaration; `list` an array target (`my @parts = ...`).
 */
export interface ConditionalAssignmentNode {
  kind: 'conditionalAssignment';
  target: string;
  operator: AssignmentOperator;
  value: NormalizedNode;
  condition?: NormalizedNode;
  negated: boolean;
  declared?: true;
  list?: true;
}

/** Statements run in order; the last one is the value of the expression. */
export interface SequenceNode {
  kind: 'sequence';
  statements: NormalizedNode[];
  result: NormalizedNode;
}

export interface ListNode {
  kind: 'list';
  items: NormalizedNode[];
}

/** Raw input no pass recognized. The generator always rejects it. */
export interface UnresolvedNode {
  kind: 'unresolved';
  rawKind: RawKind;
  content?: string;
  children: NormalizedNode[];
}

export type NormalizedNode =
  | LiteralNode
  | SymbolNode
  | FieldNode
  | ElementNode
  | RegexNode
  | SubstitutionNode
  | TransliterationNode
  | UnaryNode
  | BinaryNode
  | ConcatNode
  | RepeatNode
  | TernaryNode
  | SafeDivisionNode
  | CallNode
  | SprintfNode
  | PostfixConditionalNode
  | ConditionalAssignmentNode
  | SequenceNode
  | ListNode
  | UnresolvedNode;

export type NormalizedKind = NormalizedNode['kind'];

/**
 * A raw node whose children have been visited but which no pass has
 * rewritten yet. Children may be a mix of pending and normalized nodes.
 */
export interface PendingNode {
  kind: 'pending';
  type: RawKind;
  content?: string;
  children: WorkNode[];
}

export type WorkNode = PendingNode | NormalizedNode;

export function isEdit(node: NormalizedNode): node is EditNode {
  return node.kind === 'substitution' || node.kind === 'transliteration';
}

export function isPending(node: WorkNode): node is PendingNode {
  return node.kind === 'pending';
}

export function isNormalized(node: WorkNode): node is NormalizedNode {
  return node.kind !== 'pending';
}

export function pending(type: RawKind, content: string | undefined, children: WorkNode[]): PendingNode {
  return content === undefined ? { kind: 'pending', type, children } : { kind: 'pending', type, content, children };
}

/** Lift a raw node (and its subtree) into pending form. */
export function fromRaw(raw: RawNode): PendingNode {
  return pending(raw.kind, raw.content, (raw.children ?? []).map(fromRaw));
}

/**
 * Seal a work node: pending remnants become `unresolved` nodes so nothing
 * raw reaches the generator unnoticed.
 */
export function seal(node: WorkNode): NormalizedNode {
  if (!isPending(node)) return node;
  const children = node.children.map(seal);
  return node.content === undefined
    ? { kind: 'unresolved', rawKind: node.type, children }
    : { kind: 'unresolved', rawKind: node.type, content: node.content, children };
}

/**
 * Rebuild a normalized node with every direct operand mapped through `fn`.
 * Returns the same reference when no operand changed.
 */
export function mapOperands(node: NormalizedNode, fn: (child: NormalizedNode) => NormalizedNode): NormalizedNode {
  const each = (items: NormalizedNode[]): NormalizedNode[] | undefined => {
    let changed = false;
    const out = items.map((item) => {
      const next = fn(item);
      if (next !== item) changed = true;
      return next;
    });
    return changed ? out : undefined;
  };

  switch (node.kind) {
    case 'literal':
    case 'symbol':
    case 'field':
    case 'element':
    case 'regex':
    case 'substitution':
    case 'transliteration':
      return node;
    case 'unary': {
      const operand = fn(node.operand);
      return operand === node.operand ? node : { ...node, operand };
    }
    case 'binary': {
      const left = fn(node.left);
      const right = fn(node.right);
      return left === node.left && right === node.right ? node : { ...node, left, right };
    }
    case 'concat': {
      const parts = each(node.parts);
      return parts ? { ...node, parts } : node;
    }
    case 'repeat': {
      const value = fn(node.value);
      const count = fn(node.count);
      return value === node.value && count === node.count ? node : { ...node, value, count };
    }
    case 'ternary': {
      const condition = fn(node.condition);
      const whenTrue = fn(node.whenTrue);
      const whenFalse = fn(node.whenFalse);
      return condition === node.condition && whenTrue === node.whenTrue && whenFalse === node.whenFalse
        ? node
        : { ...node, condition, whenTrue, whenFalse };
    }
    case 'safeDivision': {
      const numerator = fn(node.numerator);
      const denominator = fn(node.denominator);
      return numerator === node.numerator && denominator === node.denominator
        ? node
        : { ...node, numerator, denominator };
    }
    case 'call': {
      const args = each(node.args);
      return args ? { ...node, args } : node;
    }
    case 'sprintf': {
      const format = fn(node.format);
      const args = each(node.args) ?? node.args;
      return format === node.format && args === node.args ? node : { ...node, format, args };
    }
    case 'postfixConditional': {
      const body = fn(node.body);
      const condition = fn(node.condition);
      return body === node.body && condition === node.condition ? node : { ...node, body, condition };
    }
    case 'conditionalAssignment': {
      const value = fn(node.value);
      const condition = node.condition === undefined ? undefined : fn(node.condition);
      if (value === node.value && condition === node.condition) return node;
      return condition === undefined ? { ...node, value } : { ...node, value, condition };
    }
    case 'sequence': {
      const statements = each(node.statements) ?? node.statements;
      const result = fn(node.result);
      return statements === node.statements && result === node.result ? node : { ...node, statements, result };
    }
    case 'list': {
      const items = each(node.items);
      return items ? { ...node, items } : node;
    }
    case 'unresolved': {
      const children = each(node.children);
      return children ? { ...node, children } : node;
    }
  }
}

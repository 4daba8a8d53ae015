/**
 * Operator precedence, token classification and the shared operator-run
 * parser.
 *
 * Precedence numbers follow the perlop table, highest binding first:
 *
 *   terms, named unary with parens     (High tier)
 *   **                          180  right
 *   ! ~ \ unary+ unary-         170  right
 *   =~ !~                       160  left
 *   * / % x                     150  left
 *   + - .                       140  left
 *   << >>                       130  left
 *   named unary operators       120
 *   < > <= >= lt gt le ge       100  chained
 *   == != <=> eq ne cmp          90  non-assoc
 *   &                            80  left
 *   | ^                          70  left
 *   &&                           60  left
 *   || //                        50  left
 *   ?:                           30  right
 *   = += -= *= etc.              20  right
 *   , =>                         10  left
 *   list operators (rightward)    8
 *   not                           5  right
 *   and                           3  left
 *   or xor                        1  left
 *
 * Everything from `**` down to `?:` is the Medium tier; list operators and
 * below are the Low tier.
 *
 * @module normalize/operators
 */

import {
  isPending,
  pending,
  type BinaryOperator,
  type NormalizedNode,
  type PendingNode,
  type WorkNode,
} from '../ast/normalized.js';

export type Associativity = 'left' | 'right' | 'none';

export interface OperatorInfo {
  precedence: number;
  associativity: Associativity;
}

/** Symbolic binary operators the run parser groups, including `.` and `x`. */
export type RunOperator = Exclude<BinaryOperator, 'and' | 'or' | 'xor'> | '.' | 'x';

export const BINARY_OPERATORS: Readonly<Record<RunOperator, OperatorInfo>> = {
  '**': { precedence: 180, associativity: 'right' },
  '=~': { precedence: 160, associativity: 'left' },
  '!~': { precedence: 160, associativity: 'left' },
  '*': { precedence: 150, associativity: 'left' },
  '/': { precedence: 150, associativity: 'left' },
  '%': { precedence: 150, associativity: 'left' },
  x: { precedence: 150, associativity: 'left' },
  '+': { precedence: 140, associativity: 'left' },
  '-': { precedence: 140, associativity: 'left' },
  '.': { precedence: 140, associativity: 'left' },
  '<<': { precedence: 130, associativity: 'left' },
  '>>': { precedence: 130, associativity: 'left' },
  '<': { precedence: 100, associativity: 'left' },
  '>': { precedence: 100, associativity: 'left' },
  '<=': { precedence: 100, associativity: 'left' },
  '>=': { precedence: 100, associativity: 'left' },
  lt: { precedence: 100, associativity: 'left' },
  gt: { precedence: 100, associativity: 'left' },
  le: { precedence: 100, associativity: 'left' },
  ge: { precedence: 100, associativity: 'left' },
  '==': { precedence: 90, associativity: 'none' },
  '!=': { precedence: 90, associativity: 'none' },
  '<=>': { precedence: 90, associativity: 'none' },
  eq: { precedence: 90, associativity: 'none' },
  ne: { precedence: 90, associativity: 'none' },
  cmp: { precedence: 90, associativity: 'none' },
  '&': { precedence: 80, associativity: 'left' },
  '|': { precedence: 70, associativity: 'left' },
  '^': { precedence: 70, associativity: 'left' },
  '&&': { precedence: 60, associativity: 'left' },
  '||': { precedence: 50, associativity: 'left' },
  '//': { precedence: 50, associativity: 'left' },
};

export const UNARY_PRECEDENCE = 170;
export const NAMED_UNARY_PRECEDENCE = 120;

const PREFIX_OPERATORS = new Set(['-', '!', '~', '+']);

export const ASSIGNMENT_OPERATORS: ReadonlySet<string> = new Set([
  '=',
  '+=',
  '-=',
  '*=',
  '/=',
  '%=',
  '**=',
  '.=',
  'x=',
  '&=',
  '|=',
  '^=',
  '<<=',
  '>>=',
  '&&=',
  '||=',
  '//=',
]);

export type WordOperator = 'not' | 'and' | 'or' | 'xor';
export type StatementKeyword = 'if' | 'unless' | 'return';

const WORD_OPERATORS: readonly WordOperator[] = ['not', 'and', 'or', 'xor'];
const STATEMENT_KEYWORDS: readonly StatementKeyword[] = ['if', 'unless', 'return'];

export function isRunOperator(text: string): text is RunOperator {
  return Object.hasOwn(BINARY_OPERATORS, text);
}

/** Text of a pending `operator` token. */
export function operatorText(node: WorkNode | undefined): string | undefined {
  return node !== undefined && isPending(node) && node.type === 'operator' ? node.content : undefined;
}

export function isOperator(node: WorkNode | undefined, ...texts: string[]): boolean {
  const text = operatorText(node);
  return text !== undefined && texts.includes(text);
}

/** Text of a pending bareword. */
export function wordText(node: WorkNode | undefined): string | undefined {
  return node !== undefined && isPending(node) && node.type === 'word' ? node.content : undefined;
}

/** `not`/`and`/`or`/`xor`, whether the parser reported it as an operator or a word. */
export function wordOperator(node: WorkNode | undefined): WordOperator | undefined {
  const text = operatorText(node) ?? wordText(node);
  return WORD_OPERATORS.find((op) => op === text);
}

export function statementKeyword(node: WorkNode | undefined): StatementKeyword | undefined {
  const text = wordText(node);
  return STATEMENT_KEYWORDS.find((keyword) => keyword === text);
}

export function isAssignment(node: WorkNode | undefined): boolean {
  const text = operatorText(node);
  return text !== undefined && ASSIGNMENT_OPERATORS.has(text);
}

export function isStatementEnd(node: WorkNode | undefined): boolean {
  return node !== undefined && isPending(node) && node.type === 'structure' && node.content === ';';
}

export function isComma(node: WorkNode | undefined): boolean {
  return isOperator(node, ',', '=>');
}

/** Boundaries of a list-operator argument list or a comma list. */
export function isListBoundary(node: WorkNode): boolean {
  return wordOperator(node) !== undefined || statementKeyword(node) !== undefined || isStatementEnd(node);
}

/** Boundaries of a `?:` chain: anything binding looser than the conditional operator. */
export function isTernaryBoundary(node: WorkNode): boolean {
  return isListBoundary(node) || isComma(node) || isAssignment(node);
}

/** Boundaries of a symbolic-operator run. */
export function isRunBoundary(node: WorkNode): boolean {
  return isTernaryBoundary(node) || isOperator(node, '?', ':');
}

export interface Span {
  start: number;
  end: number;
}

/** Maximal spans of `items` between boundary tokens. Empty spans are dropped. */
export function spansBetween(items: readonly WorkNode[], isBoundary: (node: WorkNode) => boolean): Span[] {
  const spans: Span[] = [];
  let start = 0;
  for (let i = 0; i <= items.length; i++) {
    if (i === items.length || isBoundary(items[i])) {
      if (i > start) spans.push({ start, end: i });
      start = i + 1;
    }
  }
  return spans;
}

/**
 * Rebuild a pending node with new children. A statement reduced to a
 * single normalized child (ignoring its terminating `;`) becomes that
 * child.
 */
export function rebuild(node: PendingNode, children: WorkNode[]): WorkNode {
  let end = children.length;
  while (end > 0 && isStatementEnd(children[end - 1])) end--;
  const kept = end === children.length ? children : children.slice(0, end);
  if (node.type === 'statement' && kept.length === 1 && !isPending(kept[0])) {
    return kept[0];
  }
  return pending(node.type, node.content, children);
}

/** Replace `items[span.start..span.end)` with one node. */
export function splice(items: readonly WorkNode[], span: Span, replacement: WorkNode): WorkNode[] {
  return [...items.slice(0, span.start), replacement, ...items.slice(span.end)];
}

/** `(EXPR)` used as an operand is EXPR. */
export function unwrapGroup(node: NormalizedNode): NormalizedNode {
  return node.kind === 'list' && node.items.length === 1 ? unwrapGroup(node.items[0]) : node;
}

function makeUnary(operator: string, operand: NormalizedNode): NormalizedNode {
  switch (operator) {
    case '+':
      return operand;
    case '-':
      if (operand.kind === 'literal' && typeof operand.value === 'number') {
        return { kind: 'literal', value: -operand.value };
      }
      return { kind: 'unary', operator: '-', operand };
    case '~':
      return { kind: 'unary', operator: '~', operand };
    default:
      return { kind: 'unary', operator: '!', operand };
  }
}

function combine(operator: RunOperator, left: NormalizedNode, right: NormalizedNode): NormalizedNode {
  switch (operator) {
    case '.': {
      const parts = [
        ...(left.kind === 'concat' ? left.parts : [left]),
        ...(right.kind === 'concat' ? right.parts : [right]),
      ];
      return { kind: 'concat', parts };
    }
    case 'x':
      return { kind: 'repeat', value: left, count: right };
    default:
      return { kind: 'binary', operator, left, right };
  }
}

/**
 * Precedence-climbing parser over a flat run of normalized operands and
 * pending operator tokens. Returns `undefined` when the run is not a single
 * well-formed expression (a pending non-operator item, two adjacent
 * operands, a dangling operator).
 */
export function parseRun(items: readonly WorkNode[]): NormalizedNode | undefined {
  let position = 0;

  const peekBinary = (): RunOperator | undefined => {
    const text = operatorText(items[position]);
    return text !== undefined && isRunOperator(text) ? text : undefined;
  };

  const operand = (): NormalizedNode | undefined => {
    const item = items[position];
    if (item === undefined) return undefined;
    const prefix = operatorText(item);
    if (prefix !== undefined && PREFIX_OPERATORS.has(prefix)) {
      position++;
      const inner = expression(UNARY_PRECEDENCE);
      return inner === undefined ? undefined : makeUnary(prefix, inner);
    }
    if (isPending(item)) return undefined;
    position++;
    return unwrapGroup(item);
  };

  const expression = (minimum: number): NormalizedNode | undefined => {
    let left = operand();
    if (left === undefined) return undefined;
    for (;;) {
      const operator = peekBinary();
      if (operator === undefined) break;
      const info = BINARY_OPERATORS[operator];
      if (info.precedence < minimum) break;
      position++;
      const right = expression(info.associativity === 'right' ? info.precedence : info.precedence + 1);
      if (right === undefined) return undefined;
      left = combine(operator, left, right);
    }
    return left;
  };

  if (items.length === 0) return undefined;
  const result = expression(0);
  return result !== undefined && position === items.length ? result : undefined;
}

/**
 * End (exclusive) of the operand of a named unary operator starting at
 * `start`: everything up to the first separator or operator binding looser
 * than a named unary.
 */
export function namedUnaryOperandEnd(items: readonly WorkNode[], start: number): number {
  let i = start;
  for (; i < items.length; i++) {
    const item = items[i];
    if (isRunBoundary(item)) break;
    const text = operatorText(item);
    if (text !== undefined && isRunOperator(text) && BINARY_OPERATORS[text].precedence < NAMED_UNARY_PRECEDENCE) {
      break;
    }
  }
  return i;
}

/**
 * Recursive-descent translation of normalized expressions into TypeScript
 * expressions over the runtime namespace `rt`.
 *
 * @module codegen/expressions
 */

import {
  isEdit,
  type BinaryNode,
  type BinaryOperator,
  type CallNode,
  type EditNode,
  type NormalizedNode,
  type SprintfNode,
} from '../ast/normalized.js';
import type { ExpressionContext } from '../context.js';
import { UnsupportedConstruct } from '../errors.js';
import { lookupFunction, type RuntimeFunction } from './functions.js';
import { numberLiteral, quote, regexLiteral, replacementText } from './literals.js';

/** Whether a value is consumed as a scalar or spliced into an argument list. */
export type ValueContext = 'scalar' | 'list';

export interface Scope {
  context: ExpressionContext;
  /** Target-language name that `$val` reads. */
  val: string;
  /** Declared locals, keyed by sigil and name (`$x`, `@parts`). */
  locals: ReadonlySet<string>;
}

/** Target-language name of a `my` variable. */
export function localName(name: string, list = false): string {
  return list ? `a_${name}` : `v_${name}`;
}

const IN_PLACE = 'an in-place edit is only supported as a statement';

const NUMERIC_OPERATORS: Partial<Record<BinaryOperator, string>> = {
  '**': 'pow',
  '*': 'mul',
  '/': 'div',
  '%': 'mod',
  '+': 'add',
  '-': 'sub',
  '<<': 'shiftLeft',
  '>>': 'shiftRight',
  '<': 'numLt',
  '>': 'numGt',
  '<=': 'numLe',
  '>=': 'numGe',
  '==': 'numEq',
  '!=': 'numNe',
  '<=>': 'numCmp',
  '&': 'bitAnd',
  '|': 'bitOr',
  '^': 'bitXor',
};

const STRING_OPERATORS: Partial<Record<BinaryOperator, string>> = {
  lt: 'strLt',
  gt: 'strGt',
  le: 'strLe',
  ge: 'strGe',
  eq: 'strEq',
  ne: 'strNe',
  cmp: 'strCmp',
};

const SHORT_CIRCUIT: Partial<Record<BinaryOperator, string>> = {
  '&&': 'and',
  and: 'and',
  '||': 'or',
  or: 'or',
  '//': 'definedOr',
};

export class ExpressionCompiler {
  constructor(private readonly scope: Scope) {}

  compile(node: NormalizedNode, want: ValueContext = 'scalar'): string {
    switch (node.kind) {
      case 'literal':
        return typeof node.value === 'number' ? numberLiteral(node.value) : quote(node.value);

      case 'symbol':
        if (node.list) {
          if (this.scope.locals.has(`@${node.name}`)) return localName(node.name, true);
          throw new UnsupportedConstruct('symbol', `@${node.name} is not a declared list`);
        }
        if (node.name === 'val') return this.scope.val;
        if (this.scope.locals.has(`$${node.name}`)) return localName(node.name);
        return this.fromContext('symbol', `$${node.name}`, `ctx.tag(${quote(node.name)})`);

      case 'field':
        return this.fromContext('field', `$$self{${node.name}}`, `ctx.field(${quote(node.name)})`);

      case 'element': {
        const source =
          node.name === 'val'
            ? this.scope.val
            : this.scope.locals.has(`@${node.name}`)
              ? localName(node.name, true)
              : this.fromContext('element', `$${node.name}[]`, `ctx.tag(${quote(node.name)})`);
        return `rt.element(${source}, ${node.index})`;
      }

      case 'regex':
        throw new UnsupportedConstruct('regex', 'a match pattern is only supported as the right side of =~ or !~');

      case 'substitution':
      case 'transliteration':
        if (!node.flags.includes('r')) throw new UnsupportedConstruct(node.kind, IN_PLACE);
        return this.edit(this.scope.val, node);

      case 'unary': {
        const operand = this.compile(node.operand);
        switch (node.operator) {
          case '-':
            return `rt.neg(${operand})`;
          case '!':
          case 'not':
            return `rt.not(${operand})`;
          default:
            throw new UnsupportedConstruct('unary', `operator '${node.operator}'`);
        }
      }

      case 'binary':
        return this.binary(node);

      case 'concat':
        return `rt.concat([${node.parts.map((part) => this.compile(part)).join(', ')}])`;

      case 'repeat':
        return `rt.repeat(${this.compile(node.value)}, ${this.compile(node.count)})`;

      case 'ternary':
        return `(rt.truthy(${this.compile(node.condition)}) ? ${this.compile(node.whenTrue, want)} : ${this.compile(node.whenFalse, want)})`;

      case 'safeDivision': {
        const denominator = this.compile(node.denominator);
        if (node.numerator.kind === 'literal' && node.numerator.value === 1) {
          return `rt.safeReciprocal(${denominator})`;
        }
        return `rt.safeDivide(${this.compile(node.numerator)}, ${denominator})`;
      }

      case 'call':
        return this.call(node, want);

      case 'sprintf':
        return this.sprintf(node);

      case 'list':
        if (want === 'list') {
          return `[${node.items.map((item) => this.compile(item, 'list')).join(', ')}]`;
        }
        if (node.items.length === 1) return this.compile(node.items[0]);
        throw new UnsupportedConstruct('list', 'a list in scalar context');

      case 'postfixConditional':
      case 'conditionalAssignment':
      case 'sequence':
        throw new UnsupportedConstruct(node.kind, 'only supported as a statement');

      case 'unresolved':
        throw new UnsupportedConstruct(node.rawKind, node.content === undefined ? 'unrecognized input' : `'${node.content}'`);
    }
  }

  /** A read through the gate's evaluation context. */
  private fromContext(construct: string, display: string, read: string): string {
    if (this.scope.context !== 'BooleanGate') {
      throw new UnsupportedConstruct(construct, `${display} is only available to boolean gates`);
    }
    return read;
  }

  /**
   * The edited copy of `source`: `s///` through `rt.substitute`, `tr///`
   * through `rt.transliterate`.
   */
  edit(source: string, node: EditNode): string {
    if (node.kind === 'substitution') {
      const global = node.flags.includes('g');
      const flags = node.flags.replace(/[gr]/g, '');
      const pattern = regexLiteral(node.pattern, flags, global);
      return `rt.substitute(${source}, ${pattern}, ${quote(replacementText(node.replacement))})`;
    }
    const flags = node.flags.replace(/r/g, '');
    if (!/^[cds]*$/.test(flags)) {
      throw new UnsupportedConstruct('transliteration', `flags '${flags}'`);
    }
    return `rt.transliterate(${source}, ${quote(node.search)}, ${quote(node.replacement)}, ${quote(flags)})`;
  }

  private binary(node: BinaryNode): string {
    const { operator } = node;
    if ((operator === '=~' || operator === '!~') && isEdit(node.right)) {
      if (operator === '!~' || !node.right.flags.includes('r')) {
        throw new UnsupportedConstruct(node.right.kind, IN_PLACE);
      }
      return this.edit(this.compile(node.left), node.right);
    }
    if (operator === '=~' || operator === '!~') {
      if (node.right.kind !== 'regex') {
        throw new UnsupportedConstruct('binary', `right side of ${operator} must be a match pattern`);
      }
      const helper = operator === '=~' ? 'match' : 'notMatch';
      return `rt.${helper}(${this.compile(node.left)}, ${regexLiteral(node.right.pattern, node.right.flags)})`;
    }

    const left = this.compile(node.left);
    const right = this.compile(node.right);
    const lazy = SHORT_CIRCUIT[operator];
    if (lazy !== undefined) return `rt.${lazy}(${left}, () => ${right})`;
    if (operator === 'xor') return `rt.xor(${left}, ${right})`;
    const helper = NUMERIC_OPERATORS[operator] ?? STRING_OPERATORS[operator];
    if (helper === undefined) {
      throw new UnsupportedConstruct('binary', `operator '${operator}'`);
    }
    return `rt.${helper}(${left}, ${right})`;
  }

  private call(node: CallNode, want: ValueContext): string {
    const fn = lookupFunction(node.name);
    if (!fn) {
      throw new UnsupportedConstruct('call', `unknown function '${node.name}'`);
    }
    if (node.args.length < fn.minArgs || node.args.length > fn.maxArgs) {
      throw new UnsupportedConstruct('call', `'${node.name}' called with ${node.args.length} argument(s)`);
    }
    const args = node.args.map((arg, i) => this.argument(fn, arg, i));
    if (!fn.returnsList) return `rt.${fn.runtime}(${args.join(', ')})`;
    if (want === 'list') {
      return node.name === 'reverse'
        ? `rt.reverse(rt.flatten([${args.join(', ')}]))`
        : `rt.${fn.runtime}(${args.join(', ')})`;
    }
    return this.scalarOf(node, fn, args);
  }

  /**
   * A list-returning call consumed as a scalar: `unpack` yields its first
   * value and `reverse` reverses the concatenation of its arguments.
   */
  private scalarOf(node: CallNode, fn: RuntimeFunction, args: string[]): string {
    switch (node.name) {
      case 'unpack':
        return `rt.element(rt.${fn.runtime}(${args.join(', ')}), 0)`;
      case 'reverse':
        return `rt.reverse(rt.concat([${args.join(', ')}]))`;
      default:
        throw new UnsupportedConstruct('call', `'${node.name}' in scalar context`);
    }
  }

  private argument(fn: RuntimeFunction, arg: NormalizedNode, index: number): string {
    if (fn.patternArg === index && arg.kind === 'regex') {
      return regexLiteral(arg.pattern, arg.flags);
    }
    const listContext = fn.listArgsFrom !== undefined && index >= fn.listArgsFrom;
    return this.compile(arg, listContext ? 'list' : 'scalar');
  }

  private sprintf(node: SprintfNode): string {
    const format = this.compile(node.format);
    const args = node.args.map((arg) => this.compile(arg, 'list'));
    return `rt.sprintf(${[format, ...args].join(', ')})`;
  }
}

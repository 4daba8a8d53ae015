/**
 * Code generator: normalized tree + context → one exported TypeScript
 * function.
 *
 * Each context has its own calling convention:
 *
 *   ValueTransform  (val: TagValue) => ConvResult
 *   DisplayFormat   (val: TagValue) => string
 *   BooleanGate     (val: TagValue, ctx: EvalContext) => boolean
 *
 * Only the generator's own `UnsupportedConstruct` is returned as a
 * failure. Anything else escaping `generate` is a compiler defect.
 *
 * @module codegen/generator
 */

import {
  isEdit,
  type AssignmentOperator,
  type ConditionalAssignmentNode,
  type EditNode,
  type NormalizedNode,
  type PostfixConditionalNode,
} from '../ast/normalized.js';
import type { ExpressionContext } from '../context.js';
import { UnsupportedConstruct } from '../errors.js';
import { ExpressionCompiler, localName } from './expressions.js';

export type GenerateResult = { ok: true; value: string } | { ok: false; error: UnsupportedConstruct };

export interface GenerateOptions {
  /** Lines placed in a doc comment above the function. */
  doc?: string[];
}

interface Convention {
  params: string;
  returns: string;
  wrap: (expression: string) => string;
  recover: string[];
}

const CONVENTIONS: Record<ExpressionContext, Convention> = {
  ValueTransform: {
    params: 'val: rt.TagValue',
    returns: 'rt.ConvResult',
    wrap: (expression) => `rt.ok(${expression})`,
    recover: ['} catch (error) {', '  return rt.fail(error);', '}'],
  },
  DisplayFormat: {
    params: 'val: rt.TagValue',
    returns: 'string',
    wrap: (expression) => `rt.str(${expression})`,
    recover: ['} catch {', '  return rt.str(val);', '}'],
  },
  BooleanGate: {
    params: 'val: rt.TagValue, ctx: rt.EvalContext',
    returns: 'boolean',
    wrap: (expression) => `rt.truthy(${expression})`,
    recover: ['} catch {', '  return false;', '}'],
  },
};

/** Name of the mutable copy of `val` that assignments write to. */
const WORKING_COPY = 'value';

const UPDATES: Record<AssignmentOperator, (target: string, value: string) => string> = {
  '=': (_, v) => v,
  '+=': (t, v) => `rt.add(${t}, ${v})`,
  '-=': (t, v) => `rt.sub(${t}, ${v})`,
  '*=': (t, v) => `rt.mul(${t}, ${v})`,
  '/=': (t, v) => `rt.div(${t}, ${v})`,
  '%=': (t, v) => `rt.mod(${t}, ${v})`,
  '**=': (t, v) => `rt.pow(${t}, ${v})`,
  '.=': (t, v) => `rt.concat([${t}, ${v}])`,
  'x=': (t, v) => `rt.repeat(${t}, ${v})`,
  '&=': (t, v) => `rt.bitAnd(${t}, ${v})`,
  '|=': (t, v) => `rt.bitOr(${t}, ${v})`,
  '^=': (t, v) => `rt.bitXor(${t}, ${v})`,
  '<<=': (t, v) => `rt.shiftLeft(${t}, ${v})`,
  '>>=': (t, v) => `rt.shiftRight(${t}, ${v})`,
  '&&=': (t, v) => `rt.and(${t}, () => ${v})`,
  '||=': (t, v) => `rt.or(${t}, () => ${v})`,
  '//=': (t, v) => `rt.definedOr(${t}, () => ${v})`,
};

interface InPlaceEdit {
  target: NormalizedNode;
  edit: EditNode;
  condition?: NormalizedNode;
  negated: boolean;
}

/**
 * Statements that edit a variable in place: `s///` or `tr///` on `$_`,
 * `$x =~ s///`, and either guarded by `COND and` / `COND or`.
 */
function inPlaceEdit(node: NormalizedNode): InPlaceEdit | undefined {
  if (isEdit(node) && !node.flags.includes('r')) {
    return { target: { kind: 'symbol', name: 'val' }, edit: node, negated: false };
  }
  if (node.kind !== 'binary') return undefined;
  if (node.operator === '=~' && isEdit(node.right) && !node.right.flags.includes('r')) {
    return { target: node.left, edit: node.right, negated: false };
  }
  const negated = node.operator === 'or' || node.operator === '||';
  if (negated || node.operator === 'and' || node.operator === '&&') {
    const body = inPlaceEdit(node.right);
    if (body && body.condition === undefined) return { ...body, condition: node.left, negated };
  }
  return undefined;
}

function writesVal(target: NormalizedNode): boolean {
  return target.kind === 'symbol' && target.name === 'val' && !target.list;
}

/** Whether any statement writes to `$val`, which then needs a working copy. */
function assigns(node: NormalizedNode): boolean {
  switch (node.kind) {
    case 'conditionalAssignment':
      return node.target === 'val' && !node.list && !node.declared;
    case 'sequence':
      return node.statements.some(assigns) || assigns(node.result);
    case 'postfixConditional':
      return assigns(node.body);
    default: {
      const edit = inPlaceEdit(node);
      return edit !== undefined && writesVal(edit.target);
    }
  }
}

class BodyWriter {
  private readonly lines: string[] = [];
  private readonly expressions: ExpressionCompiler;
  private readonly convention: Convention;
  private readonly locals = new Set<string>();
  private temporaries = 0;
  private depth = 0;

  constructor(
    context: ExpressionContext,
    private readonly val: string,
  ) {
    this.convention = CONVENTIONS[context];
    this.expressions = new ExpressionCompiler({ context, val, locals: this.locals });
  }

  write(root: NormalizedNode): string[] {
    if (this.val === WORKING_COPY) {
      this.line(`let ${WORKING_COPY}: rt.TagValue = val;`);
    }
    this.result(root);
    return this.lines;
  }

  private line(text: string): void {
    this.lines.push(`${'  '.repeat(this.depth)}${text}`);
  }

  /** Locals declared inside a block go out of scope at its end. */
  private block(header: string, body: () => void): void {
    const outer = [...this.locals];
    this.line(`${header} {`);
    this.depth++;
    body();
    this.depth--;
    this.line('}');
    this.locals.clear();
    for (const name of outer) this.locals.add(name);
  }

  private expr(node: NormalizedNode): string {
    return this.expressions.compile(node);
  }

  private test(condition: NormalizedNode, negated: boolean): string {
    const truth = `rt.truthy(${this.expr(condition)})`;
    return negated ? `!${truth}` : truth;
  }

  /** Emit statements that return the value of `node`. */
  private result(node: NormalizedNode): void {
    switch (node.kind) {
      case 'ternary':
        this.block(`if (rt.truthy(${this.expr(node.condition)}))`, () => this.result(node.whenTrue));
        this.result(node.whenFalse);
        return;

      case 'sequence':
        for (const statement of node.statements) this.statement(statement);
        this.result(node.result);
        return;

      case 'conditionalAssignment':
        this.line(`return ${this.convention.wrap(this.assignment(node))};`);
        return;

      case 'postfixConditional':
        this.guardedResult(node);
        return;

      default:
        this.line(`return ${this.convention.wrap(this.expr(node))};`);
    }
  }

  /**
   * `EXPR if COND` as the last statement evaluates to COND when the
   * condition fails (`COND and EXPR`), and likewise for `unless`.
   */
  private guardedResult(node: PostfixConditionalNode): void {
    const temp = `c${++this.temporaries}`;
    this.line(`const ${temp} = ${this.expr(node.condition)};`);
    const truth = node.negated ? `!rt.truthy(${temp})` : `rt.truthy(${temp})`;
    this.block(`if (${truth})`, () => this.result(node.body));
    this.line(`return ${this.convention.wrap(temp)};`);
  }

  private statement(node: NormalizedNode): void {
    switch (node.kind) {
      case 'conditionalAssignment':
        this.assignment(node);
        return;

      case 'postfixConditional':
        if (node.returns) {
          this.block(`if (${this.test(node.condition, node.negated)})`, () => this.result(node.body));
        } else {
          this.block(`if (${this.test(node.condition, node.negated)})`, () => this.statement(node.body));
        }
        return;

      case 'sequence':
        throw new UnsupportedConstruct('sequence', 'nested statement sequence');

      default: {
        const edit = inPlaceEdit(node);
        if (edit) {
          this.applyEdit(edit);
        } else {
          this.line(`${this.expr(node)};`);
        }
      }
    }
  }

  /** Target-language name of a variable a statement may write to. */
  private writable(name: string, list: boolean, construct: string): string {
    if (name === 'val' && !list) return this.val;
    if (this.locals.has(`${list ? '@' : '$'}${name}`)) return localName(name, list);
    throw new UnsupportedConstruct(construct, `assignment to ${list ? '@' : '$'}${name}`);
  }

  /** Emit an assignment; returns the name of the variable written. */
  private assignment(node: ConditionalAssignmentNode): string {
    const list = node.list === true;
    const value = list ? `rt.flatten([${this.expressions.compile(node.value, 'list')}])` : this.expr(node.value);
    const key = `${list ? '@' : '$'}${node.target}`;
    if (node.declared && !this.locals.has(key)) {
      if (node.condition !== undefined || node.operator !== '=' || key === '$val') {
        throw new UnsupportedConstruct('conditionalAssignment', `conditional or compound declaration of ${key}`);
      }
      const name = localName(node.target, list);
      this.line(`let ${name}: rt.TagValue = ${value};`);
      this.locals.add(key);
      return name;
    }
    const target = this.writable(node.target, list, 'conditionalAssignment');
    const update = `${target} = ${UPDATES[node.operator](target, value)};`;
    if (node.condition === undefined) {
      this.line(update);
    } else {
      this.block(`if (${this.test(node.condition, node.negated)})`, () => this.line(update));
    }
    return target;
  }

  private applyEdit(node: InPlaceEdit): void {
    const { target } = node;
    if (target.kind !== 'symbol') {
      throw new UnsupportedConstruct(node.edit.kind, 'an in-place edit of an expression');
    }
    const name = this.writable(target.name, target.list === true, node.edit.kind);
    const update = `${name} = ${this.expressions.edit(name, node.edit)};`;
    if (node.condition === undefined) {
      this.line(update);
    } else {
      this.block(`if (${this.test(node.condition, node.negated)})`, () => this.line(update));
    }
  }
}

/** Render doc comment lines, escaping any comment terminator inside them. */
export function docComment(lines: readonly string[]): string[] {
  if (lines.length === 0) return [];
  return ['/**', ...lines.map((text) => (text === '' ? ' *' : ` * ${text.replace(/\*\//g, '*\\/')}`)), ' */'];
}

/**
 * Generate `export function <functionName>(...)` for a normalized tree.
 * The emitted code refers to the runtime package as the namespace `rt`.
 */
export function generate(
  root: NormalizedNode,
  context: ExpressionContext,
  functionName: string,
  options: GenerateOptions = {},
): GenerateResult {
  const convention = CONVENTIONS[context];
  let body: string[];
  try {
    body = new BodyWriter(context, assigns(root) ? WORKING_COPY : 'val').write(root);
  } catch (error) {
    if (error instanceof UnsupportedConstruct) {
      return { ok: false, error };
    }
    throw error;
  }

  const source = [
    ...docComment(options.doc ?? []),
    `export function ${functionName}(${convention.params}): ${convention.returns} {`,
    '  try {',
    ...body.map((line) => `    ${line}`),
    ...convention.recover.map((line) => `  ${line}`),
    '}',
  ];
  return { ok: true, value: source.join('\n') };
}

/** Signature line of a function in the given context. */
export function signature(context: ExpressionContext, functionName: string): string {
  const convention = CONVENTIONS[context];
  return `export function ${functionName}(${convention.params}): ${convention.returns}`;
}

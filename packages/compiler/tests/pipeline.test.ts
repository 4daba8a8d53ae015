import { describe, it, expect, vi } from 'vitest';
import type { WorkNode } from '../src/ast/normalized.js';
import { instantiate } from '../src/codegen/loader.js';
import { CompilerDefect } from '../src/errors.js';
import { parseCorpus } from '../src/input/corpus.js';
import type { NormalizerPass } from '../src/normalize/pass.js';
import { DEFAULT_PASSES } from '../src/normalize/passes/index.js';
import { compileCorpus, compileExpression } from '../src/pipeline.js';
import { emitModules } from '../src/registry/emit.js';
import { emptyStats } from '../src/registry/stats.js';
import { createLogger } from '../src/utils/logger.js';
import { doc, end, expr, group, num, op, stmt, str, val, word } from './raw.js';

const usage = (tag: string) => ({ module: 'Camera', table: 'Main', tag });

/** A pass that fails on the literal 'boom', raising `failure`. */
function failingPass(failure: () => Error): NormalizerPass {
  return {
    name: 'Failing',
    tier: 'Low',
    apply(node: WorkNode) {
      if (node.kind === 'literal' && node.value === 'boom') throw failure();
      return node;
    },
  };
}

describe('compileCorpus', () => {
  it('should deduplicate, fall back and keep rejected records', () => {
    const corpus = parseCorpus(
      [
        {
          expression_type: 'ValueConv',
          original_text: '$val / 10',
          parsed_ast: expr(val(), op('/'), num('10')),
          usage: usage('Exposure'),
        },
        {
          expression_type: 'ValueConv',
          original_text: '$val/10',
          parsed_ast: expr(val(), op('/'), num('10')),
          usage: usage('Aperture'),
        },
        { expression_type: 'Condition', original_text: '$val ~~ 1', parsed_ast: { kind: 'bogus' } },
        { expression_type: 'Unknown', original_text: 'x', parsed_ast: {} },
      ],
      'corpus.json',
    );
    const sink = vi.fn();
    const result = compileCorpus(corpus, { logger: createLogger('warn', sink) });

    expect(result.functions.map((fn) => fn.outcome).sort()).toEqual(['fallback', 'generated']);
    const scaled = result.functions.find((fn) => fn.outcome === 'generated');
    expect(scaled?.usages).toEqual([usage('Exposure'), usage('Aperture')]);

    const gate = result.functions.find((fn) => fn.outcome === 'fallback');
    expect(gate?.context).toBe('BooleanGate');
    expect(gate?.reason).toBe("Unknown node kind 'bogus' at [2].parsed_ast");

    expect(result.rejected).toEqual([{ index: 3, issues: ['/expression_type: must be equal to one of the allowed values'] }]);
    expect(result.stats.total).toEqual({ attempts: 3, generated: 2, manual: 0, fallback: 1, functions: 2 });

    const lines = sink.mock.calls.map((call) => String(call[0]).split(' {')[0]);
    expect(lines).toEqual(['[tagexpr] WARN Record rejected', '[tagexpr] WARN Expression falls back']);
  });

  it('should compile a format whose repeat count is not a number', () => {
    const corpus = parseCorpus([
      {
        expression_type: 'PrintConv',
        original_text: 'sprintf("%s" x "abc", $val)',
        parsed_ast: expr(word('sprintf'), group(str('"%s"'), op('x'), str('"abc"'), op(','), val())),
      },
      { expression_type: 'ValueConv', original_text: '$val', parsed_ast: expr(val()) },
    ]);
    const result = compileCorpus(corpus);

    expect(result.functions.map((fn) => fn.outcome)).toEqual(['generated', 'generated']);
    const display = result.functions.find((fn) => fn.context === 'DisplayFormat');
    const [module] = emitModules(result);
    expect(display && instantiate(module.contents).displayFormat(display.name)('x')).toBe('x');
  });

  it('should fall back when a pass fails on one entry and keep going', () => {
    const corpus = parseCorpus([
      { expression_type: 'PrintConv', original_text: '"boom"', parsed_ast: expr(str('"boom"')) },
      { expression_type: 'ValueConv', original_text: '$val * 2', parsed_ast: expr(val(), op('*'), num('2')) },
    ]);
    const passes = [...DEFAULT_PASSES, failingPass(() => new Error('cannot rewrite boom'))];
    const result = compileCorpus(corpus, { passes });

    const failed = result.functions.find((fn) => fn.context === 'DisplayFormat');
    expect(failed?.outcome).toBe('fallback');
    expect(failed?.reason).toBe('cannot rewrite boom');
    expect(result.functions.find((fn) => fn.context === 'ValueTransform')?.outcome).toBe('generated');
  });

  it('should abort on a compiler defect raised inside a pass', () => {
    const corpus = parseCorpus([
      { expression_type: 'PrintConv', original_text: '"boom"', parsed_ast: expr(str('"boom"')) },
    ]);
    const passes = [...DEFAULT_PASSES, failingPass(() => new CompilerDefect('broken pass'))];
    expect(() => compileCorpus(corpus, { passes })).toThrow(CompilerDefect);
  });

  it('should produce the same functions in any record order', () => {
    const records = [
      { expression_type: 'ValueConv', original_text: '$val / 10', parsed_ast: expr(val(), op('/'), num('10')) },
      { expression_type: 'PrintConv', original_text: '$val * 2', parsed_ast: expr(val(), op('*'), num('2')) },
      { expression_type: 'Condition', original_text: '$val > 1', parsed_ast: expr(val(), op('>'), num('1')) },
    ];
    const forward = emitModules(compileCorpus(parseCorpus(records)));
    const backward = emitModules(compileCorpus(parseCorpus([...records].reverse())));

    expect(backward.map((file) => file.contents)).toEqual(forward.map((file) => file.contents));
  });
});

describe('compileExpression', () => {
  it('should return the normalized tree with its function', () => {
    const raw = doc(
      stmt(val(), op('<'), num('0'), op('and'), val(), op('='), num('0'), end()),
      stmt(val()),
    );
    const { tree, fn } = compileExpression(raw, 'ValueTransform', '$val < 0 and $val = 0; $val');

    expect(tree?.kind).toBe('sequence');
    expect(fn.outcome).toBe('generated');

    const [module] = emitModules({ functions: [fn], lookup: [], stats: emptyStats() });
    const transform = instantiate(module.contents).valueTransform(fn.name);
    expect(transform(-5)).toEqual({ ok: true, value: 0 });
    expect(transform(5)).toEqual({ ok: true, value: 5 });
  });

  it('should fall back without a tree when normalization fails', () => {
    const passes = [...DEFAULT_PASSES, failingPass(() => new Error('cannot rewrite boom'))];
    const { tree, fn } = compileExpression(expr(str('"boom"')), 'DisplayFormat', '"boom"', { passes });

    expect(tree).toBeUndefined();
    expect(fn.outcome).toBe('fallback');
    expect(fn.reason).toBe('cannot rewrite boom');
  });
});

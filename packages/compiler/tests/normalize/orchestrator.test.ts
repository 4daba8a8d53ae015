import { describe, it, expect, vi } from 'vitest';
import { fromRaw, type NormalizedNode } from '../../src/ast/normalized.js';
import { serializeTree } from '../../src/ast/serialize.js';
import { CompilerDefect, PrecedenceInvariantViolation } from '../../src/errors.js';
import { foldPasses, normalize, Normalizer } from '../../src/normalize/orchestrator.js';
import type { NormalizerPass } from '../../src/normalize/pass.js';
import {
  binaryOperatorsPass,
  DEFAULT_PASSES,
  functionCallPass,
  logicalWordsPass,
  sequencePass,
  termsPass,
  ternaryPass,
} from '../../src/normalize/passes/index.js';
import { createLogger } from '../../src/utils/logger.js';
import { doc, end, expr, group, num, op, stmt, str, sym, val, word } from '../raw.js';

const $val: NormalizedNode = { kind: 'symbol', name: 'val' };

const SAMPLES = [
  expr(val(), op('/'), num('100')),
  expr(word('length'), val(), op('?'), num('1'), op('/'), val(), op(':'), num('0')),
  expr(word('sprintf'), str('"%.2f"'), op(','), val(), op('/'), num('3')),
  expr(str('"a"'), op('.'), str('"b"'), op('.'), str('"c"')),
  expr(val(), op('>'), num('1'), op('and'), val(), op('<'), num('5')),
  doc(
    stmt(val(), op('>'), num('100'), op('and'), val(), op('-='), num('100'), end()),
    stmt(val(), op('*'), num('2')),
  ),
  expr(word('int'), group(val(), op('*'), num('10'))),
];

describe('Normalizer', () => {
  describe('ordering', () => {
    it('should apply passes in tier order', () => {
      expect(new Normalizer().order).toEqual([
        'Terms',
        'Grouping',
        'FunctionCall',
        'SafeDivision',
        'StringOps',
        'BinaryOperators',
        'Ternary',
        'FormattedPrint',
        'LogicalWords',
        'ConditionalAssignment',
        'PostfixConditional',
        'Sequence',
      ]);
    });

    it('should sort passes registered in reverse tier order', () => {
      const byTier = (tier: string): NormalizerPass[] => DEFAULT_PASSES.filter((pass) => pass.tier === tier);
      const shuffled = [...byTier('Low'), ...byTier('Medium'), ...byTier('High')];
      const normalizer = new Normalizer({ passes: shuffled });

      expect(normalizer.order).toEqual(new Normalizer().order);
      for (const sample of SAMPLES) {
        expect(normalizer.normalize(sample)).toEqual(normalize(sample));
      }
    });

    it('should reject a pass registered twice', () => {
      expect(() => new Normalizer({ passes: [termsPass, termsPass] })).toThrow(CompilerDefect);
    });
  });

  describe('precedence', () => {
    it('should wrap only the first operand of a ternary in a named unary call', () => {
      const tree = normalize(expr(word('length'), val(), op('?'), num('1'), op('/'), val(), op(':'), num('0')));
      expect(tree).toEqual({
        kind: 'ternary',
        condition: { kind: 'call', name: 'length', args: [$val] },
        whenTrue: { kind: 'binary', operator: '/', left: { kind: 'literal', value: 1 }, right: $val },
        whenFalse: { kind: 'literal', value: 0 },
      });
    });

    it('should see the safe-division idiom before binary operators group it', () => {
      const raw = expr(val(), op('?'), num('1'), op('/'), val(), op(':'), num('0'));
      expect(normalize(raw).kind).toBe('safeDivision');

      const withoutIdiom = DEFAULT_PASSES.filter((pass) => pass.name !== 'SafeDivision');
      expect(normalize(raw, { passes: withoutIdiom }).kind).toBe('ternary');
    });

    it('should group symbolic operators before word logic', () => {
      const tree = normalize(expr(val(), op('>'), num('1'), op('and'), val(), op('<'), num('5')));
      expect(tree).toEqual({
        kind: 'binary',
        operator: 'and',
        left: { kind: 'binary', operator: '>', left: $val, right: { kind: 'literal', value: 1 } },
        right: { kind: 'binary', operator: '<', left: $val, right: { kind: 'literal', value: 5 } },
      });
    });

    it('should end a list operator argument list at a word operator', () => {
      const tree = normalize(expr(word('sprintf'), str("'%d'"), op(','), val(), op('or'), str("'none'")));
      expect(tree).toEqual({
        kind: 'binary',
        operator: 'or',
        left: { kind: 'sprintf', format: { kind: 'literal', value: '%d' }, args: [$val] },
        right: { kind: 'literal', value: 'none' },
      });
    });

    it('should read a guarded assignment before a statement modifier', () => {
      const tree = normalize(expr(val(), op('+='), num('1'), word('if'), val(), op('<'), num('0')));
      expect(tree.kind).toBe('conditionalAssignment');
    });
  });

  describe('foldPasses', () => {
    it('should throw when a higher-binding pass follows a lower one', () => {
      const node = fromRaw(stmt(val()));
      expect(() => foldPasses(node, [ternaryPass, functionCallPass])).toThrow(PrecedenceInvariantViolation);
    });

    it('should accept passes of non-decreasing tier', () => {
      const node = fromRaw(stmt(val(), op('+'), num('1')));
      expect(() => foldPasses(node, [functionCallPass, binaryOperatorsPass, logicalWordsPass, sequencePass])).not.toThrow();
    });
  });

  describe('idempotence', () => {
    it('should return a normalized tree unchanged', () => {
      for (const sample of SAMPLES) {
        const once = normalize(sample);
        const twice = normalize(once);
        expect(serializeTree(twice)).toBe(serializeTree(once));
      }
    });
  });

  describe('logging', () => {
    it('should report trees with unrecognized nodes at debug level', () => {
      const sink = vi.fn();
      const normalizer = new Normalizer({ logger: createLogger('debug', sink) });
      normalizer.normalize(expr(sym('@list')));

      expect(sink).toHaveBeenCalledTimes(1);
      expect(sink.mock.calls[0][0]).toBe(
        '[tagexpr] DEBUG Normalization left unrecognized nodes {"unresolved":3,"kind":"unresolved"}',
      );
    });
  });
});

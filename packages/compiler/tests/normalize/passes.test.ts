import { describe, it, expect } from 'vitest';
import type { NormalizedNode } from '../../src/ast/normalized.js';
import { precompose } from '../../src/normalize/compose.js';
import { normalize } from '../../src/normalize/orchestrator.js';
import { doc, end, expr, group, num, op, regex, stmt, str, subst, sym, trans, val, word } from '../raw.js';

const $val: NormalizedNode = { kind: 'symbol', name: 'val' };
const lit = (value: number | string): NormalizedNode => ({ kind: 'literal', value });

describe('normalizer passes', () => {
  describe('Terms', () => {
    it('should read numbers in every notation', () => {
      expect(normalize(expr(num('0x1F')))).toEqual(lit(31));
      expect(normalize(expr(num('017')))).toEqual(lit(15));
      expect(normalize(expr(num('1_000')))).toEqual(lit(1000));
      expect(normalize(expr(num('2.5e3')))).toEqual(lit(2500));
    });

    it('should read processing-state fields and list elements', () => {
      expect(normalize(expr(sym('$$self{Make}')))).toEqual({ kind: 'field', name: 'Make' });
      expect(normalize(expr(sym('$val[1]')))).toEqual({ kind: 'element', name: 'val', index: 1 });
    });

    it('should read list variables and the default variable', () => {
      expect(normalize(expr(sym('@parts')))).toEqual({ kind: 'symbol', name: 'parts', list: true });
      expect(normalize(expr(sym('$_')))).toEqual($val);
    });

    it('should read substitutions with any delimiter', () => {
      expect(normalize(expr(subst('s/\\s+$//')))).toEqual({
        kind: 'substitution',
        pattern: '\\s+$',
        replacement: '',
        flags: '',
      });
      expect(normalize(expr(subst('s{a}{b}g')))).toEqual({ kind: 'substitution', pattern: 'a', replacement: 'b', flags: 'g' });
      expect(normalize(expr(subst('s/a\\/b/c/')))).toEqual({
        kind: 'substitution',
        pattern: 'a/b',
        replacement: 'c',
        flags: '',
      });
    });

    it('should read transliterations in both spellings', () => {
      expect(normalize(expr(trans('tr/a-z/A-Z/')))).toEqual({
        kind: 'transliteration',
        search: 'a-z',
        replacement: 'A-Z',
        flags: '',
      });
      expect(normalize(expr(trans('y/ /_/d')))).toEqual({ kind: 'transliteration', search: ' ', replacement: '_', flags: 'd' });
    });

    it('should keep single-quoted strings literal', () => {
      expect(normalize(expr(str("'$val mm'")))).toEqual(lit('$val mm'));
    });

    it('should interpolate scalars in double-quoted strings', () => {
      expect(normalize(expr(str('"$val mm"')))).toEqual({ kind: 'concat', parts: [$val, lit(' mm')] });
    });

    it('should decode escapes in double-quoted strings', () => {
      expect(normalize(expr(str('"a\\tb\\x41"')))).toEqual(lit('a\tbA'));
    });

    it('should read match patterns', () => {
      expect(normalize(expr(val(), op('=~'), regex('/^abc/i')))).toEqual({
        kind: 'binary',
        operator: '=~',
        left: $val,
        right: { kind: 'regex', pattern: '^abc', flags: 'i' },
      });
    });
  });

  describe('Grouping', () => {
    it('should make a comma group a list', () => {
      expect(normalize(expr(group(num('1'), op(','), num('2'))))).toEqual({
        kind: 'list',
        items: [lit(1), lit(2)],
      });
    });

    it('should unwrap a parenthesized operand', () => {
      expect(normalize(expr(group(val(), op('+'), num('1')), op('*'), num('2')))).toEqual({
        kind: 'binary',
        operator: '*',
        left: { kind: 'binary', operator: '+', left: $val, right: lit(1) },
        right: lit(2),
      });
    });
  });

  describe('FunctionCall', () => {
    it('should turn a word and a group into a call', () => {
      expect(normalize(expr(word('int'), group(val(), op('/'), num('2'))))).toEqual({
        kind: 'call',
        name: 'int',
        args: [{ kind: 'binary', operator: '/', left: $val, right: lit(2) }],
      });
    });

    it('should nest named unary operators from the inside out', () => {
      expect(normalize(expr(word('uc'), word('lc'), val()))).toEqual({
        kind: 'call',
        name: 'uc',
        args: [{ kind: 'call', name: 'lc', args: [$val] }],
      });
    });

    it('should give a named unary operator only the operand binding tighter than comparison', () => {
      expect(normalize(expr(word('length'), val(), op('>'), num('3')))).toEqual({
        kind: 'binary',
        operator: '>',
        left: { kind: 'call', name: 'length', args: [$val] },
        right: lit(3),
      });
    });
  });

  describe('SafeDivision', () => {
    it('should recognize the guarded reciprocal', () => {
      expect(normalize(expr(val(), op('?'), num('1'), op('/'), val(), op(':'), num('0')))).toEqual({
        kind: 'safeDivision',
        numerator: lit(1),
        denominator: $val,
      });
    });

    it('should not match when the guard differs from the divisor', () => {
      const tree = normalize(expr(sym('$x'), op('?'), num('1'), op('/'), val(), op(':'), num('0')));
      expect(tree.kind).toBe('ternary');
    });
  });

  describe('StringOps', () => {
    it('should fold a concatenation chain into one node', () => {
      expect(normalize(expr(str('"a"'), op('.'), str('"b"'), op('.'), str('"c"')))).toEqual({
        kind: 'concat',
        parts: [lit('a'), lit('b'), lit('c')],
      });
    });

    it('should recognize repetition', () => {
      expect(normalize(expr(str("'-'"), op('x'), num('3')))).toEqual({
        kind: 'repeat',
        value: lit('-'),
        count: lit(3),
      });
    });
  });

  describe('BinaryOperators', () => {
    it('should respect precedence', () => {
      expect(normalize(expr(val(), op('+'), num('2'), op('*'), num('3')))).toEqual({
        kind: 'binary',
        operator: '+',
        left: $val,
        right: { kind: 'binary', operator: '*', left: lit(2), right: lit(3) },
      });
    });

    it('should group ** to the right', () => {
      expect(normalize(expr(num('2'), op('**'), num('3'), op('**'), num('2')))).toEqual({
        kind: 'binary',
        operator: '**',
        left: lit(2),
        right: { kind: 'binary', operator: '**', left: lit(3), right: lit(2) },
      });
    });

    it('should group - to the left', () => {
      expect(normalize(expr(val(), op('-'), num('1'), op('-'), num('2')))).toEqual({
        kind: 'binary',
        operator: '-',
        left: { kind: 'binary', operator: '-', left: $val, right: lit(1) },
        right: lit(2),
      });
    });

    it('should fold a negated number literal', () => {
      expect(normalize(expr(op('-'), num('5')))).toEqual(lit(-5));
      expect(normalize(expr(op('-'), val()))).toEqual({ kind: 'unary', operator: '-', operand: $val });
    });

    it('should split a mixed concatenation by precedence', () => {
      expect(normalize(expr(val(), op('*'), num('2'), op('.'), str('" mm"')))).toEqual({
        kind: 'concat',
        parts: [{ kind: 'binary', operator: '*', left: $val, right: lit(2) }, lit(' mm')],
      });
    });
  });

  describe('Ternary', () => {
    it('should nest conditionals to the right', () => {
      const tree = normalize(
        expr(
          val(), op('=='), num('1'), op('?'), str("'one'"), op(':'),
          val(), op('=='), num('2'), op('?'), str("'two'"), op(':'), str("'many'"),
        ),
      );
      expect(tree).toEqual({
        kind: 'ternary',
        condition: { kind: 'binary', operator: '==', left: $val, right: lit(1) },
        whenTrue: lit('one'),
        whenFalse: {
          kind: 'ternary',
          condition: { kind: 'binary', operator: '==', left: $val, right: lit(2) },
          whenTrue: lit('two'),
          whenFalse: lit('many'),
        },
      });
    });
  });

  describe('FormattedPrint', () => {
    it('should collect the arguments of a list operator without parentheses', () => {
      expect(normalize(expr(word('sprintf'), str('"%.1f mm"'), op(','), val()))).toEqual({
        kind: 'sprintf',
        format: lit('%.1f mm'),
        args: [$val],
      });
    });

    it('should precompose a literal format', () => {
      const tree = normalize(
        expr(word('sprintf'), group(str('"%d "'), op('x'), num('2'), op(','), val(), op(','), val())),
      );
      expect(tree).toEqual({ kind: 'sprintf', format: lit('%d %d '), args: [$val, $val] });
    });

    it('should leave a format with a non-numeric or oversized repeat count to the runtime', () => {
      const tree = normalize(expr(word('sprintf'), group(str('"%s"'), op('x'), str('"abc"'), op(','), val())));
      expect(tree).toEqual({
        kind: 'sprintf',
        format: { kind: 'repeat', value: lit('%s'), count: lit('abc') },
        args: [$val],
      });

      const huge: NormalizedNode = { kind: 'repeat', value: lit('%s'), count: lit(1e12) };
      const negative: NormalizedNode = { kind: 'repeat', value: lit('%s'), count: lit(-1) };
      expect(precompose(huge)).toBe(huge);
      expect(precompose(negative)).toBe(negative);
      expect(precompose({ kind: 'repeat', value: lit('ab'), count: lit(2.7) })).toEqual(lit('abab'));
    });

    it('should only fold the format argument itself', () => {
      const nested: NormalizedNode = {
        kind: 'concat',
        parts: [{ kind: 'repeat', value: lit('%d '), count: lit(2) }, lit('%s')],
      };
      expect(precompose(nested)).toBe(nested);
      expect(precompose({ kind: 'concat', parts: [lit('%d'), lit(' / '), lit(2)] })).toEqual(lit('%d / 2'));
    });
  });

  describe('LogicalWords', () => {
    it('should bind not tighter than and, and and tighter than or', () => {
      const tree = normalize(expr(op('not'), val(), op('and'), sym('$x'), op('or'), sym('$y')));
      expect(tree).toEqual({
        kind: 'binary',
        operator: 'or',
        left: {
          kind: 'binary',
          operator: 'and',
          left: { kind: 'unary', operator: 'not', operand: $val },
          right: { kind: 'symbol', name: 'x' },
        },
        right: { kind: 'symbol', name: 'y' },
      });
    });
  });

  describe('ConditionalAssignment', () => {
    it('should read an assignment guarded by and', () => {
      const tree = normalize(expr(val(), op('>'), num('100'), op('and'), val(), op('-='), num('100')));
      expect(tree).toEqual({
        kind: 'conditionalAssignment',
        target: 'val',
        operator: '-=',
        value: lit(100),
        condition: { kind: 'binary', operator: '>', left: $val, right: lit(100) },
        negated: false,
      });
    });

    it('should read an assignment with a trailing unless', () => {
      const tree = normalize(expr(val(), op('.='), str("' mm'"), word('unless'), val(), op('eq'), str("''")));
      expect(tree).toEqual({
        kind: 'conditionalAssignment',
        target: 'val',
        operator: '.=',
        value: lit(' mm'),
        condition: { kind: 'binary', operator: 'eq', left: $val, right: lit('') },
        negated: true,
      });
    });
  });

  describe('ConditionalAssignment declarations', () => {
    it('should read a my declaration of a scalar', () => {
      const tree = normalize(expr(word('my'), sym('$x'), op('='), val(), op('*'), num('2')));
      expect(tree).toEqual({
        kind: 'conditionalAssignment',
        target: 'x',
        operator: '=',
        value: { kind: 'binary', operator: '*', left: $val, right: lit(2) },
        negated: false,
        declared: true,
      });
    });

    it('should read a my declaration of a list', () => {
      const tree = normalize(expr(word('my'), sym('@parts'), op('='), word('split'), group(str('" "'), op(','), val())));
      expect(tree).toEqual({
        kind: 'conditionalAssignment',
        target: 'parts',
        operator: '=',
        value: { kind: 'call', name: 'split', args: [lit(' '), $val] },
        negated: false,
        declared: true,
        list: true,
      });
    });

    it('should read an in-place edit as a binding', () => {
      expect(normalize(expr(val(), op('=~'), subst('s/a/b/g')))).toEqual({
        kind: 'binary',
        operator: '=~',
        left: $val,
        right: { kind: 'substitution', pattern: 'a', replacement: 'b', flags: 'g' },
      });
    });
  });

  describe('PostfixConditional', () => {
    it('should read a statement modifier', () => {
      const tree = normalize(expr(val(), op('*'), num('2'), word('if'), val(), op('>'), num('0')));
      expect(tree).toEqual({
        kind: 'postfixConditional',
        body: { kind: 'binary', operator: '*', left: $val, right: lit(2) },
        condition: { kind: 'binary', operator: '>', left: $val, right: lit(0) },
        negated: false,
        returns: false,
      });
    });

    it('should drop a bare return', () => {
      expect(normalize(expr(word('return'), val(), op('+'), num('1')))).toEqual({
        kind: 'binary',
        operator: '+',
        left: $val,
        right: lit(1),
      });
    });
  });

  describe('Sequence', () => {
    it('should make the last statement the result', () => {
      const tree = normalize(
        doc(
          stmt(val(), op('>'), num('100'), op('and'), val(), op('-='), num('100'), end()),
          stmt(val(), op('*'), num('2')),
        ),
      );
      expect(tree).toEqual({
        kind: 'sequence',
        statements: [
          {
            kind: 'conditionalAssignment',
            target: 'val',
            operator: '-=',
            value: lit(100),
            condition: { kind: 'binary', operator: '>', left: $val, right: lit(100) },
            negated: false,
          },
        ],
        result: { kind: 'binary', operator: '*', left: $val, right: lit(2) },
      });
    });
  });

  describe('unrecognized input', () => {
    it('should seal raw remnants as unresolved nodes', () => {
      const tree = normalize(expr(val(), op('~~'), val()));
      expect(tree.kind).toBe('unresolved');
      expect(tree).toMatchObject({ kind: 'unresolved', rawKind: 'document' });
    });
  });
});

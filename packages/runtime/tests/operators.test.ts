import { describe, it, expect } from 'vitest';
import { ConvError } from '../src/errors.js';
import {
  add,
  and,
  bitAnd,
  bitOr,
  bitXor,
  concat,
  definedOr,
  div,
  match,
  mod,
  numCmp,
  numEq,
  or,
  repeat,
  shiftLeft,
  shiftRight,
  strCmp,
  strEq,
} from '../src/operators.js';

function explode(): never {
  throw new Error('right operand should not be evaluated');
}

describe('operators', () => {
  describe('arithmetic', () => {
    it('should numify string operands', () => {
      expect(add('2', '3')).toBe(5);
    });

    it('should raise division_by_zero for a zero divisor', () => {
      expect(() => div(1, 0)).toThrow(ConvError);
      expect(() => div(1, '0')).toThrow('Illegal division by zero');
    });

    it('should give the modulus the sign of the right operand', () => {
      expect(mod(-7, 3)).toBe(2);
      expect(mod(7, -3)).toBe(-2);
      expect(mod(7, 3)).toBe(1);
    });
  });

  describe('comparison', () => {
    it('should compare numerically or as strings depending on the operator', () => {
      expect(numEq('1.0', 1)).toBe(1);
      expect(strEq('1.0', 1)).toBe('');
    });

    it('should order numbers and strings differently', () => {
      expect(numCmp(2, 10)).toBe(-1);
      expect(strCmp('2', '10')).toBe(1);
    });
  });

  describe('logic', () => {
    it('should not evaluate the right operand of a false and', () => {
      expect(and(0, explode)).toBe(0);
      expect(and(1, () => 'yes')).toBe('yes');
    });

    it('should not evaluate the right operand of a true or', () => {
      expect(or('x', explode)).toBe('x');
      expect(or('', () => 'fallback')).toBe('fallback');
    });

    it('should apply defined-or to undef only', () => {
      expect(definedOr(0, explode)).toBe(0);
      expect(definedOr(undefined, () => 5)).toBe(5);
    });
  });

  describe('bitwise', () => {
    it('should mask and shift integers', () => {
      expect(bitAnd(0xff, 0x0f)).toBe(15);
      expect(shiftLeft(1, 4)).toBe(16);
    });

    it('should keep bits above 32 in masks', () => {
      expect(bitAnd(4294967296, 0x100000000)).toBe(4294967296);
      expect(bitOr(0x100000000, 1)).toBe(4294967297);
      expect(bitXor(0x300000000, 0x100000000)).toBe(8589934592);
      expect(shiftRight(0x500000000, 32)).toBe(5);
    });

    it('should treat negative operands as unsigned 64-bit words', () => {
      expect(bitAnd(-1, 0xff)).toBe(255);
      expect(shiftRight(-1, 60)).toBe(15);
    });

    it('should reject infinite operands', () => {
      expect(() => bitAnd(Infinity, 1)).toThrow('Cannot use Inf in a bitwise operation');
    });
  });

  describe('strings', () => {
    it('should concatenate every operand in one fold', () => {
      expect(concat(['a', 1, undefined, 'b'])).toBe('a1b');
    });

    it('should repeat strings', () => {
      expect(repeat('ab', 3)).toBe('ababab');
      expect(repeat('x', -1)).toBe('');
    });

    it('should match regular expressions', () => {
      expect(match('Canon EOS', /^Canon/)).toBe(1);
      expect(match('Nikon', /^Canon/)).toBe('');
    });
  });
});

import { describe, it, expect } from 'vitest';
import {
  hex,
  index,
  join,
  length,
  oct,
  reverse,
  split,
  substitute,
  substr,
  transliterate,
  ucfirst,
} from '../src/strings.js';

describe('strings', () => {
  describe('substr', () => {
    it('should take the rest of the string by default', () => {
      expect(substr('abcdef', 2)).toBe('cdef');
    });

    it('should count negative offsets and lengths from the end', () => {
      expect(substr('abcdef', -2)).toBe('ef');
      expect(substr('abcdef', 1, -2)).toBe('bcd');
    });

    it('should return undef past the end', () => {
      expect(substr('abc', 5)).toBeUndefined();
    });
  });

  describe('length', () => {
    it('should measure stringified values', () => {
      expect(length(12345)).toBe(5);
      expect(length(undefined)).toBeUndefined();
    });
  });

  it('should find substrings with index', () => {
    expect(index('hello', 'l')).toBe(2);
    expect(index('hello', 'z')).toBe(-1);
  });

  it('should parse hex and oct', () => {
    expect(hex('0x1F')).toBe(31);
    expect(oct('0755')).toBe(493);
    expect(oct('0x10')).toBe(16);
    expect(oct('0b101')).toBe(5);
  });

  it('should flatten join arguments', () => {
    expect(join('-', [1, 2], 3)).toBe('1-2-3');
  });

  describe('split', () => {
    it('should split on whitespace runs for a single-space pattern', () => {
      expect(split(' ', '  a b  c ')).toEqual(['a', 'b', 'c']);
    });

    it('should drop trailing empty fields', () => {
      expect(split(/,/, 'a,b,,c,,')).toEqual(['a', 'b', '', 'c']);
    });

    it('should honour a positive limit', () => {
      expect(split(/,/, 'a,b,c', 2)).toEqual(['a', 'b,c']);
    });

    it('should split into characters on an empty pattern', () => {
      expect(split(new RegExp(''), 'abc')).toEqual(['a', 'b', 'c']);
    });
  });

  it('should reverse strings and lists', () => {
    expect(reverse('abc')).toBe('cba');
    expect(reverse([1, 2, 3])).toEqual([3, 2, 1]);
  });

  it('should upper-case the first character', () => {
    expect(ucfirst('canon')).toBe('Canon');
  });

  describe('substitute', () => {
    it('should replace the first match, or every match with the g flag', () => {
      expect(substitute('a-b-c', /-/, '+')).toBe('a+b-c');
      expect(substitute('a-b-c', /-/g, '+')).toBe('a+b+c');
    });

    it('should expand group references', () => {
      expect(substitute(20240131, /(\d{4})(\d{2})(\d{2})/, '$01:$02:$03')).toBe('2024:01:31');
    });
  });

  describe('transliterate', () => {
    it('should map characters and expand ranges', () => {
      expect(transliterate('a.b.c', '.', ':')).toBe('a:b:c');
      expect(transliterate('hello', 'a-y', 'b-z')).toBe('ifmmp');
      expect(transliterate('a-b', '\\-', '_')).toBe('a_b');
    });

    it('should repeat the last replacement character', () => {
      expect(transliterate('abc', 'abc', 'x')).toBe('xxx');
    });

    it('should delete, complement and squeeze', () => {
      expect(transliterate('(K) 12', '()K', '', 'd')).toBe(' 12');
      expect(transliterate('0x1G-fz', 'a-fA-F0-9', '', 'dc')).toBe('01f');
      expect(transliterate('a  b   c', ' ', ' ', 's')).toBe('a b c');
    });

    it('should reject a reversed range', () => {
      expect(() => transliterate('x', 'z-a', '')).toThrow('Invalid range "z-a" in transliteration operator');
    });
  });
});

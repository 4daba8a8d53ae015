import { describe, it, expect } from 'vitest';
import { ConvError } from '../src/errors.js';
import { pack, parseTemplate, unpack } from '../src/binary.js';

describe('binary', () => {
  describe('unpack', () => {
    it('should read big- and little-endian integers', () => {
      expect(unpack('n', '\x01\x02')).toEqual([258]);
      expect(unpack('v', '\x01\x02')).toEqual([513]);
      expect(unpack('N', '\x00\x00\x01\x00')).toEqual([256]);
    });

    it('should read signed and unsigned bytes', () => {
      expect(unpack('C*', '\x01\xff')).toEqual([1, 255]);
      expect(unpack('c*', '\x01\xff')).toEqual([1, -1]);
    });

    it('should strip padding from string fields', () => {
      expect(unpack('A4', 'ab  ')).toEqual(['ab']);
      expect(unpack('Z*', 'ab\0cd')).toEqual(['ab']);
    });

    it('should read hex nybbles in both orders', () => {
      expect(unpack('H*', '\x12\xab')).toEqual(['12ab']);
      expect(unpack('h*', '\x12\xab')).toEqual(['21ba']);
    });

    it('should skip bytes', () => {
      expect(unpack('x2 C', '\x00\x00\x07')).toEqual([7]);
    });

    it('should stop when the data runs out', () => {
      expect(unpack('n2', '\x00\x01')).toEqual([1]);
    });
  });

  describe('pack', () => {
    it('should write integers and padded strings', () => {
      expect(pack('n', 258)).toBe('\x01\x02');
      expect(pack('A3', 'x')).toBe('x  ');
      expect(pack('C*', 1, 2, 3)).toBe('\x01\x02\x03');
    });

    it('should write hex nybbles', () => {
      expect(pack('H4', '12ab')).toBe('\x12\xab');
    });
  });

  it('should reject unknown template letters', () => {
    expect(() => parseTemplate('Q')).toThrow(ConvError);
  });
});

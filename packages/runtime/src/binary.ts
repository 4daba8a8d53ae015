/**
 * `pack` and `unpack` over byte strings (one character per byte, codes
 * 0-255).
 *
 * Supported template letters: `a A Z` (strings), `C c` (8-bit), `n N`
 * (big-endian 16/32-bit), `v V` (little-endian 16/32-bit), `s S l L`
 * (little-endian signed/unsigned 16/32-bit), `H h` (hex nybbles) and `x`
 * (null byte / skip). Each may be followed by a count or `*`.
 *
 * @module binary
 */

import { ConvError } from './errors.js';
import { flatten, integer, str, type TagValue } from './value.js';

interface TemplateItem {
  letter: string;
  /** `undefined` when no count was given, `'*'` for "all remaining". */
  count: number | '*' | undefined;
}

interface IntegerFormat {
  size: 1 | 2 | 4;
  littleEndian: boolean;
  signed: boolean;
}

const INTEGER_FORMATS: Readonly<Record<string, IntegerFormat>> = {
  C: { size: 1, littleEndian: false, signed: false },
  c: { size: 1, littleEndian: false, signed: true },
  n: { size: 2, littleEndian: false, signed: false },
  N: { size: 4, littleEndian: false, signed: false },
  v: { size: 2, littleEndian: true, signed: false },
  V: { size: 4, littleEndian: true, signed: false },
  s: { size: 2, littleEndian: true, signed: true },
  S: { size: 2, littleEndian: true, signed: false },
  l: { size: 4, littleEndian: true, signed: true },
  L: { size: 4, littleEndian: true, signed: false },
};

export function parseTemplate(template: string): TemplateItem[] {
  const items: TemplateItem[] = [];
  const token = /\s*([aAZCcnNvVsSlLHhx])(\*|\d+)?\s*/y;
  let position = 0;
  while (position < template.length) {
    token.lastIndex = position;
    const found = token.exec(template);
    if (!found) {
      if (/^\s*$/.test(template.slice(position))) break;
      throw new ConvError('bad_argument', `Invalid type '${template.charAt(position)}' in pack template "${template}"`);
    }
    const count = found[2] === undefined ? undefined : found[2] === '*' ? '*' : Number(found[2]);
    items.push({ letter: found[1], count });
    position = token.lastIndex;
  }
  return items;
}

function readInteger(data: string, offset: number, format: IntegerFormat): number {
  let value = 0;
  for (let i = 0; i < format.size; i++) {
    const byte = data.charCodeAt(offset + (format.littleEndian ? format.size - 1 - i : i)) & 0xff;
    value = value * 256 + byte;
  }
  const bits = format.size * 8;
  if (format.signed && value >= 2 ** (bits - 1)) {
    value -= 2 ** bits;
  }
  return value;
}

function writeInteger(value: number, format: IntegerFormat): string {
  let remaining = BigInt.asUintN(format.size * 8, BigInt(Math.trunc(value)));
  const bytes: number[] = [];
  for (let i = 0; i < format.size; i++) {
    bytes.push(Number(remaining & 0xffn));
    remaining >>= 8n;
  }
  if (!format.littleEndian) bytes.reverse();
  return String.fromCharCode(...bytes);
}

/**
 * `unpack TEMPLATE, EXPR`. Integer groups stop early when the data runs out.
 */
export function unpack(template: TagValue, data: TagValue): TagValue[] {
  const bytes = str(data);
  const out: TagValue[] = [];
  let offset = 0;

  for (const { letter, count } of parseTemplate(str(template))) {
    const remaining = bytes.length - offset;
    switch (letter) {
      case 'a':
      case 'A':
      case 'Z': {
        const size = count === '*' ? remaining : Math.min(count ?? 1, remaining);
        let field = bytes.slice(offset, offset + size);
        offset += size;
        if (letter === 'A') field = field.replace(/[\0 \t\n\r]+$/, '');
        if (letter === 'Z') {
          const nul = field.indexOf('\0');
          if (nul >= 0) field = field.slice(0, nul);
        }
        out.push(field);
        break;
      }
      case 'H':
      case 'h': {
        const nybbles = count === '*' ? remaining * 2 : Math.min(count ?? 1, remaining * 2);
        const size = Math.ceil(nybbles / 2);
        let digits = '';
        for (let i = 0; i < size; i++) {
          const byte = bytes.charCodeAt(offset + i) & 0xff;
          const high = (byte >> 4).toString(16);
          const low = (byte & 0x0f).toString(16);
          digits += letter === 'H' ? high + low : low + high;
        }
        offset += size;
        out.push(digits.slice(0, nybbles));
        break;
      }
      case 'x': {
        const size = count === '*' ? remaining : (count ?? 1);
        if (size > remaining) {
          throw new ConvError('bad_argument', "'x' outside of string in unpack");
        }
        offset += size;
        break;
      }
      default: {
        const format = INTEGER_FORMATS[letter];
        const available = Math.floor(remaining / format.size);
        const wanted = count === '*' ? available : Math.min(count ?? 1, available);
        for (let i = 0; i < wanted; i++) {
          out.push(readInteger(bytes, offset, format));
          offset += format.size;
        }
      }
    }
  }
  return out;
}

/**
 * `pack TEMPLATE, LIST`. Missing arguments pack as empty strings or zeros.
 */
export function pack(template: TagValue, ...args: TagValue[]): string {
  const values = flatten(args);
  let next = 0;
  const take = (): TagValue => (next < values.length ? values[next++] : undefined);
  let out = '';

  for (const { letter, count } of parseTemplate(str(template))) {
    switch (letter) {
      case 'a':
      case 'A':
      case 'Z': {
        const field = str(take());
        const fill = letter === 'A' ? ' ' : '\0';
        if (count === '*') {
          out += letter === 'Z' ? `${field}\0` : field;
          break;
        }
        const size = count ?? 1;
        const body = letter === 'Z' ? field.slice(0, Math.max(0, size - 1)) : field.slice(0, size);
        out += body + fill.repeat(size - body.length);
        break;
      }
      case 'H':
      case 'h': {
        const digits = str(take());
        const nybbles = count === '*' ? digits.length : (count ?? 1);
        for (let i = 0; i < nybbles; i += 2) {
          const first = parseInt(digits.charAt(i) || '0', 16) || 0;
          const second = i + 1 < nybbles ? parseInt(digits.charAt(i + 1) || '0', 16) || 0 : 0;
          out += String.fromCharCode(letter === 'H' ? (first << 4) | second : (second << 4) | first);
        }
        break;
      }
      case 'x':
        out += '\0'.repeat(count === '*' ? 0 : (count ?? 1));
        break;
      default: {
        const format = INTEGER_FORMATS[letter];
        const times = count === '*' ? values.length - next : (count ?? 1);
        for (let i = 0; i < times; i++) {
          const value = take();
          out += writeInteger(value === undefined ? 0 : integer(value), format);
        }
      }
    }
  }
  return out;
}

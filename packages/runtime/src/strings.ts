/**
 * String built-ins.
 *
 * @module strings
 */

import { ConvError } from './errors.js';
import { flatten, integer, str, type TagValue } from './value.js';

export function length(value: TagValue): TagValue {
  if (value === undefined) return undefined;
  return str(value).length;
}

/**
 * `substr EXPR, OFFSET, LENGTH`. Negative offsets count from the end and a
 * negative length leaves that many characters off the end.
 */
export function substr(value: TagValue, offset: TagValue, count?: TagValue): TagValue {
  const s = str(value);
  let start = integer(offset);
  if (start < 0) start = Math.max(0, s.length + start);
  if (start > s.length) return undefined;
  if (count === undefined) return s.slice(start);
  const n = integer(count);
  const end = n < 0 ? s.length + n : start + n;
  return end <= start ? '' : s.slice(start, end);
}

/** `index STR, SUBSTR, POSITION`: -1 when not found. */
export function index(value: TagValue, needle: TagValue, position?: TagValue): number {
  const from = position === undefined ? 0 : Math.max(0, integer(position));
  return str(value).indexOf(str(needle), from);
}

export function uc(value: TagValue): string {
  return str(value).toUpperCase();
}

export function lc(value: TagValue): string {
  return str(value).toLowerCase();
}

export function ucfirst(value: TagValue): string {
  const s = str(value);
  return s.charAt(0).toUpperCase() + s.slice(1);
}

export function lcfirst(value: TagValue): string {
  const s = str(value);
  return s.charAt(0).toLowerCase() + s.slice(1);
}

export function ord(value: TagValue): number {
  const s = str(value);
  return s === '' ? 0 : (s.codePointAt(0) ?? 0);
}

export function chr(value: TagValue): string {
  const code = integer(value);
  if (code < 0 || code > 0x10ffff) return '�';
  return String.fromCodePoint(code);
}

/** `hex`: parse a hexadecimal string, with or without a `0x` prefix. */
export function hex(value: TagValue): number {
  const digits = str(value).trim().replace(/^0[xX]/, '').replace(/_/g, '');
  const match = /^[0-9a-fA-F]*/.exec(digits);
  return match && match[0] !== '' ? parseInt(match[0], 16) : 0;
}

/**
 * `oct`: parse an octal string, or hex/binary when prefixed with `0x`/`0b`.
 */
export function oct(value: TagValue): number {
  const s = str(value).trim().replace(/_/g, '');
  if (/^0?[xX]/.test(s)) return hex(s.replace(/^0?[xX]/, ''));
  if (/^0?[bB]/.test(s)) {
    const match = /^[01]*/.exec(s.replace(/^0?[bB]/, ''));
    return match && match[0] !== '' ? parseInt(match[0], 2) : 0;
  }
  const match = /^[0-7]*/.exec(s.replace(/^0?[oO]/, ''));
  return match && match[0] !== '' ? parseInt(match[0], 8) : 0;
}

/** `join EXPR, LIST`: list arguments are flattened first. */
export function join(separator: TagValue, ...items: TagValue[]): string {
  return flatten(items).map(str).join(str(separator));
}

/**
 * `split /PATTERN/, EXPR, LIMIT`. A single-space string pattern splits on
 * runs of whitespace after trimming leading whitespace. Trailing empty
 * fields are removed unless a negative limit is given.
 */
export function split(pattern: RegExp | TagValue, value: TagValue, limit?: TagValue): TagValue[] {
  let s = str(value);
  let separator: RegExp;
  if (pattern instanceof RegExp) {
    separator = new RegExp(pattern.source, pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`);
  } else if (str(pattern) === ' ') {
    s = s.replace(/^\s+/, '');
    separator = /\s+/g;
  } else {
    separator = new RegExp(escapeRegExp(str(pattern)), 'g');
  }
  const max = limit === undefined ? 0 : integer(limit);
  const fields: string[] = [];
  let last = 0;
  separator.lastIndex = 0;
  let found: RegExpExecArray | null;
  while ((found = separator.exec(s)) !== null) {
    if (max > 0 && fields.length === max - 1) break;
    if (found[0] === '') {
      if (found.index >= s.length) break;
      if (found.index === 0) {
        separator.lastIndex++;
        continue;
      }
    }
    fields.push(s.slice(last, found.index));
    fields.push(...found.slice(1).map((g) => g ?? ''));
    last = found.index + found[0].length;
    if (found[0] === '') separator.lastIndex++;
  }
  fields.push(s.slice(last));
  if (max === 0) {
    while (fields.length > 0 && fields[fields.length - 1] === '') {
      fields.pop();
    }
  }
  return fields;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** `reverse`: reverses a list, or the characters of a scalar. */
export function reverse(value: TagValue): TagValue {
  if (Array.isArray(value)) return [...value].reverse();
  return [...str(value)].reverse().join('');
}

/**
 * `s///`: replace the first match of `pattern`, or every match when the
 * pattern carries the `g` flag.
 */
export function substitute(value: TagValue, pattern: RegExp, replacement: string): string {
  pattern.lastIndex = 0;
  return str(value).replace(pattern, replacement);
}

const TR_ESCAPES: Readonly<Record<string, string>> = { n: '\n', t: '\t', r: '\r', f: '\f', e: '\x1b', '0': '\0' };

/** Expand a `tr` character list: `a-z` ranges and backslash escapes. */
function expandCharacters(list: string): string[] {
  const chars = Array.from(list);
  const out: string[] = [];
  let i = 0;
  const read = (): string => {
    const ch = chars[i++];
    if (ch === '\\' && i < chars.length) {
      const next = chars[i++];
      return TR_ESCAPES[next] ?? next;
    }
    return ch;
  };
  while (i < chars.length) {
    const first = read();
    if (chars[i] === '-' && i + 1 < chars.length) {
      i++;
      const last = read();
      const from = first.codePointAt(0) ?? 0;
      const to = last.codePointAt(0) ?? 0;
      if (to < from) {
        throw new ConvError('bad_argument', `Invalid range "${first}-${last}" in transliteration operator`);
      }
      for (let code = from; code <= to; code++) out.push(String.fromCodePoint(code));
    } else {
      out.push(first);
    }
  }
  return out;
}

/**
 * `tr/SEARCH/REPLACEMENT/FLAGS`. A short replacement list repeats its last
 * character; an empty one leaves matched characters as they are.
 *
 *   c  complement the search list
 *   d  delete matched characters that have no replacement
 *   s  squeeze runs of the same replaced character
 */
export function transliterate(value: TagValue, search: string, replacement: string, flags = ''): string {
  const from = expandCharacters(search);
  const complement = flags.includes('c');
  const remove = flags.includes('d');
  const squeeze = flags.includes('s');
  let to = expandCharacters(replacement);
  if (to.length === 0 && !remove && !complement) to = from;

  let out = '';
  let previous: string | undefined;
  for (const ch of str(value)) {
    const at = from.indexOf(ch);
    if (complement ? at >= 0 : at < 0) {
      out += ch;
      previous = undefined;
      continue;
    }
    let mapped: string | undefined;
    if (complement) {
      mapped = remove ? undefined : to.length > 0 ? to[to.length - 1] : ch;
    } else if (at < to.length) {
      mapped = to[at];
    } else {
      mapped = remove ? undefined : to[to.length - 1];
    }
    if (mapped === undefined || (squeeze && mapped === previous)) continue;
    out += mapped;
    previous = mapped;
  }
  return out;
}

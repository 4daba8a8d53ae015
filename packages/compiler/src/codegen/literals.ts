/**
 * Target-language literals: strings, numbers and regular expressions.
 *
 * @module codegen/literals
 */

import { UnsupportedConstruct } from '../errors.js';

export function quote(text: string): string {
  return `'${text.replace(/[\\'\n\r\t\u2028\u2029]/g, (ch) => {
    switch (ch) {
      case '\n':
        return '\\n';
      case '\r':
        return '\\r';
      case '\t':
        return '\\t';
      case '\u2028':
        return '\\u2028';
      case '\u2029':
        return '\\u2029';
      default:
        return `\\${ch}`;
    }
  })}'`;
}

export function numberLiteral(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (!Number.isFinite(value)) return value > 0 ? 'Infinity' : '-Infinity';
  return Object.is(value, -0) ? '-0' : String(value);
}

/** Characters at `index` preceded by an even number of backslashes are unescaped. */
function isEscaped(text: string, index: number): boolean {
  let slashes = 0;
  for (let i = index - 1; i >= 0 && text.charAt(i) === '\\'; i--) slashes++;
  return slashes % 2 === 1;
}

/** `/x` mode: drop unescaped whitespace and comments outside character classes. */
function stripExtended(pattern: string): string {
  let out = '';
  let inClass = false;
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern.charAt(i);
    const escaped = isEscaped(pattern, i);
    if (!escaped && ch === '[') inClass = true;
    else if (!escaped && ch === ']') inClass = false;
    if (!inClass && !escaped) {
      if (/\s/.test(ch)) continue;
      if (ch === '#') {
        while (i < pattern.length && pattern.charAt(i) !== '\n') i++;
        continue;
      }
    }
    out += ch;
  }
  return out;
}

/**
 * Translate a match pattern into a RegExp literal. The result is compiled
 * once here so an invalid pattern is rejected at generation time. `global`
 * keeps the `g` flag, which only substitutions use.
 */
export function regexLiteral(pattern: string, flags: string, global = false): string {
  let source = pattern;
  let targetFlags = global ? 'g' : '';
  for (const flag of flags) {
    switch (flag) {
      case 'i':
      case 'm':
      case 's':
        targetFlags += flag;
        break;
      case 'x':
        source = stripExtended(source);
        break;
      case 'g':
      case 'o':
        break;
      default:
        throw new UnsupportedConstruct('regex', `flag '${flag}'`);
    }
  }

  for (let i = 0; i < source.length; i++) {
    if ((source.charAt(i) === '$' || source.charAt(i) === '@') && !isEscaped(source, i) && /[\w{]/.test(source.charAt(i + 1))) {
      throw new UnsupportedConstruct('regex', 'interpolated variable');
    }
  }
  source = source.replace(/\\A/g, '^').replace(/\\[zZ]/g, '$');

  let compiled: RegExp;
  try {
    compiled = new RegExp(source, targetFlags);
  } catch (error) {
    throw new UnsupportedConstruct('regex', error instanceof Error ? error.message : String(error));
  }
  return `/${compiled.source}/${compiled.flags}`;
}

const REPLACEMENT_ESCAPES: Readonly<Record<string, string>> = { n: '\n', t: '\t', r: '\r', f: '\f', e: '\x1b', '0': '\0' };

/**
 * Translate the replacement part of `s///` into a `String.prototype.replace`
 * replacement. Group references (`$1`, `${1}`, `$&`) are kept and any other
 * `$` is doubled; backslash escapes are resolved. Interpolated variables
 * are rejected.
 */
export function replacementText(replacement: string): string {
  let out = '';
  for (let i = 0; i < replacement.length; i++) {
    const ch = replacement.charAt(i);
    if (ch === '\\' && i + 1 < replacement.length) {
      const next = replacement.charAt(++i);
      const text = REPLACEMENT_ESCAPES[next] ?? next;
      out += text === '$' ? '$$' : text;
      continue;
    }
    if (ch !== '$') {
      out += ch;
      continue;
    }
    const group = /^\$(?:(\d+)|\{(\d+)\}|(&))/.exec(replacement.slice(i));
    if (group) {
      const index = group[1] ?? group[2];
      out += index === undefined ? '$&' : `$${index.padStart(2, '0')}`;
      i += group[0].length - 1;
    } else if (/[\w{]/.test(replacement.charAt(i + 1))) {
      throw new UnsupportedConstruct('substitution', 'interpolated variable in the replacement');
    } else {
      out += '$$';
    }
  }
  return out;
}

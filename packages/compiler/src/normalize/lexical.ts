/**
 * Token-text readers for leaf terms: variables, numbers, quoted strings,
 * match patterns and the `s///` and `tr///` edits.
 *
 * @module normalize/lexical
 */

import type { NormalizedNode, RegexNode, SubstitutionNode, TransliterationNode } from '../ast/normalized.js';

const SCALAR = /^\$([A-Za-z_]\w*)$/;
const ARRAY = /^@([A-Za-z_]\w*)$/;
const ELEMENT = /^\$([A-Za-z_]\w*)\[\s*(-?\d+)\s*\]$/;
const SELF_FIELD = /^\$(?:\$self|self->)\{\s*(?:'([^']*)'|"([^"]*)"|(\w+))\s*\}$/;

/**
 * `$val`, `$name`, `@name`, `$val[N]`, `$$self{Name}` (also
 * `$self->{Name}`). The default variable `$_` reads `$val`.
 */
export function readSymbol(content: string): NormalizedNode | undefined {
  const text = content.trim();
  if (text === '$_') return { kind: 'symbol', name: 'val' };
  const array = ARRAY.exec(text);
  if (array) {
    return { kind: 'symbol', name: array[1], list: true };
  }
  const field = SELF_FIELD.exec(text);
  if (field) {
    return { kind: 'field', name: field[1] ?? field[2] ?? field[3] };
  }
  const element = ELEMENT.exec(text);
  if (element) {
    return { kind: 'element', name: element[1], index: Number(element[2]) };
  }
  const scalar = SCALAR.exec(text);
  if (scalar) {
    return { kind: 'symbol', name: scalar[1] };
  }
  return undefined;
}

/** Decimal, float, exponent, `0x` hex, `0b` binary and leading-zero octal. */
export function readNumber(content: string): number | undefined {
  const text = content.trim().replace(/_/g, '');
  const negative = text.startsWith('-');
  const body = negative || text.startsWith('+') ? text.slice(1) : text;
  let value: number;
  if (/^0[xX][0-9a-fA-F]+$/.test(body)) {
    value = parseInt(body.slice(2), 16);
  } else if (/^0[bB][01]+$/.test(body)) {
    value = parseInt(body.slice(2), 2);
  } else if (/^0[0-7]+$/.test(body)) {
    value = parseInt(body.slice(1), 8);
  } else if (/^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/.test(body)) {
    value = Number(body);
  } else {
    return undefined;
  }
  return negative ? -value : value;
}

const CLOSING: Readonly<Record<string, string>> = { '{': '}', '(': ')', '[': ']', '<': '>' };

interface Quoted {
  body: string;
  interpolate: boolean;
  delimiter: string;
}

function splitQuoted(content: string): Quoted | undefined {
  const text = content.trim();
  let interpolate: boolean;
  let rest: string;
  if (text.startsWith('qq')) {
    interpolate = true;
    rest = text.slice(2).trimStart();
  } else if (text.startsWith('q') && text.length > 1 && !/\w/.test(text.charAt(1))) {
    interpolate = false;
    rest = text.slice(1).trimStart();
  } else if (text.startsWith('"')) {
    interpolate = true;
    rest = text;
  } else if (text.startsWith("'")) {
    interpolate = false;
    rest = text;
  } else {
    return undefined;
  }
  const open = rest.charAt(0);
  const close = CLOSING[open] ?? open;
  if (rest.length < 2 || rest.charAt(rest.length - 1) !== close) return undefined;
  return { body: rest.slice(1, -1), interpolate, delimiter: close };
}

function unescapeSingle(body: string, delimiter: string): string {
  return body.replace(/\\(.)/gs, (whole: string, ch: string) => (ch === '\\' || ch === delimiter ? ch : whole));
}

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  n: '\n',
  t: '\t',
  r: '\r',
  f: '\f',
  a: '\x07',
  e: '\x1b',
  '0': '\0',
};

/**
 * Read a quoted string. Double-quoted forms interpolate scalars, which
 * yields a `concat`; everything else is a `literal`.
 */
export function readString(content: string): NormalizedNode | undefined {
  const quoted = splitQuoted(content);
  if (!quoted) return undefined;
  if (!quoted.interpolate) {
    return { kind: 'literal', value: unescapeSingle(quoted.body, quoted.delimiter) };
  }

  const parts: NormalizedNode[] = [];
  let text = '';
  const flush = (): void => {
    if (text !== '') parts.push({ kind: 'literal', value: text });
    text = '';
  };

  const body = quoted.body;
  let i = 0;
  while (i < body.length) {
    const ch = body.charAt(i);
    if (ch === '\\' && i + 1 < body.length) {
      const next = body.charAt(i + 1);
      const hex = /^x(?:\{([0-9a-fA-F]+)\}|([0-9a-fA-F]{1,2}))/.exec(body.slice(i + 1));
      if (hex) {
        text += String.fromCodePoint(parseInt(hex[1] ?? hex[2], 16));
        i += 1 + hex[0].length;
      } else {
        text += SIMPLE_ESCAPES[next] ?? next;
        i += 2;
      }
      continue;
    }
    if (ch === '$') {
      const rest = body.slice(i);
      const variable = /^\$\$self\{\w+\}|^\$\{\w+\}|^\$[A-Za-z_]\w*(?:\[-?\d+\])?/.exec(rest);
      if (variable) {
        const name = variable[0].replace(/^\$\{(\w+)\}$/, '$$$1');
        const node = readSymbol(name);
        if (node) {
          flush();
          parts.push(node);
          i += variable[0].length;
          continue;
        }
      }
    }
    text += ch;
    i++;
  }
  flush();

  if (parts.length === 0) return { kind: 'literal', value: '' };
  if (parts.length === 1 && parts[0].kind === 'literal') return parts[0];
  return { kind: 'concat', parts };
}

/** `/pattern/flags`, `m/pattern/flags`, `m{pattern}flags`. */
export function readRegex(content: string): RegexNode | undefined {
  const text = content.trim();
  const rest = text.startsWith('m') ? text.slice(1).trimStart() : text;
  const open = rest.charAt(0);
  if (open === '' || /[\w\s]/.test(open)) return undefined;
  const close = CLOSING[open] ?? open;
  const end = rest.lastIndexOf(close);
  if (end <= 0) return undefined;
  const flags = rest.slice(end + 1);
  if (!/^[a-z]*$/.test(flags)) return undefined;
  let pattern = rest.slice(1, end);
  if (close === '/') pattern = pattern.replace(/\\\//g, '/');
  return { kind: 'regex', pattern, flags };
}

interface Sections {
  sections: string[];
  delimiter: string;
  flags: string;
}

/**
 * Split the body of a quote-like operator into `count` delimited sections
 * and trailing flags: `/a/b/g`, `#a#b#`, `{a}{b}g`, `{a} {b}`.
 */
function readSections(text: string, count: number): Sections | undefined {
  const sections: string[] = [];
  let open = text.charAt(0);
  let close = CLOSING[open] ?? open;
  let start = 0;
  for (;;) {
    if (open === '' || /[\w\s]/.test(open)) return undefined;
    let depth = 0;
    let i = start + 1;
    for (; i < text.length; i++) {
      const ch = text.charAt(i);
      if (ch === '\\') {
        i++;
      } else if (ch === close && depth === 0) {
        break;
      } else if (ch === close) {
        depth--;
      } else if (ch === open && close !== open) {
        depth++;
      }
    }
    if (i >= text.length) return undefined;
    sections.push(text.slice(start + 1, i));
    if (sections.length === count) {
      const flags = text.slice(i + 1);
      return /^[a-z]*$/.test(flags) ? { sections, delimiter: close, flags } : undefined;
    }
    if (close === open) {
      start = i;
    } else {
      start = i + 1;
      while (/\s/.test(text.charAt(start))) start++;
      open = text.charAt(start);
      close = CLOSING[open] ?? open;
    }
  }
}

function quoteLike(content: string, operators: readonly string[]): string | undefined {
  const text = content.trim();
  for (const operator of operators) {
    if (text.startsWith(operator) && !/\w/.test(text.charAt(operator.length))) {
      return text.slice(operator.length).trimStart();
    }
  }
  return undefined;
}

/** `s/pattern/replacement/flags`, `s{pattern}{replacement}flags`. */
export function readSubstitution(content: string): SubstitutionNode | undefined {
  const body = quoteLike(content, ['s']);
  const read = body === undefined ? undefined : readSections(body, 2);
  if (!read) return undefined;
  const [pattern, replacement] = read.sections;
  return {
    kind: 'substitution',
    pattern: read.delimiter === '/' ? pattern.replace(/\\\//g, '/') : pattern,
    replacement,
    flags: read.flags,
  };
}

/** `tr/search/replacement/flags`, or the same with `y`. */
export function readTransliteration(content: string): TransliterationNode | undefined {
  const body = quoteLike(content, ['tr', 'y']);
  const read = body === undefined ? undefined : readSections(body, 2);
  if (!read) return undefined;
  const [search, replacement] = read.sections;
  return { kind: 'transliteration', search, replacement, flags: read.flags };
}

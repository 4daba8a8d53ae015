/**
 * `sprintf` with source-language directive semantics.
 *
 * Supports the flags `- + space 0 #`, `*` widths and precisions, size
 * modifiers (ignored) and the conversions `c s d i u o x X e E f F g G b B`.
 * Unknown directives are copied to the output unchanged.
 *
 * @module sprintf
 */

import { flatten, num, str, type TagValue } from './value.js';

const DIRECTIVE = /%([-+ 0#]*)(\*|\d+)?(?:\.(\*|\d*))?(?:hh|h|ll|l|q|L|V)?([a-zA-Z%])/g;

interface Spec {
  left: boolean;
  plus: boolean;
  space: boolean;
  zero: boolean;
  alt: boolean;
  width: number;
  precision: number | undefined;
}

export function sprintf(format: TagValue, ...args: TagValue[]): string {
  const values = flatten(args);
  let next = 0;
  const take = (): TagValue => (next < values.length ? values[next++] : undefined);

  return str(format).replace(
    DIRECTIVE,
    (whole: string, flags: string, width: string | undefined, precision: string | undefined, conversion: string) => {
      if (conversion === '%') return '%';
      if (!'csdiuoxXeEfFgGbB'.includes(conversion)) return whole;

      const spec: Spec = {
        left: flags.includes('-'),
        plus: flags.includes('+'),
        space: flags.includes(' '),
        zero: flags.includes('0'),
        alt: flags.includes('#'),
        width: 0,
        precision: undefined,
      };
      if (width === '*') {
        const w = Math.trunc(numeric(take()));
        spec.width = Math.abs(w);
        if (w < 0) spec.left = true;
      } else if (width !== undefined) {
        spec.width = Number(width);
      }
      if (precision === '*') {
        const p = Math.trunc(numeric(take()));
        spec.precision = p < 0 ? undefined : p;
      } else if (precision !== undefined) {
        spec.precision = precision === '' ? 0 : Number(precision);
      }

      return formatDirective(conversion, take(), spec);
    },
  );
}

function numeric(value: TagValue): number {
  return value === undefined ? 0 : num(value);
}

function formatDirective(conversion: string, value: TagValue, spec: Spec): string {
  switch (conversion) {
    case 's': {
      const s = str(value);
      return pad('', spec.precision === undefined ? s : s.slice(0, spec.precision), spec, false);
    }
    case 'c':
      return pad('', String.fromCodePoint(Math.max(0, Math.trunc(numeric(value)))), spec, false);
    case 'd':
    case 'i':
      return formatSigned(numeric(value), spec);
    case 'u':
      return formatUnsigned(numeric(value), 10, '', spec);
    case 'o':
      return formatUnsigned(numeric(value), 8, '0', spec);
    case 'x':
      return formatUnsigned(numeric(value), 16, '0x', spec);
    case 'X':
      return formatUnsigned(numeric(value), 16, '0X', spec).toUpperCase();
    case 'b':
      return formatUnsigned(numeric(value), 2, '0b', spec);
    case 'B':
      return formatUnsigned(numeric(value), 2, '0B', spec);
    case 'f':
    case 'F':
      return formatFloat(numeric(value), spec, (n, p) => n.toFixed(p));
    case 'e':
    case 'E': {
      const out = formatFloat(numeric(value), spec, (n, p) => exponential(n, p));
      return conversion === 'E' ? out.toUpperCase() : out;
    }
    case 'g':
    case 'G': {
      const out = formatFloat(numeric(value), spec, (n, p) => general(n, p, spec.alt));
      return conversion === 'G' ? out.toUpperCase() : out;
    }
    default:
      return '';
  }
}

function signOf(negative: boolean, spec: Spec): string {
  if (negative) return '-';
  if (spec.plus) return '+';
  if (spec.space) return ' ';
  return '';
}

function formatSigned(value: number, spec: Spec): string {
  const n = Math.trunc(value);
  let digits = Math.abs(n).toFixed(0);
  if (spec.precision !== undefined) {
    digits = spec.precision === 0 && n === 0 ? '' : digits.padStart(spec.precision, '0');
  }
  return pad(signOf(n < 0, spec), digits, spec, spec.precision === undefined);
}

function formatUnsigned(value: number, radix: number, altPrefix: string, spec: Spec): string {
  const n = BigInt.asUintN(64, BigInt(Math.trunc(Number.isFinite(value) ? value : 0)));
  let digits = n.toString(radix);
  if (spec.precision !== undefined) {
    digits = spec.precision === 0 && n === 0n ? '' : digits.padStart(spec.precision, '0');
  }
  let prefix = '';
  if (spec.alt && n !== 0n) {
    if (radix === 8) {
      if (!digits.startsWith('0')) digits = `0${digits}`;
    } else {
      prefix = altPrefix;
    }
  }
  return pad(prefix, digits, spec, spec.precision === undefined);
}

function formatFloat(value: number, spec: Spec, render: (n: number, precision: number) => string): string {
  if (!Number.isFinite(value)) {
    const text = Number.isNaN(value) ? 'NaN' : 'Inf';
    return pad(Number.isNaN(value) ? signOf(false, spec) : signOf(value < 0, spec), text, spec, false);
  }
  const negative = value < 0 || Object.is(value, -0);
  let digits = render(Math.abs(value), spec.precision ?? 6);
  if (spec.alt && !digits.includes('.') && !digits.includes('e')) digits += '.';
  return pad(signOf(negative, spec), digits, spec, true);
}

function exponential(n: number, precision: number): string {
  return n.toExponential(Math.min(precision, 100)).replace(/e([+-])(\d)$/, 'e$10$2');
}

function general(n: number, requested: number, alt: boolean): string {
  const precision = requested === 0 ? 1 : requested;
  const exponent = n === 0 ? 0 : Number(n.toExponential(precision - 1).split('e')[1]);
  let out: string;
  if (exponent < precision && exponent >= -4) {
    out = n.toFixed(precision - 1 - exponent);
    if (!alt && out.includes('.')) out = out.replace(/\.?0+$/, '');
  } else {
    out = exponential(n, precision - 1);
    if (!alt) out = out.replace(/\.?0+e/, 'e');
  }
  return out;
}

function pad(sign: string, digits: string, spec: Spec, zeroAllowed: boolean): string {
  const length = sign.length + digits.length;
  if (spec.width <= length) return sign + digits;
  const fill = spec.width - length;
  if (spec.left) return sign + digits + ' '.repeat(fill);
  if (spec.zero && zeroAllowed) return sign + '0'.repeat(fill) + digits;
  return ' '.repeat(fill) + sign + digits;
}

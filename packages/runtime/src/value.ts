/**
 * Tag values and the scalar coercions every other primitive builds on.
 *
 * Values follow the source language: a scalar is a number or a string,
 * `undefined` stands for undef, and lists come back from `unpack`/`split`.
 *
 * @module value
 */

import { ConvError } from './errors.js';

export type TagValue = number | string | undefined | TagValue[];

/** Boolean results use the source language's canonical true/false scalars. */
export const TRUE: TagValue = 1;
export const FALSE: TagValue = '';

const NUMERIC = /^\s*[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?\s*$/;
const INFINITE = /^\s*([+-]?)inf(?:inity)?\s*$/i;
const NOT_A_NUMBER = /^\s*[+-]?nan\s*$/i;

export function bool(value: boolean): TagValue {
  return value ? TRUE : FALSE;
}

export function isList(value: TagValue): value is TagValue[] {
  return Array.isArray(value);
}

export function isDefined(value: TagValue): boolean {
  return value !== undefined;
}

/** `defined EXPR` as a source-language boolean. */
export function defined(value: TagValue): TagValue {
  return bool(value !== undefined);
}

/**
 * Truthiness: undef, '', '0' and 0 are false; everything else is true.
 * Lists are true when non-empty.
 */
export function truthy(value: TagValue): boolean {
  if (value === undefined) return false;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') return value !== '' && value !== '0';
  return value.length > 0;
}

/**
 * Numify a value. Only strings that are entirely numeric are accepted;
 * anything else is a type mismatch rather than a silent 0.
 */
export function num(value: TagValue): number {
  if (typeof value === 'number') return value;
  if (value === undefined) {
    throw new ConvError('type_mismatch', 'Use of undefined value in numeric context');
  }
  if (Array.isArray(value)) {
    throw new ConvError('type_mismatch', 'Cannot use a list in numeric context');
  }
  if (NUMERIC.test(value)) return Number(value.trim());
  const inf = INFINITE.exec(value);
  if (inf) return inf[1] === '-' ? -Infinity : Infinity;
  if (NOT_A_NUMBER.test(value)) return NaN;
  throw new ConvError('type_mismatch', `Argument "${value}" isn't numeric`);
}

/**
 * Integer part of a numified value, truncated toward zero.
 */
export function integer(value: TagValue): number {
  return Math.trunc(num(value));
}

export function isNumeric(value: TagValue): boolean {
  if (typeof value === 'number') return true;
  if (typeof value !== 'string') return false;
  return NUMERIC.test(value) || INFINITE.test(value) || NOT_A_NUMBER.test(value);
}

/**
 * Stringify a value. Numbers print with 15 significant digits, undef is
 * the empty string and lists are joined with single spaces.
 */
export function str(value: TagValue): string {
  if (value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return formatNumber(value);
  const parts: string[] = [];
  for (const item of value) {
    parts.push(str(item));
  }
  return parts.join(' ');
}

function formatNumber(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return 'Inf';
  if (value === -Infinity) return '-Inf';
  if (Number.isInteger(value) && Math.abs(value) < 1e15) return String(value);
  const rounded = Number(value.toPrecision(15));
  return String(rounded).replace(/e([+-])(\d)$/, 'e$10$2');
}

/**
 * Flatten list values one level into their scalars, the way argument lists
 * are flattened before a call.
 */
export function flatten(values: TagValue[]): TagValue[] {
  const out: TagValue[] = [];
  for (const value of values) {
    if (Array.isArray(value)) {
      out.push(...flatten(value));
    } else {
      out.push(value);
    }
  }
  return out;
}

/**
 * `$val[N]`: element of a list value. Scalar strings are treated as
 * whitespace-separated lists.
 */
export function element(value: TagValue, index: TagValue): TagValue {
  const items = Array.isArray(value) ? value : str(value).trim().split(/\s+/).filter((s) => s !== '');
  const i = integer(index);
  const at = i < 0 ? items.length + i : i;
  return at >= 0 && at < items.length ? items[at] : undefined;
}

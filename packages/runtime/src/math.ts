/**
 * Numeric built-ins.
 *
 * @module math
 */

import { ConvError } from './errors.js';
import { num, truthy, type TagValue } from './value.js';

export function int(value: TagValue): number {
  return Math.trunc(num(value));
}

export function abs(value: TagValue): number {
  return Math.abs(num(value));
}

export function sqrt(value: TagValue): number {
  const n = num(value);
  if (n < 0) {
    throw new ConvError('bad_argument', `Can't take sqrt of ${n}`);
  }
  return Math.sqrt(n);
}

export function exp(value: TagValue): number {
  return Math.exp(num(value));
}

export function log(value: TagValue): number {
  const n = num(value);
  if (n <= 0) {
    throw new ConvError('bad_argument', `Can't take log of ${n}`);
  }
  return Math.log(n);
}

export function sin(value: TagValue): number {
  return Math.sin(num(value));
}

export function cos(value: TagValue): number {
  return Math.cos(num(value));
}

export function atan2(y: TagValue, x: TagValue): number {
  return Math.atan2(num(y), num(x));
}

/**
 * `$den ? N / $den : 0`. The guard runs before any division, so a zero or
 * false denominator yields 0 instead of an error.
 */
export function safeDivide(numerator: TagValue, denominator: TagValue): number {
  if (!truthy(denominator)) return 0;
  const d = num(denominator);
  if (d === 0) return 0;
  return num(numerator) / d;
}

/** `$den ? 1 / $den : 0`. */
export function safeReciprocal(denominator: TagValue): number {
  return safeDivide(1, denominator);
}

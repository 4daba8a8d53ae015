/**
 * Operator primitives: arithmetic, comparison, logic, string and regex.
 *
 * Numeric operators numify their operands (and fail on non-numeric input);
 * string operators stringify them. Comparison results are the canonical
 * true/false scalars.
 *
 * @module operators
 */

import { ConvError } from './errors.js';
import { bool, integer, isDefined, num, str, truthy, type TagValue } from './value.js';

export function add(a: TagValue, b: TagValue): number {
  return num(a) + num(b);
}

export function sub(a: TagValue, b: TagValue): number {
  return num(a) - num(b);
}

export function mul(a: TagValue, b: TagValue): number {
  return num(a) * num(b);
}

export function div(a: TagValue, b: TagValue): number {
  const divisor = num(b);
  if (divisor === 0) {
    throw new ConvError('division_by_zero', 'Illegal division by zero');
  }
  return num(a) / divisor;
}

/** Integer modulus; the result takes the sign of the right operand. */
export function mod(a: TagValue, b: TagValue): number {
  const right = integer(b);
  if (right === 0) {
    throw new ConvError('division_by_zero', 'Illegal modulus zero');
  }
  const left = integer(a);
  const r = left % right;
  return r !== 0 && (r < 0) !== (right < 0) ? r + right : r;
}

export function pow(a: TagValue, b: TagValue): number {
  return num(a) ** num(b);
}

export function neg(a: TagValue): number {
  return -num(a);
}

export function numEq(a: TagValue, b: TagValue): TagValue {
  return bool(num(a) === num(b));
}

export function numNe(a: TagValue, b: TagValue): TagValue {
  return bool(num(a) !== num(b));
}

export function numLt(a: TagValue, b: TagValue): TagValue {
  return bool(num(a) < num(b));
}

export function numGt(a: TagValue, b: TagValue): TagValue {
  return bool(num(a) > num(b));
}

export function numLe(a: TagValue, b: TagValue): TagValue {
  return bool(num(a) <= num(b));
}

export function numGe(a: TagValue, b: TagValue): TagValue {
  return bool(num(a) >= num(b));
}

/** `<=>`: -1, 0 or 1; undef when either side is NaN. */
export function numCmp(a: TagValue, b: TagValue): TagValue {
  const left = num(a);
  const right = num(b);
  if (Number.isNaN(left) || Number.isNaN(right)) return undefined;
  return left < right ? -1 : left > right ? 1 : 0;
}

export function strEq(a: TagValue, b: TagValue): TagValue {
  return bool(str(a) === str(b));
}

export function strNe(a: TagValue, b: TagValue): TagValue {
  return bool(str(a) !== str(b));
}

export function strLt(a: TagValue, b: TagValue): TagValue {
  return bool(str(a) < str(b));
}

export function strGt(a: TagValue, b: TagValue): TagValue {
  return bool(str(a) > str(b));
}

export function strLe(a: TagValue, b: TagValue): TagValue {
  return bool(str(a) <= str(b));
}

export function strGe(a: TagValue, b: TagValue): TagValue {
  return bool(str(a) >= str(b));
}

export function strCmp(a: TagValue, b: TagValue): TagValue {
  const left = str(a);
  const right = str(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

/** Bitwise operands are unsigned 64-bit integers; negative values wrap. */
function word(value: TagValue): bigint {
  const n = integer(value);
  if (!Number.isFinite(n)) {
    throw new ConvError('bad_argument', `Cannot use ${str(value)} in a bitwise operation`);
  }
  return BigInt.asUintN(64, BigInt(n));
}

export function bitAnd(a: TagValue, b: TagValue): number {
  return Number(word(a) & word(b));
}

export function bitOr(a: TagValue, b: TagValue): number {
  return Number(word(a) | word(b));
}

export function bitXor(a: TagValue, b: TagValue): number {
  return Number(word(a) ^ word(b));
}

export function shiftLeft(a: TagValue, b: TagValue): number {
  return Number(BigInt.asUintN(64, word(a) << BigInt(integer(b))));
}

export function shiftRight(a: TagValue, b: TagValue): number {
  return Number(word(a) >> BigInt(integer(b)));
}

/**
 * `&&` / `and`. The right operand is a thunk so it is only evaluated when
 * the left one is true; the result is the last operand evaluated.
 */
export function and(a: TagValue, b: () => TagValue): TagValue {
  return truthy(a) ? b() : a;
}

/** `||` / `or`. */
export function or(a: TagValue, b: () => TagValue): TagValue {
  return truthy(a) ? a : b();
}

/** `//`: defined-or. */
export function definedOr(a: TagValue, b: () => TagValue): TagValue {
  return isDefined(a) ? a : b();
}

/** `xor`: both sides are always evaluated. */
export function xor(a: TagValue, b: TagValue): TagValue {
  return bool(truthy(a) !== truthy(b));
}

export function not(a: TagValue): TagValue {
  return bool(!truthy(a));
}

/**
 * Choose between two lazily evaluated branches.
 */
export function choose(condition: TagValue, whenTrue: () => TagValue, whenFalse: () => TagValue): TagValue {
  return truthy(condition) ? whenTrue() : whenFalse();
}

/**
 * String concatenation as a single fold over all operands.
 */
export function concat(parts: TagValue[]): string {
  const pieces: string[] = new Array<string>(parts.length);
  for (let i = 0; i < parts.length; i++) {
    pieces[i] = str(parts[i]);
  }
  return pieces.join('');
}

/** `x`: string repetition. Counts below one give the empty string. */
export function repeat(value: TagValue, count: TagValue): string {
  const times = integer(count);
  return times > 0 ? str(value).repeat(times) : '';
}

export function match(value: TagValue, pattern: RegExp): TagValue {
  pattern.lastIndex = 0;
  return bool(pattern.test(str(value)));
}

export function notMatch(value: TagValue, pattern: RegExp): TagValue {
  pattern.lastIndex = 0;
  return bool(!pattern.test(str(value)));
}

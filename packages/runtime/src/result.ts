/**
 * Result type returned by generated value transforms.
 *
 * @module result
 */

import { ConvError } from './errors.js';
import { str, type TagValue } from './value.js';

export type ConvResult =
  | { ok: true; value: TagValue }
  | { ok: false; error: ConvError };

export function ok(value: TagValue): ConvResult {
  return { ok: true, value };
}

/**
 * Wrap anything thrown while evaluating an expression. Runtime `ConvError`s
 * pass through; other values become an `internal` error carrying the cause.
 */
export function fail(error: unknown): ConvResult {
  if (error instanceof ConvError) {
    return { ok: false, error };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { ok: false, error: new ConvError('internal', message, { cause: error }) };
}

/**
 * Result of the fallback emitted for an expression that could not be
 * compiled.
 */
export function notImplemented(expression: string, value: TagValue): ConvResult {
  return {
    ok: false,
    error: new ConvError('not_implemented', `Expression not implemented: ${expression} (value "${str(value)}")`),
  };
}

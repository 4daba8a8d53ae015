/**
 * Errors raised by runtime primitives.
 *
 * @module errors
 */

export type ConvErrorCode =
  | 'type_mismatch'
  | 'division_by_zero'
  | 'bad_argument'
  | 'not_implemented'
  | 'internal';

/**
 * Raised when a primitive cannot produce a value with source-language
 * semantics, e.g. numifying a non-numeric string.
 */
export class ConvError extends Error {
  readonly code: ConvErrorCode;

  constructor(code: ConvErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConvError';
    this.code = code;
  }
}

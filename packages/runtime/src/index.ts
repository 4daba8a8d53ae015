/**
 * tagexpr-runtime
 *
 * Source-language primitives that compiled tag expressions call into.
 * Generated modules import this package as a namespace (`rt`).
 *
 * @module tagexpr-runtime
 */

export { ConvError, type ConvErrorCode } from './errors.js';
export {
  type TagValue,
  TRUE,
  FALSE,
  bool,
  isList,
  isDefined,
  defined,
  truthy,
  num,
  integer,
  isNumeric,
  str,
  flatten,
  element,
} from './value.js';
export { type ConvResult, ok, fail, notImplemented } from './result.js';
export { type EvalContext, type EvalContextValues, createEvalContext } from './context.js';
export {
  add,
  sub,
  mul,
  div,
  mod,
  pow,
  neg,
  numEq,
  numNe,
  numLt,
  numGt,
  numLe,
  numGe,
  numCmp,
  strEq,
  strNe,
  strLt,
  strGt,
  strLe,
  strGe,
  strCmp,
  bitAnd,
  bitOr,
  bitXor,
  shiftLeft,
  shiftRight,
  and,
  or,
  definedOr,
  xor,
  not,
  choose,
  concat,
  repeat,
  match,
  notMatch,
} from './operators.js';
export {
  length,
  substr,
  index,
  uc,
  lc,
  ucfirst,
  lcfirst,
  ord,
  chr,
  hex,
  oct,
  join,
  split,
  reverse,
  substitute,
  transliterate,
} from './strings.js';
export { int, abs, sqrt, exp, log, sin, cos, atan2, safeDivide, safeReciprocal } from './math.js';
export { sprintf } from './sprintf.js';
export { pack, unpack } from './binary.js';

/**
 * Source-language functions the generator can call into the runtime
 * package for, with their arities.
 *
 * @module codegen/functions
 */

export interface RuntimeFunction {
  /** Export name in the runtime package. */
  runtime: string;
  minArgs: number;
  maxArgs: number;
  /** The function returns a list in list context. */
  returnsList?: boolean;
  /** Arguments from this index on are evaluated in list context. */
  listArgsFrom?: number;
  /** Index of an argument that may be a match pattern. */
  patternArg?: number;
}

const unary = (runtime: string): RuntimeFunction => ({ runtime, minArgs: 1, maxArgs: 1 });

export const RUNTIME_FUNCTIONS: Readonly<Record<string, RuntimeFunction>> = {
  abs: unary('abs'),
  atan2: { runtime: 'atan2', minArgs: 2, maxArgs: 2 },
  chr: unary('chr'),
  cos: unary('cos'),
  defined: unary('defined'),
  exp: unary('exp'),
  hex: unary('hex'),
  index: { runtime: 'index', minArgs: 2, maxArgs: 3 },
  int: unary('int'),
  join: { runtime: 'join', minArgs: 1, maxArgs: Infinity, listArgsFrom: 1 },
  lc: unary('lc'),
  lcfirst: unary('lcfirst'),
  length: unary('length'),
  log: unary('log'),
  oct: unary('oct'),
  ord: unary('ord'),
  pack: { runtime: 'pack', minArgs: 1, maxArgs: Infinity, listArgsFrom: 1 },
  reverse: { runtime: 'reverse', minArgs: 0, maxArgs: Infinity, returnsList: true, listArgsFrom: 0 },
  sin: unary('sin'),
  split: { runtime: 'split', minArgs: 2, maxArgs: 3, returnsList: true, patternArg: 0 },
  sqrt: unary('sqrt'),
  substr: { runtime: 'substr', minArgs: 2, maxArgs: 3 },
  uc: unary('uc'),
  ucfirst: unary('ucfirst'),
  unpack: { runtime: 'unpack', minArgs: 2, maxArgs: 2, returnsList: true },
};

export function lookupFunction(name: string): RuntimeFunction | undefined {
  return Object.hasOwn(RUNTIME_FUNCTIONS, name) ? RUNTIME_FUNCTIONS[name] : undefined;
}

/**
 * Types shared by the registry and the emitter.
 *
 * @module registry/types
 */

import type { NormalizedNode } from '../ast/normalized.js';
import type { ExpressionContext } from '../context.js';

/** Where in the tag tables an expression is used. */
export interface UsageContext {
  module: string;
  table: string;
  tag: string;
}

export interface FunctionSpec {
  readonly originalText: string;
  readonly context: ExpressionContext;
  readonly ast: NormalizedNode;
  readonly usage?: UsageContext;
}

/** A hand-written function that stands in for one expression. */
export interface ManualImplementation {
  context: ExpressionContext;
  originalText: string;
  /** Module specifier the emitted code re-exports from. */
  module: string;
  export: string;
}

export type Outcome = 'generated' | 'manual' | 'fallback';

export interface GeneratedFunction {
  readonly name: string;
  readonly hash: string;
  readonly context: ExpressionContext;
  readonly outcome: Outcome;
  /** Function source without its doc comment. */
  readonly code: string;
  /** Distinct original texts that share this function, in registration order. */
  readonly originalTexts: readonly string[];
  readonly usages: readonly UsageContext[];
  /** Why the function is a fallback or a manual stand-in. */
  readonly reason?: string;
}

export interface LookupEntry {
  originalText: string;
  context: ExpressionContext;
  name: string;
}

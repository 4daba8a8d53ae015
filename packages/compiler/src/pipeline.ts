/**
 * End-to-end compilation: corpus → normalized trees → registry.
 *
 * @module pipeline
 */

import type { NormalizedNode } from './ast/normalized.js';
import type { RawNode } from './ast/raw.js';
import type { ExpressionContext } from './context.js';
import type { Corpus, RejectedRecord } from './input/corpus.js';
import { Normalizer } from './normalize/orchestrator.js';
import type { NormalizerPass } from './normalize/pass.js';
import type { HashFunction } from './registry/hash.js';
import { FunctionRegistry, type RegistryResult } from './registry/registry.js';
import type { GeneratedFunction, ManualImplementation } from './registry/types.js';
import { silentLogger, type Logger } from './utils/logger.js';

export interface CompileOptions {
  passes?: readonly NormalizerPass[];
  hash?: HashFunction;
  hashLength?: number;
  manual?: readonly ManualImplementation[];
  logger?: Logger;
}

export interface CompileResult extends RegistryResult {
  /** Records that never reached the registry. */
  rejected: RejectedRecord[];
}

/**
 * Compile every entry of a corpus. Entries are processed in file order;
 * the result does not depend on that order.
 */
export function compileCorpus(corpus: Corpus, options: CompileOptions = {}): CompileResult {
  const logger = options.logger ?? silentLogger;
  const normalizer = new Normalizer({ passes: options.passes, logger });
  const registry = new FunctionRegistry({
    hash: options.hash,
    hashLength: options.hashLength,
    manual: options.manual,
    logger,
  });

  for (const rejected of corpus.rejected) {
    logger.warn('Record rejected', { source: corpus.source, index: rejected.index, issues: rejected.issues });
  }

  for (const entry of corpus.entries) {
    if (entry.status === 'invalid-ast') {
      registry.registerFallback(entry.originalText, entry.context, entry.error.message, entry.usage);
      continue;
    }
    const normalized = normalizer.tryNormalize(entry.ast);
    if (!normalized.ok) {
      registry.registerFallback(entry.originalText, entry.context, normalized.error.message, entry.usage);
      continue;
    }
    const ast = normalized.value;
    registry.resolveOrFallback(
      entry.usage
        ? { originalText: entry.originalText, context: entry.context, ast, usage: entry.usage }
        : { originalText: entry.originalText, context: entry.context, ast },
    );
  }

  const result = registry.finish();
  logger.info('Compiled corpus', {
    source: corpus.source,
    expressions: result.stats.total.attempts,
    functions: result.functions.length,
    rejected: corpus.rejected.length,
  });
  return { ...result, rejected: corpus.rejected };
}

export interface CompiledExpression {
  /** Absent when normalization itself failed. */
  tree?: NormalizedNode;
  fn: GeneratedFunction;
}

/**
 * Compile a single expression the way the corpus pipeline would.
 */
export function compileExpression(
  raw: RawNode,
  context: ExpressionContext,
  originalText: string,
  options: CompileOptions = {},
): CompiledExpression {
  const normalized = new Normalizer({ passes: options.passes, logger: options.logger }).tryNormalize(raw);
  const registry = new FunctionRegistry({
    hash: options.hash,
    hashLength: options.hashLength,
    manual: options.manual,
    logger: options.logger,
  });
  if (!normalized.ok) {
    return { fn: registry.registerFallback(originalText, context, normalized.error.message) };
  }
  const tree = normalized.value;
  return { tree, fn: registry.resolveOrFallback({ originalText, context, ast: tree }) };
}

/**
 * Traversal orchestrator: one post-order walk that folds the tier-sorted
 * pass list over every node.
 *
 * @module normalize/orchestrator
 */

import {
  fromRaw,
  isPending,
  mapOperands,
  pending,
  seal,
  type NormalizedNode,
  type WorkNode,
} from '../ast/normalized.js';
import { isRawKind, type RawNode } from '../ast/raw.js';
import { CompilerDefect, PrecedenceInvariantViolation } from '../errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { TIER_RANK, sortByTier, type NormalizerPass } from './pass.js';
import { DEFAULT_PASSES } from './passes/index.js';

export type NormalizeResult = { ok: true; value: NormalizedNode } | { ok: false; error: Error };

export interface NormalizerOptions {
  /** Passes to run. Defaults to the built-in set. */
  passes?: readonly NormalizerPass[];
  logger?: Logger;
}

/**
 * Fold `passes` over one node, in the order given. Throws
 * `PrecedenceInvariantViolation` if a pass of a higher-binding tier follows
 * a lower one.
 */
export function foldPasses(node: WorkNode, passes: readonly NormalizerPass[]): WorkNode {
  let current = node;
  let previous: NormalizerPass | undefined;
  for (const pass of passes) {
    if (previous && TIER_RANK[pass.tier] < TIER_RANK[previous.tier]) {
      throw new PrecedenceInvariantViolation(pass.name, pass.tier, previous.tier);
    }
    current = pass.apply(current);
    previous = pass;
  }
  return current;
}

function isRawInput(node: RawNode | NormalizedNode): node is RawNode {
  switch (node.kind) {
    case 'symbol':
      return !('name' in node);
    case 'list':
      return !('items' in node);
    case 'regex':
    case 'substitution':
      return !('pattern' in node);
    case 'transliteration':
      return !('search' in node);
    default:
      return isRawKind(node.kind);
  }
}

function countUnresolved(node: NormalizedNode): number {
  let count = node.kind === 'unresolved' ? 1 : 0;
  mapOperands(node, (child) => {
    count += countUnresolved(child);
    return child;
  });
  return count;
}

export class Normalizer {
  private readonly passes: readonly NormalizerPass[];
  private readonly logger: Logger;

  constructor(options: NormalizerOptions = {}) {
    const passes = options.passes ?? DEFAULT_PASSES;
    const seen = new Set<string>();
    for (const pass of passes) {
      if (seen.has(pass.name)) {
        throw new CompilerDefect(`Normalizer pass '${pass.name}' is registered twice`);
      }
      seen.add(pass.name);
    }
    this.passes = sortByTier(passes);
    this.logger = options.logger ?? silentLogger;
  }

  /** Pass names in the order they are applied at each node. */
  get order(): string[] {
    return this.passes.map((pass) => pass.name);
  }

  normalize(root: RawNode | NormalizedNode): NormalizedNode {
    const work: WorkNode = isRawInput(root) ? fromRaw(root) : root;
    const result = seal(this.visit(work));
    const unresolved = countUnresolved(result);
    if (unresolved > 0) {
      this.logger.debug('Normalization left unrecognized nodes', { unresolved, kind: result.kind });
    }
    return result;
  }

  /**
   * Normalize one expression, returning a failure raised inside a pass
   * instead of throwing it. Compiler defects still propagate.
   */
  tryNormalize(root: RawNode | NormalizedNode): NormalizeResult {
    try {
      return { ok: true, value: this.normalize(root) };
    } catch (error) {
      if (error instanceof CompilerDefect) throw error;
      return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
    }
  }

  private visit(node: WorkNode): WorkNode {
    const visited: WorkNode = isPending(node)
      ? pending(
          node.type,
          node.content,
          node.children.map((child) => this.visit(child)),
        )
      : mapOperands(node, (child) => seal(this.visit(child)));
    return foldPasses(visited, this.passes);
  }
}

export function normalize(root: RawNode | NormalizedNode, options?: NormalizerOptions): NormalizedNode {
  return new Normalizer(options).normalize(root);
}

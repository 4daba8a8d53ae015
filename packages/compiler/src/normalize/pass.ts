/**
 * Normalizer pass contract and precedence tiers.
 *
 * @module normalize/pass
 */

import type { WorkNode } from '../ast/normalized.js';

/**
 * Coarse binding strength of the construct a pass recognizes. At any node
 * every High pass runs before any Medium pass, and every Medium pass before
 * any Low pass.
 */
export type PrecedenceTier = 'High' | 'Medium' | 'Low';

export const TIER_RANK: Readonly<Record<PrecedenceTier, number>> = {
  High: 0,
  Medium: 1,
  Low: 2,
};

/**
 * A single-level rewrite rule. `apply` may read the node and its direct
 * children only, and returns the node itself (same reference) when its
 * pattern does not match.
 */
export interface NormalizerPass {
  readonly name: string;
  readonly tier: PrecedenceTier;
  apply(node: WorkNode): WorkNode;
}

/**
 * Stable sort by tier: registration order breaks ties within a tier.
 */
export function sortByTier(passes: readonly NormalizerPass[]): NormalizerPass[] {
  return passes
    .map((pass, index) => ({ pass, index }))
    .sort((a, b) => TIER_RANK[a.pass.tier] - TIER_RANK[b.pass.tier] || a.index - b.index)
    .map(({ pass }) => pass);
}

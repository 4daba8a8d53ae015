/**
 * Registration statistics and the coverage report.
 *
 * @module registry/stats
 */

import { EXPRESSION_CONTEXTS, type ExpressionContext } from '../context.js';
import type { Outcome } from './types.js';

export interface ContextStats {
  /** Expressions registered, including ones whose AST was rejected. */
  attempts: number;
  generated: number;
  manual: number;
  fallback: number;
  /** Distinct functions after deduplication. */
  functions: number;
}

export interface FallbackRecord {
  originalText: string;
  context: ExpressionContext;
  name: string;
  reason: string;
}

export interface RegistryStats {
  contexts: Record<ExpressionContext, ContextStats>;
  total: ContextStats;
  fallbacks: FallbackRecord[];
}

export function emptyContextStats(): ContextStats {
  return { attempts: 0, generated: 0, manual: 0, fallback: 0, functions: 0 };
}

export function emptyStats(): RegistryStats {
  return {
    contexts: {
      ValueTransform: emptyContextStats(),
      DisplayFormat: emptyContextStats(),
      BooleanGate: emptyContextStats(),
    },
    total: emptyContextStats(),
    fallbacks: [],
  };
}

/** Count `specs` expressions that ended in `outcome`, in one function. */
export function record(stats: RegistryStats, context: ExpressionContext, outcome: Outcome, specs: number): void {
  for (const bucket of [stats.contexts[context], stats.total]) {
    bucket.attempts += specs;
    bucket[outcome] += specs;
    bucket.functions += 1;
  }
}

/** Share of attempts that compiled to real code (generated or manual). */
export function coverage(stats: ContextStats): number {
  return stats.attempts === 0 ? 1 : (stats.generated + stats.manual) / stats.attempts;
}

const COLUMNS = ['Attempts', 'Generated', 'Manual', 'Fallback', 'Functions'];

function row(label: string, stats: ContextStats): string {
  const cells = [stats.attempts, stats.generated, stats.manual, stats.fallback, stats.functions];
  return label.padEnd(16) + cells.map((n, i) => String(n).padStart(COLUMNS[i].length + 2)).join('');
}

export function formatReport(stats: RegistryStats): string {
  const lines = [''.padEnd(16) + COLUMNS.map((c) => c.padStart(c.length + 2)).join('')];
  for (const context of EXPRESSION_CONTEXTS) {
    lines.push(row(context, stats.contexts[context]));
  }
  lines.push(row('Total', stats.total));
  lines.push('');
  lines.push(`Coverage: ${(coverage(stats.total) * 100).toFixed(1)}%`);

  if (stats.fallbacks.length > 0) {
    lines.push('');
    lines.push('Fallbacks:');
    for (const fb of stats.fallbacks) {
      lines.push(`  ${fb.name}  ${fb.originalText}`);
      lines.push(`    ${fb.reason}`);
    }
  }
  return lines.join('\n');
}

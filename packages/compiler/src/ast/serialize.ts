/**
 * Canonical serialization of normalized trees.
 *
 * Object keys are sorted so two structurally equal trees always produce the
 * same text, whatever order their properties were created in. The registry
 * hashes this text and compares it on hash hits.
 *
 * @module ast/serialize
 */

import type { NormalizedNode } from './normalized.js';

export function stableSerialize(value: unknown): string {
  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'number':
      return Number.isFinite(value) ? String(value) : `"${String(value)}"`;
    case 'boolean':
      return value ? 'true' : 'false';
    case 'undefined':
      return 'null';
    case 'object': {
      if (value === null) return 'null';
      if (Array.isArray(value)) {
        const items: unknown[] = value;
        return `[${items.map(stableSerialize).join(',')}]`;
      }
      const entries: [string, unknown][] = Object.entries(value);
      const parts = entries
        .filter(([, entry]) => entry !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, entry]) => `${JSON.stringify(key)}:${stableSerialize(entry)}`);
      return `{${parts.join(',')}}`;
    }
    default:
      return JSON.stringify(String(value));
  }
}

export function serializeTree(node: NormalizedNode): string {
  return stableSerialize(node);
}

export function treesEqual(a: NormalizedNode, b: NormalizedNode): boolean {
  return serializeTree(a) === serializeTree(b);
}

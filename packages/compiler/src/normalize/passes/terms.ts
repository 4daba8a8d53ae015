/**
 * Leaf terms: variables, numbers, quoted strings, match patterns and the
 * `s///` and `tr///` edits.
 *
 * @module normalize/passes/terms
 */

import { isPending, type WorkNode } from '../../ast/normalized.js';
import { readNumber, readRegex, readString, readSubstitution, readSymbol, readTransliteration } from '../lexical.js';
import type { NormalizerPass } from '../pass.js';

function readTerm(type: string, content: string): WorkNode | undefined {
  switch (type) {
    case 'symbol':
      return readSymbol(content);
    case 'number': {
      const value = readNumber(content);
      return value === undefined ? undefined : { kind: 'literal', value };
    }
    case 'string':
      return readString(content);
    case 'regex':
      return readRegex(content);
    case 'substitution':
      return readSubstitution(content);
    case 'transliteration':
      return readTransliteration(content);
    default:
      return undefined;
  }
}

export const termsPass: NormalizerPass = {
  name: 'Terms',
  tier: 'High',
  apply(node) {
    if (!isPending(node) || node.content === undefined) return node;
    return readTerm(node.type, node.content) ?? node;
  },
};

/**
 * Builders for raw trees used across the compiler tests.
 */

import type { RawNode } from '../src/ast/raw.js';

export function doc(...children: RawNode[]): RawNode {
  return { kind: 'document', children };
}

export function stmt(...children: RawNode[]): RawNode {
  return { kind: 'statement', children };
}

/** `( ... )` around one expression statement. */
export function group(...children: RawNode[]): RawNode {
  return { kind: 'list', content: '(', children: [stmt(...children)] };
}

export function sym(content: string): RawNode {
  return { kind: 'symbol', content };
}

export function num(content: string): RawNode {
  return { kind: 'number', content };
}

export function str(content: string): RawNode {
  return { kind: 'string', content };
}

export function op(content: string): RawNode {
  return { kind: 'operator', content };
}

export function word(content: string): RawNode {
  return { kind: 'word', content };
}

export function regex(content: string): RawNode {
  return { kind: 'regex', content };
}

export function subst(content: string): RawNode {
  return { kind: 'substitution', content };
}

export function trans(content: string): RawNode {
  return { kind: 'transliteration', content };
}

export function end(): RawNode {
  return { kind: 'structure', content: ';' };
}

/** A one-statement document. */
export function expr(...children: RawNode[]): RawNode {
  return doc(stmt(...children));
}

export const val = (): RawNode => sym('$val');

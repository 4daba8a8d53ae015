/**
 * Raw nodes produced by the upstream parser.
 *
 * @module ast/raw
 */

export const RAW_KINDS = [
  'document',
  'statement',
  'list',
  'block',
  'subscript',
  'symbol',
  'cast',
  'number',
  'string',
  'operator',
  'word',
  'regex',
  'substitution',
  'transliteration',
  'structure',
] as const;

export type RawKind = (typeof RAW_KINDS)[number];

/**
 * A node of the upstream tree. `content` holds the token text for leaves;
 * for bracketed containers (`list`, `subscript`, `block`) it holds the
 * opening delimiter when the parser reports one.
 */
export interface RawNode {
  kind: RawKind;
  content?: string;
  children?: RawNode[];
}

/** Kinds that carry token text and never have children. */
export const LEAF_KINDS: ReadonlySet<RawKind> = new Set<RawKind>([
  'symbol',
  'cast',
  'number',
  'string',
  'operator',
  'word',
  'regex',
  'substitution',
  'transliteration',
  'structure',
]);

export function isRawKind(value: string): value is RawKind {
  return RAW_KINDS.some((kind) => kind === value);
}

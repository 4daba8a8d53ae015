/**
 * Reading upstream ASTs into raw nodes.
 *
 * Two node shapes are accepted:
 *   - `{ kind, content?, children? }` with `kind` one of the raw kinds
 *   - parser dumps `{ class: 'PPI::...', content?, children?, structure_bounds? }`
 *
 * Whitespace and comments are dropped, and variable accesses the parser
 * splits over several tokens (`$$self{Make}`, `$val[0]`) are joined back
 * into one symbol.
 *
 * @module input/ast
 */

import { isRawKind, LEAF_KINDS, type RawKind, type RawNode } from '../ast/raw.js';
import { ParseInputError } from '../errors.js';

const SKIPPED_CLASSES = /^PPI::Token::(?:Whitespace|Comment|Pod|End|Separator)$/;

const CLASS_KINDS: readonly [RegExp, RawKind][] = [
  [/^PPI::Document(?:::Fragment)?$/, 'document'],
  [/^PPI::Statement(?:::\w+)*$/, 'statement'],
  [/^PPI::Structure::List$/, 'list'],
  [/^PPI::Structure::Block$/, 'block'],
  [/^PPI::Structure::Subscript$/, 'subscript'],
  [/^PPI::Token::(?:Symbol|Magic|ArrayIndex)$/, 'symbol'],
  [/^PPI::Token::Cast$/, 'cast'],
  [/^PPI::Token::Number(?:::\w+)?$/, 'number'],
  [/^PPI::Token::Quote(?:::\w+)?$/, 'string'],
  [/^PPI::Token::Operator$/, 'operator'],
  [/^PPI::Token::Word$/, 'word'],
  [/^PPI::Token::(?:Regexp::Match|QuoteLike::Regexp)$/, 'regex'],
  [/^PPI::Token::Regexp::Substitute$/, 'substitution'],
  [/^PPI::Token::Regexp::Transliterate$/, 'transliteration'],
  [/^PPI::Token::Structure$/, 'structure'],
];

function classKind(className: string, path: string): RawKind {
  for (const [pattern, kind] of CLASS_KINDS) {
    if (pattern.test(className)) return kind;
  }
  throw new ParseInputError(`Unsupported node class '${className}'`, path);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(node: Record<string, unknown>, key: string, path: string): string | undefined {
  const value = node[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ParseInputError(`'${key}' must be a string`, path);
  }
  return value;
}

function readKind(node: Record<string, unknown>, path: string): RawKind | null {
  if (typeof node.kind === 'string') {
    if (!isRawKind(node.kind)) {
      throw new ParseInputError(`Unknown node kind '${node.kind}'`, path);
    }
    return node.kind;
  }
  if (typeof node.class === 'string') {
    return SKIPPED_CLASSES.test(node.class) ? null : classKind(node.class, path);
  }
  throw new ParseInputError("Node has neither 'kind' nor 'class'", path);
}

/** `structure_bounds` looks like `( ... )`; the first character is the opener. */
function opener(node: Record<string, unknown>, path: string): string | undefined {
  const bounds = optionalString(node, 'structure_bounds', path);
  return bounds === undefined ? undefined : bounds.trim().charAt(0) || undefined;
}

function read(value: unknown, path: string): RawNode | null {
  if (!isRecord(value)) {
    throw new ParseInputError('Node must be an object', path);
  }
  const kind = readKind(value, path);
  if (kind === null) return null;

  let content = optionalString(value, 'content', path);
  if (content === undefined && (kind === 'list' || kind === 'subscript' || kind === 'block')) {
    content = opener(value, path);
  }
  if (LEAF_KINDS.has(kind) && content === undefined) {
    throw new ParseInputError(`A '${kind}' node needs content`, path);
  }

  let rawChildren: unknown[] = [];
  if (Array.isArray(value.children)) {
    rawChildren = value.children;
  } else if (value.children !== undefined && value.children !== null) {
    throw new ParseInputError("'children' must be an array", path);
  }
  const children: RawNode[] = [];
  rawChildren.forEach((child, i) => {
    const node = read(child, `${path}.children[${i}]`);
    if (node) children.push(node);
  });
  if (LEAF_KINDS.has(kind) && children.length > 0) {
    throw new ParseInputError(`A '${kind}' node cannot have children`, path);
  }

  const node: RawNode = { kind };
  if (content !== undefined) node.content = content;
  if (children.length > 0) node.children = joinAccesses(children);
  return node;
}

/** Token text of a subtree, concatenated. */
function flatText(node: RawNode): string {
  return node.content !== undefined && LEAF_KINDS.has(node.kind)
    ? node.content
    : (node.children ?? []).map(flatText).join('');
}

function subscriptText(node: RawNode): string | undefined {
  const open = node.content;
  if (open === '{') return `{${flatText(node)}}`;
  if (open === '[') return `[${flatText(node)}]`;
  return undefined;
}

/**
 * Join `cast $` + `symbol $self` + `subscript {X}`, `symbol $$self` +
 * `subscript {X}`, `symbol $self` + `operator ->` + `subscript {X}` and
 * `symbol $x` + `subscript [N]` into single symbols.
 */
function joinAccesses(children: RawNode[]): RawNode[] {
  const out: RawNode[] = [];
  for (let i = 0; i < children.length; i++) {
    const node = children[i];
    const next = children[i + 1];
    const after = children[i + 2];

    if (node.kind === 'cast' && node.content === '$' && next?.kind === 'symbol' && after?.kind === 'subscript') {
      const subscript = subscriptText(after);
      if (subscript !== undefined) {
        out.push({ kind: 'symbol', content: `$${next.content ?? ''}${subscript}` });
        i += 2;
        continue;
      }
    }
    if (node.kind === 'symbol' && next?.kind === 'operator' && next.content === '->' && after?.kind === 'subscript') {
      const subscript = subscriptText(after);
      if (subscript !== undefined) {
        out.push({ kind: 'symbol', content: `${node.content ?? ''}->${subscript}` });
        i += 2;
        continue;
      }
    }
    if (node.kind === 'symbol' && next?.kind === 'subscript') {
      const subscript = subscriptText(next);
      if (subscript !== undefined) {
        out.push({ kind: 'symbol', content: `${node.content ?? ''}${subscript}` });
        i += 1;
        continue;
      }
    }
    out.push(node);
  }
  return out;
}

/**
 * Convert one upstream AST to a raw tree. Throws `ParseInputError` with
 * the path of the first malformed node.
 */
export function toRawNode(value: unknown, path = 'parsed_ast'): RawNode {
  const node = read(value, path);
  if (!node) {
    throw new ParseInputError('AST root is whitespace or a comment', path);
  }
  return node;
}

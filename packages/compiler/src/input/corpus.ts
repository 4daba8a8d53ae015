/**
 * Corpus loading: a JSON or YAML file of expression records.
 *
 * A record missing its type or text is rejected and reported. A record
 * whose AST cannot be read is kept, carrying the `ParseInputError`, so the
 * registry can give it a fallback.
 *
 * @module input/corpus
 */

import { readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import type { RawNode } from '../ast/raw.js';
import { parseExpressionContext, type ExpressionContext } from '../context.js';
import { CorpusError, ParseInputError } from '../errors.js';
import type { UsageContext } from '../registry/types.js';
import { schemaCheck } from '../utils/schema.js';
import { toRawNode } from './ast.js';
import { CORPUS_SCHEMA, EXPRESSION_TYPES, RECORD_SCHEMA } from './schema.js';

export interface ExpressionRecord {
  expression_type: (typeof EXPRESSION_TYPES)[number];
  original_text: string;
  parsed_ast: unknown;
  usage?: UsageContext;
}

type CorpusDocument = unknown[] | { expressions: unknown[] };

interface EntryBase {
  /** Position of the record in the corpus file. */
  index: number;
  context: ExpressionContext;
  originalText: string;
  usage?: UsageContext;
}

export type CorpusEntry =
  | (EntryBase & { status: 'ok'; ast: RawNode })
  | (EntryBase & { status: 'invalid-ast'; error: ParseInputError });

export interface RejectedRecord {
  index: number;
  issues: string[];
}

export interface Corpus {
  source: string;
  entries: CorpusEntry[];
  rejected: RejectedRecord[];
}

const checkCorpus = schemaCheck<CorpusDocument>(CORPUS_SCHEMA);
const checkRecord = schemaCheck<ExpressionRecord>(RECORD_SCHEMA);

/**
 * Validate already-parsed corpus data. `source` names the data in errors.
 */
export function parseCorpus(data: unknown, source = '<corpus>'): Corpus {
  const document = checkCorpus(data);
  if (!document.valid) {
    throw new CorpusError(source, 'expected a list of records or an object with an "expressions" list');
  }
  const records = Array.isArray(document.value) ? document.value : document.value.expressions;

  const corpus: Corpus = { source, entries: [], rejected: [] };
  records.forEach((item, index) => {
    const record = checkRecord(item);
    if (!record.valid) {
      corpus.rejected.push({ index, issues: record.issues.map((issue) => `${issue.path}: ${issue.message}`) });
      return;
    }
    const { expression_type, original_text, parsed_ast, usage } = record.value;
    const context = parseExpressionContext(expression_type);
    if (!context) {
      corpus.rejected.push({ index, issues: [`/expression_type: unknown type '${expression_type}'`] });
      return;
    }

    const base: EntryBase = usage
      ? { index, context, originalText: original_text, usage }
      : { index, context, originalText: original_text };
    try {
      corpus.entries.push({ ...base, status: 'ok', ast: toRawNode(parsed_ast, `[${index}].parsed_ast`) });
    } catch (error) {
      if (!(error instanceof ParseInputError)) throw error;
      corpus.entries.push({ ...base, status: 'invalid-ast', error });
    }
  });
  return corpus;
}

/**
 * Read a corpus file. YAML is a superset of JSON, so one parser covers
 * `.json`, `.yaml` and `.yml`.
 */
export function loadCorpus(file: string): Corpus {
  let text: string;
  try {
    text = readFileSync(file, 'utf-8');
  } catch (error) {
    const e = error instanceof Error ? error : new Error(String(error));
    throw new CorpusError(file, `cannot read file (${e.message})`);
  }

  let data: unknown;
  try {
    data = parseYaml(text);
  } catch (error) {
    const e = error instanceof Error ? error : new Error(String(error));
    throw new CorpusError(file, `cannot parse file (${e.message})`);
  }
  return parseCorpus(data, file);
}

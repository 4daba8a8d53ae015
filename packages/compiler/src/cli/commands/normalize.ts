/**
 * `tagexpr normalize <input>`: print the normalized tree of every record
 * in a corpus.
 *
 * @module cli/commands/normalize
 */

import { resolve } from 'node:path';
import type { NormalizedNode } from '../../ast/normalized.js';
import type { ExpressionContext } from '../../context.js';
import { CorpusError } from '../../errors.js';
import { loadCorpus, type Corpus } from '../../input/corpus.js';
import { Normalizer } from '../../normalize/orchestrator.js';

export interface NormalizeCommandOptions {
  input: string;
  json?: boolean;
  cwd?: string;
}

export interface NormalizedRecord {
  index: number;
  context: ExpressionContext;
  originalText: string;
  tree?: NormalizedNode;
  error?: string;
}

export interface NormalizeCommandResult {
  success: boolean;
  error?: string;
  records: NormalizedRecord[];
}

export function normalizeCorpus(corpus: Corpus): NormalizedRecord[] {
  const normalizer = new Normalizer();
  return corpus.entries.map((entry) => {
    const base = { index: entry.index, context: entry.context, originalText: entry.originalText };
    if (entry.status !== 'ok') return { ...base, error: entry.error.message };
    const normalized = normalizer.tryNormalize(entry.ast);
    return normalized.ok ? { ...base, tree: normalized.value } : { ...base, error: normalized.error.message };
  });
}

export function normalizeCommand(options: NormalizeCommandOptions): NormalizeCommandResult {
  let corpus: Corpus;
  try {
    corpus = loadCorpus(resolve(options.cwd ?? process.cwd(), options.input));
  } catch (error) {
    if (error instanceof CorpusError) {
      console.error(`Error: ${error.message}`);
      return { success: false, error: error.message, records: [] };
    }
    throw error;
  }

  const records = normalizeCorpus(corpus);
  if (options.json) {
    console.log(JSON.stringify(records, null, 2));
  } else {
    for (const record of records) {
      console.log(`[${record.index}] ${record.context}: ${record.originalText}`);
      console.log(record.tree ? JSON.stringify(record.tree, null, 2) : `  ${record.error ?? ''}`);
      console.log('');
    }
    for (const rejected of corpus.rejected) {
      console.warn(`WARN  [${rejected.index}] rejected: ${rejected.issues.join('; ')}`);
    }
  }
  return { success: true, records };
}

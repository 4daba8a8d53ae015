/**
 * Function registry: content-hash deduplication of compiled expressions.
 *
 * Two expressions share a function when their context and normalized tree
 * serialize identically. Each distinct function is resolved once, to
 * generated code, a manual implementation or a fallback. The registry is
 * drained exactly once by `finish()`.
 *
 * @module registry/registry
 */

import { stableSerialize } from '../ast/serialize.js';
import { fallback } from '../codegen/fallback.js';
import { generate } from '../codegen/generator.js';
import { quote } from '../codegen/literals.js';
import { FUNCTION_PREFIX, type ExpressionContext } from '../context.js';
import { CompilerDefect, DuplicateNameCollision } from '../errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { sha256, type HashFunction } from './hash.js';
import { emptyStats, record, type RegistryStats } from './stats.js';
import type {
  FunctionSpec,
  GeneratedFunction,
  LookupEntry,
  ManualImplementation,
  Outcome,
  UsageContext,
} from './types.js';

export const DEFAULT_HASH_LENGTH = 12;

export interface RegistryOptions {
  hash?: HashFunction;
  /** Hex characters of the hash used in function names. */
  hashLength?: number;
  manual?: readonly ManualImplementation[];
  logger?: Logger;
}

export interface RegistryResult {
  /** Sorted by name. */
  functions: GeneratedFunction[];
  /** Sorted by context, then original text. */
  lookup: LookupEntry[];
  stats: RegistryStats;
}

interface Resolution {
  outcome: Outcome;
  code: string;
  reason?: string;
}

interface Entry {
  name: string;
  hash: string;
  canonical: string;
  context: ExpressionContext;
  spec: FunctionSpec | undefined;
  texts: string[];
  usages: UsageContext[];
  specs: number;
  resolution?: Resolution;
}

function manualKey(context: ExpressionContext, originalText: string): string {
  return `${context}\n${originalText}`;
}

export class FunctionRegistry {
  private readonly entries = new Map<string, Entry>();
  private readonly names = new Map<string, Entry>();
  private readonly manual = new Map<string, ManualImplementation>();
  private readonly hash: HashFunction;
  private readonly hashLength: number;
  private readonly logger: Logger;
  private finished = false;

  constructor(options: RegistryOptions = {}) {
    this.hash = options.hash ?? sha256;
    this.hashLength = options.hashLength ?? DEFAULT_HASH_LENGTH;
    this.logger = options.logger ?? silentLogger;
    for (const impl of options.manual ?? []) {
      this.manual.set(manualKey(impl.context, impl.originalText), impl);
    }
  }

  /**
   * Register an expression and return its function name. A structurally
   * identical expression already registered in the same context reuses
   * the existing name.
   */
  register(spec: FunctionSpec): string {
    return this.intern(spec.context, stableSerialize(spec.ast), spec, spec.originalText, spec.usage).name;
  }

  /**
   * Register an expression and resolve its function, generating code the
   * first time the function is seen.
   */
  resolveOrFallback(spec: FunctionSpec): GeneratedFunction {
    const entry = this.intern(spec.context, stableSerialize(spec.ast), spec, spec.originalText, spec.usage);
    this.resolve(entry);
    return this.snapshot(entry);
  }

  /**
   * Register an expression whose AST could not be read. It always gets the
   * context fallback, keyed by its original text.
   */
  registerFallback(
    originalText: string,
    context: ExpressionContext,
    reason: string,
    usage?: UsageContext,
  ): GeneratedFunction {
    const entry = this.intern(context, stableSerialize({ fallback: originalText }), undefined, originalText, usage);
    if (!entry.resolution) {
      entry.resolution = { outcome: 'fallback', code: fallback(context, entry.name, originalText), reason };
      this.logger.warn('Expression falls back', { name: entry.name, context, reason });
    }
    return this.snapshot(entry);
  }

  /**
   * Resolve anything still pending and drain the registry. The registry
   * cannot be used afterwards.
   */
  finish(): RegistryResult {
    this.assertOpen();
    this.finished = true;

    const stats = emptyStats();
    const functions: GeneratedFunction[] = [];
    const lookup = new Map<string, LookupEntry>();

    for (const entry of this.entries.values()) {
      const resolution = this.resolve(entry);
      record(stats, entry.context, resolution.outcome, entry.specs);
      if (resolution.outcome === 'fallback') {
        for (const originalText of entry.texts) {
          stats.fallbacks.push({
            originalText,
            context: entry.context,
            name: entry.name,
            reason: resolution.reason ?? 'unknown',
          });
        }
      }
      functions.push(this.snapshot(entry));
      for (const originalText of entry.texts) {
        const key = manualKey(entry.context, originalText);
        const existing = lookup.get(key);
        if (existing) {
          this.logger.debug('Original text maps to more than one function', {
            originalText,
            kept: existing.name,
            dropped: entry.name,
          });
          continue;
        }
        lookup.set(key, { originalText, context: entry.context, name: entry.name });
      }
    }

    functions.sort((a, b) => compare(a.name, b.name));
    const entries = [...lookup.values()].sort(
      (a, b) => compare(a.context, b.context) || compare(a.originalText, b.originalText),
    );
    stats.fallbacks.sort((a, b) => compare(a.name, b.name) || compare(a.originalText, b.originalText));

    this.logger.info('Registry finished', {
      functions: functions.length,
      expressions: stats.total.attempts,
      fallbacks: stats.total.fallback,
    });
    return { functions, lookup: entries, stats };
  }

  private assertOpen(): void {
    if (this.finished) {
      throw new CompilerDefect('Function registry used after finish()');
    }
  }

  private intern(
    context: ExpressionContext,
    canonical: string,
    spec: FunctionSpec | undefined,
    originalText: string,
    usage: UsageContext | undefined,
  ): Entry {
    this.assertOpen();
    const hash = this.hash(`${context}\n${canonical}`);
    let entry = this.entries.get(hash);

    if (entry) {
      if (entry.canonical !== canonical || entry.context !== context) {
        throw new DuplicateNameCollision(hash, entry.canonical, canonical);
      }
      this.logger.debug('Expression deduplicated', { name: entry.name, originalText });
    } else {
      const name = `${FUNCTION_PREFIX[context]}_${hash.slice(0, this.hashLength)}`;
      const clash = this.names.get(name);
      if (clash) {
        throw new DuplicateNameCollision(hash.slice(0, this.hashLength), clash.canonical, canonical);
      }
      entry = { name, hash, canonical, context, spec, texts: [], usages: [], specs: 0 };
      this.entries.set(hash, entry);
      this.names.set(name, entry);
    }

    entry.specs += 1;
    if (!entry.texts.includes(originalText)) entry.texts.push(originalText);
    if (usage) entry.usages.push(usage);
    return entry;
  }

  private resolve(entry: Entry): Resolution {
    if (entry.resolution) return entry.resolution;
    const spec = entry.spec;
    if (!spec) {
      throw new CompilerDefect(`Function ${entry.name} has neither a tree nor a fallback`);
    }

    const generated = generate(spec.ast, spec.context, entry.name);
    if (generated.ok) {
      entry.resolution = { outcome: 'generated', code: generated.value };
      return entry.resolution;
    }

    const reason = generated.error.message;
    const impl = entry.texts
      .map((text) => this.manual.get(manualKey(entry.context, text)))
      .find((candidate) => candidate !== undefined);
    if (impl) {
      entry.resolution = {
        outcome: 'manual',
        code: `export { ${impl.export} as ${entry.name} } from ${quote(impl.module)};`,
        reason,
      };
      this.logger.debug('Using manual implementation', { name: entry.name, module: impl.module, export: impl.export });
      return entry.resolution;
    }

    entry.resolution = { outcome: 'fallback', code: fallback(entry.context, entry.name, spec.originalText), reason };
    this.logger.warn('Expression falls back', { name: entry.name, context: entry.context, reason });
    return entry.resolution;
  }

  private snapshot(entry: Entry): GeneratedFunction {
    const resolution = this.resolve(entry);
    const base = {
      name: entry.name,
      hash: entry.hash,
      context: entry.context,
      outcome: resolution.outcome,
      code: resolution.code,
      originalTexts: [...entry.texts],
      usages: [...entry.usages],
    };
    return resolution.reason === undefined ? base : { ...base, reason: resolution.reason };
  }
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

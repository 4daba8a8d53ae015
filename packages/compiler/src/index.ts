/**
 * tagexpr
 *
 * Compiles parsed tag-table expressions into deduplicated TypeScript
 * functions over `tagexpr-runtime`.
 *
 * @module tagexpr
 */

export type { RawKind, RawNode } from './ast/raw.js';
export { RAW_KINDS, isRawKind } from './ast/raw.js';
export type {
  NormalizedNode,
  NormalizedKind,
  BinaryOperator,
  UnaryOperator,
  AssignmentOperator,
} from './ast/normalized.js';
export { stableSerialize, serializeTree, treesEqual } from './ast/serialize.js';

export {
  type ExpressionContext,
  EXPRESSION_CONTEXTS,
  FUNCTION_PREFIX,
  parseExpressionContext,
} from './context.js';
export {
  ParseInputError,
  UnsupportedConstruct,
  CompilerDefect,
  PrecedenceInvariantViolation,
  DuplicateNameCollision,
  ConfigError,
  CorpusError,
} from './errors.js';

export { Normalizer, normalize, foldPasses, type NormalizeResult, type NormalizerOptions } from './normalize/orchestrator.js';
export { type NormalizerPass, type PrecedenceTier, TIER_RANK, sortByTier } from './normalize/pass.js';
export { DEFAULT_PASSES } from './normalize/passes/index.js';

export { generate, signature, type GenerateOptions, type GenerateResult } from './codegen/generator.js';
export { fallback } from './codegen/fallback.js';
export {
  instantiate,
  DEFAULT_RUNTIME_IMPORT,
  type CompiledModule,
  type InstantiateOptions,
} from './codegen/loader.js';

export { FunctionRegistry, DEFAULT_HASH_LENGTH, type RegistryOptions, type RegistryResult } from './registry/registry.js';
export { sha256, type HashFunction } from './registry/hash.js';
export { formatReport, coverage, type RegistryStats, type ContextStats, type FallbackRecord } from './registry/stats.js';
export {
  emitModules,
  writeModules,
  GENERATED_HEADER,
  type Layout,
  type EmitOptions,
  type EmittedFile,
} from './registry/emit.js';
export type {
  FunctionSpec,
  GeneratedFunction,
  LookupEntry,
  ManualImplementation,
  Outcome,
  UsageContext,
} from './registry/types.js';

export { toRawNode } from './input/ast.js';
export { loadCorpus, parseCorpus, type Corpus, type CorpusEntry, type RejectedRecord } from './input/corpus.js';
export { loadConfig, parseConfig, DEFAULT_CONFIG, CONFIG_FILES, type LoadedConfig } from './config/loader.js';
export type { CompilerConfig, ConfigFile } from './config/schema.js';

export { compileCorpus, compileExpression, type CompileOptions, type CompileResult } from './pipeline.js';
export { createLogger, silentLogger, type Logger, type LogLevel } from './utils/logger.js';

/**
 * `tagexpr compile [input]`: compile a corpus and write the generated
 * modules.
 *
 * @module cli/commands/compile
 */

import { resolve } from 'node:path';
import { loadConfig, type LoadedConfig } from '../../config/loader.js';
import { CompilerDefect, ConfigError, CorpusError } from '../../errors.js';
import { loadCorpus } from '../../input/corpus.js';
import { compileCorpus, type CompileResult } from '../../pipeline.js';
import { emitModules, isLayout, writeModules } from '../../registry/emit.js';
import { formatReport, type RegistryStats } from '../../registry/stats.js';
import { createLogger, isLogLevel, type LogLevel } from '../../utils/logger.js';

export interface CompileCommandOptions {
  input?: string;
  config?: string;
  out?: string;
  layout?: string;
  logLevel?: string;
  failOnFallback?: boolean;
  json?: boolean;
  quiet?: boolean;
  cwd?: string;
}

export interface CompileCommandResult {
  success: boolean;
  /** The arguments were wrong; nothing was compiled. */
  usageError?: string;
  error?: string;
  files: string[];
  rejected: number;
  stats?: RegistryStats;
}

function failure(error: string, usageError?: string): CompileCommandResult {
  return usageError === undefined
    ? { success: false, error, files: [], rejected: 0 }
    : { success: false, error, usageError, files: [], rejected: 0 };
}

export function compile(options: CompileCommandOptions): CompileCommandResult {
  const cwd = options.cwd ?? process.cwd();

  let loaded: LoadedConfig;
  try {
    loaded = loadConfig({ file: options.config, cwd });
  } catch (error) {
    if (error instanceof ConfigError) return failure(error.message);
    throw error;
  }
  const config = loaded.config;

  const input = options.input ? resolve(cwd, options.input) : config.input;
  if (!input) {
    return failure('No input corpus given', 'Usage: tagexpr compile <input> (or set "input" in the config file)');
  }
  const layout = options.layout ?? config.layout;
  if (!isLayout(layout)) {
    return failure(`Unknown layout '${layout}'`, 'Layout must be "single" or "prefix"');
  }
  let level: LogLevel = config.logLevel;
  if (options.logLevel !== undefined) {
    if (!isLogLevel(options.logLevel)) {
      return failure(`Unknown log level '${options.logLevel}'`, 'Log level must be debug, info, warn, error or silent');
    }
    level = options.logLevel;
  }
  const logger = createLogger(options.quiet ? 'silent' : level);
  const outDir = options.out ? resolve(cwd, options.out) : config.outDir;
  const failOnFallback = options.failOnFallback ?? config.failOnFallback;

  let result: CompileResult;
  try {
    const corpus = loadCorpus(input);
    result = compileCorpus(corpus, { hashLength: config.hashLength, manual: config.manual, logger });
  } catch (error) {
    if (error instanceof CorpusError || error instanceof CompilerDefect) {
      logger.error('Compilation aborted', { input }, error);
      return failure(error.message);
    }
    throw error;
  }

  const files = writeModules(emitModules(result, { layout, runtimeImport: config.runtimeImport }), outDir);
  const fallbacks = result.stats.total.fallback;
  const success = !(failOnFallback && fallbacks > 0);
  const outcome: CompileCommandResult = { success, files, rejected: result.rejected.length, stats: result.stats };
  if (!success) {
    outcome.error = `${fallbacks} expression(s) fell back`;
  }

  if (options.json) {
    console.log(JSON.stringify(outcome, null, 2));
  } else if (!options.quiet) {
    console.log(formatReport(result.stats));
    console.log('');
    if (result.rejected.length > 0) {
      console.log(`${result.rejected.length} record(s) rejected`);
    }
    console.log(`Wrote ${files.length} file(s) to ${outDir}`);
  }
  return outcome;
}

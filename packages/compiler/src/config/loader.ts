/**
 * Loading `tagexpr.config.yaml` (also `.yml` and `.json`).
 *
 * @module config/loader
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { DEFAULT_RUNTIME_IMPORT } from '../codegen/loader.js';
import { parseExpressionContext } from '../context.js';
import { ConfigError } from '../errors.js';
import { DEFAULT_HASH_LENGTH } from '../registry/registry.js';
import type { ManualImplementation } from '../registry/types.js';
import { schemaCheck } from '../utils/schema.js';
import { CONFIG_SCHEMA, type CompilerConfig, type ConfigFile } from './schema.js';

export const CONFIG_FILES = ['tagexpr.config.yaml', 'tagexpr.config.yml', 'tagexpr.config.json'];

export const DEFAULT_CONFIG: Readonly<CompilerConfig> = {
  outDir: 'generated',
  layout: 'single',
  runtimeImport: DEFAULT_RUNTIME_IMPORT,
  hashLength: DEFAULT_HASH_LENGTH,
  failOnFallback: false,
  logLevel: 'info',
  manual: [],
};

export interface LoadedConfig {
  config: CompilerConfig;
  /** Absent when no config file was found and defaults are in use. */
  file?: string;
}

const checkConfig = schemaCheck<ConfigFile>(CONFIG_SCHEMA);

export function findConfigFile(cwd: string): string | undefined {
  return CONFIG_FILES.map((name) => join(cwd, name)).find((path) => existsSync(path));
}

/**
 * Validate config data and merge it over the defaults. Relative `input`
 * and `outDir` paths are resolved against `baseDir`.
 */
export function parseConfig(data: unknown, file: string, baseDir: string): CompilerConfig {
  const checked = checkConfig(data ?? {});
  if (!checked.valid) {
    throw new ConfigError(
      file,
      checked.issues.map((issue) => `${issue.path}: ${issue.message}`),
    );
  }
  const raw = checked.value;

  const manual: ManualImplementation[] = [];
  for (const entry of raw.manual ?? []) {
    const context = parseExpressionContext(entry.expression_type);
    if (!context) {
      throw new ConfigError(file, [`/manual: unknown expression_type '${entry.expression_type}'`]);
    }
    manual.push({ context, originalText: entry.original_text, module: entry.module, export: entry.export });
  }

  const config: CompilerConfig = {
    outDir: resolve(baseDir, raw.outDir ?? DEFAULT_CONFIG.outDir),
    layout: raw.layout ?? DEFAULT_CONFIG.layout,
    runtimeImport: raw.runtimeImport ?? DEFAULT_CONFIG.runtimeImport,
    hashLength: raw.hashLength ?? DEFAULT_CONFIG.hashLength,
    failOnFallback: raw.failOnFallback ?? DEFAULT_CONFIG.failOnFallback,
    logLevel: raw.logLevel ?? DEFAULT_CONFIG.logLevel,
    manual,
  };
  if (raw.input !== undefined) {
    config.input = resolve(baseDir, raw.input);
  }
  return config;
}

/**
 * Load the given config file, or the first of `CONFIG_FILES` found in
 * `cwd`. Without either, the defaults apply.
 */
export function loadConfig(options: { file?: string; cwd?: string } = {}): LoadedConfig {
  const cwd = options.cwd ?? process.cwd();
  const file = options.file ? resolve(cwd, options.file) : findConfigFile(cwd);
  if (!file) {
    return { config: parseConfig({}, '<defaults>', cwd) };
  }

  let data: unknown;
  try {
    data = parseYaml(readFileSync(file, 'utf-8'));
  } catch (error) {
    const e = error instanceof Error ? error : new Error(String(error));
    throw new ConfigError(file, [e.message]);
  }
  return { config: parseConfig(data, file, dirname(file)), file };
}

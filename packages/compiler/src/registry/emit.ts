/**
 * Emitter: turns a drained registry into module files.
 *
 * Layouts:
 *   single  functions.ts
 *   prefix  functions/hash_<xx>.ts per two-hex-char hash prefix, plus
 *           functions/index.ts re-exporting all of them
 *
 * Both layouts also produce lookup.ts (original text → function, one map
 * per context) and lookup.json.
 *
 * @module registry/emit
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { docComment } from '../codegen/generator.js';
import { DEFAULT_RUNTIME_IMPORT } from '../codegen/loader.js';
import { quote } from '../codegen/literals.js';
import { EXPRESSION_CONTEXTS, type ExpressionContext } from '../context.js';
import type { RegistryResult } from './registry.js';
import type { GeneratedFunction, LookupEntry } from './types.js';

export type Layout = 'single' | 'prefix';

export const LAYOUTS: readonly Layout[] = ['single', 'prefix'];

export const GENERATED_HEADER = '// Generated by tagexpr. Do not edit.';

export interface EmitOptions {
  layout?: Layout;
  runtimeImport?: string;
}

export interface EmittedFile {
  /** Relative to the output directory, `/`-separated. */
  path: string;
  contents: string;
}

const LOOKUP_TABLES: Record<ExpressionContext, { name: string; type: string }> = {
  ValueTransform: { name: 'VALUE_TRANSFORMS', type: '(val: TagValue) => ConvResult' },
  DisplayFormat: { name: 'DISPLAY_FORMATS', type: '(val: TagValue) => string' },
  BooleanGate: { name: 'BOOLEAN_GATES', type: '(val: TagValue, ctx: EvalContext) => boolean' },
};

export function isLayout(value: string): value is Layout {
  return LAYOUTS.some((layout) => layout === value);
}

function oneLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Doc comment lines: the original texts, then where they are used. */
export function describe(fn: GeneratedFunction): string[] {
  const lines = fn.originalTexts.map((text) => `\`${oneLine(text)}\``);
  const usages = [...new Set(fn.usages.map((u) => `${u.module}.${u.table}.${u.tag}`))].sort();
  if (usages.length > 0) {
    lines.push('', `Used by: ${usages.join(', ')}`);
  }
  if (fn.outcome !== 'generated' && fn.reason !== undefined) {
    lines.push('', `${fn.outcome === 'manual' ? 'Manual implementation' : 'Fallback'}: ${fn.reason}`);
  }
  return lines;
}

function renderFunctions(functions: readonly GeneratedFunction[], runtimeImport: string): string {
  const blocks = functions.map((fn) => [...docComment(describe(fn)), fn.code].join('\n'));
  return [GENERATED_HEADER, '', `import * as rt from ${quote(runtimeImport)};`, '', blocks.join('\n\n'), ''].join('\n');
}

function renderLookup(entries: readonly LookupEntry[], functionsModule: string, runtimeImport: string): string {
  const lines = [
    GENERATED_HEADER,
    '',
    `import type { ConvResult, EvalContext, TagValue } from ${quote(runtimeImport)};`,
    `import * as fn from ${quote(functionsModule)};`,
  ];
  for (const context of EXPRESSION_CONTEXTS) {
    const table = LOOKUP_TABLES[context];
    const rows = entries
      .filter((entry) => entry.context === context)
      .map((entry) => `  [${quote(entry.originalText)}, fn.${entry.name}],`);
    lines.push('');
    lines.push(`export const ${table.name}: ReadonlyMap<string, ${table.type}> = new Map([`);
    lines.push(...rows);
    lines.push(']);');
  }
  lines.push('');
  return lines.join('\n');
}

function renderLookupJson(entries: readonly LookupEntry[]): string {
  const table: Record<string, Record<string, string>> = {};
  for (const context of EXPRESSION_CONTEXTS) {
    table[context] = {};
  }
  for (const entry of entries) {
    table[entry.context][entry.originalText] = entry.name;
  }
  return `${JSON.stringify(table, null, 2)}\n`;
}

export function emitModules(result: RegistryResult, options: EmitOptions = {}): EmittedFile[] {
  const layout = options.layout ?? 'single';
  const runtimeImport = options.runtimeImport ?? DEFAULT_RUNTIME_IMPORT;
  const files: EmittedFile[] = [];

  if (layout === 'single') {
    files.push({ path: 'functions.ts', contents: renderFunctions(result.functions, runtimeImport) });
  } else {
    const groups = new Map<string, GeneratedFunction[]>();
    for (const fn of result.functions) {
      const prefix = fn.hash.slice(0, 2);
      const group = groups.get(prefix) ?? [];
      group.push(fn);
      groups.set(prefix, group);
    }
    const prefixes = [...groups.keys()].sort();
    for (const prefix of prefixes) {
      files.push({
        path: `functions/hash_${prefix}.ts`,
        contents: renderFunctions(groups.get(prefix) ?? [], runtimeImport),
      });
    }
    const reexports = prefixes.map((prefix) => `export * from './hash_${prefix}.js';`);
    files.push({ path: 'functions/index.ts', contents: [GENERATED_HEADER, '', ...reexports, ''].join('\n') });
  }

  const functionsModule = layout === 'single' ? './functions.js' : './functions/index.js';
  files.push({ path: 'lookup.ts', contents: renderLookup(result.lookup, functionsModule, runtimeImport) });
  files.push({ path: 'lookup.json', contents: renderLookupJson(result.lookup) });
  return files;
}

/** Write emitted files below `outDir`, creating directories as needed. */
export function writeModules(files: readonly EmittedFile[], outDir: string): string[] {
  const written: string[] = [];
  for (const file of files) {
    const target = join(outDir, ...file.path.split('/'));
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, file.contents, 'utf-8');
    written.push(target);
  }
  return written;
}

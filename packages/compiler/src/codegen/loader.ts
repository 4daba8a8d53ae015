/**
 * In-process loading of generated modules.
 *
 * A generated module is transpiled with the TypeScript compiler API and
 * evaluated against the runtime package. The accessors check every value
 * that crosses back from generated code, so callers get typed functions.
 *
 * @module codegen/loader
 */

import ts from 'typescript';
import * as runtime from 'tagexpr-runtime';
import { ConvError, createEvalContext, type ConvResult, type EvalContext, type TagValue } from 'tagexpr-runtime';
import { CompilerDefect } from '../errors.js';

export const DEFAULT_RUNTIME_IMPORT = 'tagexpr-runtime';

export interface InstantiateOptions {
  /** Specifier the generated code imports the runtime under. */
  runtimeImport?: string;
  /** Additional modules by specifier, e.g. for manual implementations. */
  modules?: Readonly<Record<string, unknown>>;
}

export interface CompiledModule {
  readonly names: readonly string[];
  valueTransform(name: string): (val: TagValue) => ConvResult;
  displayFormat(name: string): (val: TagValue) => string;
  booleanGate(name: string): (val: TagValue, ctx?: EvalContext) => boolean;
}

export function isTagValue(value: unknown): value is TagValue {
  if (value === undefined || typeof value === 'string' || typeof value === 'number') return true;
  return Array.isArray(value) && value.every(isTagValue);
}

export function isConvResult(value: unknown): value is ConvResult {
  if (typeof value !== 'object' || value === null || !('ok' in value)) return false;
  if (value.ok === true) return 'value' in value && isTagValue(value.value);
  return value.ok === false && 'error' in value && value.error instanceof ConvError;
}

function transpile(source: string): string {
  const output = ts.transpileModule(source, {
    compilerOptions: {
      module: ts.ModuleKind.CommonJS,
      target: ts.ScriptTarget.ES2022,
      esModuleInterop: false,
    },
    reportDiagnostics: true,
  });
  const errors = (output.diagnostics ?? []).filter((d) => d.category === ts.DiagnosticCategory.Error);
  if (errors.length > 0) {
    const message = errors.map((d) => ts.flattenDiagnosticMessageText(d.messageText, '\n')).join('\n');
    throw new CompilerDefect(`Generated module does not transpile:\n${message}`);
  }
  return output.outputText;
}

/**
 * Transpile and evaluate one generated module.
 */
export function instantiate(source: string, options: InstantiateOptions = {}): CompiledModule {
  const runtimeImport = options.runtimeImport ?? DEFAULT_RUNTIME_IMPORT;
  const modules = new Map<string, unknown>(Object.entries(options.modules ?? {}));
  modules.set(runtimeImport, runtime);

  const exports: Record<string, unknown> = {};
  const require = (specifier: string): unknown => {
    if (!modules.has(specifier)) {
      throw new Error(`Generated module imports unknown module '${specifier}'`);
    }
    return modules.get(specifier);
  };
  const evaluate = new Function('exports', 'require', transpile(source));
  evaluate(exports, require);

  const lookup = (name: string): ((...args: unknown[]) => unknown) => {
    const fn = Object.hasOwn(exports, name) ? exports[name] : undefined;
    if (typeof fn !== 'function') {
      throw new Error(`Module has no exported function '${name}'`);
    }
    return (...args: unknown[]): unknown => fn(...args);
  };

  const names = Object.keys(exports)
    .filter((key) => key !== '__esModule')
    .sort();

  return {
    names,

    valueTransform(name) {
      const fn = lookup(name);
      return (val) => {
        const out = fn(val);
        if (!isConvResult(out)) {
          throw new CompilerDefect(`Value transform '${name}' returned a non-result value`);
        }
        return out;
      };
    },

    displayFormat(name) {
      const fn = lookup(name);
      return (val) => {
        const out = fn(val);
        if (typeof out !== 'string') {
          throw new CompilerDefect(`Display format '${name}' returned a non-string value`);
        }
        return out;
      };
    },

    booleanGate(name) {
      const fn = lookup(name);
      return (val, ctx = createEvalContext()) => {
        const out = fn(val, ctx);
        if (typeof out !== 'boolean') {
          throw new CompilerDefect(`Boolean gate '${name}' returned a non-boolean value`);
        }
        return out;
      };
    },
  };
}

/**
 * `tagexpr try <context> <ast>`: compile one expression, print the
 * generated function and optionally run it on a value.
 *
 * @module cli/commands/try
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml, YAMLParseError } from 'yaml';
import { str } from 'tagexpr-runtime';
import { instantiate } from '../../codegen/loader.js';
import { parseExpressionContext } from '../../context.js';
import { ParseInputError } from '../../errors.js';
import { toRawNode } from '../../input/ast.js';
import { compileExpression } from '../../pipeline.js';
import { emitModules } from '../../registry/emit.js';
import { emptyStats } from '../../registry/stats.js';
import type { GeneratedFunction } from '../../registry/types.js';

export interface TryCommandOptions {
  context: string;
  /** AST as JSON/YAML text, or a path to a file holding it. */
  ast: string;
  /** Original expression text, used in docs and fallbacks. */
  text?: string;
  value?: string;
  json?: boolean;
  cwd?: string;
}

export interface TryCommandResult {
  success: boolean;
  usageError?: string;
  error?: string;
  fn?: GeneratedFunction;
  output?: string;
}

function readAst(source: string, cwd: string): unknown {
  const path = resolve(cwd, source);
  return parseYaml(existsSync(path) ? readFileSync(path, 'utf-8') : source);
}

/** Run the generated function and describe its result. */
function run(source: string, fn: GeneratedFunction, value: string): string {
  const loaded = instantiate(source);
  switch (fn.context) {
    case 'ValueTransform': {
      const result = loaded.valueTransform(fn.name)(value);
      return result.ok ? `ok: ${str(result.value)}` : `error (${result.error.code}): ${result.error.message}`;
    }
    case 'DisplayFormat':
      return loaded.displayFormat(fn.name)(value);
    case 'BooleanGate':
      return String(loaded.booleanGate(fn.name)(value));
  }
}

export function tryExpression(options: TryCommandOptions): TryCommandResult {
  const context = parseExpressionContext(options.context);
  if (!context) {
    return {
      success: false,
      usageError: `Unknown expression context '${options.context}'`,
    };
  }

  let fn: GeneratedFunction;
  try {
    const raw = toRawNode(readAst(options.ast, options.cwd ?? process.cwd()));
    fn = compileExpression(raw, context, options.text ?? 'expression').fn;
  } catch (error) {
    if (error instanceof ParseInputError || error instanceof YAMLParseError) {
      console.error(`Error: ${error.message}`);
      return { success: false, error: error.message };
    }
    throw error;
  }

  const [file] = emitModules({ functions: [fn], lookup: [], stats: emptyStats() });
  const result: TryCommandResult = { success: true, fn };
  if (options.value !== undefined) {
    result.output = run(file.contents, fn, options.value);
  }

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    console.log(file.contents);
    if (fn.outcome !== 'generated') {
      console.log(`// ${fn.outcome}: ${fn.reason ?? ''}`);
    }
    if (result.output !== undefined) {
      console.log(`${JSON.stringify(options.value)} => ${result.output}`);
    }
  }
  return result;
}

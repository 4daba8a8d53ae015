#!/usr/bin/env node

import { parseArgs } from './args.js';
import { compile } from './commands/compile.js';
import { normalizeCommand } from './commands/normalize.js';
import { tryExpression } from './commands/try.js';

const VERSION = '0.1.0';

function printHelp(): void {
  console.log(`
tagexpr - Compile tag-table expressions into TypeScript functions

Usage:
  tagexpr <command> [options]

Commands:
  compile [input]                   Compile a corpus and write generated modules
  normalize <input>                 Print the normalized tree of every record
  try <context> <ast>               Compile one expression (AST as JSON or a file)
  version                           Show version information
  help                              Show this help message

Global Options:
  --json              Output as JSON
  --quiet, -q         Suppress output
  --help, -h          Show help

Command Options:
  compile:
    --config <file>       Config file (default: tagexpr.config.yaml)
    --out <dir>           Output directory (default: "generated")
    --layout <layout>     "single" or "prefix"
    --log-level <level>   debug, info, warn, error or silent
    --fail-on-fallback    Exit with 1 if any expression fell back

  try:
    --value <value>       Run the generated function on this value
    --text <text>         Original expression text for the doc comment

Contexts:
  ValueTransform (ValueConv), DisplayFormat (PrintConv), BooleanGate (Condition)

Exit Codes:
  0  Success
  1  Failure (invalid config or corpus, compiler defect, fallbacks with --fail-on-fallback)
  2  Usage error (invalid arguments)

Examples:
  tagexpr compile corpus.json --out src/generated
  tagexpr compile --layout prefix --fail-on-fallback
  tagexpr normalize corpus.yaml --json
  tagexpr try ValueConv ast.json --value 250
`);
}

function printVersion(): void {
  console.log(`tagexpr v${VERSION}`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const { command, positionals, flags, options } = parseArgs(args);

  if (flags['help'] || command === 'help') {
    printHelp();
    process.exit(0);
  }

  if (flags['version'] || command === 'version') {
    printVersion();
    process.exit(0);
  }

  switch (command) {
    case 'compile': {
      const result = compile({
        input: positionals[0],
        config: options['config'],
        out: options['out'],
        layout: options['layout'],
        logLevel: options['log-level'],
        failOnFallback: flags['fail-on-fallback'],
        json: flags['json'],
        quiet: flags['quiet'],
      });
      if (result.usageError) {
        console.error(result.usageError);
        process.exit(2);
      }
      if (result.error && !flags['json']) {
        console.error(`Error: ${result.error}`);
      }
      process.exit(result.success ? 0 : 1);
      break;
    }

    case 'normalize': {
      if (positionals.length < 1) {
        console.error('Usage: tagexpr normalize <input>');
        process.exit(2);
      }
      const result = normalizeCommand({ input: positionals[0], json: flags['json'] });
      process.exit(result.success ? 0 : 1);
      break;
    }

    case 'try': {
      if (positionals.length < 2) {
        console.error('Usage: tagexpr try <context> <ast>');
        process.exit(2);
      }
      const result = tryExpression({
        context: positionals[0],
        ast: positionals[1],
        text: options['text'],
        value: options['value'],
        json: flags['json'],
      });
      if (result.usageError) {
        console.error(result.usageError);
        process.exit(2);
      }
      process.exit(result.success ? 0 : 1);
      break;
    }

    case '': {
      console.log('tagexpr - Compile tag-table expressions into TypeScript functions');
      console.log('');
      console.log('Run "tagexpr help" for usage information.');
      process.exit(0);
      break;
    }

    default: {
      console.error(`Unknown command: ${command}`);
      console.error('Run "tagexpr help" for usage information.');
      process.exit(2);
    }
  }
}

main().catch((error: unknown) => {
  const e = error instanceof Error ? error : new Error(String(error));
  console.error('Error:', e.message);
  process.exit(1);
});

/**
 * Compiler error taxonomy.
 *
 * `ParseInputError` and `UnsupportedConstruct` are recovered per
 * expression. `CompilerDefect` subclasses abort the whole run.
 *
 * @module errors
 */

/**
 * The upstream AST for one expression is malformed.
 */
export class ParseInputError extends Error {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(`${message} at ${path}`);
    this.name = 'ParseInputError';
  }
}

/**
 * The generator has no rule for a normalized shape.
 */
export class UnsupportedConstruct extends Error {
  constructor(
    public readonly construct: string,
    detail?: string,
  ) {
    super(detail ? `Unsupported construct '${construct}': ${detail}` : `Unsupported construct '${construct}'`);
    this.name = 'UnsupportedConstruct';
  }
}

/**
 * An internal invariant was violated. Continuing would emit wrong code.
 */
export class CompilerDefect extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CompilerDefect';
  }
}

export class PrecedenceInvariantViolation extends CompilerDefect {
  constructor(
    public readonly pass: string,
    public readonly tier: string,
    public readonly previousTier: string,
  ) {
    super(`Pass '${pass}' (${tier}) applied after a ${previousTier} pass`);
    this.name = 'PrecedenceInvariantViolation';
  }
}

export class DuplicateNameCollision extends CompilerDefect {
  constructor(
    public readonly hash: string,
    public readonly existing: string,
    public readonly incoming: string,
  ) {
    super(`Hash ${hash} is shared by two different trees:\n  ${existing}\n  ${incoming}`);
    this.name = 'DuplicateNameCollision';
  }
}

export class ConfigError extends Error {
  readonly errors: string[];

  constructor(file: string, errors: string[]) {
    const summary = errors.map((e) => `  - ${e}`).join('\n');
    super(`Invalid configuration in ${file}:\n${summary}`);
    this.name = 'ConfigError';
    this.errors = errors;
  }
}

/**
 * The corpus file cannot be read or does not hold a list of records.
 */
export class CorpusError extends Error {
  constructor(
    public readonly file: string,
    message: string,
  ) {
    super(`${file}: ${message}`);
    this.name = 'CorpusError';
  }
}

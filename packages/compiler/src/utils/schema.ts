/**
 * JSON Schema validation through ajv (draft 2020-12).
 *
 * @module utils/schema
 */

import { createRequire } from 'node:module';

const require = createRequire(import.meta.url);

export interface SchemaIssue {
  path: string;
  message: string;
  keyword: string;
}

interface AjvErrorObject {
  instancePath: string;
  message?: string;
  keyword: string;
}

interface ValidateFunction<T> {
  (data: unknown): data is T;
  errors?: AjvErrorObject[] | null;
}

interface AjvInstance {
  compile<T>(schema: object): ValidateFunction<T>;
}

interface AjvConstructor {
  new (opts: { allErrors: boolean }): AjvInstance;
}

let _ajv: AjvInstance | null = null;

function getAjv(): AjvInstance {
  if (!_ajv) {
    const { Ajv2020 } = require('ajv/dist/2020') as { Ajv2020: AjvConstructor };
    _ajv = new Ajv2020({ allErrors: true });
  }
  return _ajv;
}

export function formatIssues(errors: readonly AjvErrorObject[]): SchemaIssue[] {
  return errors.map((err) => ({
    path: err.instancePath || '/',
    message: err.message ?? `failed ${err.keyword} validation`,
    keyword: err.keyword,
  }));
}

export type SchemaCheck<T> = (data: unknown) => { valid: true; value: T } | { valid: false; issues: SchemaIssue[] };

/**
 * Build a checker for `schema`. The schema is compiled on first use and
 * reused afterwards.
 */
export function schemaCheck<T>(schema: object): SchemaCheck<T> {
  let validate: ValidateFunction<T> | null = null;
  return (data) => {
    if (!validate) {
      validate = getAjv().compile<T>(schema);
    }
    if (validate(data)) {
      return { valid: true, value: data };
    }
    return { valid: false, issues: formatIssues(validate.errors ?? []) };
  };
}

/**
 * Schema and types for `tagexpr.config.yaml`.
 *
 * @module config/schema
 */

import type { ManualImplementation } from '../registry/types.js';
import type { Layout } from '../registry/emit.js';
import type { LogLevel } from '../utils/logger.js';
import { EXPRESSION_TYPES } from '../input/schema.js';

export interface ManualEntry {
  expression_type: (typeof EXPRESSION_TYPES)[number];
  original_text: string;
  module: string;
  export: string;
}

/** The file as written. Every key is optional. */
export interface ConfigFile {
  input?: string;
  outDir?: string;
  layout?: Layout;
  runtimeImport?: string;
  hashLength?: number;
  failOnFallback?: boolean;
  logLevel?: LogLevel;
  manual?: ManualEntry[];
}

/** Configuration with defaults applied and paths resolved. */
export interface CompilerConfig {
  input?: string;
  outDir: string;
  layout: Layout;
  runtimeImport: string;
  hashLength: number;
  failOnFallback: boolean;
  logLevel: LogLevel;
  manual: ManualImplementation[];
}

export const CONFIG_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  properties: {
    input: { type: 'string', minLength: 1 },
    outDir: { type: 'string', minLength: 1 },
    layout: { enum: ['single', 'prefix'] },
    runtimeImport: { type: 'string', minLength: 1 },
    hashLength: { type: 'integer', minimum: 8, maximum: 64 },
    failOnFallback: { type: 'boolean' },
    logLevel: { enum: ['debug', 'info', 'warn', 'error', 'silent'] },
    manual: {
      type: 'array',
      items: {
        type: 'object',
        required: ['expression_type', 'original_text', 'module', 'export'],
        properties: {
          expression_type: { enum: EXPRESSION_TYPES },
          original_text: { type: 'string', minLength: 1 },
          module: { type: 'string', minLength: 1 },
          export: { type: 'string', pattern: '^[A-Za-z_$][\\w$]*$' },
        },
        additionalProperties: false,
      },
    },
  },
  additionalProperties: false,
} as const;

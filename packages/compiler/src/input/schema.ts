/**
 * JSON Schemas for corpus files.
 *
 * `parsed_ast` is left open here; its shape is checked node by node when
 * it is read, so a bad tree only costs that one expression.
 *
 * @module input/schema
 */

export const EXPRESSION_TYPES = [
  'ValueTransform',
  'DisplayFormat',
  'BooleanGate',
  'ValueConv',
  'PrintConv',
  'Condition',
] as const;

export const RECORD_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  required: ['expression_type', 'original_text', 'parsed_ast'],
  properties: {
    expression_type: { enum: EXPRESSION_TYPES },
    original_text: { type: 'string', minLength: 1 },
    parsed_ast: {},
    usage: {
      type: 'object',
      required: ['module', 'table', 'tag'],
      properties: {
        module: { type: 'string' },
        table: { type: 'string' },
        tag: { type: 'string' },
      },
      additionalProperties: false,
    },
  },
} as const;

export const CORPUS_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  oneOf: [
    { type: 'array' },
    {
      type: 'object',
      required: ['expressions'],
      properties: {
        expressions: { type: 'array' },
      },
    },
  ],
} as const;

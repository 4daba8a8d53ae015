/**
 * Expression contexts: the three calling conventions a compiled function
 * can have.
 *
 * @module context
 */

export type ExpressionContext = 'ValueTransform' | 'DisplayFormat' | 'BooleanGate';

export const EXPRESSION_CONTEXTS: readonly ExpressionContext[] = ['ValueTransform', 'DisplayFormat', 'BooleanGate'];

/** Tag-table names for the same contexts. */
const ALIASES: Readonly<Record<string, ExpressionContext>> = {
  ValueConv: 'ValueTransform',
  PrintConv: 'DisplayFormat',
  Condition: 'BooleanGate',
};

export function parseExpressionContext(value: string): ExpressionContext | undefined {
  for (const context of EXPRESSION_CONTEXTS) {
    if (context === value) return context;
  }
  return Object.hasOwn(ALIASES, value) ? ALIASES[value] : undefined;
}

/** Prefix of generated function names, per context. */
export const FUNCTION_PREFIX: Readonly<Record<ExpressionContext, string>> = {
  ValueTransform: 'value',
  DisplayFormat: 'print',
  BooleanGate: 'condition',
};

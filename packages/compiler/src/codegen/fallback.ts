/**
 * Fallback bodies for expressions the generator cannot compile. They keep
 * the context's calling convention so the dispatcher never needs to know
 * which functions are real.
 *
 * @module codegen/fallback
 */

import type { ExpressionContext } from '../context.js';
import { signature } from './generator.js';
import { quote } from './literals.js';

export function fallback(context: ExpressionContext, functionName: string, originalText: string): string {
  let body: string;
  switch (context) {
    case 'ValueTransform':
      body = `return rt.notImplemented(${quote(originalText)}, val);`;
      break;
    case 'DisplayFormat':
      body = 'return rt.str(val);';
      break;
    case 'BooleanGate':
      body = 'return false;';
      break;
  }
  return [`${signature(context, functionName)} {`, `  ${body}`, '}'].join('\n');
}

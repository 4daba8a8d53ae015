/**
 * Default pass set, in registration order.
 *
 * @module normalize/passes
 */

import type { NormalizerPass } from '../pass.js';
import { binaryOperatorsPass } from './binary-operators.js';
import { conditionalAssignmentPass } from './conditional-assignment.js';
import { formattedPrintPass } from './formatted-print.js';
import { functionCallPass } from './function-call.js';
import { groupingPass } from './grouping.js';
import { logicalWordsPass } from './logical-words.js';
import { postfixConditionalPass } from './postfix-conditional.js';
import { safeDivisionPass } from './safe-division.js';
import { sequencePass } from './sequence.js';
import { stringOpsPass } from './string-ops.js';
import { termsPass } from './terms.js';
import { ternaryPass } from './ternary.js';

export {
  binaryOperatorsPass,
  conditionalAssignmentPass,
  formattedPrintPass,
  functionCallPass,
  groupingPass,
  logicalWordsPass,
  postfixConditionalPass,
  safeDivisionPass,
  sequencePass,
  stringOpsPass,
  termsPass,
  ternaryPass,
};

export const DEFAULT_PASSES: readonly NormalizerPass[] = [
  termsPass,
  groupingPass,
  functionCallPass,
  safeDivisionPass,
  stringOpsPass,
  binaryOperatorsPass,
  ternaryPass,
  formattedPrintPass,
  logicalWordsPass,
  conditionalAssignmentPass,
  postfixConditionalPass,
  sequencePass,
];

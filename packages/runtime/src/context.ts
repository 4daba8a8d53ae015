/**
 * Evaluation context handed to boolean gates.
 *
 * @module context
 */

import type { TagValue } from './value.js';

/**
 * Read access to the values a gate may test besides `$val`. Fields of the
 * processing state (`$$self{Make}`) and other tag values (`$Make`) are
 * separate namespaces: the same name may hold different values in each.
 */
export interface EvalContext {
  field(name: string): TagValue;
  tag(name: string): TagValue;
}

export interface EvalContextValues {
  fields?: Readonly<Record<string, TagValue>>;
  tags?: Readonly<Record<string, TagValue>>;
}

export function createEvalContext(values: EvalContextValues = {}): EvalContext {
  const fields = new Map<string, TagValue>(Object.entries(values.fields ?? {}));
  const tags = new Map<string, TagValue>(Object.entries(values.tags ?? {}));
  return {
    field(name: string): TagValue {
      return fields.get(name);
    },
    tag(name: string): TagValue {
      return tags.get(name);
    },
  };
}

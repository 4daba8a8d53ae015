import { describe, it, expect } from 'vitest';
import { createEvalContext } from '../src/context.js';
import { ConvError } from '../src/errors.js';
import { fail, notImplemented, ok } from '../src/result.js';

describe('result', () => {
  it('should wrap values', () => {
    expect(ok(4)).toEqual({ ok: true, value: 4 });
  });

  it('should pass runtime errors through unchanged', () => {
    const error = new ConvError('division_by_zero', 'Illegal division by zero');
    const result = fail(error);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBe(error);
  });

  it('should wrap foreign errors as internal errors', () => {
    const result = fail('boom');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('internal');
      expect(result.error.message).toBe('boom');
    }
  });

  it('should describe unimplemented expressions', () => {
    const result = notImplemented('$val =~ tr/a//', 'x');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('not_implemented');
      expect(result.error.message).toBe('Expression not implemented: $val =~ tr/a// (value "x")');
    }
  });
});

describe('createEvalContext', () => {
  it('should read named values and return undef for unknown names', () => {
    const ctx = createEvalContext({ tags: { count: 582 } });
    expect(ctx.tag('count')).toBe(582);
    expect(ctx.tag('Make')).toBeUndefined();
    expect(createEvalContext().field('Make')).toBeUndefined();
  });

  it('should keep processing-state fields apart from tag values', () => {
    const ctx = createEvalContext({ fields: { Make: 'Canon' }, tags: { Make: 'Canon EOS' } });
    expect(ctx.field('Make')).toBe('Canon');
    expect(ctx.tag('Make')).toBe('Canon EOS');
  });
});

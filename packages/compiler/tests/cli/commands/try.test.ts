import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tryExpression } from '../../../src/cli/commands/try.js';
import { expr, num, op, str, sym, val } from '../../raw.js';

const TEST_DIR = '/tmp/tagexpr-try-test-' + Date.now();

const scaled = JSON.stringify(expr(val(), op('/'), num('100')));

describe('CLI try', () => {
  beforeEach(() => {
    if (existsSync(TEST_DIR)) rmSync(TEST_DIR, { recursive: true });
    mkdirSync(TEST_DIR, { recursive: true });
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    if (existsSync(TEST_DIR)) rmSync(TEST_DIR, { recursive: true });
    vi.restoreAllMocks();
  });

  it('should compile an inline AST and run it on a value', () => {
    const result = tryExpression({ context: 'ValueConv', ast: scaled, text: '$val / 100', value: '250', cwd: TEST_DIR });

    expect(result.success).toBe(true);
    expect(result.fn?.outcome).toBe('generated');
    expect(result.fn?.context).toBe('ValueTransform');
    expect(result.output).toBe('ok: 2.5');

    const printed = vi.mocked(console.log).mock.calls.map((call) => String(call[0]));
    expect(printed[0]).toContain('    return rt.ok(rt.div(val, 100));');
    expect(printed[1]).toBe('"250" => ok: 2.5');
  });

  it('should read the AST from a file', () => {
    writeFileSync(join(TEST_DIR, 'ast.json'), JSON.stringify(expr(str('"$val mm"'))), 'utf-8');
    const result = tryExpression({ context: 'PrintConv', ast: 'ast.json', value: '12', cwd: TEST_DIR });
    expect(result.output).toBe('12 mm');
  });

  it('should report typed runtime errors', () => {
    const result = tryExpression({ context: 'ValueTransform', ast: scaled, value: 'abc', cwd: TEST_DIR });
    expect(result.output).toBe('error (type_mismatch): Argument "abc" isn\'t numeric');
  });

  it('should show the fallback for unsupported constructs', () => {
    const ast = JSON.stringify(expr(sym('$$self{Make}')));
    const result = tryExpression({ context: 'DisplayFormat', ast, text: '$$self{Make}', value: 'x', json: true, cwd: TEST_DIR });

    expect(result.fn?.outcome).toBe('fallback');
    expect(result.output).toBe('x');
    const printed: unknown = JSON.parse(String(vi.mocked(console.log).mock.calls[0][0]));
    expect(printed).toMatchObject({ success: true, output: 'x', fn: { outcome: 'fallback' } });
  });

  it('should evaluate gates without a processing state', () => {
    const ast = JSON.stringify(expr(val(), op('>'), num('10')));
    expect(tryExpression({ context: 'Condition', ast, value: '11', cwd: TEST_DIR }).output).toBe('true');
    expect(tryExpression({ context: 'Condition', ast, value: '9', cwd: TEST_DIR }).output).toBe('false');
  });

  it('should reject unknown contexts', () => {
    expect(tryExpression({ context: 'Bogus', ast: scaled }).usageError).toBe("Unknown expression context 'Bogus'");
  });

  it('should fail on an unreadable AST', () => {
    const result = tryExpression({ context: 'ValueConv', ast: '{"kind":"bogus"}', cwd: TEST_DIR });
    expect(result.success).toBe(false);
    expect(result.error).toBe("Unknown node kind 'bogus' at parsed_ast");
  });
});

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { normalizeCommand } from '../../../src/cli/commands/normalize.js';
import { expr, num, op, val } from '../../raw.js';

const TEST_DIR = '/tmp/tagexpr-normalize-test-' + Date.now();

describe('CLI normalize', () => {
  beforeEach(() => {
    if (existsSync(TEST_DIR)) rmSync(TEST_DIR, { recursive: true });
    mkdirSync(TEST_DIR, { recursive: true });
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    writeFileSync(
      join(TEST_DIR, 'corpus.json'),
      JSON.stringify([
        { expression_type: 'ValueConv', original_text: '$val * 2', parsed_ast: expr(val(), op('*'), num('2')) },
        { expression_type: 'PrintConv', original_text: '???', parsed_ast: { kind: 'number' } },
        { expression_type: 'Condition', original_text: '', parsed_ast: {} },
      ]),
      'utf-8',
    );
  });

  afterEach(() => {
    if (existsSync(TEST_DIR)) rmSync(TEST_DIR, { recursive: true });
    vi.restoreAllMocks();
  });

  it('should print the normalized tree of every record', () => {
    const result = normalizeCommand({ input: 'corpus.json', cwd: TEST_DIR, json: true });

    expect(result.success).toBe(true);
    expect(result.records).toEqual([
      {
        index: 0,
        context: 'ValueTransform',
        originalText: '$val * 2',
        tree: {
          kind: 'binary',
          operator: '*',
          left: { kind: 'symbol', name: 'val' },
          right: { kind: 'literal', value: 2 },
        },
      },
      {
        index: 1,
        context: 'DisplayFormat',
        originalText: '???',
        error: "A 'number' node needs content at [1].parsed_ast",
      },
    ]);
    const printed: unknown = JSON.parse(String(vi.mocked(console.log).mock.calls[0][0]));
    expect(printed).toEqual(result.records);
  });

  it('should list rejected records as warnings', () => {
    normalizeCommand({ input: 'corpus.json', cwd: TEST_DIR });

    const lines = vi.mocked(console.log).mock.calls.map((call) => String(call[0]));
    expect(lines[0]).toBe('[0] ValueTransform: $val * 2');
    expect(lines).toContain("  A 'number' node needs content at [1].parsed_ast");
    expect(console.warn).toHaveBeenCalledWith(
      'WARN  [2] rejected: /original_text: must NOT have fewer than 1 characters',
    );
  });

  it('should fail on a missing corpus', () => {
    const result = normalizeCommand({ input: 'missing.json', cwd: TEST_DIR });
    expect(result.success).toBe(false);
    expect(result.records).toEqual([]);
  });
});

import { describe, it, expect } from 'vitest';
import { parseArgs } from '../../src/cli/args.js';

describe('parseArgs', () => {
  it('should split the command from its positionals', () => {
    expect(parseArgs(['compile', 'corpus.json'])).toEqual({
      command: 'compile',
      positionals: ['corpus.json'],
      flags: {},
      options: {},
    });
  });

  it('should read value options in both spellings', () => {
    const parsed = parseArgs(['compile', '--out', 'gen', '--layout=prefix', '--log-level', 'debug']);
    expect(parsed.options).toEqual({ out: 'gen', layout: 'prefix', 'log-level': 'debug' });
    expect(parsed.positionals).toEqual([]);
  });

  it('should treat other long options as flags', () => {
    const parsed = parseArgs(['compile', '--json', '--fail-on-fallback']);
    expect(parsed.flags).toEqual({ json: true, 'fail-on-fallback': true });
  });

  it('should expand short flags', () => {
    expect(parseArgs(['-qh']).flags).toEqual({ quiet: true, help: true });
  });

  it('should keep arguments after -- as positionals', () => {
    const parsed = parseArgs(['try', 'ValueConv', '--', '--value']);
    expect(parsed.positionals).toEqual(['ValueConv', '--value']);
    expect(parsed.options).toEqual({});
  });

  it('should treat a value option at the end as a flag', () => {
    expect(parseArgs(['try', '--value']).flags).toEqual({ value: true });
  });
});

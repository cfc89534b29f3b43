import { describe, it, expect } from 'vitest';
import { parseCliArgs, usage } from '../../src/cli/args.js';

const defaults = { inputPath: '/opt/bill-dict/data/tracker.csv', outputDir: '/opt/bill-dict/data' };

describe('parseCliArgs', () => {
  it('uses defaults without arguments', () => {
    expect(parseCliArgs([], defaults)).toEqual({ ...defaults, help: false });
  });

  it('takes the input path from the first positional', () => {
    expect(parseCliArgs(['export.csv'], defaults)).toEqual({
      inputPath: 'export.csv',
      outputDir: '/opt/bill-dict/data',
      help: false,
    });
  });

  it('takes the output directory from the second positional', () => {
    expect(parseCliArgs(['export.csv', 'out'], defaults)).toEqual({
      inputPath: 'export.csv',
      outputDir: 'out',
      help: false,
    });
  });

  it('recognizes help flags', () => {
    expect(parseCliArgs(['--help'], defaults).help).toBe(true);
    expect(parseCliArgs(['-h'], defaults).help).toBe(true);
  });

  it('rejects unknown options', () => {
    expect(() => parseCliArgs(['--verbose'], defaults)).toThrow('Unknown option: --verbose');
  });
});

describe('usage', () => {
  it('shows the defaults', () => {
    const text = usage(defaults);
    expect(text).toContain('input.csv    Tracker export (default: /opt/bill-dict/data/tracker.csv)');
    expect(text).toContain('(default: /opt/bill-dict/data)\n');
  });
});

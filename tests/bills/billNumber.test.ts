import { describe, it, expect } from 'vitest';
import { normalizeBillNumber } from '../../src/bills/billNumber.js';

describe('normalizeBillNumber', () => {
  it.each([
    ['S.350', 'S350'],
    ['H.B.158', 'HB158'],
    ['S.F.473', 'SF473'],
    ['L.D. 1134 (S.P. 461)', 'LD1134'],
    ['H.B. 229', 'HB229'],
    ['H.C.R.2042', 'HCR2042'],
    ['S.B.0009', 'SB9'],
  ])('normalizes %s to %s', (raw, expected) => {
    expect(normalizeBillNumber(raw)).toBe(expected);
  });

  it('returns null only for a missing value', () => {
    expect(normalizeBillNumber(null)).toBeNull();
    expect(normalizeBillNumber('')).toBe('');
    expect(normalizeBillNumber('   ')).toBe('');
  });

  it('reduces a bare parenthetical to an empty string', () => {
    expect(normalizeBillNumber('(S.P. 461)')).toBe('');
  });

  it('strips leading zeros from the legislative document number', () => {
    expect(normalizeBillNumber('L.D 0042')).toBe('LD42');
    expect(normalizeBillNumber('L.D. 000')).toBe('LD0');
  });

  it('keeps every digit of a long legislative document number', () => {
    expect(normalizeBillNumber('L.D. 012345678901234567890')).toBe('LD12345678901234567890');
  });

  it('uppercases mixed-case input', () => {
    expect(normalizeBillNumber('h.b. 12')).toBe('HB12');
  });

  it('removes every parenthetical group', () => {
    expect(normalizeBillNumber('S.B. 5 (Sub 1) (Engrossed)')).toBe('SB5');
  });

  it('drops text after the numeric run', () => {
    expect(normalizeBillNumber('H.B. 77 A')).toBe('HB77');
  });

  it('keeps a single zero when the number is all zeros', () => {
    expect(normalizeBillNumber('S.B. 000')).toBe('SB0');
  });

  it('passes through values without a letters+digits shape', () => {
    expect(normalizeBillNumber('Ballot Measure')).toBe('BALLOTMEASURE');
    expect(normalizeBillNumber('H-B 12')).toBe('H-B12');
  });

  it('is idempotent on its own output', () => {
    const inputs = [
      'S.350',
      'H.B.158',
      'L.D. 1134 (S.P. 461)',
      'S.B.0009',
      'h.c.r. 2042',
      'Ballot Measure',
      'H-B 12',
      '(S.P. 461)',
      '',
    ];
    for (const input of inputs) {
      const once = normalizeBillNumber(input);
      expect(normalizeBillNumber(once)).toBe(once);
    }
  });
});

import { describe, it, expect } from 'vitest';
import {
  STATE_ABBREVIATIONS,
  resolveStateAbbreviation,
} from '../../src/bills/stateAbbreviations.js';

describe('resolveStateAbbreviation', () => {
  it('covers all 50 states and DC', () => {
    expect(Object.keys(STATE_ABBREVIATIONS)).toHaveLength(51);
    expect(new Set(Object.values(STATE_ABBREVIATIONS)).size).toBe(51);
  });

  it('resolves known names', () => {
    expect(resolveStateAbbreviation('Maine')).toBe('ME');
    expect(resolveStateAbbreviation('New Hampshire')).toBe('NH');
    expect(resolveStateAbbreviation('District of Columbia')).toBe('DC');
  });

  it('falls back to the first two characters, uppercased', () => {
    expect(resolveStateAbbreviation('Puerto Rico')).toBe('PU');
    expect(resolveStateAbbreviation('guam')).toBe('GU');
    expect(resolveStateAbbreviation('X')).toBe('X');
  });

  it('ignores names inherited from Object.prototype', () => {
    expect(resolveStateAbbreviation('constructor')).toBe('CO');
    expect(resolveStateAbbreviation('toString')).toBe('TO');
    expect(resolveStateAbbreviation('__proto__')).toBe('__');
  });

  it('is case-sensitive on the full name', () => {
    expect(resolveStateAbbreviation('texas')).toBe('TE');
  });
});

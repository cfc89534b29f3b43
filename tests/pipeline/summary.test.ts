import { describe, it, expect } from 'vitest';
import { buildClassificationRecords } from '../../src/bills/recordBuilder.js';
import type { TrackerRow } from '../../src/bills/types.js';
import { formatSummary, summarizeRecords } from '../../src/pipeline/summary.js';

function row(state: string, billName: string | null, status: string | null): TrackerRow {
  return { state, billName, status, statusDetail: null, statusDate: '02/01/2025', issues: null };
}

const records = buildClassificationRecords([
  row('Texas', 'S.B.0009', 'Advancing'),
  row('Iowa', 'S.F.473', 'Introduced'),
  row('Texas', 'S.B.0009', 'Introduced'),
  row('Utah', null, null),
  row('Iowa', 'S.F. 473', 'Defeated'),
]);

describe('summarizeRecords', () => {
  it('counts bills and distinct states', () => {
    const summary = summarizeRecords(records);
    expect(summary.totalBills).toBe(5);
    expect(summary.stateCount).toBe(3);
  });

  it('orders statuses by count, ties in first-seen order, skipping missing', () => {
    expect(summarizeRecords(records).statusCounts).toEqual([
      ['Introduced', 2],
      ['Advancing', 1],
      ['Defeated', 1],
    ]);
  });

  it('keeps distinct raw/normalized pairs in first-seen order', () => {
    expect(summarizeRecords(records).samples).toEqual([
      { raw: 'S.B.0009', normalized: 'SB9' },
      { raw: 'S.F.473', normalized: 'SF473' },
      { raw: null, normalized: null },
      { raw: 'S.F. 473', normalized: 'SF473' },
    ]);
  });

  it('caps the number of samples', () => {
    expect(summarizeRecords(records, 2).samples).toHaveLength(2);
  });
});

describe('formatSummary', () => {
  it('renders the summary block', () => {
    const text = formatSummary({
      totalBills: 3,
      stateCount: 2,
      statusCounts: [
        ['Introduced', 2],
        ['Advancing', 1],
      ],
      samples: [
        { raw: 'S.B.0009', normalized: 'SB9' },
        { raw: null, normalized: null },
      ],
    });
    const rule = '='.repeat(60);

    expect(text.split('\n')).toEqual([
      '',
      rule,
      'CLASSIFICATION DICTIONARY SUMMARY',
      rule,
      'Total bills: 3',
      'States: 2',
      'All labeled: harmful',
      '',
      'Status breakdown:',
      '  Introduced  2',
      '  Advancing   1',
      '',
      rule,
      'BILL NUMBER NORMALIZATION SAMPLES',
      rule,
      `  'S.B.0009${' '.repeat(17)}' -> 'SB9'`,
      `  '(missing)${' '.repeat(16)}' -> '(missing)'`,
    ]);
  });
});

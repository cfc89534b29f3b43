import { CLASSIFICATION_LABEL } from '../config/dataset.js';
import type { ClassificationRecord } from '../bills/types.js';

export interface NormalizationSample {
  raw: string | null;
  normalized: string | null;
}

export interface DictSummary {
  totalBills: number;
  stateCount: number;
  /** [status, count], most frequent first; ties keep first-seen order */
  statusCounts: Array<[string, number]>;
  samples: NormalizationSample[];
}

const MAX_SAMPLES = 20;

/**
 * Compute the run summary for a record collection
 */
export function summarizeRecords(
  records: readonly ClassificationRecord[],
  maxSamples: number = MAX_SAMPLES
): DictSummary {
  const states = new Set<string>();
  const statusCounts = new Map<string, number>();
  const samples: NormalizationSample[] = [];
  const seenPairs = new Set<string>();

  for (const record of records) {
    states.add(record.state);

    if (record.status !== null) {
      statusCounts.set(record.status, (statusCounts.get(record.status) || 0) + 1);
    }

    if (samples.length < maxSamples) {
      const key = JSON.stringify([record.bill_number_raw, record.bill_number]);
      if (!seenPairs.has(key)) {
        seenPairs.add(key);
        samples.push({ raw: record.bill_number_raw, normalized: record.bill_number });
      }
    }
  }

  // Array.prototype.sort is stable, so equal counts stay in insertion order
  const sortedStatuses = Array.from(statusCounts.entries()).sort((a, b) => b[1] - a[1]);

  return {
    totalBills: records.length,
    stateCount: states.size,
    statusCounts: sortedStatuses,
    samples,
  };
}

/**
 * Render the summary block printed at the end of a CLI run
 */
export function formatSummary(summary: DictSummary): string {
  const rule = '='.repeat(60);
  const lines: string[] = [
    '',
    rule,
    'CLASSIFICATION DICTIONARY SUMMARY',
    rule,
    `Total bills: ${summary.totalBills}`,
    `States: ${summary.stateCount}`,
    `All labeled: ${CLASSIFICATION_LABEL}`,
    '',
    'Status breakdown:',
  ];

  const statusWidth = Math.max(0, ...summary.statusCounts.map(([status]) => status.length));
  for (const [status, count] of summary.statusCounts) {
    lines.push(`  ${status.padEnd(statusWidth)}  ${count}`);
  }

  lines.push('', rule, 'BILL NUMBER NORMALIZATION SAMPLES', rule);

  for (const sample of summary.samples) {
    const raw = sample.raw ?? '(missing)';
    const normalized = sample.normalized ?? '(missing)';
    lines.push(`  '${raw.padEnd(25)}' -> '${normalized}'`);
  }

  return lines.join('\n');
}

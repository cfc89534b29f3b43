import { CLASSIFICATION_LABEL, DATA_SOURCE, DEFAULT_DATASET_YEAR } from '../config/dataset.js';
import { normalizeBillNumber } from './billNumber.js';
import { ALL_ISSUE_CATEGORIES, categorizeIssues } from './issueCategories.js';
import { resolveStateAbbreviation } from './stateAbbreviations.js';
import { extractYear } from './statusDate.js';
import type { ClassificationRecord, RecordBuildOptions, TrackerRow } from './types.js';

/**
 * Build the dictionary entry for a single tracker row.
 *
 * The label is constant: the tracker only lists bills already judged
 * harmful, so no per-row decision is made here.
 */
export function buildClassificationRecord(
  row: TrackerRow,
  options: RecordBuildOptions = {}
): ClassificationRecord {
  const categories = categorizeIssues(row.issues);

  return Object.freeze({
    state: resolveStateAbbreviation(row.state),
    bill_number: normalizeBillNumber(row.billName),
    year: extractYear(row.statusDate, options.fallbackYear ?? DEFAULT_DATASET_YEAR),

    state_full: row.state,
    bill_number_raw: row.billName,

    status: row.status,
    status_detail: row.statusDetail,

    issues_raw: row.issues,
    issue_categories: Object.freeze(ALL_ISSUE_CATEGORIES.filter((c) => categories.has(c))),

    label: CLASSIFICATION_LABEL,
    source: DATA_SOURCE,

    legiscan_bill_id: null,
    legiscan_text_url: null,
  });
}

/**
 * Build one record per row, preserving row order
 */
export function buildClassificationRecords(
  rows: readonly TrackerRow[],
  options: RecordBuildOptions = {}
): ClassificationRecord[] {
  return rows.map((row) => buildClassificationRecord(row, options));
}

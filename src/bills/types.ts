/**
 * Type definitions for the bill classification dictionary
 */

import type { IssueCategory } from './issueCategories.js';

/**
 * One data row of the tracker export.
 *
 * Empty cells are null. `state` is never empty: the loader drops such rows.
 */
export interface TrackerRow {
  state: string;
  billName: string | null;
  status: string | null;
  statusDetail: string | null;
  statusDate: string | null;
  issues: string | null;
}

/**
 * One entry of the classification dictionary.
 *
 * Keys are snake_case because they are written verbatim to CSV/JSON and
 * joined against LegiScan data downstream.
 */
export interface ClassificationRecord {
  // Core identifiers for LegiScan
  readonly state: string;
  readonly bill_number: string | null;
  readonly year: number;

  // Original data for reference
  readonly state_full: string;
  readonly bill_number_raw: string | null;

  readonly status: string | null;
  readonly status_detail: string | null;

  readonly issues_raw: string | null;
  readonly issue_categories: readonly IssueCategory[];

  readonly label: string;
  readonly source: string;

  // Filled in by a later LegiScan enrichment pass
  readonly legiscan_bill_id: number | null;
  readonly legiscan_text_url: string | null;
}

export const CLASSIFICATION_RECORD_FIELDS = [
  'state',
  'bill_number',
  'year',
  'state_full',
  'bill_number_raw',
  'status',
  'status_detail',
  'issues_raw',
  'issue_categories',
  'label',
  'source',
  'legiscan_bill_id',
  'legiscan_text_url',
] as const satisfies readonly (keyof ClassificationRecord)[];

export interface RecordBuildOptions {
  /** Year used when a status date has no four-digit year */
  fallbackYear?: number;
}

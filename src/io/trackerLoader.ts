import fs from 'fs/promises';
import { FOOTER_MARKER } from '../config/dataset.js';
import type { TrackerRow } from '../bills/types.js';
import { parseCsv } from '../utils/csv.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('TrackerLoader');

export const TRACKER_COLUMNS = [
  'State',
  'Bill Name',
  'Status',
  'Status Detail',
  'Status Date',
  'Issues',
] as const;

type TrackerColumn = (typeof TRACKER_COLUMNS)[number];

function emptyToNull(value: string | undefined): string | null {
  return value === undefined || value === '' ? null : value;
}

/**
 * Whether a parsed row is real data rather than the export's footer
 */
export function isDataRow(state: string | null): state is string {
  return state !== null && !state.includes(FOOTER_MARKER);
}

/**
 * Convert parsed CSV rows (header first) into tracker rows.
 *
 * Rows with an empty State or carrying the footer marker are dropped.
 * Extra columns are ignored; a missing required column is an error.
 */
export function toTrackerRows(table: readonly (readonly string[])[]): TrackerRow[] {
  if (table.length === 0) {
    throw new Error('Tracker CSV is empty: expected a header row');
  }

  const header = table[0].map((h) => h.trim());
  const indexOf = new Map<TrackerColumn, number>();

  for (const column of TRACKER_COLUMNS) {
    const index = header.indexOf(column);
    if (index === -1) {
      throw new Error(`Tracker CSV must have a "${column}" column`);
    }
    indexOf.set(column, index);
  }

  const rows: TrackerRow[] = [];

  for (let i = 1; i < table.length; i++) {
    const values = table[i];
    const cell = (column: TrackerColumn): string | null => {
      const index = indexOf.get(column);
      return index === undefined ? null : emptyToNull(values[index]);
    };

    const state = cell('State');
    if (!isDataRow(state)) {
      logger.debug('Skipping non-data row', { row: i + 1 });
      continue;
    }

    rows.push({
      state,
      billName: cell('Bill Name'),
      status: cell('Status'),
      statusDetail: cell('Status Detail'),
      statusDate: cell('Status Date'),
      issues: cell('Issues'),
    });
  }

  return rows;
}

/**
 * Load the data rows of a tracker CSV export
 */
export async function loadTrackerRows(filePath: string): Promise<TrackerRow[]> {
  const content = await fs.readFile(filePath, 'utf-8');
  return toTrackerRows(parseCsv(content));
}

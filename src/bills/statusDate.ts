import { DEFAULT_DATASET_YEAR } from '../config/dataset.js';

const YEAR_PATTERN = /(\d{4})/;

/**
 * Extract the year from a tracker status date (normally MM/DD/YYYY).
 *
 * Takes the first run of four digits anywhere in the string, so a value
 * like "HB 1234 on 01/19/2025" reads as 1234.
 */
export function extractYear(
  statusDate: string | null,
  fallbackYear: number = DEFAULT_DATASET_YEAR
): number {
  if (statusDate === null) {
    return fallbackYear;
  }

  const match = YEAR_PATTERN.exec(statusDate);
  return match ? parseInt(match[1], 10) : fallbackYear;
}

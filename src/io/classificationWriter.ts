import fs from 'fs/promises';
import path from 'path';
import { OUTPUT_BASENAME } from '../config/dataset.js';
import { CLASSIFICATION_RECORD_FIELDS } from '../bills/types.js';
import type { ClassificationRecord } from '../bills/types.js';
import { formatCsv } from '../utils/csv.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('ClassificationWriter');

export interface WrittenFiles {
  csvPath: string;
  jsonPath: string;
}

/**
 * Flat text for one CSV cell. Lists are written as JSON array text.
 */
function toCsvCell(value: ClassificationRecord[keyof ClassificationRecord]): string {
  if (value === null) {
    return '';
  }
  if (Array.isArray(value)) {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Render records as CSV, header first, columns in record field order
 */
export function formatClassificationCsv(records: readonly ClassificationRecord[]): string {
  const header: string[] = [...CLASSIFICATION_RECORD_FIELDS];
  const rows = records.map((record) =>
    CLASSIFICATION_RECORD_FIELDS.map((field) => toCsvCell(record[field]))
  );
  return formatCsv([header, ...rows]);
}

/**
 * Render records as an indented JSON array
 */
export function formatClassificationJson(records: readonly ClassificationRecord[]): string {
  return JSON.stringify(records, null, 2);
}

/**
 * Write bill_classification_dict.csv and bill_classification_dict.json
 *
 * @param outputDir Created (recursively) if it does not exist
 */
export async function writeClassificationDict(
  records: readonly ClassificationRecord[],
  outputDir: string
): Promise<WrittenFiles> {
  await fs.mkdir(outputDir, { recursive: true });

  const csvPath = path.join(outputDir, `${OUTPUT_BASENAME}.csv`);
  const jsonPath = path.join(outputDir, `${OUTPUT_BASENAME}.json`);

  // CSV (flat format for easy viewing)
  await fs.writeFile(csvPath, formatClassificationCsv(records), 'utf-8');

  // JSON (keeps issue_categories as a list)
  await fs.writeFile(jsonPath, formatClassificationJson(records), 'utf-8');

  logger.info('Wrote classification dictionary', {
    records: records.length,
    csvPath,
    jsonPath,
  });

  return { csvPath, jsonPath };
}

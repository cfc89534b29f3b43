/**
 * Classification Dictionary Pipeline
 *
 * load tracker CSV -> build one record per row -> validate -> write CSV + JSON
 */

import { buildClassificationRecords } from '../bills/recordBuilder.js';
import { assertValidClassificationRecords } from '../bills/schema.js';
import type { ClassificationRecord } from '../bills/types.js';
import { writeClassificationDict } from '../io/classificationWriter.js';
import type { WrittenFiles } from '../io/classificationWriter.js';
import { loadTrackerRows } from '../io/trackerLoader.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('ClassificationDict');

export interface BuildDictOptions {
  inputPath: string;
  outputDir: string;
  fallbackYear?: number;
}

export interface ClassificationDictResult {
  records: ClassificationRecord[];
  files: WrittenFiles;
}

export async function buildClassificationDict(
  options: BuildDictOptions
): Promise<ClassificationDictResult> {
  const rows = await loadTrackerRows(options.inputPath);
  logger.info(`Loaded ${rows.length} bills from ${options.inputPath}`);

  const records = buildClassificationRecords(rows, {
    fallbackYear: options.fallbackYear,
  });

  assertValidClassificationRecords(records);

  const files = await writeClassificationDict(records, options.outputDir);

  return { records, files };
}

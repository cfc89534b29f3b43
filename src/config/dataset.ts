import dotenv from 'dotenv';

dotenv.config();

/**
 * Dataset Configuration
 *
 * Constants describing the tracker export and the classification
 * dictionary built from it, plus the environment overrides read from .env.
 */

/** Year assigned when a status date carries no four-digit year */
export const DEFAULT_DATASET_YEAR = 2025;

/** Every bill in the tracker export is pre-labeled with this class */
export const CLASSIFICATION_LABEL = 'harmful';

export const DATA_SOURCE = 'aclu_tracker';

/** Substring identifying the export's trailing metadata row */
export const FOOTER_MARKER = 'Data is current';

export const OUTPUT_BASENAME = 'bill_classification_dict';

export const DEFAULT_INPUT_FILENAME = 'aclu-legislation-tracker.csv';

export interface DatasetSettings {
  fallbackYear: number;
}

export interface LogSettings {
  level: string;
  /** When set, file transports write combined.log / error.log here */
  dir?: string;
}

export class DatasetConfig {
  /**
   * Read settings from the environment
   */
  static getConfig(env: NodeJS.ProcessEnv = process.env): DatasetSettings {
    const rawYear = env.BILL_DICT_FALLBACK_YEAR;
    let fallbackYear = DEFAULT_DATASET_YEAR;

    if (rawYear !== undefined && rawYear.trim() !== '') {
      if (!/^\d{4}$/.test(rawYear.trim())) {
        throw new Error(
          `Invalid BILL_DICT_FALLBACK_YEAR: "${rawYear}". ` +
            'Expected a four-digit year such as 2025'
        );
      }
      fallbackYear = parseInt(rawYear.trim(), 10);
    }

    return { fallbackYear };
  }

  /**
   * Logger settings (LOG_LEVEL, LOG_DIR)
   */
  static getLogSettings(env: NodeJS.ProcessEnv = process.env): LogSettings {
    return {
      level: env.LOG_LEVEL || 'info',
      dir: env.LOG_DIR || undefined,
    };
  }
}

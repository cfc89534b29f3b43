import winston from 'winston';
import path from 'path';
import { DatasetConfig } from '../config/dataset.js';
import type { LogSettings } from '../config/dataset.js';

/**
 * Logger Configuration
 *
 * Structured logging for the classification dictionary build
 */

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...metadata }) => {
    let msg = `${timestamp} [${level}] ${message}`;
    if (Object.keys(metadata).length > 0) {
      msg += ` ${JSON.stringify(metadata)}`;
    }
    return msg;
  })
);

/**
 * Create a logger instance
 *
 * File transports are only attached when LOG_DIR is set.
 *
 * @param component Component name (e.g., 'TrackerLoader', 'ClassificationWriter')
 */
export function createLogger(
  component: string,
  settings: LogSettings = DatasetConfig.getLogSettings()
): winston.Logger {
  const logDir = settings.dir;
  const fileTransports = logDir
    ? [
        // File output - all logs
        new winston.transports.File({
          filename: path.join(logDir, 'combined.log'),
          maxsize: 5242880, // 5MB
          maxFiles: 5,
        }),
        // File output - errors only
        new winston.transports.File({
          filename: path.join(logDir, 'error.log'),
          level: 'error',
          maxsize: 5242880, // 5MB
          maxFiles: 5,
        }),
      ]
    : [];

  return winston.createLogger({
    level: settings.level,
    format: logFormat,
    defaultMeta: { component },
    transports: [
      new winston.transports.Console({
        format: consoleFormat,
      }),
      ...fileTransports,
    ],
  });
}

/**
 * Default logger instance
 */
export const logger = createLogger('App');

/**
 * Log levels:
 * - error: Failures that abort the run
 * - warn: Data quality issues that were handled with a fallback
 * - info: Progress (rows loaded, files written)
 * - debug: Per-row detail
 */

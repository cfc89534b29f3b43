#!/usr/bin/env node

import path from 'path';
import { fileURLToPath } from 'url';
import { DEFAULT_INPUT_FILENAME } from './config/dataset.js';
import type { CliDefaults } from './cli/args.js';
import { runCli } from './cli/run.js';

/**
 * CLI for building the bill classification dictionary
 *
 * Usage:
 *   npm run dev                              - Use the bundled tracker export
 *   npm run dev -- <input.csv> [outputDir]   - Use a specific export
 */

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Both src/ and dist/ sit one level below the package root
const dataDir = path.join(__dirname, '..', 'data');

const DEFAULTS: CliDefaults = {
  inputPath: path.join(dataDir, DEFAULT_INPUT_FILENAME),
  outputDir: dataDir,
};

process.exitCode = await runCli(process.argv.slice(2), DEFAULTS);

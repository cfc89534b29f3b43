import { DatasetConfig } from '../config/dataset.js';
import { buildClassificationDict } from '../pipeline/buildClassificationDict.js';
import { formatSummary, summarizeRecords } from '../pipeline/summary.js';
import { logger } from '../utils/logger.js';
import { parseCliArgs, usage } from './args.js';
import type { CliDefaults } from './args.js';

/**
 * Run the CLI and resolve to its exit code.
 *
 * Failures are logged and reported as exit code 1; the caller sets
 * process.exitCode instead of exiting.
 */
export async function runCli(args: readonly string[], defaults: CliDefaults): Promise<number> {
  try {
    const options = parseCliArgs(args, defaults);

    if (options.help) {
      console.log(usage(defaults));
      return 0;
    }

    const settings = DatasetConfig.getConfig();

    const { records, files } = await buildClassificationDict({
      inputPath: options.inputPath,
      outputDir: options.outputDir,
      fallbackYear: settings.fallbackYear,
    });

    console.log('\nSaved:');
    console.log(`  ${files.csvPath}`);
    console.log(`  ${files.jsonPath}`);

    console.log(formatSummary(summarizeRecords(records)));
    return 0;
  } catch (error) {
    logger.error('Build failed', error);
    console.error('\n❌ Build failed:', error instanceof Error ? error.message : String(error));
    return 1;
  }
}

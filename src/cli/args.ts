export interface CliOptions {
  inputPath: string;
  outputDir: string;
  help: boolean;
}

export interface CliDefaults {
  inputPath: string;
  outputDir: string;
}

/**
 * Parse `[input.csv] [outputDir] [--help]`.
 *
 * Positionals beyond the second are ignored.
 */
export function parseCliArgs(args: readonly string[], defaults: CliDefaults): CliOptions {
  const positionals: string[] = [];
  let help = false;

  for (const arg of args) {
    if (arg === '--help' || arg === '-h') {
      help = true;
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      positionals.push(arg);
    }
  }

  return {
    inputPath: positionals[0] ?? defaults.inputPath,
    outputDir: positionals[1] ?? defaults.outputDir,
    help,
  };
}

export function usage(defaults: CliDefaults): string {
  return `
📊 Bill Classification Dictionary

Builds a LegiScan-ready classification dictionary from a tracker CSV export.

Usage:
  bill-dict [input.csv] [outputDir]

Arguments:
  input.csv    Tracker export (default: ${defaults.inputPath})
  outputDir    Where to write bill_classification_dict.{csv,json}
               (default: ${defaults.outputDir})

Environment:
  BILL_DICT_FALLBACK_YEAR   Year used when a status date has none (default: 2025)
  LOG_LEVEL                 winston log level (default: info)
  LOG_DIR                   Also write combined.log / error.log here
`;
}

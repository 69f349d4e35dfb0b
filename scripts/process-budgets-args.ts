import { err, ok, type Result } from 'neverthrow';

import { isSourceType, SOURCE_TYPES, type SourceType } from '../src/modules/extraction/index.js';

export interface CLIOptions {
  sources?: string;
  out?: string;
  validate: boolean;
  /** Re-validate processed output without reading workbooks */
  validateOnly: boolean;
  strict: boolean;
  only: SourceType[];
  help: boolean;
}

export const USAGE = `Usage:
  tsx scripts/process-budgets.ts [--sources <file>] [--out <dir>] [--validate | --validate-only] [--strict] [--only <TYPE>]

Options:
  --sources: YAML manifest of { year, type, path } entries (default: $BUDGET_SOURCES_FILE)
  --out: Output directory (default: $BUDGET_OUTPUT_DIR)
  --validate: Validate every processed dataset and write reports
  --validate-only: Re-validate datasets already under --out without reading their workbooks
  --strict: Failed warnings fail validation too
  --only: Process one source type; repeat or comma-separate for several (${SOURCE_TYPES.join(', ')})`;

/**
 * Parse command line arguments
 */
export const parseArgs = (args: readonly string[]): Result<CLIOptions, string> => {
  const options: CLIOptions = {
    validate: false,
    validateOnly: false,
    strict: false,
    only: [],
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    switch (arg) {
      case '--sources':
      case '--out': {
        if (nextArg === undefined || nextArg.startsWith('--')) {
          return err(`${arg} requires a value`);
        }
        if (arg === '--sources') {
          options.sources = nextArg;
        } else {
          options.out = nextArg;
        }
        i++;
        break;
      }
      case '--only': {
        if (nextArg === undefined || nextArg.startsWith('--')) {
          return err('--only requires a source type');
        }
        for (const value of nextArg.split(',')) {
          const sourceType = value.trim().toUpperCase();
          if (!isSourceType(sourceType)) {
            return err(`Unknown source type '${value}'. Expected one of: ${SOURCE_TYPES.join(', ')}`);
          }
          options.only.push(sourceType);
        }
        i++;
        break;
      }
      case '--validate':
        options.validate = true;
        break;
      case '--validate-only':
        options.validateOnly = true;
        break;
      case '--strict':
        options.strict = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        return err(`Unknown argument '${String(arg)}'`);
    }
  }

  return ok(options);
};

import path from 'node:path';

import { createConfig, parseEnv } from '../src/infra/config/env.js';
import { createLogger, type Logger } from '../src/infra/logger/index.js';
import {
  createProcessedOutputStore,
  createSourcesRepo,
  createXlsxWorkbookReader,
  formatOutcome,
  processBatch,
  type BatchSummary,
  type DatasetValidator,
  type SourceEntry,
  type SourceType,
} from '../src/modules/extraction/index.js';
import {
  createCheckRegistry,
  createFileReportWriter,
  revalidateBatch,
  toConsoleSummary,
  validateDataset,
  type CheckRegistry,
} from '../src/modules/validation/index.js';

import { parseArgs, USAGE } from './process-budgets-args.js';

export const EXIT_OK = 0;
export const EXIT_NOTHING_PROCESSED = 1;
export const EXIT_VALIDATION_FAILED = 2;

/** Where the run prints its console output */
export interface RunOutput {
  log(line: string): void;
  error(line: string): void;
}

interface BatchContext {
  logger: Logger;
  registry: CheckRegistry;
  outputDir: string;
  sources: readonly SourceEntry[];
  only: readonly SourceType[];
  strict: boolean;
  io: RunOutput;
}

const extractSources = async (ctx: BatchContext, validateEach: boolean): Promise<BatchSummary> => {
  const reportWriter = createFileReportWriter({ outputDir: ctx.outputDir });

  const validate: DatasetValidator = async (dataset, files) => {
    const result = await validateDataset(
      { reportWriter, logger: ctx.logger, registry: ctx.registry },
      { dataset, file: files.csvPath, strict: ctx.strict }
    );
    return result.map(({ report, passed }) => {
      ctx.io.log(toConsoleSummary(report));
      return {
        passed,
        errorCount: report.summary.errorCount,
        warningCount: report.summary.warningCount,
      };
    });
  };

  return processBatch(
    {
      workbookReader: createXlsxWorkbookReader(),
      outputStore: createProcessedOutputStore({ outputDir: ctx.outputDir }),
      logger: ctx.logger,
      validate: validateEach ? validate : undefined,
    },
    { sources: ctx.sources, only: ctx.only }
  );
};

const revalidateSources = async (ctx: BatchContext): Promise<BatchSummary> => {
  const { summary, reports } = await revalidateBatch(
    {
      reportWriter: createFileReportWriter({ outputDir: ctx.outputDir }),
      outputStore: createProcessedOutputStore({ outputDir: ctx.outputDir }),
      logger: ctx.logger,
      registry: ctx.registry,
    },
    { sources: ctx.sources, only: ctx.only, strict: ctx.strict }
  );
  for (const report of reports) {
    ctx.io.log(toConsoleSummary(report));
  }
  return summary;
};

/**
 * Runs the batch for the given arguments and environment and returns the exit code:
 * 0 success, 1 nothing processed, 2 validation failed.
 */
export const runProcessBudgets = async (
  argv: readonly string[],
  env: NodeJS.ProcessEnv,
  io: RunOutput
): Promise<number> => {
  const parsed = parseArgs(argv);
  if (parsed.isErr()) {
    io.error(parsed.error);
    io.error(USAGE);
    return EXIT_NOTHING_PROCESSED;
  }
  const options = parsed.value;
  if (options.help) {
    io.log(USAGE);
    return EXIT_OK;
  }

  const config = createConfig(parseEnv(env));
  const logger = createLogger({
    name: 'process-budgets',
    level: config.logger.level,
    pretty: config.logger.pretty,
  });

  const sourcesFile = path.resolve(options.sources ?? config.paths.sourcesFile);
  const sources = await createSourcesRepo({ manifestPath: sourcesFile }).list();
  if (sources.isErr()) {
    io.error(sources.error.message);
    if (sources.error.type === 'SchemaValidationError') {
      io.error(`  - ${sources.error.details.join('\n  - ')}`);
    }
    return EXIT_NOTHING_PROCESSED;
  }

  const ctx: BatchContext = {
    logger,
    registry: createCheckRegistry(config.validation),
    outputDir: path.resolve(options.out ?? config.paths.outputDir),
    sources: sources.value,
    only: options.only,
    strict: options.strict || config.strict,
    io,
  };

  const summary = options.validateOnly
    ? await revalidateSources(ctx)
    : await extractSources(ctx, options.validate);

  for (const item of summary.items) {
    io.log(formatOutcome(item));
  }

  if (summary.processed === 0) {
    io.error(options.validateOnly ? 'No datasets were validated.' : 'No sources were processed.');
    return EXIT_NOTHING_PROCESSED;
  }
  if (summary.validationFailures > 0) {
    io.error(`Validation failed for ${String(summary.validationFailures)} dataset(s).`);
    return EXIT_VALIDATION_FAILED;
  }
  return EXIT_OK;
};

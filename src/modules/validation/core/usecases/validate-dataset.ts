import { err, ok, type Result } from 'neverthrow';

import { createCheckRegistry, runChecks, type CheckRegistry } from '../registry.js';
import { buildValidationReport, hasFailures } from '../report.js';

import type { WrittenReport, ValidationReportWriter } from '../ports.js';
import type { ValidationReport } from '../types.js';
import type {
  OutputError,
  ProcessedDataset,
  ProcessedOutputStore,
  SourceType,
} from '@/modules/extraction/index.js';
import type { Logger } from 'pino';

export interface ValidateDatasetDeps {
  reportWriter: ValidationReportWriter;
  logger: Logger;
  registry?: CheckRegistry | undefined;
  /** Timestamp source for report metadata */
  now?: (() => Date) | undefined;
}

export interface ValidateDatasetInput {
  dataset: ProcessedDataset;
  /** Record table the dataset was written to or loaded from */
  file: string;
  strict?: boolean | undefined;
}

export interface ValidateDatasetOutput {
  readonly report: ValidationReport;
  readonly files: WrittenReport;
  /** False when the report fails under the requested policy */
  readonly passed: boolean;
}

/**
 * Runs the check registry over a dataset without touching the file system.
 */
export const validateRecords = (
  registry: CheckRegistry,
  dataset: ProcessedDataset,
  file: string,
  generatedAt: Date
): ValidationReport =>
  buildValidationReport(
    runChecks(registry, {
      records: dataset.records,
      overall: dataset.overall,
      sourceKind: dataset.sourceKind,
      columns: dataset.columns,
    }),
    {
      sourceType: dataset.sourceType,
      sourceKind: dataset.sourceKind,
      year: dataset.year,
      file,
      generatedAt: generatedAt.toISOString(),
    }
  );

/**
 * Validates a dataset and writes its JSON and Markdown reports.
 */
export const validateDataset = async (
  deps: ValidateDatasetDeps,
  input: ValidateDatasetInput
): Promise<Result<ValidateDatasetOutput, OutputError>> => {
  const { dataset } = input;
  const log = deps.logger.child({
    usecase: 'validateDataset',
    year: dataset.year,
    sourceType: dataset.sourceType,
  });

  const registry = deps.registry ?? createCheckRegistry();
  const now = deps.now ?? (() => new Date());
  const report = validateRecords(registry, dataset, input.file, now());

  for (const result of report.results) {
    if (!result.passed) {
      log.debug(
        {
          checkId: result.checkId,
          severity: result.severity,
          level: result.level,
          failCount: result.failCount,
        },
        'Validation check failed'
      );
    }
  }

  const written = await deps.reportWriter.write(report);
  if (written.isErr()) {
    log.error({ error: written.error }, 'Failed to write validation report');
    return err(written.error);
  }

  const passed = !hasFailures(report, { strict: input.strict ?? false });
  log.info(
    {
      checks: report.summary.total,
      errors: report.summary.errorCount,
      warnings: report.summary.warningCount,
      passed,
    },
    'Validation finished'
  );

  return ok({ report, files: written.value, passed });
};

export interface RevalidateProcessedDeps extends ValidateDatasetDeps {
  outputStore: ProcessedOutputStore;
}

export interface RevalidateProcessedInput {
  year: number;
  sourceType: SourceType;
  strict?: boolean | undefined;
}

export interface RevalidateProcessedOutput extends ValidateDatasetOutput {
  readonly dataset: ProcessedDataset;
}

/**
 * Re-validates a previously written dataset without re-parsing its workbook.
 * The report names the record table the store read the dataset from.
 */
export const revalidateProcessed = async (
  deps: RevalidateProcessedDeps,
  input: RevalidateProcessedInput
): Promise<Result<RevalidateProcessedOutput, OutputError>> => {
  const loaded = await deps.outputStore.read(input.year, input.sourceType);
  if (loaded.isErr()) {
    deps.logger.error(
      { year: input.year, sourceType: input.sourceType, error: loaded.error },
      'Failed to load processed dataset'
    );
    return err(loaded.error);
  }

  const dataset = loaded.value;
  const { csvPath } = deps.outputStore.locate(input.year, input.sourceType);
  const validated = await validateDataset(deps, { dataset, file: csvPath, strict: input.strict });
  return validated.map((output) => ({ ...output, dataset }));
};

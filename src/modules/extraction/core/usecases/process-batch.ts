import { errorMessage } from '@/common/types/errors.js';

import { extractBudget } from './extract-budget.js';

import type { OutputError } from '../errors.js';
import type {
  ProcessedDataset,
  ProcessedOutputStore,
  SourceEntry,
  WorkbookReader,
  WrittenFiles,
} from '../ports.js';
import type { SourceType } from '../types.js';
import type { Result } from 'neverthrow';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface ValidationVerdict {
  /** False when the report fails by the configured policy */
  readonly passed: boolean;
  readonly errorCount: number;
  readonly warningCount: number;
}

/**
 * Validates a freshly written dataset; supplied by the caller so that the
 * batch does not depend on the validation module.
 */
export type DatasetValidator = (
  dataset: ProcessedDataset,
  files: WrittenFiles
) => Promise<Result<ValidationVerdict, OutputError>>;

export interface ProcessBatchDeps {
  workbookReader: WorkbookReader;
  outputStore: ProcessedOutputStore;
  logger: Logger;
  validate?: DatasetValidator | undefined;
}

export interface ProcessBatchInput {
  sources: readonly SourceEntry[];
  /** Restricts the batch to these source types */
  only?: readonly SourceType[] | undefined;
}

export type BatchItemOutcome =
  | {
      readonly status: 'OK';
      readonly year: number;
      readonly sourceType: SourceType;
      readonly records: number;
      readonly validation: ValidationVerdict | null;
    }
  | {
      readonly status: 'FAIL';
      readonly year: number;
      readonly sourceType: SourceType;
      readonly reason: string;
    };

export interface BatchSummary {
  readonly items: readonly BatchItemOutcome[];
  readonly processed: number;
  readonly failed: number;
  readonly validationFailures: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Manifest entries of the requested source types; all of them when none are requested.
 */
export const selectSources = (
  sources: readonly SourceEntry[],
  only: readonly SourceType[] | undefined
): readonly SourceEntry[] =>
  only === undefined || only.length === 0
    ? sources
    : sources.filter((entry) => only.includes(entry.sourceType));

const fail = (entry: SourceEntry, reason: string): BatchItemOutcome => ({
  status: 'FAIL',
  year: entry.year,
  sourceType: entry.sourceType,
  reason,
});

const processEntry = async (
  deps: ProcessBatchDeps,
  entry: SourceEntry
): Promise<BatchItemOutcome> => {
  const extracted = await extractBudget(
    { workbookReader: deps.workbookReader, logger: deps.logger },
    entry
  );
  if (extracted.isErr()) {
    return fail(entry, extracted.error.message);
  }

  const dataset = extracted.value;
  const written = await deps.outputStore.write(dataset);
  if (written.isErr()) {
    return fail(entry, written.error.message);
  }

  let validation: ValidationVerdict | null = null;
  if (deps.validate !== undefined) {
    const verdict = await deps.validate(dataset, written.value);
    if (verdict.isErr()) {
      return fail(entry, verdict.error.message);
    }
    validation = verdict.value;
  }

  return {
    status: 'OK',
    year: entry.year,
    sourceType: entry.sourceType,
    records: dataset.records.length,
    validation,
  };
};

/**
 * Extracts, writes and optionally validates every manifest entry.
 *
 * Entries share nothing and run concurrently. A failing entry, including one
 * that throws, is reported as FAIL without affecting the others.
 */
export const processBatch = async (
  deps: ProcessBatchDeps,
  input: ProcessBatchInput
): Promise<BatchSummary> => {
  const log = deps.logger.child({ usecase: 'processBatch' });
  const entries = selectSources(input.sources, input.only);

  log.info({ entries: entries.length }, 'Processing budget sources');

  const items = await Promise.all(
    entries.map((entry) =>
      processEntry(deps, entry).catch((error: unknown) => {
        log.error(
          { err: error, year: entry.year, sourceType: entry.sourceType },
          'Unexpected failure while processing source'
        );
        return fail(entry, errorMessage(error));
      })
    )
  );

  const processed = items.filter((item) => item.status === 'OK').length;
  const validationFailures = items.filter(
    (item) => item.status === 'OK' && item.validation !== null && !item.validation.passed
  ).length;

  log.info(
    { processed, failed: items.length - processed, validationFailures },
    'Batch finished'
  );

  return {
    items,
    processed,
    failed: items.length - processed,
    validationFailures,
  };
};

/**
 * One line per item: `2024 BUDGET_LAW: OK` or `2024 MTEP: FAIL (<reason>)`.
 */
export const formatOutcome = (item: BatchItemOutcome): string =>
  item.status === 'OK'
    ? `${String(item.year)} ${item.sourceType}: OK`
    : `${String(item.year)} ${item.sourceType}: FAIL (${item.reason})`;

import { errorMessage } from '@/common/types/errors.js';
import { selectSources } from '@/modules/extraction/index.js';

import { revalidateProcessed, type RevalidateProcessedDeps } from './validate-dataset.js';

import type { ValidationReport } from '../types.js';
import type {
  BatchItemOutcome,
  BatchSummary,
  SourceEntry,
  SourceType,
} from '@/modules/extraction/index.js';

export interface RevalidateBatchInput {
  sources: readonly SourceEntry[];
  only?: readonly SourceType[] | undefined;
  strict?: boolean | undefined;
}

export interface RevalidateBatchOutput {
  readonly summary: BatchSummary;
  /** Reports of the datasets that loaded, in manifest order */
  readonly reports: readonly ValidationReport[];
}

interface EntryOutcome {
  readonly item: BatchItemOutcome;
  readonly report: ValidationReport | null;
}

const failed = (entry: SourceEntry, reason: string): EntryOutcome => ({
  item: { status: 'FAIL', year: entry.year, sourceType: entry.sourceType, reason },
  report: null,
});

const revalidateEntry = async (
  deps: RevalidateProcessedDeps,
  entry: SourceEntry,
  strict: boolean
): Promise<EntryOutcome> => {
  const result = await revalidateProcessed(deps, {
    year: entry.year,
    sourceType: entry.sourceType,
    strict,
  });
  if (result.isErr()) {
    return failed(entry, result.error.message);
  }

  const { dataset, report, passed } = result.value;
  return {
    item: {
      status: 'OK',
      year: entry.year,
      sourceType: entry.sourceType,
      records: dataset.records.length,
      validation: {
        passed,
        errorCount: report.summary.errorCount,
        warningCount: report.summary.warningCount,
      },
    },
    report,
  };
};

/**
 * Re-validates the processed output of every manifest entry.
 *
 * Workbooks are not read. An entry whose processed files are missing or
 * unreadable is reported as FAIL, the same way a failed extraction is.
 */
export const revalidateBatch = async (
  deps: RevalidateProcessedDeps,
  input: RevalidateBatchInput
): Promise<RevalidateBatchOutput> => {
  const log = deps.logger.child({ usecase: 'revalidateBatch' });
  const entries = selectSources(input.sources, input.only);
  const strict = input.strict ?? false;

  log.info({ entries: entries.length }, 'Re-validating processed datasets');

  const outcomes = await Promise.all(
    entries.map((entry) =>
      revalidateEntry(deps, entry, strict).catch((error: unknown) => {
        log.error(
          { err: error, year: entry.year, sourceType: entry.sourceType },
          'Unexpected failure while re-validating dataset'
        );
        return failed(entry, errorMessage(error));
      })
    )
  );

  const items = outcomes.map((outcome) => outcome.item);
  const reports = outcomes.flatMap((outcome) => (outcome.report === null ? [] : [outcome.report]));
  const processed = items.filter((item) => item.status === 'OK').length;
  const validationFailures = items.filter(
    (item) => item.status === 'OK' && item.validation !== null && !item.validation.passed
  ).length;

  log.info(
    { processed, failed: items.length - processed, validationFailures },
    'Re-validation finished'
  );

  return {
    summary: { items, processed, failed: items.length - processed, validationFailures },
    reports,
  };
};

import { err, ok, type Result } from 'neverthrow';

import { recordColumns } from '../column-schema.js';
import { scanSheet } from '../state-machine.js';
import {
  createScanDiagnostics,
  layoutFor,
  sourceKindOf,
  type ExtractionOutput,
  type ExtractionTarget,
  type ScanDiagnostics,
} from '../types.js';

import type { ExtractionError, ScanError } from '../errors.js';
import type { SheetRows, WorkbookReader } from '../ports.js';
import type { Logger } from 'pino';

export interface ExtractBudgetDeps {
  workbookReader: WorkbookReader;
  logger: Logger;
}

export interface ExtractBudgetInput extends ExtractionTarget {
  path: string;
}

/**
 * Extracts records and overall totals from already-read sheet rows.
 * The layout and column schema follow from the year and source type.
 */
export const extractFromSheet = (
  sheet: SheetRows,
  target: ExtractionTarget,
  diagnostics: ScanDiagnostics = createScanDiagnostics()
): Result<ExtractionOutput, ScanError> => {
  const sourceKind = sourceKindOf(target.sourceType);
  const layout = layoutFor(target.year, target.sourceType);

  return scanSheet(sheet, { kind: sourceKind, layout, year: target.year }, diagnostics).map(
    ({ records, overall }) => ({
      sourceType: target.sourceType,
      sourceKind,
      layout,
      year: target.year,
      columns: recordColumns(sourceKind),
      records,
      overall,
      diagnostics,
    })
  );
};

/**
 * Reads a workbook and extracts its records.
 */
export const extractBudget = async (
  deps: ExtractBudgetDeps,
  input: ExtractBudgetInput
): Promise<Result<ExtractionOutput, ExtractionError>> => {
  const { year, sourceType, path } = input;
  const log = deps.logger.child({ usecase: 'extractBudget', year, sourceType });

  const sheetResult = await deps.workbookReader.readFirstSheet(path);
  if (sheetResult.isErr()) {
    log.error({ error: sheetResult.error }, 'Failed to read workbook');
    return err(sheetResult.error);
  }

  log.debug({ path, rows: sheetResult.value.length }, 'Workbook loaded');

  const diagnostics = createScanDiagnostics();
  const extracted = extractFromSheet(sheetResult.value, { year, sourceType }, diagnostics);

  for (const warning of diagnostics.warnings) {
    log.warn({ row: warning.row }, warning.message);
  }

  if (extracted.isErr()) {
    log.error({ error: extracted.error }, 'Extraction failed');
    return err(extracted.error);
  }

  const output = extracted.value;
  log.info(
    {
      layout: output.layout,
      records: output.records.length,
      warnings: diagnostics.warnings.length,
      skippedRows: diagnostics.skippedRows.length,
      rowTypes: diagnostics.rowTypeCounts,
    },
    'Extracted budget records'
  );

  return ok(output);
};

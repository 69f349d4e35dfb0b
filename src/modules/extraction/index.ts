// Use cases
export {
  extractBudget,
  extractFromSheet,
  type ExtractBudgetDeps,
  type ExtractBudgetInput,
} from './core/usecases/extract-budget.js';
export {
  processBatch,
  formatOutcome,
  selectSources,
  type BatchItemOutcome,
  type BatchSummary,
  type DatasetValidator,
  type ProcessBatchDeps,
  type ProcessBatchInput,
  type ValidationVerdict,
} from './core/usecases/process-batch.js';

// Parsing core
export { classifyRow, toRawRow } from './core/row-classifier.js';
export { LAYOUT_GRAMMARS } from './core/layouts.js';
export { collectDetails, DETAIL_WINDOW_SIZE } from './core/detail-collector.js';
export { nextState, scanSheet } from './core/state-machine.js';
export {
  amountFieldsOf,
  columnBase,
  fieldsOf,
  getColumnSpecs,
  identifierColumns,
  levelColumn,
  levelPrefixes,
  percentageFieldsOf,
  recordColumns,
  type ColumnSpec,
  type LevelPrefix,
} from './core/column-schema.js';
export { levelAmounts, overallToJson, toRow } from './core/record-builder.js';

// Shell
export { createXlsxWorkbookReader, readWorkbookBuffer } from './shell/workbook/xlsx-reader.js';
export {
  createProcessedOutputStore,
  type ProcessedStoreOptions,
} from './shell/output/processed-store.js';
export { processedPaths, validationReportPath } from './shell/output/paths.js';
export { writeTextFile } from './shell/output/processed-writer.js';
export { createSourcesRepo, type SourcesRepoOptions } from './shell/manifest/sources-repo.js';

// Ports
export type {
  ProcessedDataset,
  ProcessedOutputStore,
  SheetRows,
  SourceEntry,
  SourcesRepo,
  WorkbookReader,
  WrittenFiles,
} from './core/ports.js';

// Types
export {
  SOURCE_TYPES,
  createScanDiagnostics,
  hasSubprogram,
  isSourceType,
  layoutFor,
  sourceKindOf,
} from './core/types.js';
export type {
  AmountField,
  AmountView,
  Amounts,
  AnySubprogramRecord,
  ExtractionOutput,
  FlattenedRecord,
  Layout,
  OverallTotals,
  PlanProgramRecord,
  ProcessingState,
  RawRow,
  RowType,
  ScanDiagnostics,
  SourceKind,
  SourceType,
  SubprogramKind,
  SubprogramRecord,
} from './core/types.js';

// Errors
export type {
  ExtractionError,
  OutputError,
  ScanError,
  SourcesManifestError,
  WorkbookError,
} from './core/errors.js';

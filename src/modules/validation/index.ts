// Registry and checks
export { createCheckRegistry, runChecks, type CheckRegistry } from './core/registry.js';
export {
  DEFAULT_VALIDATION_CONFIG,
  hierarchyTolerance,
  type ValidationConfig,
} from './core/config.js';
export { exceedsLimit } from './core/checks/period-vs-annual.js';

// Report
export {
  buildValidationReport,
  failedResults,
  hasFailures,
  summarizeResults,
  type FailurePolicy,
} from './core/report.js';
export {
  resultTitle,
  toConsoleSummary,
  toJson,
  toMarkdown,
  type CheckResultJson,
  type ValidationReportJson,
} from './core/render.js';

// Use cases
export {
  revalidateProcessed,
  validateDataset,
  validateRecords,
  type RevalidateProcessedDeps,
  type RevalidateProcessedInput,
  type RevalidateProcessedOutput,
  type ValidateDatasetDeps,
  type ValidateDatasetInput,
  type ValidateDatasetOutput,
} from './core/usecases/validate-dataset.js';
export {
  revalidateBatch,
  type RevalidateBatchInput,
  type RevalidateBatchOutput,
} from './core/usecases/revalidate-batch.js';

// Shell
export { createFileReportWriter, type ReportWriterOptions } from './shell/report-writer.js';

// Ports
export type { ValidationReportWriter, WrittenReport } from './core/ports.js';

// Types
export { CHECK_IDS, createCheckResult } from './core/types.js';
export type {
  CheckId,
  CheckLevel,
  CheckResult,
  RowLevel,
  Severity,
  ValidationCheck,
  ValidationInput,
  ValidationMetadata,
  ValidationReport,
  ValidationSummary,
} from './core/types.js';

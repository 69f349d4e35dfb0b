import type {
  CheckResult,
  Severity,
  ValidationMetadata,
  ValidationReport,
  ValidationSummary,
} from './types.js';

const failedWith = (results: readonly CheckResult[], severity: Severity): CheckResult[] =>
  results.filter((result) => !result.passed && result.severity === severity);

const sumFailCounts = (results: readonly CheckResult[]): number =>
  results.reduce((total, result) => total + result.failCount, 0);

export const summarizeResults = (results: readonly CheckResult[]): ValidationSummary => {
  const errors = failedWith(results, 'error');
  const warnings = failedWith(results, 'warning');
  return {
    total: results.length,
    passed: results.filter((result) => result.passed).length,
    withWarnings: warnings.length,
    withErrors: errors.length,
    errorCount: sumFailCounts(errors),
    warningCount: sumFailCounts(warnings),
  };
};

export const buildValidationReport = (
  results: readonly CheckResult[],
  metadata: ValidationMetadata
): ValidationReport =>
  Object.freeze({
    metadata: Object.freeze({ ...metadata }),
    results: Object.freeze([...results]),
    summary: Object.freeze(summarizeResults(results)),
  });

export interface FailurePolicy {
  /** Failed warnings fail the report too */
  strict: boolean;
}

export const hasFailures = (report: ValidationReport, policy: FailurePolicy): boolean =>
  report.results.some(
    (result) => !result.passed && (result.severity === 'error' || policy.strict)
  );

export const failedResults = (
  report: ValidationReport,
  severity?: Severity
): CheckResult[] =>
  report.results.filter(
    (result) => !result.passed && (severity === undefined || result.severity === severity)
  );

import type { ValidationReport } from './types.js';
import type { OutputError } from '@/modules/extraction/index.js';
import type { Result } from 'neverthrow';

export interface WrittenReport {
  readonly jsonPath: string;
  readonly markdownPath: string;
}

export interface ValidationReportWriter {
  /**
   * Persists the JSON and Markdown renderings of a report.
   */
  write(report: ValidationReport): Promise<Result<WrittenReport, OutputError>>;
}

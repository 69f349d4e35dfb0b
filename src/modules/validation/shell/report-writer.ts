import { err, ok, type Result } from 'neverthrow';

import {
  validationReportPath,
  writeTextFile,
  type OutputError,
} from '@/modules/extraction/index.js';

import { toJson, toMarkdown } from '../core/render.js';

import type { ValidationReportWriter, WrittenReport } from '../core/ports.js';
import type { ValidationReport } from '../core/types.js';

export interface ReportWriterOptions {
  /** Root output directory; reports go under `validation/` */
  outputDir: string;
}

export const createFileReportWriter = (options: ReportWriterOptions): ValidationReportWriter => ({
  async write(report: ValidationReport): Promise<Result<WrittenReport, OutputError>> {
    const { year, sourceType } = report.metadata;

    const json = await writeTextFile(
      validationReportPath(options.outputDir, year, sourceType, 'json'),
      `${JSON.stringify(toJson(report), null, 2)}\n`
    );
    if (json.isErr()) {
      return err(json.error);
    }

    const markdown = await writeTextFile(
      validationReportPath(options.outputDir, year, sourceType, 'md'),
      toMarkdown(report)
    );
    if (markdown.isErr()) {
      return err(markdown.error);
    }

    return ok({ jsonPath: json.value, markdownPath: markdown.value });
  },
});

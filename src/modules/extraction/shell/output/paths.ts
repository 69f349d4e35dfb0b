import path from 'node:path';

import type { SourceType } from '../../core/types.js';

export interface ProcessedPaths {
  readonly csvPath: string;
  readonly overallPath: string;
}

/**
 * `<outputDir>/csv/<year>_<TYPE>.csv` and `<year>_<TYPE>_overall.json` beside it.
 */
export const processedPaths = (
  outputDir: string,
  year: number,
  sourceType: SourceType
): ProcessedPaths => {
  const base = path.join(outputDir, 'csv', `${String(year)}_${sourceType}`);
  return {
    csvPath: `${base}.csv`,
    overallPath: `${base}_overall.json`,
  };
};

/**
 * `<outputDir>/validation/<year>_<TYPE>_validation.<ext>`
 */
export const validationReportPath = (
  outputDir: string,
  year: number,
  sourceType: SourceType,
  extension: 'json' | 'md'
): string =>
  path.join(outputDir, 'validation', `${String(year)}_${sourceType}_validation.${extension}`);

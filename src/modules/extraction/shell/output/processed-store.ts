import { err, ok, type Result } from 'neverthrow';

import { processedPaths } from './paths.js';
import { readProcessedDataset } from './processed-reader.js';
import { toOverallJson, toProcessedCsv, writeTextFile } from './processed-writer.js';

import type { OutputError } from '../../core/errors.js';
import type { ProcessedDataset, ProcessedOutputStore, WrittenFiles } from '../../core/ports.js';
import type { SourceType } from '../../core/types.js';

export interface ProcessedStoreOptions {
  /** Root output directory; files go under `csv/` */
  outputDir: string;
}

/**
 * File-backed store of processed record tables and overall totals.
 */
export const createProcessedOutputStore = (
  options: ProcessedStoreOptions
): ProcessedOutputStore => ({
  async write(dataset: ProcessedDataset): Promise<Result<WrittenFiles, OutputError>> {
    const paths = processedPaths(options.outputDir, dataset.year, dataset.sourceType);

    const csv = await writeTextFile(paths.csvPath, toProcessedCsv(dataset));
    if (csv.isErr()) {
      return err(csv.error);
    }
    const overall = await writeTextFile(paths.overallPath, toOverallJson(dataset));
    if (overall.isErr()) {
      return err(overall.error);
    }

    return ok(paths);
  },

  async read(year: number, sourceType: SourceType): Promise<Result<ProcessedDataset, OutputError>> {
    return readProcessedDataset(processedPaths(options.outputDir, year, sourceType), year, sourceType);
  },

  locate(year: number, sourceType: SourceType): WrittenFiles {
    return processedPaths(options.outputDir, year, sourceType);
  },
});

import type { OutputError, SourcesManifestError, WorkbookError } from './errors.js';
import type {
  FlattenedRecord,
  OverallTotals,
  SourceKind,
  SourceType,
} from './types.js';
import type { Result } from 'neverthrow';

/**
 * Raw cell strings of a workbook's first sheet.
 */
export type SheetRows = readonly (readonly string[])[];

export interface WorkbookReader {
  /**
   * Reads the first worksheet without a header row; every cell is a string.
   */
  readFirstSheet(path: string): Promise<Result<SheetRows, WorkbookError>>;
}

/**
 * A processed dataset as written to and read from the output directory.
 */
export interface ProcessedDataset {
  readonly year: number;
  readonly sourceType: SourceType;
  readonly sourceKind: SourceKind;
  readonly columns: readonly string[];
  readonly records: readonly FlattenedRecord[];
  readonly overall: OverallTotals;
}

export interface WrittenFiles {
  readonly csvPath: string;
  readonly overallPath: string;
}

export interface ProcessedOutputStore {
  write(dataset: ProcessedDataset): Promise<Result<WrittenFiles, OutputError>>;
  read(year: number, sourceType: SourceType): Promise<Result<ProcessedDataset, OutputError>>;
  /** Where `write` puts, and `read` looks for, a dataset */
  locate(year: number, sourceType: SourceType): WrittenFiles;
}

export interface SourceEntry {
  readonly year: number;
  readonly sourceType: SourceType;
  readonly path: string;
}

export interface SourcesRepo {
  /**
   * All manifest entries, in file order.
   */
  list(): Promise<Result<SourceEntry[], SourcesManifestError>>;
}

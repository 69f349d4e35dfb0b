import fs from 'node:fs/promises';
import path from 'node:path';

import { err, ok, type Result } from 'neverthrow';
import * as XLSX from 'xlsx';

import { toFileSystemError } from '@/common/types/errors.js';

import { overallToJson, toRow, type CellValue } from '../../core/record-builder.js';

import type { OutputError } from '../../core/errors.js';
import type { ProcessedDataset } from '../../core/ports.js';

const UTF8_BOM = '\ufeff';

const toCsvCell = (value: CellValue): string => {
  if (value === null) {
    return '';
  }
  return typeof value === 'number' ? String(value) : value;
};

/**
 * Record table as CSV text with a BOM and a header row.
 *
 * Numbers are written as plain strings so that no spreadsheet number format
 * rounds them.
 */
export const toProcessedCsv = (dataset: ProcessedDataset): string => {
  const rows: string[][] = [
    [...dataset.columns],
    ...dataset.records.map((record) => toRow(record).map(toCsvCell)),
  ];
  const sheet = XLSX.utils.aoa_to_sheet(rows);
  return `${UTF8_BOM}${XLSX.utils.sheet_to_csv(sheet)}`;
};

export const toOverallJson = (dataset: ProcessedDataset): string =>
  `${JSON.stringify(overallToJson(dataset.sourceKind, dataset.overall), null, 2)}\n`;

/**
 * Writes a text file, creating parent directories.
 */
export const writeTextFile = async (
  filePath: string,
  contents: string
): Promise<Result<string, OutputError>> => {
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, contents, 'utf8');
    return ok(filePath);
  } catch (error) {
    const fsError = toFileSystemError(error, filePath, 'write');
    return err({ type: 'WriteError', message: fsError.message, path: filePath });
  }
};

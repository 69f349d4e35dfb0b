import fs from 'node:fs/promises';

import { err, ok, type Result } from 'neverthrow';
import * as XLSX from 'xlsx';

import { errorMessage, toFileSystemError } from '@/common/types/errors.js';

import type { WorkbookError } from '../../core/errors.js';
import type { SheetRows, WorkbookReader } from '../../core/ports.js';

/**
 * Cell value as read by SheetJS in raw mode, coerced to a trimmed string.
 */
const cellToString = (value: unknown): string => {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return '';
};

/**
 * First worksheet as rows of strings, anchored at A1 so that column indexes
 * match the sheet even when the used range starts further right or down.
 */
export const sheetRowsFromWorkbook = (
  workbook: XLSX.WorkBook,
  source: string
): Result<SheetRows, WorkbookError> => {
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  const ref = sheet?.['!ref'];

  if (sheet === undefined || ref === undefined) {
    return err({
      type: 'EmptyWorkbook',
      message: `Workbook at ${source} has no populated worksheet`,
      path: source,
    });
  }

  const range = XLSX.utils.decode_range(ref);
  range.s.r = 0;
  range.s.c = 0;

  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: true,
    defval: '',
    blankrows: true,
    range: XLSX.utils.encode_range(range),
  });

  return ok(rows.map((row) => row.map(cellToString)));
};

/**
 * Parses workbook bytes (xlsx, xls, ods, csv).
 */
export const readWorkbookBuffer = (
  data: Buffer,
  source: string
): Result<SheetRows, WorkbookError> => {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(data, { type: 'buffer', cellDates: true });
  } catch (error) {
    return err({
      type: 'WorkbookReadError',
      message: `Failed to parse workbook at ${source}: ${errorMessage(error)}`,
      path: source,
    });
  }
  return sheetRowsFromWorkbook(workbook, source);
};

export const createXlsxWorkbookReader = (): WorkbookReader => ({
  async readFirstSheet(path: string): Promise<Result<SheetRows, WorkbookError>> {
    let data: Buffer;
    try {
      data = await fs.readFile(path);
    } catch (error) {
      const fsError = toFileSystemError(error, path, 'read');
      return err({
        type: fsError.type === 'NotFound' ? 'NotFound' : 'WorkbookReadError',
        message: fsError.message,
        path,
      });
    }
    return readWorkbookBuffer(data, path);
  },
});

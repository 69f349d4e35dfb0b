import fs from 'node:fs/promises';

import { Type } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';
import * as XLSX from 'xlsx';

import { errorMessage, toFileSystemError } from '@/common/types/errors.js';

import {
  buildAmounts,
  fieldForColumnBase,
  fieldsOf,
  levelColumn,
  type LevelPrefix,
} from '../../core/column-schema.js';
import { formatSchemaErrors, type OutputError } from '../../core/errors.js';
import { isNumeric, parseIntegral } from '../../core/markers.js';
import { recordBuildersFor, type HierarchyContext } from '../../core/record-builder.js';
import { sourceKindOf } from '../../core/types.js';

import type { ProcessedDataset } from '../../core/ports.js';
import type {
  AmountField,
  Amounts,
  OverallTotals,
  RecordByKind,
  SourceKind,
  SourceType,
} from '../../core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Overall JSON
// ─────────────────────────────────────────────────────────────────────────────

const OverallJsonSchema = Type.Record(
  Type.String(),
  Type.Union([Type.Number(), Type.Null(), Type.Array(Type.Number())])
);

const overallValidator = TypeCompiler.Compile(OverallJsonSchema);

/**
 * Overall totals from `{ overall_<column>: value, plan_years? }`. Absent keys
 * stay absent so that the required-fields check can report them.
 */
export const parseOverallJson = (
  kind: SourceKind,
  text: string,
  source: string
): Result<OverallTotals, OutputError> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse JSON at ${source}: ${errorMessage(error)}`,
      path: source,
    });
  }

  if (!overallValidator.Check(parsed)) {
    const details = formatSchemaErrors(overallValidator.Errors(parsed));
    return err({
      type: 'ParseError',
      message: `Unexpected overall totals shape at ${source}: ${details.join('; ')}`,
      path: source,
    });
  }

  const kindFields: ReadonlySet<AmountField> = new Set<AmountField>(fieldsOf(kind));
  const fields: Record<string, number | null> = {};
  let planYears: readonly number[] | undefined;

  for (const [key, value] of Object.entries(parsed)) {
    if (key === 'plan_years' && Array.isArray(value)) {
      planYears = value;
      continue;
    }
    if (!key.startsWith('overall_') || Array.isArray(value)) {
      continue;
    }
    const field = fieldForColumnBase(key.slice('overall_'.length));
    if (field !== undefined && kindFields.has(field)) {
      fields[field] = value;
    }
  }

  return ok({ fields, ...(planYears !== undefined && { planYears }) });
};

// ─────────────────────────────────────────────────────────────────────────────
// Record CSV
// ─────────────────────────────────────────────────────────────────────────────

interface CsvTable {
  readonly header: readonly string[];
  readonly rows: readonly (readonly string[])[];
}

const toCellString = (value: unknown): string =>
  typeof value === 'string' ? value : value === null || value === undefined ? '' : String(value);

const UTF8_BOM = '\ufeff';

const readCsvTable = (data: Buffer): CsvTable => {
  const text = data.toString('utf8');
  const workbook = XLSX.read(text.startsWith(UTF8_BOM) ? text.slice(1) : text, {
    type: 'string',
    raw: true,
  });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (sheet === undefined) {
    return { header: [], rows: [] };
  }
  const [header = [], ...rows] = XLSX.utils
    .sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, defval: '', blankrows: false })
    .map((row) => row.map(toCellString));
  return { header, rows };
};

class RowReader {
  private readonly index: Map<string, number>;

  constructor(
    header: readonly string[],
    private readonly row: readonly string[]
  ) {
    this.index = new Map(header.map((column, position) => [column, position]));
  }

  text(column: string): string {
    const position = this.index.get(column);
    return position === undefined ? '' : (this.row[position] ?? '');
  }

  has(column: string): boolean {
    return this.index.has(column);
  }

  amount(column: string): number | null {
    const value = this.text(column).trim();
    return isNumeric(value) ? Number(value) : null;
  }

  /** Integer code; null when the column is present but unparseable */
  code(column: string): number | null {
    if (!this.has(column)) {
      return 0;
    }
    return parseIntegral(this.text(column));
  }
}

const readLevel = <K extends SourceKind>(
  kind: K,
  reader: RowReader,
  prefix: LevelPrefix
): Amounts<K> => buildAmounts(kind, (field) => reader.amount(levelColumn(prefix, field)));

const readRecord = <K extends SourceKind>(
  kind: K,
  reader: RowReader
): RecordByKind[K] | string => {
  const programCode = reader.code('program_code');
  if (programCode === null) {
    return `invalid program_code '${reader.text('program_code')}'`;
  }

  const context: HierarchyContext<K> = {
    stateBody: reader.text('state_body'),
    stateBodyAmounts: readLevel(kind, reader, 'state_body_'),
    programCode,
    programName: reader.text('program_name'),
    programGoal: reader.text('program_goal'),
    programResultDesc: reader.text('program_result_desc'),
    programAmounts: readLevel(kind, reader, 'program_'),
  };

  const builders = recordBuildersFor(kind);
  if (builders.atProgram !== null) {
    return builders.atProgram(context);
  }
  if (builders.atSubprogram === null) {
    return 'source kind has no record shape';
  }

  const subprogramCode = reader.code('subprogram_code');
  if (subprogramCode === null) {
    return `invalid subprogram_code '${reader.text('subprogram_code')}'`;
  }
  const ext = reader.text('program_code_ext').trim();
  const programCodeExt = ext === '' ? null : parseIntegral(ext);
  if (ext !== '' && programCodeExt === null) {
    return `invalid program_code_ext '${ext}'`;
  }

  return builders.atSubprogram(context, {
    programCodeExt,
    subprogramCode,
    subprogramName: reader.text('subprogram_name'),
    subprogramDesc: reader.text('subprogram_desc'),
    subprogramType: reader.text('subprogram_type'),
    amounts: readLevel(kind, reader, 'subprogram_'),
  });
};

/**
 * Records from a processed CSV. Blank amount cells read as null; a row whose
 * codes are not integers is an error.
 */
export const parseProcessedCsv = <K extends SourceKind>(
  kind: K,
  data: Buffer,
  source: string
): Result<{ columns: readonly string[]; records: RecordByKind[K][] }, OutputError> => {
  let table: CsvTable;
  try {
    table = readCsvTable(data);
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse CSV at ${source}: ${errorMessage(error)}`,
      path: source,
    });
  }

  const records: RecordByKind[K][] = [];
  for (const [offset, row] of table.rows.entries()) {
    const record = readRecord(kind, new RowReader(table.header, row));
    if (typeof record === 'string') {
      // header is line 1
      const line = offset + 2;
      return err({
        type: 'InvalidProcessedRow',
        message: `Line ${String(line)} of ${source}: ${record}`,
        path: source,
        line,
      });
    }
    records.push(record);
  }

  return ok({ columns: table.header, records });
};

// ─────────────────────────────────────────────────────────────────────────────
// File access
// ─────────────────────────────────────────────────────────────────────────────

const readFileResult = async (filePath: string): Promise<Result<Buffer, OutputError>> => {
  try {
    return ok(await fs.readFile(filePath));
  } catch (error) {
    const fsError = toFileSystemError(error, filePath, 'read');
    return err({
      type: fsError.type === 'NotFound' ? 'NotFound' : 'ReadError',
      message: fsError.message,
      path: filePath,
    });
  }
};

/**
 * Loads a processed dataset (CSV and overall JSON) for re-validation.
 */
export const readProcessedDataset = async (
  paths: { csvPath: string; overallPath: string },
  year: number,
  sourceType: SourceType
): Promise<Result<ProcessedDataset, OutputError>> => {
  const sourceKind = sourceKindOf(sourceType);

  const csvData = await readFileResult(paths.csvPath);
  if (csvData.isErr()) {
    return err(csvData.error);
  }
  const table = parseProcessedCsv(sourceKind, csvData.value, paths.csvPath);
  if (table.isErr()) {
    return err(table.error);
  }

  const overallData = await readFileResult(paths.overallPath);
  if (overallData.isErr()) {
    return err(overallData.error);
  }
  const overall = parseOverallJson(sourceKind, overallData.value.toString('utf8'), paths.overallPath);
  if (overall.isErr()) {
    return err(overall.error);
  }

  return ok({
    year,
    sourceType,
    sourceKind,
    columns: table.value.columns,
    records: table.value.records,
    overall: overall.value,
  });
};

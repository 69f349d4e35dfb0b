import { mkdtemp, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { createProcessedOutputStore, processedPaths } from '@/modules/extraction/index.js';
import {
  parseOverallJson,
  parseProcessedCsv,
} from '@/modules/extraction/shell/output/processed-reader.js';

import {
  makeBudgetLawDataset,
  makeDataset,
  makePeriodAmounts,
  makePeriodDataset,
  makePeriodRecord,
  makePlanRecord,
} from '../../fixtures/builders.js';

const makeTempDir = async (): Promise<string> => mkdtemp(path.join(tmpdir(), 'processed-'));

describe('processedPaths', () => {
  it('names the CSV and overall JSON after year and source type', () => {
    expect(processedPaths('/out', 2024, 'SPENDING_Q12')).toEqual({
      csvPath: '/out/csv/2024_SPENDING_Q12.csv',
      overallPath: '/out/csv/2024_SPENDING_Q12_overall.json',
    });
  });
});

describe('processed output store', () => {
  it('writes a CSV with a BOM, a header and one line per record', async () => {
    const dir = await makeTempDir();
    const store = createProcessedOutputStore({ outputDir: dir });

    const files = (await store.write(makeBudgetLawDataset()))._unsafeUnwrap();
    const csv = await readFile(files.csvPath, 'utf8');
    const lines = csv.split('\n');

    expect(files.csvPath).toBe(path.join(dir, 'csv', '2024_BUDGET_LAW.csv'));
    expect(lines[0]).toBe(
      '\ufeffstate_body,program_code,program_code_ext,program_name,program_goal,' +
        'program_result_desc,subprogram_code,subprogram_name,subprogram_desc,subprogram_type,' +
        'state_body_total,program_total,subprogram_total'
    );
    expect(lines[1]).toBe(
      'Ministry of Finance,1001,,Public finance management,Sustainable public finances,' +
        'Balanced budget execution,11001,Budget planning,Preparation of the annual budget,' +
        'Service,600000,600000,400000'
    );
  });

  it('writes the overall totals as JSON', async () => {
    const dir = await makeTempDir();
    const store = createProcessedOutputStore({ outputDir: dir });

    const files = (await store.write(makeBudgetLawDataset()))._unsafeUnwrap();

    expect(await readFile(files.overallPath, 'utf8')).toBe('{\n  "overall_total": 1000000\n}\n');
  });

  it('locates files where it writes them', async () => {
    const dir = await makeTempDir();
    const store = createProcessedOutputStore({ outputDir: dir });

    const files = (await store.write(makeBudgetLawDataset()))._unsafeUnwrap();

    expect(store.locate(2024, 'BUDGET_LAW')).toEqual(files);
    expect(store.locate(2025, 'MTEP')).toEqual(processedPaths(dir, 2025, 'MTEP'));
  });

  it('reads back what it wrote', async () => {
    const dir = await makeTempDir();
    const store = createProcessedOutputStore({ outputDir: dir });
    const dataset = makeBudgetLawDataset();

    (await store.write(dataset))._unsafeUnwrap();
    const loaded = (await store.read(2024, 'BUDGET_LAW'))._unsafeUnwrap();

    expect(loaded).toEqual(dataset);
  });

  it('keeps blank amounts as null', async () => {
    const dir = await makeTempDir();
    const store = createProcessedOutputStore({ outputDir: dir });
    const dataset = makePeriodDataset([
      makePeriodRecord({ subprogramAmounts: makePeriodAmounts({ actual: null }) }),
    ]);

    (await store.write(dataset))._unsafeUnwrap();
    const loaded = (await store.read(2024, 'SPENDING_Q12'))._unsafeUnwrap();

    expect(loaded.records[0]).toMatchObject({
      subprogramAmounts: makePeriodAmounts({ actual: null }),
    });
  });

  it('round-trips the plan years of an expenditure plan', async () => {
    const dir = await makeTempDir();
    const store = createProcessedOutputStore({ outputDir: dir });
    const dataset = makeDataset(
      'MTEP',
      [makePlanRecord()],
      { fields: { totalY0: 300, totalY1: 330, totalY2: 360 }, planYears: [2025, 2026, 2027] },
      2025
    );

    (await store.write(dataset))._unsafeUnwrap();
    const loaded = (await store.read(2025, 'MTEP'))._unsafeUnwrap();

    expect(loaded).toEqual(dataset);
  });

  it('returns NotFound for a dataset that was never written', async () => {
    const dir = await makeTempDir();
    const store = createProcessedOutputStore({ outputDir: dir });

    const error = (await store.read(2030, 'MTEP'))._unsafeUnwrapErr();

    expect(error.type).toBe('NotFound');
  });
});

describe('parseProcessedCsv', () => {
  it('rejects a row with a non-integer code', () => {
    const error = parseProcessedCsv(
      'budget_law',
      Buffer.from('state_body,program_code\nMinistry of Finance,abc\n'),
      'law.csv'
    )._unsafeUnwrapErr();

    expect(error).toEqual({
      type: 'InvalidProcessedRow',
      message: "Line 2 of law.csv: invalid program_code 'abc'",
      path: 'law.csv',
      line: 2,
    });
  });

  it('reads absent code columns as zero and absent amounts as null', () => {
    const table = parseProcessedCsv(
      'budget_law',
      Buffer.from('state_body,subprogram_name\nMinistry of Finance,Budget planning\n'),
      'law.csv'
    )._unsafeUnwrap();

    expect(table.columns).toEqual(['state_body', 'subprogram_name']);
    expect(table.records[0]).toMatchObject({
      programCode: 0,
      subprogramCode: 0,
      subprogramName: 'Budget planning',
      subprogramAmounts: { total: null },
    });
  });
});

describe('parseOverallJson', () => {
  it('keeps only the overall fields of the source kind', () => {
    const overall = parseOverallJson(
      'budget_law',
      '{"overall_total": 5, "overall_actual": 3, "other": 1}',
      'law.json'
    )._unsafeUnwrap();

    expect(overall).toEqual({ fields: { total: 5 } });
  });

  it('rejects values that are not numbers', () => {
    const error = parseOverallJson('budget_law', '{"overall_total": "5"}', 'law.json')._unsafeUnwrapErr();

    expect(error.type).toBe('ParseError');
  });

  it('rejects malformed JSON', () => {
    const error = parseOverallJson('budget_law', '{', 'law.json')._unsafeUnwrapErr();

    expect(error.type).toBe('ParseError');
  });
});

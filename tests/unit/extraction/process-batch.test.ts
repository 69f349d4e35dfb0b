import { ok } from 'neverthrow';
import pinoLogger from 'pino';
import { describe, expect, it } from 'vitest';

import {
  extractBudget,
  formatOutcome,
  processBatch,
  type DatasetValidator,
  type SourceEntry,
} from '@/modules/extraction/index.js';

import { budgetLawSheet, expenditurePlanSheet } from '../../fixtures/budget-sheets.js';
import { makeFakeOutputStore, makeFakeWorkbookReader } from '../../fixtures/fakes.js';

const testLogger = pinoLogger({ level: 'silent' });

const sources: SourceEntry[] = [
  { year: 2024, sourceType: 'BUDGET_LAW', path: '/raw/2024_law.xlsx' },
  { year: 2025, sourceType: 'MTEP', path: '/raw/2025_mtep.xlsx' },
  { year: 2024, sourceType: 'SPENDING_Q1', path: '/raw/2024_q1.xlsx' },
];

const makeReader = () =>
  makeFakeWorkbookReader({
    '/raw/2024_law.xlsx': budgetLawSheet(),
    '/raw/2025_mtep.xlsx': expenditurePlanSheet(),
  });

describe('extractBudget', () => {
  it('reads the workbook and extracts its records', async () => {
    const reader = makeReader();

    const output = (
      await extractBudget(
        { workbookReader: reader, logger: testLogger },
        { year: 2024, sourceType: 'BUDGET_LAW', path: '/raw/2024_law.xlsx' }
      )
    )._unsafeUnwrap();

    expect(reader.reads).toEqual(['/raw/2024_law.xlsx']);
    expect(output.year).toBe(2024);
    expect(output.records).toHaveLength(4);
  });

  it('passes reader errors through', async () => {
    const error = (
      await extractBudget(
        { workbookReader: makeReader(), logger: testLogger },
        { year: 2024, sourceType: 'SPENDING_Q1', path: '/raw/2024_q1.xlsx' }
      )
    )._unsafeUnwrapErr();

    expect(error).toEqual({
      type: 'NotFound',
      message: 'File not found at /raw/2024_q1.xlsx',
      path: '/raw/2024_q1.xlsx',
    });
  });

  it('fails on a sheet without a grand total', async () => {
    const error = (
      await extractBudget(
        { workbookReader: makeFakeWorkbookReader({ '/raw/empty.xlsx': [] }), logger: testLogger },
        { year: 2024, sourceType: 'BUDGET_LAW', path: '/raw/empty.xlsx' }
      )
    )._unsafeUnwrapErr();

    expect(error.type).toBe('MissingGrandTotal');
  });
});

describe('processBatch', () => {
  it('processes every entry and reports failures per entry', async () => {
    const outputStore = makeFakeOutputStore();

    const summary = await processBatch(
      { workbookReader: makeReader(), outputStore, logger: testLogger },
      { sources }
    );

    expect(summary.items).toEqual([
      { status: 'OK', year: 2024, sourceType: 'BUDGET_LAW', records: 4, validation: null },
      { status: 'OK', year: 2025, sourceType: 'MTEP', records: 2, validation: null },
      {
        status: 'FAIL',
        year: 2024,
        sourceType: 'SPENDING_Q1',
        reason: 'File not found at /raw/2024_q1.xlsx',
      },
    ]);
    expect(summary.processed).toBe(2);
    expect(summary.failed).toBe(1);
    expect([...outputStore.datasets.keys()].sort()).toEqual(['2024_BUDGET_LAW', '2025_MTEP']);
  });

  it('restricts the batch to the requested source types', async () => {
    const reader = makeReader();

    const summary = await processBatch(
      { workbookReader: reader, outputStore: makeFakeOutputStore(), logger: testLogger },
      { sources, only: ['MTEP'] }
    );

    expect(summary.items).toHaveLength(1);
    expect(reader.reads).toEqual(['/raw/2025_mtep.xlsx']);
  });

  it('fails an entry whose output cannot be written', async () => {
    const summary = await processBatch(
      {
        workbookReader: makeReader(),
        outputStore: makeFakeOutputStore({ failWrite: true }),
        logger: testLogger,
      },
      { sources: sources.slice(0, 1) }
    );

    expect(summary.items).toEqual([
      {
        status: 'FAIL',
        year: 2024,
        sourceType: 'BUDGET_LAW',
        reason: 'Failed to write /out/csv/2024_BUDGET_LAW.csv',
      },
    ]);
  });

  it('counts datasets that fail validation', async () => {
    const validated: string[] = [];
    const validate: DatasetValidator = async (dataset, files) => {
      validated.push(files.csvPath);
      return ok({ passed: dataset.sourceType !== 'MTEP', errorCount: 1, warningCount: 0 });
    };

    const summary = await processBatch(
      {
        workbookReader: makeReader(),
        outputStore: makeFakeOutputStore(),
        logger: testLogger,
        validate,
      },
      { sources: sources.slice(0, 2) }
    );

    expect([...validated].sort()).toEqual(['/out/csv/2024_BUDGET_LAW.csv', '/out/csv/2025_MTEP.csv']);
    expect(summary.validationFailures).toBe(1);
    expect(summary.items[1]).toEqual({
      status: 'OK',
      year: 2025,
      sourceType: 'MTEP',
      records: 2,
      validation: { passed: false, errorCount: 1, warningCount: 0 },
    });
  });

  it('turns an exception in one entry into a failure of that entry', async () => {
    const validate: DatasetValidator = async (dataset) => {
      if (dataset.sourceType === 'MTEP') {
        throw new Error('boom');
      }
      return ok({ passed: true, errorCount: 0, warningCount: 0 });
    };

    const summary = await processBatch(
      {
        workbookReader: makeReader(),
        outputStore: makeFakeOutputStore(),
        logger: testLogger,
        validate,
      },
      { sources: sources.slice(0, 2) }
    );

    expect(summary.items.map(formatOutcome)).toEqual([
      '2024 BUDGET_LAW: OK',
      '2025 MTEP: FAIL (boom)',
    ]);
  });
});

import { mkdtemp, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { createProcessedOutputStore, type ProcessedDataset } from '@/modules/extraction/index.js';

import {
  EXIT_NOTHING_PROCESSED,
  EXIT_OK,
  EXIT_VALIDATION_FAILED,
  runProcessBudgets,
  type RunOutput,
} from '../../../scripts/process-budgets-run.js';
import { makeBudgetLawDataset, makeBudgetLawRecords, makeDataset } from '../../fixtures/builders.js';

const env: NodeJS.ProcessEnv = { NODE_ENV: 'test', LOG_LEVEL: 'silent' };

const makeOutput = (): RunOutput & { logs: string[]; errors: string[] } => {
  const logs: string[] = [];
  const errors: string[] = [];
  return {
    logs,
    errors,
    log: (line) => {
      logs.push(line);
    },
    error: (line) => {
      errors.push(line);
    },
  };
};

/**
 * Temp workspace with a manifest whose workbooks do not exist, and an output
 * directory holding the given processed datasets.
 */
const makeWorkspace = async (
  datasets: readonly ProcessedDataset[],
  entries = [{ year: 2024, type: 'BUDGET_LAW' }]
): Promise<{ manifest: string; out: string }> => {
  const dir = await mkdtemp(path.join(tmpdir(), 'process-budgets-'));
  const manifest = path.join(dir, 'sources.yaml');
  const out = path.join(dir, 'out');

  const lines = ['sources:'];
  for (const entry of entries) {
    lines.push(
      `  - year: ${String(entry.year)}`,
      `    type: ${entry.type}`,
      `    path: raw/${String(entry.year)}_${entry.type}.xlsx`
    );
  }
  await writeFile(manifest, `${lines.join('\n')}\n`, 'utf8');

  const store = createProcessedOutputStore({ outputDir: out });
  for (const dataset of datasets) {
    (await store.write(dataset))._unsafeUnwrap();
  }
  return { manifest, out };
};

describe('runProcessBudgets --validate-only', () => {
  it('re-validates processed output without reading workbooks', async () => {
    const { manifest, out } = await makeWorkspace([makeBudgetLawDataset()]);
    const io = makeOutput();

    const code = await runProcessBudgets(
      ['--validate-only', '--sources', manifest, '--out', out],
      env,
      io
    );

    expect(code).toBe(EXIT_OK);
    expect(io.logs.at(-1)).toBe('2024 BUDGET_LAW: OK');
    expect(io.errors).toEqual([]);

    const report: unknown = JSON.parse(
      await readFile(path.join(out, 'validation', '2024_BUDGET_LAW_validation.json'), 'utf8')
    );
    expect(report).toMatchObject({
      metadata: { file: path.join(out, 'csv', '2024_BUDGET_LAW.csv') },
      summary: { error_count: 0 },
    });
  });

  it('exits with 2 when a dataset fails an error check', async () => {
    const { manifest, out } = await makeWorkspace([
      makeDataset('BUDGET_LAW', makeBudgetLawRecords(), { fields: { total: 900000 } }),
    ]);
    const io = makeOutput();

    const code = await runProcessBudgets(
      ['--validate-only', '--sources', manifest, '--out', out],
      env,
      io
    );

    expect(code).toBe(EXIT_VALIDATION_FAILED);
    expect(io.logs.at(-1)).toBe('2024 BUDGET_LAW: OK');
    expect(io.errors).toEqual(['Validation failed for 1 dataset(s).']);
  });

  it('fails warnings when strict validation is configured', async () => {
    const { manifest, out } = await makeWorkspace([
      makeDataset(
        'BUDGET_LAW',
        makeBudgetLawRecords().map((record) =>
          record.subprogramCode === 13001 ? { ...record, subprogramName: '' } : record
        ),
        { fields: { total: 1000000 } }
      ),
    ]);
    const args = ['--validate-only', '--sources', manifest, '--out', out];

    expect(await runProcessBudgets(args, env, makeOutput())).toBe(EXIT_OK);
    expect(
      await runProcessBudgets(args, { ...env, VALIDATION_STRICT: 'true' }, makeOutput())
    ).toBe(EXIT_VALIDATION_FAILED);
  });

  it('exits with 1 when no processed dataset could be loaded', async () => {
    const { manifest, out } = await makeWorkspace([], [{ year: 2025, type: 'MTEP' }]);
    const io = makeOutput();

    const code = await runProcessBudgets(
      ['--validate-only', '--sources', manifest, '--out', out],
      env,
      io
    );

    expect(code).toBe(EXIT_NOTHING_PROCESSED);
    expect(io.logs).toEqual([
      `2025 MTEP: FAIL (File not found at ${path.join(out, 'csv', '2025_MTEP.csv')})`,
    ]);
    expect(io.errors).toEqual(['No datasets were validated.']);
  });

  it('honours --only', async () => {
    const { manifest, out } = await makeWorkspace(
      [makeBudgetLawDataset()],
      [
        { year: 2024, type: 'BUDGET_LAW' },
        { year: 2025, type: 'MTEP' },
      ]
    );
    const io = makeOutput();

    const code = await runProcessBudgets(
      ['--validate-only', '--only', 'BUDGET_LAW', '--sources', manifest, '--out', out],
      env,
      io
    );

    expect(code).toBe(EXIT_OK);
    expect(io.logs.filter((line) => line.startsWith('2025'))).toEqual([]);
  });
});

describe('runProcessBudgets', () => {
  it('exits with 1 when no workbook could be extracted', async () => {
    const { manifest, out } = await makeWorkspace([]);
    const io = makeOutput();

    const code = await runProcessBudgets(['--sources', manifest, '--out', out], env, io);

    expect(code).toBe(EXIT_NOTHING_PROCESSED);
    expect(io.logs).toHaveLength(1);
    expect(io.logs[0]).toMatch(/^2024 BUDGET_LAW: FAIL \(/);
    expect(io.errors).toEqual(['No sources were processed.']);
  });

  it('prints usage for unknown arguments', async () => {
    const io = makeOutput();

    const code = await runProcessBudgets(['--bogus'], env, io);

    expect(code).toBe(EXIT_NOTHING_PROCESSED);
    expect(io.errors[0]).toBe("Unknown argument '--bogus'");
  });

  it('prints usage for help', async () => {
    const io = makeOutput();

    expect(await runProcessBudgets(['--help'], env, io)).toBe(EXIT_OK);
    expect(io.logs[0]).toMatch(/^Usage:/);
  });
});

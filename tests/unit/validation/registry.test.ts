import { describe, expect, it } from 'vitest';

import { extractFromSheet } from '@/modules/extraction/index.js';
import {
  CHECK_IDS,
  createCheckRegistry,
  runChecks,
  validateRecords,
} from '@/modules/validation/index.js';

import { budgetLawSheet } from '../../fixtures/budget-sheets.js';
import {
  makeBudgetLawDataset,
  makeDataset,
  makePeriodDataset,
  makePlanRecord,
  toValidationInput,
} from '../../fixtures/builders.js';

const countBy = (ids: readonly string[]): Record<string, number> => {
  const counts: Record<string, number> = {};
  for (const id of ids) {
    counts[id] = (counts[id] ?? 0) + 1;
  }
  return counts;
};

describe('check registry', () => {
  it('lists the checks in report order', () => {
    expect(createCheckRegistry().map((check) => check.id)).toEqual([...CHECK_IDS]);
  });

  it('runs the budget law checks and passes a consistent dataset', () => {
    const results = runChecks(createCheckRegistry(), toValidationInput(makeBudgetLawDataset()));

    expect(countBy(results.map((result) => result.checkId))).toEqual({
      required_fields: 1,
      empty_identifiers: 3,
      missing_financial_data: 4,
      hierarchical_totals: 3,
      negative_totals: 4,
      hierarchical_structure_sanity: 1,
    });
    expect(results.filter((result) => !result.passed)).toEqual([]);
  });

  it('runs every check but the structure sanity check on quarterly spending', () => {
    const results = runChecks(createCheckRegistry(), toValidationInput(makePeriodDataset()));

    expect(countBy(results.map((result) => result.checkId))).toEqual({
      required_fields: 1,
      empty_identifiers: 3,
      missing_financial_data: 4,
      hierarchical_totals: 15,
      negative_totals: 4,
      period_vs_annual: 4,
      negative_percentages: 4,
      execution_exceeds_100: 4,
      percentage_calculation: 8,
    });
    expect(results.filter((result) => !result.passed)).toEqual([]);
  });

  it('checks two levels for the expenditure plan', () => {
    const dataset = makeDataset(
      'MTEP',
      [makePlanRecord()],
      { fields: { totalY0: 300, totalY1: 330, totalY2: 360 }, planYears: [2025, 2026, 2027] },
      2025
    );

    const results = runChecks(createCheckRegistry(), toValidationInput(dataset));

    expect(countBy(results.map((result) => result.checkId))).toEqual({
      required_fields: 1,
      empty_identifiers: 2,
      missing_financial_data: 3,
      hierarchical_totals: 6,
      negative_totals: 3,
    });
    expect(results.every((result) => result.level !== 'subprogram')).toBe(true);
    expect(results.filter((result) => !result.passed)).toEqual([]);
  });

  it('validates a freshly extracted workbook without failures', () => {
    const output = extractFromSheet(budgetLawSheet(), {
      year: 2024,
      sourceType: 'BUDGET_LAW',
    })._unsafeUnwrap();

    const report = validateRecords(
      createCheckRegistry(),
      output,
      'law.csv',
      new Date('2026-01-15T10:00:00.000Z')
    );

    expect(report.summary).toEqual({
      total: 16,
      passed: 16,
      withWarnings: 0,
      withErrors: 0,
      errorCount: 0,
      warningCount: 0,
    });
    expect(report.metadata).toEqual({
      sourceType: 'BUDGET_LAW',
      sourceKind: 'budget_law',
      year: 2024,
      file: 'law.csv',
      generatedAt: '2026-01-15T10:00:00.000Z',
    });
  });
});

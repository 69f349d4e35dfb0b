import { Decimal } from 'decimal.js';

import {
  columnBase,
  type AmountField,
  type AmountView,
  type SourceKind,
} from '@/modules/extraction/index.js';

import { columnAt, fixed, isPresent, levelEntities, rowLevelsFor } from '../levels.js';
import { createCheckResult, type CheckResult, type ValidationCheck } from '../types.js';

import type { ValidationConfig } from '../config.js';

interface RateDefinition {
  readonly rate: AmountField;
  readonly numerator: AmountField;
  readonly denominator: AmountField;
}

const RATES_BY_KIND: Readonly<Record<SourceKind, readonly RateDefinition[]>> = {
  budget_law: [],
  expenditure_plan: [],
  annual_spending: [
    { rate: 'actualVsRevAnnualPlan', numerator: 'actual', denominator: 'revAnnualPlan' },
  ],
  period_spending: [
    { rate: 'actualVsRevAnnualPlan', numerator: 'actual', denominator: 'revAnnualPlan' },
    { rate: 'actualVsRevPeriodPlan', numerator: 'actual', denominator: 'revPeriodPlan' },
  ],
};

interface RateComparison {
  readonly expected: Decimal;
  readonly reported: number;
  readonly diff: Decimal;
}

/**
 * Null when the rate cannot be recomputed: missing operands or a zero denominator.
 */
const compareRate = (amounts: AmountView, definition: RateDefinition): RateComparison | null => {
  const reported = amounts[definition.rate];
  const numerator = amounts[definition.numerator];
  const denominator = amounts[definition.denominator];
  if (!isPresent(reported) || !isPresent(numerator) || !isPresent(denominator) || denominator === 0) {
    return null;
  }
  const expected = new Decimal(numerator).div(denominator);
  return { expected, reported, diff: expected.minus(reported).abs() };
};

/**
 * Reported execution rates match actual / plan within the percentage tolerance.
 * One result per rate field and level.
 */
export const createPercentageCalculationCheck = (config: ValidationConfig): ValidationCheck => ({
  id: 'percentage_calculation',
  appliesTo: (kind) => RATES_BY_KIND[kind].length > 0,
  validate(input) {
    const tolerance = config.tolerances.percentage;
    const results: CheckResult[] = [];

    for (const definition of RATES_BY_KIND[input.sourceKind]) {
      const overallColumn = columnAt('overall', definition.rate);
      const overall = compareRate(input.overall.fields, definition);
      results.push(
        createCheckResult({
          checkId: 'percentage_calculation',
          severity: 'error',
          level: 'overall',
          subject: columnBase(definition.rate),
          messages:
            overall !== null && overall.diff.greaterThan(tolerance)
              ? [
                  `Overall ${overallColumn}: expected ${fixed(overall.expected, 4)}, ` +
                    `reported ${fixed(overall.reported, 4)}, diff ${fixed(overall.diff, 4)} ` +
                    `(tolerance ${String(tolerance)})`,
                ]
              : [],
        })
      );

      for (const level of rowLevelsFor(input.sourceKind)) {
        const column = columnAt(level, definition.rate);
        const messages: string[] = [];
        for (const entity of levelEntities(input.records, level)) {
          const comparison = compareRate(entity.amounts, definition);
          if (comparison !== null && comparison.diff.greaterThan(tolerance)) {
            messages.push(
              `Row ${String(entity.index)}: Mismatch for '${column}'. ` +
                `Expected: ${fixed(comparison.expected, 4)}, ` +
                `Reported: ${fixed(comparison.reported, 4)}, ` +
                `Diff: ${fixed(comparison.diff, 4)} in ${entity.label}`
            );
          }
        }
        results.push(
          createCheckResult({
            checkId: 'percentage_calculation',
            severity: 'error',
            level,
            subject: columnBase(definition.rate),
            messages,
          })
        );
      }
    }

    return results;
  },
});

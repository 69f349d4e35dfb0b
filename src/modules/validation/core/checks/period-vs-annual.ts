import { Decimal } from 'decimal.js';

import type { AmountField, AmountView } from '@/modules/extraction/index.js';

import { LEVEL_TITLES, columnAt, fixed, isPresent, levelEntities, rowLevelsFor } from '../levels.js';
import { createCheckResult, type CheckResult, type Severity, type ValidationCheck } from '../types.js';

interface PlanPair {
  readonly period: AmountField;
  readonly annual: AmountField;
  readonly revised: boolean;
}

const PLAN_PAIRS: readonly PlanPair[] = [
  { period: 'periodPlan', annual: 'annualPlan', revised: false },
  { period: 'revPeriodPlan', annual: 'revAnnualPlan', revised: true },
];

const REVISED_PAIR: PlanPair = { period: 'revPeriodPlan', annual: 'revAnnualPlan', revised: true };

/**
 * Sign-aware "period exceeds annual": above a non-negative limit, below a
 * negative one, or a non-zero period whose sign opposes the limit.
 */
export const exceedsLimit = (period: number, annual: number): boolean => {
  if (annual >= 0 && period > annual) {
    return true;
  }
  if (annual < 0 && period < annual) {
    return true;
  }
  const opposite = (annual >= 0 && period < 0) || (annual <= 0 && period > 0);
  return opposite && period !== 0;
};

interface Violation {
  readonly pair: PlanPair;
  readonly period: number;
  readonly annual: number;
  /** Both operands non-negative and not excused by the revised plan */
  readonly strict: boolean;
}

const pairViolation = (amounts: AmountView, pair: PlanPair): Violation | null => {
  const period = amounts[pair.period];
  const annual = amounts[pair.annual];
  if (!isPresent(period) || !isPresent(annual) || !exceedsLimit(period, annual)) {
    return null;
  }

  let strict = period >= 0 && annual >= 0;
  if (strict && !pair.revised) {
    // the original plan is excused when the revised plan of the same entity holds
    const revisedPeriod = amounts[REVISED_PAIR.period];
    const revisedAnnual = amounts[REVISED_PAIR.annual];
    const revisedHolds =
      isPresent(revisedPeriod) &&
      isPresent(revisedAnnual) &&
      !exceedsLimit(revisedPeriod, revisedAnnual);
    strict = !revisedHolds;
  }

  return { pair, period, annual, strict };
};

const violationsOf = (amounts: AmountView): Violation[] =>
  PLAN_PAIRS.flatMap((pair) => {
    const violation = pairViolation(amounts, pair);
    return violation === null ? [] : [violation];
  });

const levelSeverity = (violations: readonly Violation[]): Severity =>
  violations.length === 0 || violations.some((violation) => violation.strict) ? 'error' : 'warning';

/**
 * Period plans stay within annual plans, for the original and the revised
 * plan, at every level.
 */
export const periodVsAnnualCheck: ValidationCheck = {
  id: 'period_vs_annual',
  appliesTo: (kind) => kind === 'period_spending',
  validate(input) {
    const overallViolations = violationsOf(input.overall.fields);
    const results: CheckResult[] = [
      createCheckResult({
        checkId: 'period_vs_annual',
        severity: levelSeverity(overallViolations),
        level: 'overall',
        messages:
          overallViolations.length > 0
            ? [
                `Overall violations: ${overallViolations
                  .map(
                    (violation) =>
                      `${columnAt('overall', violation.pair.period)} (${String(violation.period)}) ` +
                      `exceeds limit ${columnAt('overall', violation.pair.annual)} (${String(violation.annual)})`
                  )
                  .join(', ')}`,
              ]
            : [],
        failCount: overallViolations.length,
      }),
    ];

    for (const level of rowLevelsFor(input.sourceKind)) {
      const violations: Violation[] = [];
      const messages: string[] = [];
      for (const entity of levelEntities(input.records, level)) {
        for (const violation of violationsOf(entity.amounts)) {
          violations.push(violation);
          const excess = new Decimal(violation.period).minus(violation.annual).abs();
          messages.push(
            `${LEVEL_TITLES[level]} violation: '${columnAt(level, violation.pair.period)}' ` +
              `(${fixed(violation.period, 2)}) exceeds limit '${columnAt(level, violation.pair.annual)}' ` +
              `(${fixed(violation.annual, 2)}) by ${fixed(excess, 2)} for ${entity.label}`
          );
        }
      }
      results.push(
        createCheckResult({
          checkId: 'period_vs_annual',
          severity: level === 'subprogram' ? 'warning' : levelSeverity(violations),
          level,
          messages,
        })
      );
    }

    return results;
  },
};

import { percentageFieldsOf, type SourceKind } from '@/modules/extraction/index.js';

import { LEVEL_TITLES, columnAt, isPresent, levelEntities, rowLevelsFor } from '../levels.js';
import {
  createCheckResult,
  type CheckId,
  type CheckLevel,
  type CheckResult,
  type Severity,
  type ValidationCheck,
  type ValidationInput,
} from '../types.js';

/**
 * Execution-rate bound shared by the negative and over-100% checks.
 */
interface RateBoundRule {
  readonly id: CheckId;
  readonly severity: Readonly<Record<CheckLevel, Severity>>;
  readonly violates: (rate: number) => boolean;
  /** Single message of a failing level; `items` are `column` or `column (n rows)` */
  readonly describe: (level: CheckLevel, items: string) => string;
}

const hasRates = (kind: SourceKind): boolean => percentageFieldsOf(kind).length > 0;

const validateRates = (rule: RateBoundRule, input: ValidationInput): CheckResult[] => {
  const fields = percentageFieldsOf(input.sourceKind);

  const overallColumns = fields
    .filter((field) => {
      const value = input.overall.fields[field];
      return isPresent(value) && rule.violates(value);
    })
    .map((field) => columnAt('overall', field));

  const results = [
    createCheckResult({
      checkId: rule.id,
      severity: rule.severity.overall,
      level: 'overall',
      messages:
        overallColumns.length > 0 ? [rule.describe('overall', overallColumns.join(', '))] : [],
      failCount: overallColumns.length,
    }),
  ];

  for (const level of rowLevelsFor(input.sourceKind)) {
    const entities = levelEntities(input.records, level);
    const items: string[] = [];
    let failures = 0;
    for (const field of fields) {
      const rows = entities.filter((entity) => {
        const value = entity.amounts[field];
        return isPresent(value) && rule.violates(value);
      }).length;
      if (rows > 0) {
        items.push(`${columnAt(level, field)} (${String(rows)} rows)`);
        failures += rows;
      }
    }
    results.push(
      createCheckResult({
        checkId: rule.id,
        severity: rule.severity[level],
        level,
        messages: items.length > 0 ? [rule.describe(level, items.join(', '))] : [],
        failCount: failures,
      })
    );
  }

  return results;
};

const rateBoundCheck = (rule: RateBoundRule): ValidationCheck => ({
  id: rule.id,
  appliesTo: hasRates,
  validate: (input) => validateRates(rule, input),
});

export const negativePercentagesCheck = rateBoundCheck({
  id: 'negative_percentages',
  severity: { overall: 'error', state_body: 'error', program: 'warning', subprogram: 'warning' },
  violates: (rate) => rate < 0,
  describe: (level, items) => `Negative ${level} percentages: ${items}`,
});

export const executionExceeds100Check = rateBoundCheck({
  id: 'execution_exceeds_100',
  severity: {
    overall: 'warning',
    state_body: 'warning',
    program: 'warning',
    subprogram: 'warning',
  },
  violates: (rate) => rate > 1,
  describe: (level, items) => `${LEVEL_TITLES[level]} execution > 100%: ${items}`,
});

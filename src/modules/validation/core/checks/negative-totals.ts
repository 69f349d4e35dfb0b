import { amountFieldsOf } from '@/modules/extraction/index.js';

import { LEVEL_TITLES, columnAt, fixed, isPresent, levelEntities, rowLevelsFor } from '../levels.js';
import { createCheckResult, type CheckLevel, type Severity, type ValidationCheck } from '../types.js';

const SEVERITY: Readonly<Record<CheckLevel, Severity>> = {
  overall: 'error',
  state_body: 'error',
  program: 'warning',
  subprogram: 'warning',
};

/**
 * Amount fields below zero. Execution rates are covered by the percentage checks.
 */
export const negativeTotalsCheck: ValidationCheck = {
  id: 'negative_totals',
  appliesTo: () => true,
  validate(input) {
    const fields = amountFieldsOf(input.sourceKind);

    const overallMessages: string[] = [];
    for (const field of fields) {
      const value = input.overall.fields[field];
      if (isPresent(value) && value < 0) {
        overallMessages.push(
          `Overall field '${columnAt('overall', field)}' has negative value: ${fixed(value, 2)}`
        );
      }
    }

    const results = [
      createCheckResult({
        checkId: 'negative_totals',
        severity: SEVERITY.overall,
        level: 'overall',
        messages: overallMessages,
      }),
    ];

    for (const level of rowLevelsFor(input.sourceKind)) {
      const messages: string[] = [];
      for (const entity of levelEntities(input.records, level)) {
        for (const field of fields) {
          const value = entity.amounts[field];
          if (isPresent(value) && value < 0) {
            messages.push(
              `${LEVEL_TITLES[level]} field '${columnAt(level, field)}' has negative value: ${fixed(value, 2)} for ${entity.label}`
            );
          }
        }
      }
      results.push(
        createCheckResult({
          checkId: 'negative_totals',
          severity: SEVERITY[level],
          level,
          messages,
        })
      );
    }

    return results;
  },
};

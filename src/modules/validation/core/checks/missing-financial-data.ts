import { fieldsOf } from '@/modules/extraction/index.js';

import { columnAt, isPresent, levelEntities, rowLevelsFor } from '../levels.js';
import { createCheckResult, type ValidationCheck } from '../types.js';

/**
 * Overall fields and record amount cells that are absent or blank.
 */
export const missingFinancialDataCheck: ValidationCheck = {
  id: 'missing_financial_data',
  appliesTo: () => true,
  validate(input) {
    const fields = fieldsOf(input.sourceKind);

    const missingOverall = fields
      .filter((field) => !isPresent(input.overall.fields[field]))
      .map((field) => columnAt('overall', field));

    const results = [
      createCheckResult({
        checkId: 'missing_financial_data',
        severity: 'error',
        level: 'overall',
        messages:
          missingOverall.length > 0 ? [`Missing overall fields: ${missingOverall.join(', ')}`] : [],
        failCount: missingOverall.length,
      }),
    ];

    for (const level of rowLevelsFor(input.sourceKind)) {
      const messages: string[] = [];
      for (const entity of levelEntities(input.records, level)) {
        for (const field of fields) {
          if (!isPresent(entity.amounts[field])) {
            messages.push(
              `Row ${String(entity.index)}: Missing data for '${columnAt(level, field)}' in ${entity.label}`
            );
          }
        }
      }
      results.push(
        createCheckResult({
          checkId: 'missing_financial_data',
          severity: level === 'subprogram' ? 'warning' : 'error',
          level,
          messages,
        })
      );
    }

    return results;
  },
};

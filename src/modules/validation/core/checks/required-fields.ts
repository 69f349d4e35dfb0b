import { columnBase, fieldsOf, recordColumns } from '@/modules/extraction/index.js';

import { createCheckResult, type ValidationCheck } from '../types.js';

/**
 * Every record column of the kind is present in the table, and every overall
 * field (plus `plan_years` for the plan) is present in the totals.
 */
export const requiredFieldsCheck: ValidationCheck = {
  id: 'required_fields',
  appliesTo: () => true,
  validate(input) {
    const present = new Set(input.columns);
    const missingColumns = recordColumns(input.sourceKind).filter((column) => !present.has(column));

    const missingOverall = fieldsOf(input.sourceKind)
      .filter((field) => !(field in input.overall.fields))
      .map((field) => `overall_${columnBase(field)}`);
    if (input.sourceKind === 'expenditure_plan' && input.overall.planYears === undefined) {
      missingOverall.push('plan_years');
    }

    const missing = [
      ...missingColumns.map((column) => `CSV: ${column}`),
      ...missingOverall.map((field) => `JSON: ${field}`),
    ];

    return [
      createCheckResult({
        checkId: 'required_fields',
        severity: 'error',
        messages: missing.length > 0 ? [`Missing fields: ${missing.join(', ')}`] : [],
        failCount: missing.length,
      }),
    ];
  },
};

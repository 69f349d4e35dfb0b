import { hasSubprogram, type FlattenedRecord } from '@/modules/extraction/index.js';

import { rowLevelsFor } from '../levels.js';
import { createCheckResult, type RowLevel, type Severity, type ValidationCheck } from '../types.js';

interface IdentifierRule {
  readonly column: string;
  readonly severity: Severity;
  readonly read: (record: FlattenedRecord) => string;
}

const RULES: Readonly<Record<RowLevel, IdentifierRule>> = {
  state_body: { column: 'state_body', severity: 'error', read: (record) => record.stateBody },
  program: { column: 'program_name', severity: 'error', read: (record) => record.programName },
  subprogram: {
    column: 'subprogram_name',
    severity: 'warning',
    read: (record) => (hasSubprogram(record) ? record.subprogramName : ''),
  },
};

/**
 * Counts record rows whose name at a level is blank.
 */
export const emptyIdentifiersCheck: ValidationCheck = {
  id: 'empty_identifiers',
  appliesTo: () => true,
  validate(input) {
    return rowLevelsFor(input.sourceKind).map((level) => {
      const rule = RULES[level];
      const empty = input.records.filter((record) => rule.read(record).trim() === '').length;
      return createCheckResult({
        checkId: 'empty_identifiers',
        severity: rule.severity,
        level,
        messages: empty > 0 ? [`Found ${String(empty)} rows with empty ${rule.column}`] : [],
        failCount: empty,
      });
    });
  },
};

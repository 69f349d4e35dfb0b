import type { Decimal } from 'decimal.js';

import {
  amountFieldsOf,
  columnBase,
  type AmountField,
  type FlattenedRecord,
  type SourceKind,
} from '@/modules/extraction/index.js';

import { hierarchyTolerance, type ValidationConfig } from '../config.js';
import { columnAt, isPresent, levelEntities, programKey, sumPresent } from '../levels.js';
import { createCheckResult, type CheckResult, type ValidationCheck } from '../types.js';

const formatDecimal = (value: Decimal): string => value.toString();

const groupBy = <T>(items: readonly T[], key: (item: T) => string): Map<string, T[]> => {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const id = key(item);
    const group = groups.get(id);
    if (group === undefined) {
      groups.set(id, [item]);
    } else {
      group.push(item);
    }
  }
  return groups;
};

const overallVersusStateBodies = (
  records: readonly FlattenedRecord[],
  overallValue: number | null | undefined,
  field: AmountField,
  tolerance: number
): CheckResult => {
  const expected = sumPresent(
    levelEntities(records, 'state_body').map((entity) => entity.amounts[field])
  );
  const messages: string[] = [];

  if (isPresent(overallValue)) {
    const diff = expected.minus(overallValue).abs();
    if (diff.greaterThan(tolerance)) {
      messages.push(
        `Overall ${columnAt('overall', field)}: expected ${formatDecimal(expected)}, ` +
          `got ${String(overallValue)}, diff ${formatDecimal(diff)} (tolerance ${String(tolerance)})`
      );
    }
  }

  return createCheckResult({
    checkId: 'hierarchical_totals',
    severity: 'error',
    level: 'overall',
    subject: columnBase(field),
    messages,
  });
};

const stateBodiesVersusPrograms = (
  records: readonly FlattenedRecord[],
  field: AmountField,
  tolerance: number
): CheckResult => {
  const programsByStateBody = groupBy(
    levelEntities(records, 'program'),
    (entity) => entity.record.stateBody
  );
  const messages: string[] = [];

  for (const stateBody of levelEntities(records, 'state_body')) {
    const total = stateBody.amounts[field];
    if (!isPresent(total)) {
      continue;
    }
    const programs = programsByStateBody.get(stateBody.record.stateBody) ?? [];
    const expected = sumPresent(programs.map((entity) => entity.amounts[field]));
    const diff = expected.minus(total).abs();
    if (diff.greaterThan(tolerance)) {
      messages.push(
        `${stateBody.record.stateBody}: expected ${formatDecimal(expected)}, got ${String(total)}, diff ${formatDecimal(diff)}`
      );
    }
  }

  return createCheckResult({
    checkId: 'hierarchical_totals',
    severity: 'error',
    level: 'state_body',
    subject: columnBase(field),
    messages,
  });
};

const programsVersusSubprograms = (
  records: readonly FlattenedRecord[],
  field: AmountField,
  tolerance: number
): CheckResult => {
  const subprogramsByProgram = groupBy(levelEntities(records, 'subprogram'), (entity) =>
    programKey(entity.record)
  );
  const messages: string[] = [];

  for (const program of levelEntities(records, 'program')) {
    const total = program.amounts[field];
    if (!isPresent(total)) {
      continue;
    }
    const subprograms = subprogramsByProgram.get(programKey(program.record)) ?? [];
    const expected = sumPresent(subprograms.map((entity) => entity.amounts[field]));
    const diff = expected.minus(total).abs();
    if (diff.greaterThan(tolerance)) {
      messages.push(
        `${program.record.stateBody}/${String(program.record.programCode)}: expected ${formatDecimal(expected)}, got ${String(total)}, diff ${formatDecimal(diff)}`
      );
    }
  }

  return createCheckResult({
    checkId: 'hierarchical_totals',
    severity: 'error',
    level: 'program',
    subject: columnBase(field),
    messages,
  });
};

const hasSubprogramLevel = (kind: SourceKind): boolean => kind !== 'expenditure_plan';

/**
 * Parent amounts equal the exact decimal sum of their distinct children,
 * within the tolerance of the source kind. One result per amount field and
 * level pair.
 */
export const createHierarchicalTotalsCheck = (config: ValidationConfig): ValidationCheck => ({
  id: 'hierarchical_totals',
  appliesTo: () => true,
  validate(input) {
    const tolerance = hierarchyTolerance(config, input.sourceKind);
    const results: CheckResult[] = [];

    for (const field of amountFieldsOf(input.sourceKind)) {
      results.push(
        overallVersusStateBodies(input.records, input.overall.fields[field], field, tolerance),
        stateBodiesVersusPrograms(input.records, field, tolerance)
      );
      if (hasSubprogramLevel(input.sourceKind)) {
        results.push(programsVersusSubprograms(input.records, field, tolerance));
      }
    }

    return results;
  },
});

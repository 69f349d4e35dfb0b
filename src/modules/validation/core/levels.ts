import { Decimal } from 'decimal.js';

import {
  hasSubprogram,
  levelAmounts,
  levelColumn,
  type AmountField,
  type AmountView,
  type FlattenedRecord,
  type LevelPrefix,
  type SourceKind,
} from '@/modules/extraction/index.js';

import type { CheckLevel, RowLevel } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Level naming
// ─────────────────────────────────────────────────────────────────────────────

export const LEVEL_PREFIXES: Readonly<Record<CheckLevel, LevelPrefix>> = {
  overall: 'overall_',
  state_body: 'state_body_',
  program: 'program_',
  subprogram: 'subprogram_',
};

export const LEVEL_TITLES: Readonly<Record<CheckLevel, string>> = {
  overall: 'Overall',
  state_body: 'State body',
  program: 'Program',
  subprogram: 'Subprogram',
};

export const rowLevelsFor = (kind: SourceKind): readonly RowLevel[] =>
  kind === 'expenditure_plan' ? ['state_body', 'program'] : ['state_body', 'program', 'subprogram'];

export const columnAt = (level: CheckLevel, field: AmountField): string =>
  levelColumn(LEVEL_PREFIXES[level], field);

// ─────────────────────────────────────────────────────────────────────────────
// Level entities
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One distinct entity of a level: the first record carrying it, its position
 * in the record table and its amounts at that level.
 */
export interface LevelEntity {
  readonly index: number;
  readonly record: FlattenedRecord;
  readonly amounts: AmountView;
  /** `state body`, `state body | program` or `state body | program | subprogram` */
  readonly label: string;
}

export const programKey = (record: FlattenedRecord): string =>
  JSON.stringify([record.stateBody, record.programCode]);

const entityKey = (record: FlattenedRecord, level: RowLevel, index: number): string => {
  switch (level) {
    case 'state_body':
      return record.stateBody;
    case 'program':
      return programKey(record);
    case 'subprogram':
      return String(index);
  }
};

export const entityLabel = (record: FlattenedRecord, level: RowLevel): string => {
  switch (level) {
    case 'state_body':
      return record.stateBody;
    case 'program':
      return `${record.stateBody} | ${String(record.programCode)}`;
    case 'subprogram':
      return hasSubprogram(record)
        ? `${record.stateBody} | ${String(record.programCode)} | ${String(record.subprogramCode)}`
        : `${record.stateBody} | ${String(record.programCode)}`;
  }
};

/**
 * Distinct entities of a level. State-body and program amounts are repeated
 * on every record below them, so those levels keep only the first record per
 * state body and per (state body, program code).
 */
export const levelEntities = (
  records: readonly FlattenedRecord[],
  level: RowLevel
): LevelEntity[] => {
  const seen = new Set<string>();
  const entities: LevelEntity[] = [];

  records.forEach((record, index) => {
    const amounts = levelAmounts(record, LEVEL_PREFIXES[level]);
    if (amounts === null) {
      return;
    }
    const key = entityKey(record, level, index);
    if (seen.has(key)) {
      return;
    }
    seen.add(key);
    entities.push({ index, record, amounts, label: entityLabel(record, level) });
  });

  return entities;
};

// ─────────────────────────────────────────────────────────────────────────────
// Numbers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Exact sum of the present values.
 */
export const sumPresent = (values: Iterable<number | null | undefined>): Decimal => {
  let total = new Decimal(0);
  for (const value of values) {
    if (value !== null && value !== undefined) {
      total = total.plus(value);
    }
  }
  return total;
};

export const isPresent = (value: number | null | undefined): value is number =>
  value !== null && value !== undefined && Number.isFinite(value);

export const fixed = (value: Decimal.Value, digits: number): string =>
  new Decimal(value).toFixed(digits);

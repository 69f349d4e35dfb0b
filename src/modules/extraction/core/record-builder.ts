import { columnBase, fieldsOf, type LevelPrefix } from './column-schema.js';

import type {
  AmountView,
  Amounts,
  FlattenedRecord,
  OverallTotals,
  PlanProgramRecord,
  RecordByKind,
  SourceKind,
  SubprogramKind,
  SubprogramRecord,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Hierarchy context
// ─────────────────────────────────────────────────────────────────────────────

export interface HierarchyContext<K extends SourceKind> {
  stateBody: string;
  stateBodyAmounts: Amounts<K>;
  programCode: number;
  programName: string;
  programGoal: string;
  programResultDesc: string;
  programAmounts: Amounts<K>;
}

export interface SubprogramParts<K extends SourceKind> {
  readonly programCodeExt: number | null;
  readonly subprogramCode: number;
  readonly subprogramName: string;
  readonly subprogramDesc: string;
  readonly subprogramType: string;
  readonly amounts: Amounts<K>;
}

export const resetProgram = <K extends SourceKind>(
  context: HierarchyContext<K>,
  zero: Amounts<K>
): void => {
  context.programCode = 0;
  context.programName = '';
  context.programGoal = '';
  context.programResultDesc = '';
  context.programAmounts = zero;
};

// ─────────────────────────────────────────────────────────────────────────────
// Record factories
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Where a kind emits its records: at every accepted subprogram header, or at
 * every program header for the two-level plan.
 */
export interface RecordBuilders<K extends SourceKind> {
  readonly atProgram: ((context: Readonly<HierarchyContext<K>>) => RecordByKind[K]) | null;
  readonly atSubprogram:
    | ((context: Readonly<HierarchyContext<K>>, parts: SubprogramParts<K>) => RecordByKind[K])
    | null;
}

const subprogramRecord = <K extends SubprogramKind>(
  kind: K,
  context: Readonly<HierarchyContext<K>>,
  parts: SubprogramParts<K>
): SubprogramRecord<K> => {
  const record: SubprogramRecord<K> = {
    kind,
    stateBody: context.stateBody,
    programCode: context.programCode,
    programCodeExt: parts.programCodeExt,
    programName: context.programName,
    programGoal: context.programGoal,
    programResultDesc: context.programResultDesc,
    subprogramCode: parts.subprogramCode,
    subprogramName: parts.subprogramName,
    subprogramDesc: parts.subprogramDesc,
    subprogramType: parts.subprogramType,
    stateBodyAmounts: context.stateBodyAmounts,
    programAmounts: context.programAmounts,
    subprogramAmounts: parts.amounts,
  };
  return Object.freeze(record);
};

const planRecord = (context: Readonly<HierarchyContext<'expenditure_plan'>>): PlanProgramRecord => {
  const record: PlanProgramRecord = {
    kind: 'expenditure_plan',
    stateBody: context.stateBody,
    programCode: context.programCode,
    programName: context.programName,
    programGoal: context.programGoal,
    programResultDesc: context.programResultDesc,
    stateBodyAmounts: context.stateBodyAmounts,
    programAmounts: context.programAmounts,
  };
  return Object.freeze(record);
};

export const RECORD_BUILDERS: { readonly [K in SourceKind]: RecordBuilders<K> } = {
  budget_law: {
    atProgram: null,
    atSubprogram: (context, parts) => subprogramRecord('budget_law', context, parts),
  },
  period_spending: {
    atProgram: null,
    atSubprogram: (context, parts) => subprogramRecord('period_spending', context, parts),
  },
  annual_spending: {
    atProgram: null,
    atSubprogram: (context, parts) => subprogramRecord('annual_spending', context, parts),
  },
  expenditure_plan: {
    atProgram: planRecord,
    atSubprogram: null,
  },
};

export const recordBuildersFor = <K extends SourceKind>(kind: K): RecordBuilders<K> => {
  const builders: RecordBuilders<K> = RECORD_BUILDERS[kind];
  return builders;
};

// ─────────────────────────────────────────────────────────────────────────────
// Flattening
// ─────────────────────────────────────────────────────────────────────────────

export type CellValue = string | number | null;

const amountCells = (kind: SourceKind, amounts: AmountView): CellValue[] =>
  fieldsOf(kind).map((field) => amounts[field] ?? null);

/**
 * Flattens a record into the fixed column order of its kind.
 */
export const toRow = (record: FlattenedRecord): CellValue[] => {
  if (record.kind === 'expenditure_plan') {
    return [
      record.stateBody,
      record.programCode,
      record.programName,
      record.programGoal,
      record.programResultDesc,
      ...amountCells(record.kind, record.stateBodyAmounts),
      ...amountCells(record.kind, record.programAmounts),
    ];
  }

  return [
    record.stateBody,
    record.programCode,
    record.programCodeExt,
    record.programName,
    record.programGoal,
    record.programResultDesc,
    record.subprogramCode,
    record.subprogramName,
    record.subprogramDesc,
    record.subprogramType,
    ...amountCells(record.kind, record.stateBodyAmounts),
    ...amountCells(record.kind, record.programAmounts),
    ...amountCells(record.kind, record.subprogramAmounts),
  ];
};

/**
 * Record amounts of one level as a field-name view.
 */
export const levelAmounts = (
  record: FlattenedRecord,
  prefix: LevelPrefix
): AmountView | null => {
  switch (prefix) {
    case 'state_body_':
      return record.stateBodyAmounts;
    case 'program_':
      return record.programAmounts;
    case 'subprogram_':
      return record.kind === 'expenditure_plan' ? null : record.subprogramAmounts;
    case 'overall_':
      return null;
  }
};

export type OverallJson = Record<string, number | null | readonly number[]>;

/**
 * `{ overall_<column>: value, plan_years? }`
 */
export const overallToJson = (kind: SourceKind, overall: OverallTotals): OverallJson => {
  const json: OverallJson = {};
  if (overall.planYears !== undefined) {
    json['plan_years'] = overall.planYears;
  }
  for (const field of fieldsOf(kind)) {
    json[`overall_${columnBase(field)}`] = overall.fields[field] ?? null;
  }
  return json;
};

import { err, ok, type Result } from 'neverthrow';

import { createUnsupportedLayoutError, type UnsupportedLayoutError } from './errors.js';
import { parseAmount, parsePercentage } from './markers.js';
import { cell } from './row-classifier.js';

import type {
  AmountField,
  Amounts,
  FieldsByKind,
  Layout,
  RawRow,
  SourceKind,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Column specs
// ─────────────────────────────────────────────────────────────────────────────

export interface ColumnSpec<F extends string = AmountField> {
  readonly field: F;
  /** Zero-based sheet column */
  readonly index: number;
  /** Stored as a percentage; read as a fraction */
  readonly percentage: boolean;
}

export type ColumnSpecs<K extends SourceKind> = readonly ColumnSpec<FieldsByKind[K]>[];

export type LevelPrefix = 'overall_' | 'state_body_' | 'program_' | 'subprogram_';

const amount = <F extends string>(field: F, index: number): ColumnSpec<F> => ({
  field,
  index,
  percentage: false,
});

const rate = <F extends string>(field: F, index: number): ColumnSpec<F> => ({
  field,
  index,
  percentage: true,
});

const COLUMN_SPECS: { readonly [K in SourceKind]: Partial<Record<Layout, ColumnSpecs<K>>> } = {
  budget_law: {
    legacy: [amount('total', 3)],
    layout_2025: [amount('total', 6)],
  },
  period_spending: {
    legacy: [
      amount('annualPlan', 3),
      amount('revAnnualPlan', 4),
      amount('periodPlan', 5),
      amount('revPeriodPlan', 6),
      amount('actual', 7),
      rate('actualVsRevAnnualPlan', 8),
      rate('actualVsRevPeriodPlan', 9),
    ],
  },
  annual_spending: {
    legacy: [
      amount('annualPlan', 3),
      amount('revAnnualPlan', 4),
      amount('actual', 5),
      rate('actualVsRevAnnualPlan', 6),
    ],
  },
  expenditure_plan: {
    plan: [amount('totalY0', 2), amount('totalY1', 3), amount('totalY2', 4)],
  },
};

/**
 * Column positions of the amount fields for a layout and source kind.
 */
export const getColumnSpecs = <K extends SourceKind>(
  layout: Layout,
  kind: K
): Result<ColumnSpecs<K>, UnsupportedLayoutError> => {
  const byLayout: Partial<Record<Layout, ColumnSpecs<K>>> = COLUMN_SPECS[kind];
  const specs = byLayout[layout];
  if (specs === undefined) {
    return err(createUnsupportedLayoutError(layout, kind));
  }
  return ok(specs);
};

export const schemaWidth = (specs: readonly ColumnSpec<string>[]): number =>
  specs.reduce((width, spec) => Math.max(width, spec.index + 1), 0);

// ─────────────────────────────────────────────────────────────────────────────
// Field order and column names
// ─────────────────────────────────────────────────────────────────────────────

const FIELD_ORDER: { readonly [K in SourceKind]: readonly FieldsByKind[K][] } = {
  budget_law: ['total'],
  period_spending: [
    'annualPlan',
    'revAnnualPlan',
    'periodPlan',
    'revPeriodPlan',
    'actual',
    'actualVsRevAnnualPlan',
    'actualVsRevPeriodPlan',
  ],
  annual_spending: ['annualPlan', 'revAnnualPlan', 'actual', 'actualVsRevAnnualPlan'],
  expenditure_plan: ['totalY0', 'totalY1', 'totalY2'],
};

const PERCENTAGE_FIELDS: ReadonlySet<AmountField> = new Set<AmountField>([
  'actualVsRevAnnualPlan',
  'actualVsRevPeriodPlan',
]);

const COLUMN_BASES: Readonly<Record<AmountField, string>> = {
  total: 'total',
  annualPlan: 'annual_plan',
  revAnnualPlan: 'rev_annual_plan',
  periodPlan: 'period_plan',
  revPeriodPlan: 'rev_period_plan',
  actual: 'actual',
  actualVsRevAnnualPlan: 'actual_vs_rev_annual_plan',
  actualVsRevPeriodPlan: 'actual_vs_rev_period_plan',
  totalY0: 'total_y0',
  totalY1: 'total_y1',
  totalY2: 'total_y2',
};

export const fieldsOf = <K extends SourceKind>(kind: K): readonly FieldsByKind[K][] =>
  FIELD_ORDER[kind];

export const amountFieldsOf = (kind: SourceKind): readonly AmountField[] =>
  fieldsOf(kind).filter((field) => !PERCENTAGE_FIELDS.has(field));

export const percentageFieldsOf = (kind: SourceKind): readonly AmountField[] =>
  fieldsOf(kind).filter((field) => PERCENTAGE_FIELDS.has(field));

export const columnBase = (field: AmountField): string => COLUMN_BASES[field];

export const levelColumn = (prefix: LevelPrefix, field: AmountField): string =>
  `${prefix}${COLUMN_BASES[field]}`;

export const levelColumns = (prefix: LevelPrefix, kind: SourceKind): string[] =>
  fieldsOf(kind).map((field) => levelColumn(prefix, field));

const isAmountField = (value: string): value is AmountField => value in COLUMN_BASES;

export const fieldForColumnBase = (base: string): AmountField | undefined => {
  for (const [field, column] of Object.entries(COLUMN_BASES)) {
    if (column === base && isAmountField(field)) {
      return field;
    }
  }
  return undefined;
};

const SUBPROGRAM_IDENTIFIER_COLUMNS = [
  'state_body',
  'program_code',
  'program_code_ext',
  'program_name',
  'program_goal',
  'program_result_desc',
  'subprogram_code',
  'subprogram_name',
  'subprogram_desc',
  'subprogram_type',
] as const;

const PLAN_IDENTIFIER_COLUMNS = [
  'state_body',
  'program_code',
  'program_name',
  'program_goal',
  'program_result_desc',
] as const;

export const identifierColumns = (kind: SourceKind): readonly string[] =>
  kind === 'expenditure_plan' ? PLAN_IDENTIFIER_COLUMNS : SUBPROGRAM_IDENTIFIER_COLUMNS;

export const levelPrefixes = (kind: SourceKind): readonly LevelPrefix[] =>
  kind === 'expenditure_plan'
    ? ['state_body_', 'program_']
    : ['state_body_', 'program_', 'subprogram_'];

/**
 * Output column order of the processed record table.
 */
export const recordColumns = (kind: SourceKind): string[] => [
  ...identifierColumns(kind),
  ...levelPrefixes(kind).flatMap((prefix) => levelColumns(prefix, kind)),
];

// ─────────────────────────────────────────────────────────────────────────────
// Amount structs
// ─────────────────────────────────────────────────────────────────────────────

type AmountReader<F extends string> = (field: F) => number | null;

type AmountShape<K extends SourceKind> = (read: AmountReader<FieldsByKind[K]>) => Amounts<K>;

const AMOUNT_SHAPES: { readonly [K in SourceKind]: AmountShape<K> } = {
  budget_law: (read) => ({ total: read('total') }),
  period_spending: (read) => ({
    annualPlan: read('annualPlan'),
    revAnnualPlan: read('revAnnualPlan'),
    periodPlan: read('periodPlan'),
    revPeriodPlan: read('revPeriodPlan'),
    actual: read('actual'),
    actualVsRevAnnualPlan: read('actualVsRevAnnualPlan'),
    actualVsRevPeriodPlan: read('actualVsRevPeriodPlan'),
  }),
  annual_spending: (read) => ({
    annualPlan: read('annualPlan'),
    revAnnualPlan: read('revAnnualPlan'),
    actual: read('actual'),
    actualVsRevAnnualPlan: read('actualVsRevAnnualPlan'),
  }),
  expenditure_plan: (read) => ({
    totalY0: read('totalY0'),
    totalY1: read('totalY1'),
    totalY2: read('totalY2'),
  }),
};

/**
 * Builds the fixed amount struct of a kind from a per-field reader.
 */
export const buildAmounts = <K extends SourceKind>(
  kind: K,
  read: AmountReader<FieldsByKind[K]>
): Amounts<K> => {
  const shape: AmountShape<K> = AMOUNT_SHAPES[kind];
  return shape(read);
};

/**
 * Reads one level's amounts from a sheet row.
 */
export const readAmounts = <K extends SourceKind>(
  kind: K,
  specs: ColumnSpecs<K>,
  row: RawRow
): Amounts<K> =>
  buildAmounts(kind, (field) => {
    const spec = specs.find((candidate) => candidate.field === field);
    if (spec === undefined) {
      return 0;
    }
    const value = cell(row, spec.index);
    return spec.percentage ? parsePercentage(value) : parseAmount(value);
  });

export const zeroAmounts = <K extends SourceKind>(kind: K): Amounts<K> =>
  buildAmounts(kind, () => 0);

// ─────────────────────────────────────────────────────────────────────────────
// Source identity
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Report identity used to name inputs and outputs.
 */
export const SOURCE_TYPES = [
  'BUDGET_LAW',
  'SPENDING_Q1',
  'SPENDING_Q12',
  'SPENDING_Q123',
  'SPENDING_Q1234',
  'MTEP',
] as const;

export type SourceType = (typeof SOURCE_TYPES)[number];

/**
 * The four report grammars. Quarterly spending reports carry period figures,
 * the year-end report does not, and the medium-term plan stops at programs.
 */
export type SourceKind = 'budget_law' | 'period_spending' | 'annual_spending' | 'expenditure_plan';

export type SubprogramKind = Exclude<SourceKind, 'expenditure_plan'>;

/**
 * Physical workbook layout.
 * - legacy: 2019-2024 budget laws and all spending reports (four identifier columns)
 * - layout_2025: budget laws from 2025 on (inline descriptions, compound codes)
 * - plan: medium-term expenditure plan (two levels, three forecast years)
 */
export type Layout = 'legacy' | 'layout_2025' | 'plan';

export const FIRST_2025_LAYOUT_YEAR = 2025;

export const isSourceType = (value: string): value is SourceType =>
  SOURCE_TYPES.some((sourceType) => sourceType === value);

export const sourceKindOf = (sourceType: SourceType): SourceKind => {
  switch (sourceType) {
    case 'BUDGET_LAW':
      return 'budget_law';
    case 'SPENDING_Q1':
    case 'SPENDING_Q12':
    case 'SPENDING_Q123':
      return 'period_spending';
    case 'SPENDING_Q1234':
      return 'annual_spending';
    case 'MTEP':
      return 'expenditure_plan';
  }
};

export const layoutFor = (year: number, sourceType: SourceType): Layout => {
  if (sourceType === 'MTEP') {
    return 'plan';
  }
  if (sourceType === 'BUDGET_LAW' && year >= FIRST_2025_LAYOUT_YEAR) {
    return 'layout_2025';
  }
  return 'legacy';
};

// ─────────────────────────────────────────────────────────────────────────────
// Rows and states
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Trimmed cell strings of one sheet row; absent cells are ''.
 */
export type RawRow = readonly string[];

export const ROW_TYPES = [
  'GrandTotal',
  'StateBodyHeader',
  'ProgramHeader',
  'SubprogramMarker',
  'SubprogramHeader',
  'DetailLine',
  'Empty',
  'Unknown',
] as const;

export type RowType = (typeof ROW_TYPES)[number];

export const PROCESSING_STATES = ['Init', 'Ready', 'StateBody', 'Program', 'Subprogram'] as const;

export type ProcessingState = (typeof PROCESSING_STATES)[number];

// ─────────────────────────────────────────────────────────────────────────────
// Amount structs
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Logical amount fields per source kind. Each kind has a fixed shape that is
 * repeated at every hierarchy level.
 */
export interface FieldsByKind {
  budget_law: 'total';
  period_spending:
    | 'annualPlan'
    | 'revAnnualPlan'
    | 'periodPlan'
    | 'revPeriodPlan'
    | 'actual'
    | 'actualVsRevAnnualPlan'
    | 'actualVsRevPeriodPlan';
  annual_spending: 'annualPlan' | 'revAnnualPlan' | 'actual' | 'actualVsRevAnnualPlan';
  expenditure_plan: 'totalY0' | 'totalY1' | 'totalY2';
}

export type AmountField<K extends SourceKind = SourceKind> = FieldsByKind[K];

/**
 * Amounts of one hierarchy level. `null` only appears when a processed table
 * with blank cells is read back; the workbook parser always yields numbers.
 */
export type Amounts<K extends SourceKind> = Readonly<Record<FieldsByKind[K], number | null>>;

/**
 * Field-name view over any amount struct, used by kind-agnostic code.
 */
export type AmountView = Readonly<Record<string, number | null>>;

// ─────────────────────────────────────────────────────────────────────────────
// Records
// ─────────────────────────────────────────────────────────────────────────────

export interface ProgramIdentity {
  readonly stateBody: string;
  readonly programCode: number;
  readonly programName: string;
  readonly programGoal: string;
  readonly programResultDesc: string;
}

/**
 * One output row per subprogram. State-body and program amounts are repeated
 * on every subprogram that belongs to them.
 */
export interface SubprogramRecord<K extends SubprogramKind> extends ProgramIdentity {
  readonly kind: K;
  /** Parent code carried by compound subprogram codes (2025 layout only) */
  readonly programCodeExt: number | null;
  readonly subprogramCode: number;
  readonly subprogramName: string;
  readonly subprogramDesc: string;
  readonly subprogramType: string;
  readonly stateBodyAmounts: Amounts<K>;
  readonly programAmounts: Amounts<K>;
  readonly subprogramAmounts: Amounts<K>;
}

/**
 * One output row per program for the two-level expenditure plan.
 */
export interface PlanProgramRecord extends ProgramIdentity {
  readonly kind: 'expenditure_plan';
  readonly stateBodyAmounts: Amounts<'expenditure_plan'>;
  readonly programAmounts: Amounts<'expenditure_plan'>;
}

export interface RecordByKind {
  budget_law: SubprogramRecord<'budget_law'>;
  period_spending: SubprogramRecord<'period_spending'>;
  annual_spending: SubprogramRecord<'annual_spending'>;
  expenditure_plan: PlanProgramRecord;
}

export type FlattenedRecord = RecordByKind[SourceKind];

export type AnySubprogramRecord = RecordByKind[SubprogramKind];

export const hasSubprogram = (record: FlattenedRecord): record is AnySubprogramRecord =>
  record.kind !== 'expenditure_plan';

/**
 * Aggregate figures from the grand-total row, keyed by logical field name.
 */
export interface OverallTotals {
  readonly fields: AmountView;
  /** Forecast years of the expenditure plan, [year, year + 1, year + 2] */
  readonly planYears?: readonly number[] | undefined;
}

// ─────────────────────────────────────────────────────────────────────────────
// Scan diagnostics
// ─────────────────────────────────────────────────────────────────────────────

export interface ScanWarning {
  readonly row: number;
  readonly message: string;
}

/**
 * Caller-owned accumulator threaded through a scan.
 */
export interface ScanDiagnostics {
  readonly rowTypeCounts: Record<RowType, number>;
  readonly stateCounts: Record<ProcessingState, number>;
  readonly warnings: ScanWarning[];
  readonly skippedRows: number[];
  readonly ignoredBeforeGrandTotal: number[];
}

export const createScanDiagnostics = (): ScanDiagnostics => ({
  rowTypeCounts: {
    GrandTotal: 0,
    StateBodyHeader: 0,
    ProgramHeader: 0,
    SubprogramMarker: 0,
    SubprogramHeader: 0,
    DetailLine: 0,
    Empty: 0,
    Unknown: 0,
  },
  stateCounts: {
    Init: 0,
    Ready: 0,
    StateBody: 0,
    Program: 0,
    Subprogram: 0,
  },
  warnings: [],
  skippedRows: [],
  ignoredBeforeGrandTotal: [],
});

// ─────────────────────────────────────────────────────────────────────────────
// Extraction I/O
// ─────────────────────────────────────────────────────────────────────────────

export interface ExtractionTarget {
  year: number;
  sourceType: SourceType;
}

export interface ExtractionOutput {
  readonly sourceType: SourceType;
  readonly sourceKind: SourceKind;
  readonly layout: Layout;
  readonly year: number;
  readonly columns: readonly string[];
  readonly records: readonly FlattenedRecord[];
  readonly overall: OverallTotals;
  readonly diagnostics: ScanDiagnostics;
}

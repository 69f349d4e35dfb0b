import type {
  FlattenedRecord,
  OverallTotals,
  SourceKind,
  SourceType,
} from '@/modules/extraction/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Check results
// ─────────────────────────────────────────────────────────────────────────────

export const CHECK_IDS = [
  'required_fields',
  'empty_identifiers',
  'missing_financial_data',
  'hierarchical_totals',
  'negative_totals',
  'period_vs_annual',
  'negative_percentages',
  'execution_exceeds_100',
  'percentage_calculation',
  'hierarchical_structure_sanity',
] as const;

export type CheckId = (typeof CHECK_IDS)[number];

export type Severity = 'error' | 'warning';

export type CheckLevel = 'overall' | 'state_body' | 'program' | 'subprogram';

/** Levels read from the record table */
export type RowLevel = Exclude<CheckLevel, 'overall'>;

export interface CheckResult {
  readonly checkId: CheckId;
  readonly severity: Severity;
  /** Null for checks that are not scoped to a hierarchy level */
  readonly level: CheckLevel | null;
  /** Amount column base a per-field result refers to, e.g. `annual_plan` */
  readonly subject: string | null;
  readonly passed: boolean;
  readonly failCount: number;
  readonly messages: readonly string[];
}

export interface CheckResultInit {
  checkId: CheckId;
  severity: Severity;
  level?: CheckLevel | null;
  subject?: string | null;
  messages?: readonly string[];
  /** Defaults to the number of messages */
  failCount?: number;
}

/**
 * Frozen result; `passed` is derived from `failCount`.
 */
export const createCheckResult = (init: CheckResultInit): CheckResult => {
  const messages = Object.freeze([...(init.messages ?? [])]);
  const failCount = Math.max(0, init.failCount ?? messages.length);
  return Object.freeze({
    checkId: init.checkId,
    severity: init.severity,
    level: init.level ?? null,
    subject: init.subject ?? null,
    passed: failCount === 0,
    failCount,
    messages,
  });
};

// ─────────────────────────────────────────────────────────────────────────────
// Check contract
// ─────────────────────────────────────────────────────────────────────────────

export interface ValidationInput {
  readonly records: readonly FlattenedRecord[];
  readonly overall: OverallTotals;
  readonly sourceKind: SourceKind;
  /** Column names of the record table as loaded */
  readonly columns: readonly string[];
}

export interface ValidationCheck {
  readonly id: CheckId;
  appliesTo(kind: SourceKind): boolean;
  validate(input: ValidationInput): CheckResult[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Report
// ─────────────────────────────────────────────────────────────────────────────

export interface ValidationMetadata {
  readonly sourceType: SourceType;
  readonly sourceKind: SourceKind;
  readonly year: number;
  /** Record table the report was produced from */
  readonly file: string;
  /** ISO 8601 */
  readonly generatedAt: string;
}

export interface ValidationSummary {
  readonly total: number;
  readonly passed: number;
  readonly withWarnings: number;
  readonly withErrors: number;
  /** Sum of failCount over failed error results */
  readonly errorCount: number;
  /** Sum of failCount over failed warning results */
  readonly warningCount: number;
}

export interface ValidationReport {
  readonly metadata: ValidationMetadata;
  readonly results: readonly CheckResult[];
  readonly summary: ValidationSummary;
}

import {
  PROGRAM_DETAIL_LABELS,
  SUBPROGRAM_DETAIL_LABELS,
  isNumeric,
  looksLikeSubprogramCode,
} from './markers.js';
import { cell, hasText, isBlankCell, type RowPredicates } from './row-classifier.js';

import type { Layout, RawRow } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Grammar types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Where the three descriptive strings of a header come from.
 * - window: five rows below the header (value, label, value, label, value)
 * - inline: three cells of the header row itself
 */
export type DetailSource =
  | {
      readonly mode: 'window';
      readonly textColumn: number;
      readonly policy: 'strict' | 'lenient';
      readonly labels: readonly [string, string];
    }
  | {
      readonly mode: 'inline';
      readonly columns: readonly [number, number, number];
    };

export interface SubprogramGrammar {
  readonly codeColumn: number;
  readonly details: DetailSource;
  /** Layouts without a marker row accept subprogram headers in any state after Init */
  readonly requiresMarker: boolean;
  /** Whether the parent half of a compound code is kept as programCodeExt */
  readonly keepsParentCode: boolean;
}

export interface LayoutGrammar {
  readonly layout: Layout;
  readonly predicates: RowPredicates;
  /** Minimum RawRow width; the column schema may widen it */
  readonly minWidth: number;
  readonly stateBodyNameColumn: number;
  readonly programCodeColumn: number;
  /** Header cell used for the program name when the details do not provide one */
  readonly programNameFallbackColumn: number | null;
  readonly programDetails: DetailSource;
  readonly subprogram: SubprogramGrammar | null;
}

const allText = (row: RawRow, columns: readonly number[]): boolean =>
  columns.every((index) => hasText(row, index));

const allBlank = (row: RawRow, columns: readonly number[]): boolean =>
  columns.every((index) => isBlankCell(row, index));

const allNumeric = (row: RawRow, columns: readonly number[]): boolean =>
  columns.every((index) => isNumeric(cell(row, index)));

// ─────────────────────────────────────────────────────────────────────────────
// Legacy layout (2019-2024 budget laws, all spending reports)
// ─────────────────────────────────────────────────────────────────────────────

const legacyPredicates: RowPredicates = {
  emptyWidth: 4,
  // the label occasionally drifts left of column 2
  grandTotalColumns: [0, 1, 2],
  subprogramMarkerColumns: [0, 1, 2],
  isStateBodyHeader: (row) =>
    allBlank(row, [0, 1]) && hasText(row, 2) && isNumeric(cell(row, 3)),
  isProgramHeader: (row) =>
    isNumeric(cell(row, 0)) && isBlankCell(row, 1) && hasText(row, 2) && isNumeric(cell(row, 3)),
  isSubprogramHeader: (row) =>
    isBlankCell(row, 0) &&
    looksLikeSubprogramCode(cell(row, 1)) &&
    hasText(row, 2) &&
    isNumeric(cell(row, 3)),
  isDetailLine: (row) => allBlank(row, [0, 1]) && hasText(row, 2) && isBlankCell(row, 3),
};

const legacyGrammar: LayoutGrammar = {
  layout: 'legacy',
  predicates: legacyPredicates,
  minWidth: 4,
  stateBodyNameColumn: 2,
  programCodeColumn: 0,
  programNameFallbackColumn: null,
  programDetails: {
    mode: 'window',
    textColumn: 2,
    policy: 'strict',
    labels: PROGRAM_DETAIL_LABELS,
  },
  subprogram: {
    codeColumn: 1,
    details: {
      mode: 'window',
      textColumn: 2,
      policy: 'strict',
      labels: SUBPROGRAM_DETAIL_LABELS,
    },
    requiresMarker: true,
    keepsParentCode: false,
  },
};

// ─────────────────────────────────────────────────────────────────────────────
// 2025 budget law layout
// ─────────────────────────────────────────────────────────────────────────────

const layout2025Predicates: RowPredicates = {
  emptyWidth: 7,
  grandTotalColumns: [0],
  subprogramMarkerColumns: [],
  isStateBodyHeader: (row) => hasText(row, 0) && isNumeric(cell(row, 6)),
  isProgramHeader: (row) =>
    isBlankCell(row, 0) &&
    isNumeric(cell(row, 1)) &&
    isBlankCell(row, 2) &&
    allText(row, [3, 4]) &&
    isNumeric(cell(row, 6)),
  isSubprogramHeader: (row) =>
    allBlank(row, [0, 1]) &&
    cell(row, 2).includes('-') &&
    allText(row, [3, 4, 5]) &&
    isNumeric(cell(row, 6)),
  isDetailLine: (row) => allBlank(row, [0, 1, 2]) && hasText(row, 3) && isBlankCell(row, 6),
};

const layout2025Grammar: LayoutGrammar = {
  layout: 'layout_2025',
  predicates: layout2025Predicates,
  minWidth: 7,
  stateBodyNameColumn: 0,
  programCodeColumn: 1,
  programNameFallbackColumn: null,
  programDetails: { mode: 'inline', columns: [3, 4, 5] },
  subprogram: {
    codeColumn: 2,
    details: { mode: 'inline', columns: [3, 4, 5] },
    requiresMarker: false,
    keepsParentCode: true,
  },
};

// ─────────────────────────────────────────────────────────────────────────────
// Medium-term expenditure plan
// ─────────────────────────────────────────────────────────────────────────────

const planPredicates: RowPredicates = {
  emptyWidth: 5,
  grandTotalColumns: [0, 1, 2],
  subprogramMarkerColumns: [],
  isStateBodyHeader: (row) =>
    isBlankCell(row, 0) && hasText(row, 1) && allNumeric(row, [2, 3, 4]),
  isProgramHeader: (row) =>
    isNumeric(cell(row, 0)) && hasText(row, 1) && allNumeric(row, [2, 3, 4]),
  isSubprogramHeader: () => false,
  isDetailLine: (row) => isBlankCell(row, 0) && hasText(row, 1) && allBlank(row, [2, 3, 4]),
};

const planGrammar: LayoutGrammar = {
  layout: 'plan',
  predicates: planPredicates,
  minWidth: 6,
  stateBodyNameColumn: 1,
  programCodeColumn: 0,
  programNameFallbackColumn: 1,
  programDetails: {
    mode: 'window',
    textColumn: 1,
    policy: 'lenient',
    labels: PROGRAM_DETAIL_LABELS,
  },
  subprogram: null,
};

export const LAYOUT_GRAMMARS: Readonly<Record<Layout, LayoutGrammar>> = {
  legacy: legacyGrammar,
  layout_2025: layout2025Grammar,
  plan: planGrammar,
};

import { err, ok, type Result } from 'neverthrow';

import {
  getColumnSpecs,
  readAmounts,
  schemaWidth,
  zeroAmounts,
  type ColumnSpecs,
} from './column-schema.js';
import { collectDetails, type DetailBlock, type DetailError } from './detail-collector.js';
import {
  createInvalidGrandTotalError,
  createMissingGrandTotalError,
  type ScanError,
} from './errors.js';
import { LAYOUT_GRAMMARS, type DetailSource, type LayoutGrammar } from './layouts.js';
import { isNumeric, parseProgramCode, parseSubprogramCode } from './markers.js';
import {
  recordBuildersFor,
  resetProgram,
  type HierarchyContext,
  type RecordBuilders,
} from './record-builder.js';
import { cell, classifyRow, isHierarchyRow, toRawRow } from './row-classifier.js';

import type {
  Layout,
  OverallTotals,
  ProcessingState,
  RawRow,
  RecordByKind,
  RowType,
  ScanDiagnostics,
  SourceKind,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Transitions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Next state for a classified row. Nothing but a grand total leaves Init.
 */
export const nextState = (state: ProcessingState, rowType: RowType): ProcessingState => {
  if (state === 'Init' && rowType !== 'GrandTotal') {
    return 'Init';
  }
  switch (rowType) {
    case 'GrandTotal':
      return 'Ready';
    case 'StateBodyHeader':
      return 'StateBody';
    case 'ProgramHeader':
      return 'Program';
    case 'SubprogramMarker':
      return 'Subprogram';
    default:
      return state;
  }
};

// ─────────────────────────────────────────────────────────────────────────────
// Scan
// ─────────────────────────────────────────────────────────────────────────────

export interface ScanOptions<K extends SourceKind> {
  readonly kind: K;
  readonly layout: Layout;
  /** First forecast year of the expenditure plan */
  readonly year: number;
}

export interface ScanResult<K extends SourceKind> {
  readonly records: RecordByKind[K][];
  readonly overall: OverallTotals;
}

interface DetailValues {
  readonly values: readonly [string, string, string];
  /** Index of the last row consumed by the header and its details */
  readonly lastRow: number;
}

interface ScanState<K extends SourceKind> {
  readonly kind: K;
  readonly year: number;
  readonly grammar: LayoutGrammar;
  readonly specs: ColumnSpecs<K>;
  readonly builders: RecordBuilders<K>;
  readonly rows: readonly RawRow[];
  readonly diagnostics: ScanDiagnostics;
  readonly context: HierarchyContext<K>;
  readonly records: RecordByKind[K][];
  overall: OverallTotals | null;
}

const readDetails = <K extends SourceKind>(
  scan: ScanState<K>,
  source: DetailSource,
  headerIndex: number
): Result<DetailValues, DetailError> => {
  if (source.mode === 'inline') {
    const row = scan.rows[headerIndex] ?? [];
    const [first, second, third] = source.columns;
    return ok({
      values: [cell(row, first), cell(row, second), cell(row, third)],
      lastRow: headerIndex,
    });
  }

  return collectDetails(
    scan.rows,
    headerIndex + 1,
    {
      textColumn: source.textColumn,
      policy: source.policy,
      labels: source.labels,
      predicates: scan.grammar.predicates,
    },
    scan.diagnostics
  ).map((block: DetailBlock) => ({ values: block.values, lastRow: block.next - 1 }));
};

const warn = (diagnostics: ScanDiagnostics, row: number, message: string): void => {
  diagnostics.warnings.push({ row, message });
};

const handleGrandTotal = <K extends SourceKind>(
  scan: ScanState<K>,
  row: RawRow,
  index: number
): Result<void, ScanError> => {
  if (scan.overall !== null) {
    warn(scan.diagnostics, index, 'Additional grand total row ignored');
    return ok(undefined);
  }

  // Budget laws carry a single total that must be present
  if (scan.kind === 'budget_law') {
    for (const spec of scan.specs) {
      const value = cell(row, spec.index);
      if (!isNumeric(value)) {
        return err(createInvalidGrandTotalError(index, value));
      }
    }
  }

  scan.overall = {
    fields: readAmounts(scan.kind, scan.specs, row),
    ...(scan.kind === 'expenditure_plan' && {
      planYears: [scan.year, scan.year + 1, scan.year + 2],
    }),
  };
  return ok(undefined);
};

const handleStateBody = <K extends SourceKind>(scan: ScanState<K>, row: RawRow): void => {
  scan.context.stateBody = cell(row, scan.grammar.stateBodyNameColumn);
  scan.context.stateBodyAmounts = readAmounts(scan.kind, scan.specs, row);
  resetProgram(scan.context, zeroAmounts(scan.kind));
};

const handleProgram = <K extends SourceKind>(
  scan: ScanState<K>,
  row: RawRow,
  index: number
): Result<number, ScanError> => {
  const { grammar, context } = scan;

  return readDetails(scan, grammar.programDetails, index).map(({ values, lastRow }) => {
    const [name, goal, result] = values;
    const fallbackName =
      grammar.programNameFallbackColumn === null ? '' : cell(row, grammar.programNameFallbackColumn);

    context.programCode = parseProgramCode(cell(row, grammar.programCodeColumn)) ?? 0;
    context.programName = name !== '' ? name : fallbackName;
    context.programGoal = goal;
    context.programResultDesc = result;
    context.programAmounts = readAmounts(scan.kind, scan.specs, row);

    if (scan.builders.atProgram !== null) {
      scan.records.push(scan.builders.atProgram({ ...context }));
    }
    return lastRow;
  });
};

const handleSubprogram = <K extends SourceKind>(
  scan: ScanState<K>,
  row: RawRow,
  index: number,
  state: ProcessingState
): Result<number, ScanError> => {
  const subprogram = scan.grammar.subprogram;
  const build = scan.builders.atSubprogram;

  if (subprogram === null || build === null) {
    return ok(index);
  }

  if (subprogram.requiresMarker && state !== 'Subprogram') {
    warn(scan.diagnostics, index, 'Subprogram header outside a program activities block ignored');
    scan.diagnostics.skippedRows.push(index);
    return ok(index);
  }

  const rawCode = cell(row, subprogram.codeColumn);
  const code = parseSubprogramCode(rawCode);
  if (code === null) {
    warn(scan.diagnostics, index, `Skipping subprogram with invalid code '${rawCode}'`);
    scan.diagnostics.skippedRows.push(index);
    return ok(index);
  }

  const amounts = readAmounts(scan.kind, scan.specs, row);

  return readDetails(scan, subprogram.details, index).map(({ values, lastRow }) => {
    const [name, description, type] = values;
    scan.records.push(
      build(
        { ...scan.context },
        {
          programCodeExt: subprogram.keepsParentCode ? code.parent : null,
          subprogramCode: code.code,
          subprogramName: name,
          subprogramDesc: description,
          subprogramType: type,
          amounts,
        }
      )
    );
    return lastRow;
  });
};

/**
 * Single forward scan of one sheet.
 *
 * `sheet` holds the raw cell strings of the first worksheet; each row is
 * trimmed and padded to the layout width before classification. Row-local
 * problems are recorded in `diagnostics`; structural problems end the scan
 * with a typed error and no records.
 */
export const scanSheet = <K extends SourceKind>(
  sheet: readonly (readonly string[])[],
  options: ScanOptions<K>,
  diagnostics: ScanDiagnostics
): Result<ScanResult<K>, ScanError> => {
  const specsResult = getColumnSpecs(options.layout, options.kind);
  if (specsResult.isErr()) {
    return err(specsResult.error);
  }
  const specs = specsResult.value;
  const grammar = LAYOUT_GRAMMARS[options.layout];
  const width = Math.max(grammar.minWidth, schemaWidth(specs));
  const zero = zeroAmounts(options.kind);

  const scan: ScanState<K> = {
    kind: options.kind,
    year: options.year,
    grammar,
    specs,
    builders: recordBuildersFor(options.kind),
    rows: sheet.map((cells) => toRawRow(cells, width)),
    diagnostics,
    context: {
      stateBody: '',
      stateBodyAmounts: zero,
      programCode: 0,
      programName: '',
      programGoal: '',
      programResultDesc: '',
      programAmounts: zero,
    },
    records: [],
    overall: null,
  };

  let state: ProcessingState = 'Init';

  for (let index = 0; index < scan.rows.length; index++) {
    const row = scan.rows[index] ?? [];
    const rowType = classifyRow(row, grammar.predicates);
    diagnostics.rowTypeCounts[rowType] += 1;
    diagnostics.stateCounts[state] += 1;

    state = nextState(state, rowType);

    if (state === 'Init') {
      if (isHierarchyRow(rowType)) {
        diagnostics.ignoredBeforeGrandTotal.push(index);
      }
      continue;
    }

    let step: Result<number, ScanError> = ok(index);

    switch (rowType) {
      case 'GrandTotal':
        step = handleGrandTotal(scan, row, index).map(() => index);
        break;
      case 'StateBodyHeader':
        handleStateBody(scan, row);
        break;
      case 'ProgramHeader':
        step = handleProgram(scan, row, index);
        break;
      case 'SubprogramHeader':
        step = handleSubprogram(scan, row, index, state);
        break;
      default:
        break;
    }

    if (step.isErr()) {
      return err(step.error);
    }
    // skip the rows consumed by a description block
    index = step.value;
  }

  if (scan.overall === null) {
    return err(createMissingGrandTotalError());
  }

  return ok({ records: scan.records, overall: scan.overall });
};

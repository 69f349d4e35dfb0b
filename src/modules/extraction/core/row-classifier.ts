import {
  GRAND_TOTAL_MARKER,
  SUBPROGRAM_MARKER,
  isBlank,
  isMarker,
} from './markers.js';

import type { RawRow, RowType } from './types.js';

/**
 * Shape predicates of one workbook layout. Marker rows are matched by column
 * lists; header and detail rows by predicates over blank/numeric cells.
 */
export interface RowPredicates {
  /** Number of leading cells that must be blank for a row to be Empty */
  readonly emptyWidth: number;
  readonly grandTotalColumns: readonly number[];
  /** Empty when the layout has no "program activities" marker row */
  readonly subprogramMarkerColumns: readonly number[];
  readonly isStateBodyHeader: (row: RawRow) => boolean;
  readonly isProgramHeader: (row: RawRow) => boolean;
  readonly isSubprogramHeader: (row: RawRow) => boolean;
  readonly isDetailLine: (row: RawRow) => boolean;
}

export const cell = (row: RawRow, index: number): string => row[index] ?? '';

export const hasText = (row: RawRow, index: number): boolean => !isBlank(cell(row, index));

export const isBlankCell = (row: RawRow, index: number): boolean => isBlank(cell(row, index));

/**
 * Pads or truncates a sheet row to a fixed width of trimmed strings.
 */
export const toRawRow = (cells: readonly string[], width: number): RawRow =>
  Array.from({ length: width }, (_, index) => (cells[index] ?? '').trim());

const isEmptyRow = (row: RawRow, width: number): boolean => {
  for (let index = 0; index < width; index++) {
    if (hasText(row, index)) {
      return false;
    }
  }
  return true;
};

const anyColumnIs = (row: RawRow, columns: readonly number[], marker: string): boolean =>
  columns.some((index) => isMarker(cell(row, index), marker));

/**
 * Classifies one row. First match wins:
 * Empty, GrandTotal, SubprogramMarker, StateBodyHeader, ProgramHeader,
 * SubprogramHeader, DetailLine, Unknown.
 */
export const classifyRow = (row: RawRow, predicates: RowPredicates): RowType => {
  if (isEmptyRow(row, predicates.emptyWidth)) {
    return 'Empty';
  }
  if (anyColumnIs(row, predicates.grandTotalColumns, GRAND_TOTAL_MARKER)) {
    return 'GrandTotal';
  }
  if (anyColumnIs(row, predicates.subprogramMarkerColumns, SUBPROGRAM_MARKER)) {
    return 'SubprogramMarker';
  }
  if (predicates.isStateBodyHeader(row)) {
    return 'StateBodyHeader';
  }
  if (predicates.isProgramHeader(row)) {
    return 'ProgramHeader';
  }
  if (predicates.isSubprogramHeader(row)) {
    return 'SubprogramHeader';
  }
  if (predicates.isDetailLine(row)) {
    return 'DetailLine';
  }
  return 'Unknown';
};

/**
 * Rows that carry or delimit hierarchy structure.
 */
export const isHierarchyRow = (rowType: RowType): boolean =>
  rowType === 'GrandTotal' ||
  rowType === 'StateBodyHeader' ||
  rowType === 'ProgramHeader' ||
  rowType === 'SubprogramMarker' ||
  rowType === 'SubprogramHeader';

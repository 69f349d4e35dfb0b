import { err, ok, type Result } from 'neverthrow';

import {
  createDetailLabelMismatchError,
  createUnexpectedDetailRowError,
  type DetailLabelMismatchError,
  type UnexpectedDetailRowError,
} from './errors.js';
import { containsLabel, isBlank } from './markers.js';
import { cell, classifyRow, isHierarchyRow, type RowPredicates } from './row-classifier.js';

import type { RawRow, ScanDiagnostics } from './types.js';

export const DETAIL_WINDOW_SIZE = 5;

export interface DetailWindowOptions {
  readonly textColumn: number;
  readonly policy: 'strict' | 'lenient';
  /** Expected labels of the two label lines (offsets 1 and 3) */
  readonly labels: readonly [string, string];
  readonly predicates: RowPredicates;
}

export interface DetailBlock {
  /** All five lines; rows past the sheet or past an early stop read as '' */
  readonly lines: readonly string[];
  /** Value lines (offsets 0, 2, 4): name, description, type or goal/result */
  readonly values: readonly [string, string, string];
  /** Index of the first row after the block */
  readonly next: number;
}

export type DetailError = DetailLabelMismatchError | UnexpectedDetailRowError;

const BLANK_ROW: RawRow = [];

const toBlock = (collected: readonly string[], next: number): DetailBlock => {
  const lines = Array.from({ length: DETAIL_WINDOW_SIZE }, (_, offset) => collected[offset] ?? '');
  return {
    lines,
    values: [lines[0] ?? '', lines[2] ?? '', lines[4] ?? ''],
    next,
  };
};

/**
 * Reads the five-row description block that follows a header at `start - 1`.
 *
 * Strict policy: value lines must be DetailLine (text) or Empty (warning, '');
 * label lines must be non-blank DetailLine rows containing the expected label.
 * Lenient policy: labels are not checked and the block ends early at the
 * first hierarchy row.
 */
export const collectDetails = (
  rows: readonly RawRow[],
  start: number,
  options: DetailWindowOptions,
  diagnostics: ScanDiagnostics
): Result<DetailBlock, DetailError> => {
  const lines: string[] = [];

  for (let offset = 0; offset < DETAIL_WINDOW_SIZE; offset++) {
    const index = start + offset;
    const row = rows[index] ?? BLANK_ROW;
    const rowType = classifyRow(row, options.predicates);
    const text = cell(row, options.textColumn);

    if (options.policy === 'lenient') {
      if (isHierarchyRow(rowType)) {
        return ok(toBlock(lines, index));
      }
      lines.push(text);
      continue;
    }

    const isLabelLine = offset % 2 === 1;

    if (isLabelLine) {
      const expected = offset === 1 ? options.labels[0] : options.labels[1];
      if (rowType !== 'DetailLine' || isBlank(text) || !containsLabel(text, expected)) {
        return err(createDetailLabelMismatchError(index, expected, text));
      }
      lines.push(text);
      continue;
    }

    if (rowType === 'DetailLine') {
      lines.push(text);
    } else if (rowType === 'Empty') {
      diagnostics.warnings.push({
        row: index,
        message: `Value line ${String(offset + 1)} of the description block is empty`,
      });
      lines.push('');
    } else {
      return err(createUnexpectedDetailRowError(index, rowType));
    }
  }

  return ok(toBlock(lines, start + DETAIL_WINDOW_SIZE));
};

import type { ValueError } from '@sinclair/typebox/errors';

import type { Layout, RowType, SourceKind } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Scan errors (fatal to one workbook)
// ─────────────────────────────────────────────────────────────────────────────

export interface MissingGrandTotalError {
  readonly type: 'MissingGrandTotal';
  readonly message: string;
}

export interface InvalidGrandTotalError {
  readonly type: 'InvalidGrandTotal';
  readonly message: string;
  readonly row: number;
  readonly value: string;
}

export interface DetailLabelMismatchError {
  readonly type: 'DetailLabelMismatch';
  readonly message: string;
  readonly row: number;
  readonly expected: string;
  readonly found: string;
}

export interface UnexpectedDetailRowError {
  readonly type: 'UnexpectedDetailRow';
  readonly message: string;
  readonly row: number;
  readonly found: RowType;
}

export interface UnsupportedLayoutError {
  readonly type: 'UnsupportedLayout';
  readonly message: string;
  readonly layout: Layout;
  readonly kind: SourceKind;
}

export type ScanError =
  | MissingGrandTotalError
  | InvalidGrandTotalError
  | DetailLabelMismatchError
  | UnexpectedDetailRowError
  | UnsupportedLayoutError;

// ─────────────────────────────────────────────────────────────────────────────
// Shell errors
// ─────────────────────────────────────────────────────────────────────────────

export type WorkbookError =
  | { type: 'NotFound'; message: string; path: string }
  | { type: 'WorkbookReadError'; message: string; path: string }
  | { type: 'EmptyWorkbook'; message: string; path: string };

export type OutputError =
  | { type: 'NotFound'; message: string; path: string }
  | { type: 'ReadError'; message: string; path: string }
  | { type: 'WriteError'; message: string; path: string }
  | { type: 'ParseError'; message: string; path: string }
  | { type: 'InvalidProcessedRow'; message: string; path: string; line: number };

export type SourcesManifestError =
  | { type: 'NotFound'; message: string }
  | { type: 'ReadError'; message: string }
  | { type: 'ParseError'; message: string }
  | { type: 'SchemaValidationError'; message: string; details: string[] }
  | { type: 'DuplicateEntry'; message: string; year: number; sourceType: string };

export type ExtractionError = ScanError | WorkbookError;

// ─────────────────────────────────────────────────────────────────────────────
// Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createMissingGrandTotalError = (): MissingGrandTotalError => ({
  type: 'MissingGrandTotal',
  message: 'No grand total row found; the workbook does not match the expected layout',
});

export const createInvalidGrandTotalError = (row: number, value: string): InvalidGrandTotalError => ({
  type: 'InvalidGrandTotal',
  message: `Grand total at row ${String(row)} has a non-numeric total: '${value}'`,
  row,
  value,
});

export const createDetailLabelMismatchError = (
  row: number,
  expected: string,
  found: string
): DetailLabelMismatchError => ({
  type: 'DetailLabelMismatch',
  message: `Expected label containing '${expected}' at row ${String(row)}, found '${found}'`,
  row,
  expected,
  found,
});

export const createUnexpectedDetailRowError = (
  row: number,
  found: RowType
): UnexpectedDetailRowError => ({
  type: 'UnexpectedDetailRow',
  message: `Expected a detail line at row ${String(row)}, found ${found}`,
  row,
  found,
});

export const createUnsupportedLayoutError = (
  layout: Layout,
  kind: SourceKind
): UnsupportedLayoutError => ({
  type: 'UnsupportedLayout',
  message: `Layout '${layout}' has no column schema for ${kind}`,
  layout,
  kind,
});

export const formatSchemaErrors = (errors: Iterable<ValueError>): string[] =>
  Array.from(errors).map((error) => `${error.path}: ${error.message}`);

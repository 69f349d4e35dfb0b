import { Decimal } from 'decimal.js';

/**
 * Marker text and cell-value helpers shared by the classifier and the collector.
 *
 * Amounts are parsed into JS numbers; percentage cells go through decimal.js so
 * that e.g. "87.3" becomes exactly 0.873 instead of 0.8729999999999999.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Marker tokens (already normalized)
// ─────────────────────────────────────────────────────────────────────────────

/** "Total" */
export const GRAND_TOTAL_MARKER = 'ընդամենը';

/** "Program activities" */
export const SUBPROGRAM_MARKER = 'ծրագրիմիջոցառումներ';

export const PROGRAM_DETAIL_LABELS = ['ծրագրինպատակը', 'վերջնականարդյունքինկարագրությունը'] as const;

export const SUBPROGRAM_DETAIL_LABELS = ['միջոցառմաննկարագրությունը', 'միջոցառմանտեսակը'] as const;

// ─────────────────────────────────────────────────────────────────────────────
// Normalization
// ─────────────────────────────────────────────────────────────────────────────

const WHITESPACE = /\s+/gu;
// : . ՝ ։ - — – _
const MARKER_PUNCTUATION = /[:.՝։\-—–_]/gu;

/**
 * Lowercases and removes whitespace.
 */
export const normalizeText = (value: string): string =>
  value.toLowerCase().replace(WHITESPACE, '');

/**
 * Marker comparison form: normalized text without punctuation.
 */
export const normalizeMarker = (value: string): string =>
  normalizeText(value).replace(MARKER_PUNCTUATION, '');

export const isMarker = (value: string, marker: string): boolean =>
  value !== '' && normalizeMarker(value) === marker;

export const containsLabel = (value: string, label: string): boolean =>
  normalizeText(value).includes(label);

// ─────────────────────────────────────────────────────────────────────────────
// Cell values
// ─────────────────────────────────────────────────────────────────────────────

const DECIMAL_NUMBER = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const INTEGER = /^[+-]?\d+$/;

export const isBlank = (value: string): boolean => value.trim() === '';

/**
 * True when the trimmed string is a finite decimal number.
 */
export const isNumeric = (value: string): boolean => DECIMAL_NUMBER.test(value.trim());

/**
 * Numeric cell value; non-numeric content reads as 0.
 */
export const parseAmount = (value: string): number => {
  const trimmed = value.trim();
  return isNumeric(trimmed) ? Number(trimmed) : 0;
};

/**
 * Execution-rate cell stored as a percentage; returns the fraction.
 * '%' is stripped, '-' and other non-numeric content read as 0.
 */
export const parsePercentage = (value: string): number => {
  const stripped = value.replace(/%/g, '').trim();
  if (!isNumeric(stripped)) {
    return 0;
  }
  return new Decimal(stripped).div(100).toNumber();
};

/**
 * Integer part of a numeric code cell ("1001" or "1001.0"), or null.
 */
export const parseProgramCode = (value: string): number | null => {
  const trimmed = value.trim();
  if (!isNumeric(trimmed)) {
    return null;
  }
  return Math.trunc(Number(trimmed));
};

/**
 * Strict integer value: accepts "12" and "12.0", rejects "12.5" and text.
 */
export const parseIntegral = (value: string): number | null => {
  const trimmed = value.trim();
  if (INTEGER.test(trimmed)) {
    return Number(trimmed);
  }
  if (!isNumeric(trimmed)) {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isInteger(parsed) ? parsed : null;
};

export interface SubprogramCode {
  readonly code: number;
  readonly parent: number | null;
}

const integerPart = (value: string): number | null => {
  const trimmed = value.trim();
  return INTEGER.test(trimmed) ? Number(trimmed) : null;
};

/**
 * Subprogram code cell: a bare number, truncated toward zero ("12.5" is 12),
 * or "<parent>-<code>" with exactly two integer parts ("12.0-3" is rejected).
 */
export const parseSubprogramCode = (value: string): SubprogramCode | null => {
  const trimmed = value.trim();

  if (trimmed.includes('-')) {
    const parts = trimmed.split('-');
    if (parts.length !== 2) {
      return null;
    }
    const [parentPart = '', codePart = ''] = parts;
    const parent = integerPart(parentPart);
    const code = integerPart(codePart);
    if (parent === null || code === null) {
      return null;
    }
    return { code, parent };
  }

  return isNumeric(trimmed) ? { code: Math.trunc(Number(trimmed)), parent: null } : null;
};

/**
 * Classifier shape test: a bare number or exactly two numeric dash-joined parts.
 */
export const looksLikeSubprogramCode = (value: string): boolean => {
  const trimmed = value.trim();
  if (trimmed.includes('-')) {
    const parts = trimmed.split('-');
    return parts.length === 2 && parts.every((part) => isNumeric(part));
  }
  return isNumeric(trimmed);
};

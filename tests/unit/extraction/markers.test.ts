import { describe, expect, it } from 'vitest';

import {
  GRAND_TOTAL_MARKER,
  SUBPROGRAM_MARKER,
  containsLabel,
  isMarker,
  isNumeric,
  looksLikeSubprogramCode,
  normalizeMarker,
  parseAmount,
  parseIntegral,
  parsePercentage,
  parseProgramCode,
  parseSubprogramCode,
} from '@/modules/extraction/core/markers.js';

describe('marker normalization', () => {
  it('lowercases and drops whitespace and punctuation', () => {
    expect(normalizeMarker(' ԸՆԴԱՄԵՆԸ: ')).toBe(GRAND_TOTAL_MARKER);
    expect(normalizeMarker('Ծրագրի  միջոցառումներ.')).toBe(SUBPROGRAM_MARKER);
  });

  it('matches markers exactly after normalization', () => {
    expect(isMarker('Ընդամենը', GRAND_TOTAL_MARKER)).toBe(true);
    expect(isMarker('Ընդամենը ծախսեր', GRAND_TOTAL_MARKER)).toBe(false);
    expect(isMarker('', GRAND_TOTAL_MARKER)).toBe(false);
  });

  it('finds labels inside longer text', () => {
    expect(containsLabel('1. Ծրագրի նպատակը՝', 'ծրագրինպատակը')).toBe(true);
    expect(containsLabel('Ծրագրի անվանումը', 'ծրագրինպատակը')).toBe(false);
  });
});

describe('cell values', () => {
  it('recognizes decimal numbers only', () => {
    expect(isNumeric('1000')).toBe(true);
    expect(isNumeric(' -12.5 ')).toBe(true);
    expect(isNumeric('1e3')).toBe(true);
    expect(isNumeric('')).toBe(false);
    expect(isNumeric('12 000')).toBe(false);
    expect(isNumeric('-')).toBe(false);
  });

  it('reads non-numeric amounts as zero', () => {
    expect(parseAmount('1500.25')).toBe(1500.25);
    expect(parseAmount('-')).toBe(0);
    expect(parseAmount('')).toBe(0);
  });

  it('converts percentage cells to exact fractions', () => {
    expect(parsePercentage('87.3')).toBe(0.873);
    expect(parsePercentage('80%')).toBe(0.8);
    expect(parsePercentage('-')).toBe(0);
  });

  it('truncates program codes', () => {
    expect(parseProgramCode('1001')).toBe(1001);
    expect(parseProgramCode('1001.0')).toBe(1001);
    expect(parseProgramCode('abc')).toBeNull();
  });

  it('accepts only integral values', () => {
    expect(parseIntegral('12')).toBe(12);
    expect(parseIntegral('12.0')).toBe(12);
    expect(parseIntegral('12.5')).toBeNull();
    expect(parseIntegral('x')).toBeNull();
  });
});

describe('subprogram codes', () => {
  it('parses bare and compound codes', () => {
    expect(parseSubprogramCode('11001')).toEqual({ code: 11001, parent: null });
    expect(parseSubprogramCode('1201-11001')).toEqual({ code: 11001, parent: 1201 });
    expect(parseSubprogramCode(' 1201 - 11001 ')).toEqual({ code: 11001, parent: 1201 });
  });

  it('truncates fractional bare codes', () => {
    expect(parseSubprogramCode('12.5')).toEqual({ code: 12, parent: null });
    expect(parseSubprogramCode('11001.0')).toEqual({ code: 11001, parent: null });
  });

  it('requires integer parts in compound codes', () => {
    expect(parseSubprogramCode('12.0-3')).toBeNull();
    expect(parseSubprogramCode('12-3.5')).toBeNull();
  });

  it('rejects malformed codes', () => {
    expect(parseSubprogramCode('1-2-3')).toBeNull();
    expect(parseSubprogramCode('1201-')).toBeNull();
    expect(parseSubprogramCode('abc')).toBeNull();
  });

  it('tests the code shape for classification', () => {
    expect(looksLikeSubprogramCode('11001')).toBe(true);
    expect(looksLikeSubprogramCode('1201-11001')).toBe(true);
    expect(looksLikeSubprogramCode('1-2-3')).toBe(false);
    expect(looksLikeSubprogramCode('Budget')).toBe(false);
  });
});

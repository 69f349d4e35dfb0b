import { describe, expect, it } from 'vitest';

import { PROGRAM_DETAIL_LABELS } from '@/modules/extraction/core/markers.js';
import {
  LAYOUT_GRAMMARS,
  collectDetails,
  createScanDiagnostics,
  toRawRow,
  type RawRow,
} from '@/modules/extraction/index.js';

import { legacy, plan } from '../../fixtures/budget-sheets.js';

const legacyRows = (rows: string[][]): RawRow[] => rows.map((cells) => toRawRow(cells, 4));
const planRows = (rows: string[][]): RawRow[] => rows.map((cells) => toRawRow(cells, 6));

const strictOptions = {
  textColumn: 2,
  policy: 'strict' as const,
  labels: PROGRAM_DETAIL_LABELS,
  predicates: LAYOUT_GRAMMARS.legacy.predicates,
};

const lenientOptions = {
  textColumn: 1,
  policy: 'lenient' as const,
  labels: PROGRAM_DETAIL_LABELS,
  predicates: LAYOUT_GRAMMARS.plan.predicates,
};

describe('collectDetails (strict)', () => {
  it('reads the three value lines of a five-line block', () => {
    const rows = legacyRows([
      legacy.program(1001, 'Program', 600),
      ...legacy.programDetails('Name', 'Goal', 'Result'),
      legacy.marker(),
    ]);
    const diagnostics = createScanDiagnostics();

    const block = collectDetails(rows, 1, strictOptions, diagnostics)._unsafeUnwrap();

    expect(block.values).toEqual(['Name', 'Goal', 'Result']);
    expect(block.lines).toHaveLength(5);
    expect(block.next).toBe(6);
    expect(diagnostics.warnings).toEqual([]);
  });

  it('accepts an empty value line with a warning', () => {
    const [name, goalLabel, , resultLabel, result] = legacy.programDetails('Name', 'Goal', 'Result');
    const rows = legacyRows([
      legacy.program(1001, 'Program', 600),
      name ?? [],
      goalLabel ?? [],
      ['', '', '', ''],
      resultLabel ?? [],
      result ?? [],
    ]);
    const diagnostics = createScanDiagnostics();

    const block = collectDetails(rows, 1, strictOptions, diagnostics)._unsafeUnwrap();

    expect(block.values).toEqual(['Name', '', 'Result']);
    expect(diagnostics.warnings).toEqual([
      { row: 3, message: 'Value line 3 of the description block is empty' },
    ]);
  });

  it('fails when a label line does not carry the expected label', () => {
    const rows = legacyRows([
      legacy.program(1001, 'Program', 600),
      legacy.detail('Name'),
      legacy.detail('Wrong label'),
      legacy.detail('Goal'),
    ]);

    const error = collectDetails(rows, 1, strictOptions, createScanDiagnostics())._unsafeUnwrapErr();

    expect(error).toEqual({
      type: 'DetailLabelMismatch',
      message: "Expected label containing 'ծրագրինպատակը' at row 2, found 'Wrong label'",
      row: 2,
      expected: 'ծրագրինպատակը',
      found: 'Wrong label',
    });
  });

  it('fails when a value line is a hierarchy row', () => {
    const rows = legacyRows([
      legacy.program(1001, 'Program', 600),
      legacy.stateBody('Ministry of Health', 400),
    ]);

    const error = collectDetails(rows, 1, strictOptions, createScanDiagnostics())._unsafeUnwrapErr();

    expect(error.type).toBe('UnexpectedDetailRow');
    expect(error.row).toBe(1);
  });

  it('fails when the sheet ends before a label line', () => {
    const rows = legacyRows([legacy.program(1001, 'Program', 600), legacy.detail('Name')]);

    const error = collectDetails(rows, 1, strictOptions, createScanDiagnostics())._unsafeUnwrapErr();

    expect(error.type).toBe('DetailLabelMismatch');
    expect(error.row).toBe(2);
  });
});

describe('collectDetails (lenient)', () => {
  it('does not check labels', () => {
    const rows = planRows([
      plan.program(1101, 'Schooling', 1, 2, 3),
      plan.detail('Name'),
      plan.detail('anything'),
      plan.detail('Goal'),
      plan.detail('anything'),
      plan.detail('Result'),
    ]);

    const block = collectDetails(rows, 1, lenientOptions, createScanDiagnostics())._unsafeUnwrap();

    expect(block.values).toEqual(['Name', 'Goal', 'Result']);
    expect(block.next).toBe(6);
  });

  it('stops at the first hierarchy row and pads the block', () => {
    const rows = planRows([
      plan.program(1101, 'Schooling', 1, 2, 3),
      plan.detail('Name'),
      plan.program(1102, 'Training', 1, 2, 3),
    ]);

    const block = collectDetails(rows, 1, lenientOptions, createScanDiagnostics())._unsafeUnwrap();

    expect(block.lines).toEqual(['Name', '', '', '', '']);
    expect(block.values).toEqual(['Name', '', '']);
    expect(block.next).toBe(2);
  });
});

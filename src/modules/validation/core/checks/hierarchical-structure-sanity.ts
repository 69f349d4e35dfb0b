import { createCheckResult, type ValidationCheck } from '../types.js';

/**
 * Budget laws have state bodies with differing numbers of programs, and at
 * least one with several. A uniform or flat count points at a parse that lost
 * the hierarchy.
 */
export const hierarchicalStructureSanityCheck: ValidationCheck = {
  id: 'hierarchical_structure_sanity',
  appliesTo: (kind) => kind === 'budget_law',
  validate(input) {
    const programsByStateBody = new Map<string, Set<number>>();
    for (const record of input.records) {
      const programs = programsByStateBody.get(record.stateBody) ?? new Set<number>();
      programs.add(record.programCode);
      programsByStateBody.set(record.stateBody, programs);
    }

    const counts = [...programsByStateBody.values()].map((programs) => programs.size);
    const messages: string[] = [];

    const [first] = counts;
    if (first !== undefined) {
      if (new Set(counts).size === 1) {
        messages.push(
          `All state bodies have identical program count (${String(first)}). ` +
            'This suggests degenerate hierarchy or parser failure.'
        );
      }
      if (Math.max(...counts) === 1) {
        messages.push(
          'No state body has multiple programs. This suggests flat/broken hierarchical structure.'
        );
      }
    }

    return [
      createCheckResult({
        checkId: 'hierarchical_structure_sanity',
        severity: 'error',
        messages,
      }),
    ];
  },
};

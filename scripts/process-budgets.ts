/**
 * Budget Processing Script
 *
 * Extracts every workbook listed in the sources manifest into processed CSV and
 * overall-totals JSON files, optionally validating each one. With
 * --validate-only the workbooks are skipped and the processed files already in
 * the output directory are validated again.
 *
 * Usage:
 *   tsx scripts/process-budgets.ts --sources config/sources.yaml --out data/processed
 *   tsx scripts/process-budgets.ts --validate --strict --only BUDGET_LAW
 *   tsx scripts/process-budgets.ts --validate-only --out data/processed
 *
 * Exit codes: 0 success, 1 nothing processed, 2 validation failed.
 */

import { errorMessage } from '../src/common/types/errors.js';

import { EXIT_NOTHING_PROCESSED, runProcessBudgets } from './process-budgets-run.js';

await runProcessBudgets(process.argv.slice(2), process.env, {
  log: (line) => {
    console.log(line);
  },
  error: (line) => {
    console.error(line);
  },
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(errorMessage(error));
    process.exitCode = EXIT_NOTHING_PROCESSED;
  });

import { createHierarchicalTotalsCheck } from './checks/hierarchical-totals.js';
import { hierarchicalStructureSanityCheck } from './checks/hierarchical-structure-sanity.js';
import { missingFinancialDataCheck } from './checks/missing-financial-data.js';
import { emptyIdentifiersCheck } from './checks/empty-identifiers.js';
import { negativeTotalsCheck } from './checks/negative-totals.js';
import { createPercentageCalculationCheck } from './checks/percentage-calculation.js';
import { periodVsAnnualCheck } from './checks/period-vs-annual.js';
import { executionExceeds100Check, negativePercentagesCheck } from './checks/rate-bounds.js';
import { requiredFieldsCheck } from './checks/required-fields.js';
import { DEFAULT_VALIDATION_CONFIG, type ValidationConfig } from './config.js';

import type { CheckResult, ValidationCheck, ValidationInput } from './types.js';

export type CheckRegistry = readonly ValidationCheck[];

/**
 * The closed, ordered list of checks. Report order follows this order.
 */
export const createCheckRegistry = (
  config: ValidationConfig = DEFAULT_VALIDATION_CONFIG
): CheckRegistry =>
  Object.freeze([
    requiredFieldsCheck,
    emptyIdentifiersCheck,
    missingFinancialDataCheck,
    createHierarchicalTotalsCheck(config),
    negativeTotalsCheck,
    periodVsAnnualCheck,
    negativePercentagesCheck,
    executionExceeds100Check,
    createPercentageCalculationCheck(config),
    hierarchicalStructureSanityCheck,
  ]);

/**
 * Runs every check that applies to the input's source kind, in registry order.
 */
export const runChecks = (registry: CheckRegistry, input: ValidationInput): CheckResult[] =>
  registry
    .filter((check) => check.appliesTo(input.sourceKind))
    .flatMap((check) => check.validate(input));

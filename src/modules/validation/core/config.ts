import type { SourceKind } from '@/modules/extraction/index.js';

/**
 * Tolerances used by the numeric checks. Amount tolerances are absolute
 * differences in currency units; the percentage tolerance is a fraction.
 */
export interface ValidationConfig {
  readonly tolerances: {
    readonly budgetLaw: number;
    readonly spending: number;
    readonly plan: number;
    readonly percentage: number;
  };
}

export const DEFAULT_VALIDATION_CONFIG: ValidationConfig = {
  tolerances: {
    budgetLaw: 1.0,
    spending: 5.0,
    plan: 0.5,
    percentage: 0.001,
  },
};

/**
 * Absolute tolerance for parent-versus-children sums.
 */
export const hierarchyTolerance = (config: ValidationConfig, kind: SourceKind): number => {
  switch (kind) {
    case 'budget_law':
      return config.tolerances.budgetLaw;
    case 'expenditure_plan':
      return config.tolerances.plan;
    case 'period_spending':
    case 'annual_spending':
      return config.tolerances.spending;
  }
};

/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

import type { ValidationConfig } from '@/modules/validation/index.js';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Paths
  BUDGET_SOURCES_FILE: Type.String({ minLength: 1, default: 'config/sources.yaml' }),
  BUDGET_OUTPUT_DIR: Type.String({ minLength: 1, default: 'data/processed' }),

  // Validation
  VALIDATION_STRICT: Type.Boolean({ default: false }),
  BUDGET_LAW_TOLERANCE: Type.Number({ minimum: 0, default: 1.0 }),
  SPENDING_TOLERANCE: Type.Number({ minimum: 0, default: 5.0 }),
  PLAN_TOLERANCE: Type.Number({ minimum: 0, default: 0.5 }),
  PERCENTAGE_TOLERANCE: Type.Number({ minimum: 0, default: 0.001 }),
});

export type Env = Static<typeof EnvSchema>;

const numberOr = (value: string | undefined, fallback: number): number =>
  value != null && value !== '' ? Number(value) : fallback;

const booleanOr = (value: string | undefined, fallback: boolean): boolean | string => {
  if (value == null || value === '') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') {
    return true;
  }
  if (normalized === 'false' || normalized === '0') {
    return false;
  }
  // left as a string so that schema validation reports it
  return value;
};

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    BUDGET_SOURCES_FILE: env['BUDGET_SOURCES_FILE'] ?? 'config/sources.yaml',
    BUDGET_OUTPUT_DIR: env['BUDGET_OUTPUT_DIR'] ?? 'data/processed',
    VALIDATION_STRICT: booleanOr(env['VALIDATION_STRICT'], false),
    BUDGET_LAW_TOLERANCE: numberOr(env['BUDGET_LAW_TOLERANCE'], 1.0),
    SPENDING_TOLERANCE: numberOr(env['SPENDING_TOLERANCE'], 5.0),
    PLAN_TOLERANCE: numberOr(env['PLAN_TOLERANCE'], 0.5),
    PERCENTAGE_TOLERANCE: numberOr(env['PERCENTAGE_TOLERANCE'], 0.001),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => {
  const validation: ValidationConfig = {
    tolerances: {
      budgetLaw: env.BUDGET_LAW_TOLERANCE,
      spending: env.SPENDING_TOLERANCE,
      plan: env.PLAN_TOLERANCE,
      percentage: env.PERCENTAGE_TOLERANCE,
    },
  };

  return {
    app: {
      isDevelopment: env.NODE_ENV === 'development',
      isProduction: env.NODE_ENV === 'production',
      isTest: env.NODE_ENV === 'test',
    },
    logger: {
      level: env.LOG_LEVEL,
      pretty: env.NODE_ENV === 'development',
    },
    paths: {
      sourcesFile: env.BUDGET_SOURCES_FILE,
      outputDir: env.BUDGET_OUTPUT_DIR,
    },
    validation,
    strict: env.VALIDATION_STRICT,
  };
};

export type AppConfig = ReturnType<typeof createConfig>;

/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

import { DEFAULT_RECONCILIATION_TOLERANCE } from '@/modules/rollup/index.js';

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

  // Inputs
  CATALOG_PATH: Type.String({ minLength: 1, default: 'config/metrics.yaml' }),
  CONCORDANCE_PATH: Type.String({ minLength: 1, default: 'data/concordance/nz-regions.yaml' }),
  SOURCES_DIR: Type.String({ minLength: 1, default: 'data/sources' }),

  // Outputs
  OUTPUT_DIR: Type.String({ minLength: 1, default: 'data/metrics' }),

  // Engine
  RECONCILIATION_TOLERANCE: Type.Number({
    minimum: 0,
    maximum: 1,
    default: DEFAULT_RECONCILIATION_TOLERANCE,
  }),
  /** Comma-separated output names; empty runs the whole catalog */
  ONLY_METRICS: Type.Optional(Type.String()),
});

export type Env = Static<typeof EnvSchema>;

const nonEmpty = (value: string | undefined): string | undefined =>
  value !== undefined && value.trim() !== '' ? value.trim() : undefined;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const tolerance = nonEmpty(env['RECONCILIATION_TOLERANCE']);
  const onlyMetrics = nonEmpty(env['ONLY_METRICS']);

  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    CATALOG_PATH: nonEmpty(env['CATALOG_PATH']) ?? 'config/metrics.yaml',
    CONCORDANCE_PATH: nonEmpty(env['CONCORDANCE_PATH']) ?? 'data/concordance/nz-regions.yaml',
    SOURCES_DIR: nonEmpty(env['SOURCES_DIR']) ?? 'data/sources',
    OUTPUT_DIR: nonEmpty(env['OUTPUT_DIR']) ?? 'data/metrics',
    RECONCILIATION_TOLERANCE:
      tolerance !== undefined ? Number(tolerance) : DEFAULT_RECONCILIATION_TOLERANCE,
    ...(onlyMetrics !== undefined && { ONLY_METRICS: onlyMetrics }),
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
 * Create an immutable typed configuration object from environment
 */
export const createConfig = (env: Env) =>
  Object.freeze({
    isProduction: env.NODE_ENV === 'production',
    logger: Object.freeze({
      level: env.LOG_LEVEL,
      pretty: env.NODE_ENV !== 'production',
    }),
    paths: Object.freeze({
      catalog: env.CATALOG_PATH,
      concordance: env.CONCORDANCE_PATH,
      sourcesDir: env.SOURCES_DIR,
      outputDir: env.OUTPUT_DIR,
    }),
    engine: Object.freeze({
      tolerance: env.RECONCILIATION_TOLERANCE,
      onlyMetrics: Object.freeze(
        (env.ONLY_METRICS ?? '')
          .split(',')
          .map((name) => name.trim())
          .filter((name) => name !== '')
      ),
    }),
  });

export type AppConfig = ReturnType<typeof createConfig>;

/**
 * Metric Catalog Module - Error Types
 */

import type {
  InfraError,
  InvalidNumericValueError,
  MissingColumnError,
  ValidationError,
} from '@/common/types/errors.js';
import type { ConcordanceConflictError } from '@/modules/concordance/index.js';
import type { InvalidPeriodError, RatioOutOfBoundsError } from '@/modules/derived-metrics/index.js';
import type { ReconciliationMismatchError } from '@/modules/rollup/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A definition passed schema validation but cannot be computed as written.
 */
export interface InvalidDefinitionError {
  readonly type: 'InvalidDefinition';
  readonly message: string;
  readonly outputName: string;
}

/**
 * The source table a metric reads could not be loaded or prepared.
 */
export interface SourceUnavailableError {
  readonly type: 'SourceUnavailable';
  readonly message: string;
  readonly sourceId: string;
  readonly cause: InfraError | MissingColumnError | InvalidNumericValueError | ValidationError;
}

/**
 * A computed metric could not be persisted.
 */
export interface OutputWriteError {
  readonly type: 'OutputWrite';
  readonly message: string;
  readonly path: string;
}

/**
 * Something threw inside a metric's computation.
 */
export interface UnexpectedError {
  readonly type: 'Unexpected';
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Errors of the pure per-metric computation.
 */
export type ComputeMetricError =
  | MissingColumnError
  | InvalidNumericValueError
  | ReconciliationMismatchError
  | RatioOutOfBoundsError
  | InvalidPeriodError
  | InvalidDefinitionError;

/**
 * Anything that can fail one metric in a catalog run.
 */
export type MetricError =
  | ComputeMetricError
  | SourceUnavailableError
  | OutputWriteError
  | UnexpectedError;

/**
 * Errors raised while loading the catalog or the concordance.
 */
export type CatalogError = InfraError | ValidationError | ConcordanceConflictError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createInvalidDefinitionError = (
  outputName: string,
  message: string
): InvalidDefinitionError => ({
  type: 'InvalidDefinition',
  message: `Metric '${outputName}': ${message}`,
  outputName,
});

export const createSourceUnavailableError = (
  sourceId: string,
  cause: SourceUnavailableError['cause']
): SourceUnavailableError => ({
  type: 'SourceUnavailable',
  message: `Source '${sourceId}' is unavailable: ${cause.message}`,
  sourceId,
  cause,
});

export const createOutputWriteError = (path: string, message: string): OutputWriteError => ({
  type: 'OutputWrite',
  message,
  path,
});

export const createUnexpectedError = (message: string, cause?: unknown): UnexpectedError => ({
  type: 'Unexpected',
  message,
  ...(cause !== undefined && { cause }),
});

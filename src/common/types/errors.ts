/**
 * Base error types for the metrics engine
 * All domain errors should extend these base types
 */

/**
 * Base interface for all application errors
 */
export interface AppError {
  readonly type: string;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Infrastructure errors (filesystem, parsing of external files)
 */
export interface InfraError extends AppError {
  readonly type: 'NotFound' | 'ReadError' | 'ParseError' | 'WriteError';
  readonly path: string;
}

/**
 * Validation errors (schema or definition failures)
 */
export interface ValidationError extends AppError {
  readonly type: 'ValidationError';
  readonly field?: string | undefined;
  readonly details?: string[] | undefined;
}

/**
 * A column required by a stage is absent from its input table
 */
export interface MissingColumnError extends AppError {
  readonly type: 'MissingColumn';
  readonly columns: string[];
}

/**
 * A numeric column holds a value that cannot be read as a number
 */
export interface InvalidNumericValueError extends AppError {
  readonly type: 'InvalidNumericValue';
  readonly column: string;
  readonly value: string | number;
}

export const createMissingColumnError = (
  columns: string[],
  stage: string
): MissingColumnError => ({
  type: 'MissingColumn',
  message: `${stage} requires column(s) not present in the input: ${columns.join(', ')}`,
  columns,
});

export const createInvalidNumericValueError = (
  column: string,
  value: string | number
): InvalidNumericValueError => ({
  type: 'InvalidNumericValue',
  message: `Column '${column}' holds a non-numeric value: ${String(value)}`,
  column,
  value,
});

export const createValidationError = (
  message: string,
  field?: string,
  details?: string[]
): ValidationError => ({
  type: 'ValidationError',
  message,
  ...(field !== undefined && { field }),
  ...(details !== undefined && { details }),
});

/**
 * Extracts a message from an unknown thrown value.
 */
export const errorMessage = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (typeof error === 'object' && error !== null && 'message' in error) {
    const { message } = error;
    if (typeof message === 'string') return message;
  }
  return String(error);
};

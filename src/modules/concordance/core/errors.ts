import type { InfraError, MissingColumnError, ValidationError } from '@/common/types/errors.js';

/**
 * The same raw label is listed under two different regions.
 */
export interface ConcordanceConflictError {
  readonly type: 'ConcordanceConflict';
  readonly message: string;
  readonly label: string;
  readonly regions: [string, string];
}

export type ConcordanceRepoError = InfraError | ValidationError | ConcordanceConflictError;

export type ResolveRegionsError = MissingColumnError;

/**
 * Concordance Module - Public API
 *
 * Maps raw place labels (districts, territorial authorities, locality names)
 * onto the canonical region taxonomy used by every metric.
 */

// Repository
export {
  createConcordanceRepo,
  type ConcordanceRepo,
  type ConcordanceRepoOptions,
} from './shell/repo/fs-concordance-repo.js';

// Core
export { buildConcordance } from './core/build-concordance.js';
export { normalizeLabel } from './core/normalize-label.js';
export { createConcordanceResolver, type ConcordanceResolver } from './core/resolver.js';
export {
  resolveTableRegions,
  RAW_LABEL_COLUMN,
} from './core/usecases/resolve-table-regions.js';

// Types
export {
  UNKNOWN_REGION,
  EMPTY_LABEL,
  ConcordanceFileSchema,
  type ConcordanceFileDTO,
  type ConcordanceMap,
  type Concordance,
  type ConcordanceStats,
  type RegionColumns,
} from './core/types.js';

// Errors
export type {
  ConcordanceConflictError,
  ConcordanceRepoError,
  ResolveRegionsError,
} from './core/errors.js';

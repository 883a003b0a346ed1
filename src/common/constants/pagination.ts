/**
 * Pagination Constants
 *
 * Limits shared by every paged read of metric tables.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Default number of rows per page */
export const DEFAULT_PAGE_SIZE = 100;

/** Maximum allowed rows per page */
export const MAX_PAGE_SIZE = 1000;

/** Default offset for pagination */
export const DEFAULT_OFFSET = 0;

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Clamps a limit value to [1, maxValue]. Out-of-range values are clamped,
 * never rejected.
 *
 * @example
 * clampLimit(undefined)    // 100 (default)
 * clampLimit(50)           // 50
 * clampLimit(5000)         // 1000 (max)
 * clampLimit(-1)           // 1 (min)
 */
export function clampLimit(
  limit: number | undefined | null,
  defaultValue: number = DEFAULT_PAGE_SIZE,
  maxValue: number = MAX_PAGE_SIZE
): number {
  if (limit === undefined || limit === null) {
    return defaultValue;
  }
  return Math.min(Math.max(1, Math.trunc(limit)), maxValue);
}

/**
 * Normalizes pagination parameters: clamped limit, non-negative offset.
 */
export function normalizePagination(params: { limit?: number | null; offset?: number | null }): {
  limit: number;
  offset: number;
} {
  return {
    limit: clampLimit(params.limit),
    offset: Math.max(0, Math.trunc(params.offset ?? DEFAULT_OFFSET)),
  };
}

/**
 * Canonical lookup form of a place label: trimmed, inner whitespace collapsed,
 * case-folded. Two labels match only when their whole normalised forms are equal.
 */
export const normalizeLabel = (label: string): string =>
  label.trim().replace(/\s+/g, ' ').toLowerCase();

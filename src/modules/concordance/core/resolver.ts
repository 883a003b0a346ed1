import { normalizeLabel } from './normalize-label.js';
import { EMPTY_LABEL, UNKNOWN_REGION, type ConcordanceMap, type ConcordanceStats } from './types.js';

import type { CellValue } from '@/common/types/table.js';

/**
 * Resolves raw place labels to canonical regions.
 *
 * Resolution is total: every input yields exactly one region string and
 * nothing throws. Labels without an entry resolve to "Unknown" and are
 * remembered so the run can report them.
 */
export interface ConcordanceResolver {
  resolve(label: CellValue | undefined): string;
  /** Distinct raw labels that fell back to "Unknown", sorted */
  unmappedLabels(): string[];
  stats(): ConcordanceStats;
}

export const createConcordanceResolver = (map: ConcordanceMap): ConcordanceResolver => {
  const unmapped = new Set<string>();
  const seenLabels = new Set<string>();
  const seenRegions = new Set<string>();
  let resolved = 0;
  let unresolved = 0;

  const resolve = (label: CellValue | undefined): string => {
    const raw = label === null || label === undefined ? '' : String(label);
    const key = normalizeLabel(raw);
    seenLabels.add(key);

    const region = key === '' ? undefined : map.get(key);
    if (region === undefined) {
      unresolved++;
      unmapped.add(key === '' ? EMPTY_LABEL : raw.trim());
      seenRegions.add(UNKNOWN_REGION);
      return UNKNOWN_REGION;
    }

    resolved++;
    seenRegions.add(region);
    return region;
  };

  return {
    resolve,
    unmappedLabels: () => [...unmapped].sort(),
    stats: () => ({
      resolved,
      unmapped: unresolved,
      distinctLabels: seenLabels.size,
      distinctRegions: seenRegions.size,
    }),
  };
};

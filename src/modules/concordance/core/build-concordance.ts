import { err, ok, type Result } from 'neverthrow';

import { normalizeLabel } from './normalize-label.js';

import type { ConcordanceConflictError } from './errors.js';
import type { Concordance, ConcordanceFileDTO } from './types.js';

/**
 * Inverts a region -> labels listing into a label -> region lookup.
 *
 * A region name also resolves to itself, so tables that already carry
 * canonical regions pass through unchanged.
 */
export const buildConcordance = (
  dto: ConcordanceFileDTO
): Result<Concordance, ConcordanceConflictError> => {
  const map = new Map<string, string>();
  const regions = Object.keys(dto.regions).sort();

  const register = (label: string, region: string): ConcordanceConflictError | null => {
    const key = normalizeLabel(label);
    const existing = map.get(key);
    if (existing !== undefined && existing !== region) {
      return {
        type: 'ConcordanceConflict',
        message: `Label '${label}' is listed under both '${existing}' and '${region}'`,
        label,
        regions: [existing, region],
      };
    }
    map.set(key, region);
    return null;
  };

  for (const region of regions) {
    const conflict = register(region, region);
    if (conflict !== null) return err(conflict);

    for (const label of dto.regions[region] ?? []) {
      const labelConflict = register(label, region);
      if (labelConflict !== null) return err(labelConflict);
    }
  }

  return ok({ id: dto.id, version: dto.version, map, regions });
};

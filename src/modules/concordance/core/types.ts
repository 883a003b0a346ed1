import { type Static, Type } from '@sinclair/typebox';

/** Region assigned to any label the concordance does not list */
export const UNKNOWN_REGION = 'Unknown';

/** Placeholder recorded in diagnostics for null or blank labels */
export const EMPTY_LABEL = '<empty>';

/**
 * Concordance file layout: each canonical region lists the raw labels that map to it.
 */
export const ConcordanceFileSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  version: Type.String(),
  description: Type.Optional(Type.String()),
  regions: Type.Record(Type.String({ minLength: 1 }), Type.Array(Type.String({ minLength: 1 }))),
});

export type ConcordanceFileDTO = Static<typeof ConcordanceFileSchema>;

/**
 * Raw label -> canonical region.
 * Keys are normalised labels (see normalizeLabel).
 */
export type ConcordanceMap = ReadonlyMap<string, string>;

export interface Concordance {
  id: string;
  version: string;
  map: ConcordanceMap;
  regions: readonly string[];
}

export interface ConcordanceStats {
  resolved: number;
  unmapped: number;
  distinctLabels: number;
  distinctRegions: number;
}

export interface RegionColumns {
  /** Column holding the raw place label */
  sourceColumn: string;
  /** Column that receives the canonical region */
  targetColumn: string;
}

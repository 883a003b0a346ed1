import { type Static, Type } from '@sinclair/typebox';

import type { GroupedTable } from '@/modules/aggregation/index.js';

/** Value stamped into every dimension a rollup removes */
export const TOTAL_SENTINEL = 'Total';

/** Default relative tolerance for reconciliation */
export const DEFAULT_RECONCILIATION_TOLERANCE = 1e-9;

export const RollupSpecSchema = Type.Object({
  drop: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
});

export type RollupSpec = Static<typeof RollupSpecSchema>;

/**
 * A "Total" aggregate. `grouped` is keyed by the kept dimensions only;
 * the dropped ones are implicitly "Total".
 */
export interface RollupTable {
  readonly drop: readonly string[];
  readonly grouped: GroupedTable;
}

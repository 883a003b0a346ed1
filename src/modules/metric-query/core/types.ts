import type { MetricRow } from '@/modules/metric-catalog/index.js';

/**
 * Either one value or a set of accepted values.
 */
export type ValueFilter<T> = T | readonly T[];

export interface YearRange {
  gte?: number;
  lte?: number;
}

/**
 * Conjunctive filter over the output key columns.
 */
export interface MetricTableFilter {
  year?: YearRange;
  month?: ValueFilter<number>;
  region?: ValueFilter<string>;
  metricGroup?: ValueFilter<string>;
  category?: ValueFilter<string>;
  subCategory?: ValueFilter<string>;
  fuelType?: ValueFilter<string>;
}

export interface QueryMetricTableInput {
  filter?: MetricTableFilter;
  limit?: number | null;
  offset?: number | null;
}

export interface MetricTablePageInfo {
  totalCount: number;
  hasNextPage: boolean;
  hasPreviousPage: boolean;
}

export interface MetricTableConnection {
  metricId: string;
  nodes: MetricRow[];
  pageInfo: MetricTablePageInfo;
}

import { describe, expect, it } from 'vitest';

import { createMetricCatalog, selectMetrics } from '@/modules/metric-catalog/index.js';

import { makeDefinition, makeSource } from '../../fixtures/builders.js';

import type { CatalogFileDTO, MetricDefinition } from '@/modules/metric-catalog/index.js';

const makeFile = (metrics: MetricDefinition[]): CatalogFileDTO => ({
  version: '1',
  sources: [makeSource({ regionColumn: 'TLA' })],
  metrics,
});

const problemsOf = (file: CatalogFileDTO): string[] =>
  createMetricCatalog(file)._unsafeUnwrapErr().details ?? [];

describe('createMetricCatalog', () => {
  it('builds a registry keyed by source id in catalog order', () => {
    const first = makeDefinition({ outputName: 'first' });
    const second = makeDefinition({ outputName: 'second' });

    const catalog = createMetricCatalog(makeFile([first, second]))._unsafeUnwrap();

    expect(catalog.metrics.map((m) => m.outputName)).toEqual(['first', 'second']);
    expect(catalog.sources.get('registrations')?.file).toBe('registrations.csv');
  });

  it('rejects duplicate output names', () => {
    const problems = problemsOf(
      makeFile([makeDefinition({ outputName: 'same' }), makeDefinition({ outputName: 'same' })])
    );

    expect(problems).toEqual(["outputName 'same' is declared more than once"]);
  });

  it('rejects unknown sources', () => {
    expect(problemsOf(makeFile([makeDefinition({ source: 'missing' })]))).toEqual([
      "metric 'ev_count': unknown source 'missing'",
    ]);
  });

  it('rejects a Region dimension on a source without a region column', () => {
    const file: CatalogFileDTO = {
      version: '1',
      sources: [makeSource({ id: 'generation', file: 'generation.csv' })],
      metrics: [makeDefinition({ source: 'generation' })],
    };

    expect(problemsOf(file)).toEqual([
      "metric 'ev_count': dimension 'Region' needs source 'generation' to declare a regionColumn",
    ]);
  });

  it('requires Year and known, distinct dimensions', () => {
    const problems = problemsOf(
      makeFile([makeDefinition({ dimensions: ['Month', 'District', 'Month'] })])
    );

    expect(problems).toEqual([
      "metric 'ev_count': dimension 'District' is not one of Year, Month, Region, Category, Sub_Category, Fuel_Type",
      "metric 'ev_count': dimension 'Month' is listed more than once",
      "metric 'ev_count': dimensions must include Year",
    ]);
  });

  it('rejects rollups on rolling means', () => {
    const definition = makeDefinition({
      calculation: { kind: 'rolling_mean', aggregate: { kind: 'count' }, window: 12 },
      rollups: [{ drop: ['Region'] }],
    });

    expect(problemsOf(makeFile([definition]))).toEqual([
      "metric 'ev_count': rolling means cannot declare rollups",
    ]);
  });

  it('rejects rollups that drop time or undeclared dimensions', () => {
    const definition = makeDefinition({
      rollups: [{ drop: ['Month'] }, { drop: ['Fuel_Type'] }],
    });

    expect(problemsOf(makeFile([definition]))).toEqual([
      "metric 'ev_count': rollup cannot drop the time dimension 'Month'",
      "metric 'ev_count': rollup drops 'Fuel_Type', which is not a dimension",
    ]);
  });

  it('rejects unknown unit conversions and stamps that shadow a dimension', () => {
    const definition = makeDefinition({
      calculation: { kind: 'unit_convert', valueColumn: 'kWh', conversion: 'furlongs' },
      stamp: { region: 'New Zealand' },
    });

    expect(problemsOf(makeFile([definition]))).toEqual([
      "metric 'ev_count': stamp.region conflicts with the Region dimension",
      "metric 'ev_count': unknown unit conversion 'furlongs'",
    ]);
  });

  it('rejects required groups on a dimension that is not grouped', () => {
    const definition = makeDefinition({
      requiredGroups: [{ dimension: 'Fuel_Type', values: ['BEV'] }],
    });

    expect(problemsOf(makeFile([definition]))).toEqual([
      "metric 'ev_count': requiredGroups names 'Fuel_Type', which is not a dimension",
    ]);
  });

  it('rejects unknown reclassification rule sets', () => {
    const file: CatalogFileDTO = {
      version: '1',
      sources: [makeSource({ reclassify: 'mystery' })],
      metrics: [],
    };

    expect(problemsOf(file)).toEqual([
      "source 'registrations': unknown reclassification rule set 'mystery'",
    ]);
  });

  it('reports the problem count in the message', () => {
    const error = createMetricCatalog(
      makeFile([makeDefinition({ source: 'a' }), makeDefinition({ outputName: 'b', source: 'c' })])
    )._unsafeUnwrapErr();

    expect(error.message).toBe('Metric catalog is invalid (2 problem(s))');
  });
});

describe('selectMetrics', () => {
  const catalog = createMetricCatalog(
    makeFile([
      makeDefinition({ outputName: 'a' }),
      makeDefinition({ outputName: 'b' }),
      makeDefinition({ outputName: 'c' }),
    ])
  )._unsafeUnwrap();

  it('returns every metric when no names are given', () => {
    expect(selectMetrics(catalog, []).metrics).toHaveLength(3);
    expect(selectMetrics(catalog, undefined).metrics).toHaveLength(3);
  });

  it('keeps catalog order and reports unknown names', () => {
    const { metrics, unknown } = selectMetrics(catalog, ['c', 'zz', 'a']);

    expect(metrics.map((m) => m.outputName)).toEqual(['a', 'c']);
    expect(unknown).toEqual(['zz']);
  });
});

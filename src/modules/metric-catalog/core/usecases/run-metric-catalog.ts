/**
 * Run Metric Catalog Use Case
 *
 * Computes every metric of the catalog in declaration order and persists
 * each one as soon as it has fully succeeded.
 */

import { err, ok, type Result } from 'neverthrow';

import { errorMessage } from '@/common/types/errors.js';

import { selectMetrics } from '../catalog.js';
import {
  createSourceUnavailableError,
  createUnexpectedError,
  type MetricError,
  type SourceUnavailableError,
} from '../errors.js';
import { computeMetric } from './compute-metric.js';
import { prepareSource, type PreparedSource } from './prepare-source.js';

import type { MetricWriter, SourceRepo } from '../ports.js';
import type { MetricCatalog, MetricContext, MetricDefinition, MetricDiagnostics } from '../types.js';
import type { ConcordanceMap } from '@/modules/concordance/index.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface RunMetricCatalogDeps {
  sourceRepo: SourceRepo;
  writer: MetricWriter;
  logger: Logger;
}

export interface RunMetricCatalogInput {
  catalog: MetricCatalog;
  concordance: ConcordanceMap;
  context: MetricContext;
  /** Restrict the run to these output names; all metrics when empty */
  only?: readonly string[];
}

export type MetricRunResult =
  | {
      status: 'succeeded';
      outputName: string;
      rows: number;
      path: string;
      diagnostics: MetricDiagnostics;
    }
  | {
      status: 'skipped';
      outputName: string;
      reason: string;
      diagnostics: MetricDiagnostics;
    }
  | {
      status: 'failed';
      outputName: string;
      error: MetricError;
    };

export interface RunSummary {
  succeeded: number;
  skipped: number;
  failed: number;
  /** One entry per metric, in catalog order */
  results: MetricRunResult[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Runs a single metric. Never throws: anything thrown below is turned into
 * an Unexpected error for this metric only.
 */
const runOne = async (
  definition: MetricDefinition,
  loadSource: (sourceId: string) => Promise<Result<PreparedSource, SourceUnavailableError>>,
  deps: RunMetricCatalogDeps,
  context: MetricContext
): Promise<MetricRunResult> => {
  const { outputName } = definition;
  const log = deps.logger.child({ metric: outputName });
  const failed = (error: MetricError): MetricRunResult => {
    log.error({ error }, 'Metric failed');
    return { status: 'failed', outputName, error };
  };

  try {
    const source = await loadSource(definition.source);
    if (source.isErr()) return failed(source.error);

    const computed = computeMetric(source.value.table, definition, context);
    if (computed.isErr()) return failed(computed.error);

    const computation = computed.value;
    if (computation.status === 'skipped') {
      log.warn({ reason: computation.reason }, 'Metric skipped');
      return {
        status: 'skipped',
        outputName,
        reason: computation.reason,
        diagnostics: computation.diagnostics,
      };
    }

    const written = await deps.writer.write(computation.table);
    if (written.isErr()) return failed(written.error);

    log.info({ path: written.value, ...computation.diagnostics }, 'Metric written');
    return {
      status: 'succeeded',
      outputName,
      rows: computation.table.rows.length,
      path: written.value,
      diagnostics: computation.diagnostics,
    };
  } catch (error) {
    return failed(createUnexpectedError(errorMessage(error), error));
  }
};

/**
 * Runs the catalog.
 *
 * - Each source is loaded, reclassified and resolved against the
 *   concordance once, on first use
 * - A metric that fails or is skipped never stops the others
 * - Nothing is written for a metric unless all of its stages succeeded
 */
export const runMetricCatalog = async (
  deps: RunMetricCatalogDeps,
  input: RunMetricCatalogInput
): Promise<RunSummary> => {
  const { sourceRepo, logger } = deps;
  const { catalog, concordance, context } = input;
  const log = logger.child({ usecase: 'runMetricCatalog' });

  const { metrics, unknown } = selectMetrics(catalog, input.only);
  if (unknown.length > 0) {
    log.warn({ unknown }, 'Requested metrics are not in the catalog');
  }
  log.info({ metrics: metrics.length, catalogVersion: catalog.version }, 'Starting metric run');

  const prepared = new Map<string, Promise<Result<PreparedSource, SourceUnavailableError>>>();

  const load = async (sourceId: string): Promise<Result<PreparedSource, SourceUnavailableError>> => {
    const source = catalog.sources.get(sourceId);
    if (source === undefined) {
      return err(
        createSourceUnavailableError(sourceId, {
          type: 'NotFound',
          message: `Source '${sourceId}' is not declared in the catalog`,
          path: sourceId,
        })
      );
    }

    const table = await sourceRepo.load(source);
    if (table.isErr()) return err(createSourceUnavailableError(sourceId, table.error));

    const result = prepareSource(table.value, source, concordance);
    if (result.isErr()) return err(createSourceUnavailableError(sourceId, result.error));

    const sourceLog = log.child({ source: sourceId });
    if (result.value.unmappedLabels.length > 0) {
      sourceLog.warn(
        { unmappedLabels: result.value.unmappedLabels, stats: result.value.concordance },
        'MappingGap: labels resolved to Unknown'
      );
    }
    sourceLog.debug({ rows: result.value.table.rows.length }, 'Source prepared');
    return ok(result.value);
  };

  const loadSource = (sourceId: string): Promise<Result<PreparedSource, SourceUnavailableError>> => {
    let pending = prepared.get(sourceId);
    if (pending === undefined) {
      pending = load(sourceId);
      prepared.set(sourceId, pending);
    }
    return pending;
  };

  const results: MetricRunResult[] = [];
  for (const definition of metrics) {
    results.push(await runOne(definition, loadSource, deps, context));
  }

  const summary: RunSummary = {
    succeeded: results.filter((r) => r.status === 'succeeded').length,
    skipped: results.filter((r) => r.status === 'skipped').length,
    failed: results.filter((r) => r.status === 'failed').length,
    results,
  };

  log.info(
    { succeeded: summary.succeeded, skipped: summary.skipped, failed: summary.failed },
    'Metric run completed'
  );
  return summary;
};

/**
 * Plain-text report of a run, one line per metric.
 */
export const formatRunSummary = (summary: RunSummary): string => {
  const lines = [
    `Metrics: ${String(summary.succeeded)} succeeded, ${String(summary.skipped)} skipped, ${String(summary.failed)} failed`,
  ];
  for (const result of summary.results) {
    switch (result.status) {
      case 'succeeded':
        lines.push(`  ok       ${result.outputName} (${String(result.rows)} rows) -> ${result.path}`);
        break;
      case 'skipped':
        lines.push(`  skipped  ${result.outputName}: ${result.reason}`);
        break;
      case 'failed':
        lines.push(`  failed   ${result.outputName}: [${result.error.type}] ${result.error.message}`);
        break;
    }
  }
  return lines.join('\n');
};

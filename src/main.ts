/**
 * Metric run entry point
 * Computes every catalog metric and writes one CSV artifact per metric
 */

import { parseEnv, createConfig } from './infra/config/index.js';
import { createLogger } from './infra/logger/index.js';
import { createConcordanceRepo } from './modules/concordance/index.js';
import {
  createCatalogRepo,
  createCsvMetricWriter,
  createCsvSourceRepo,
  formatRunSummary,
  runMetricCatalog,
} from './modules/metric-catalog/index.js';

const main = async (): Promise<number> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    pretty: config.logger.pretty,
  });

  logger.info({ paths: config.paths, engine: config.engine }, 'Starting metric run');

  const concordance = await createConcordanceRepo({ filePath: config.paths.concordance }).load();
  if (concordance.isErr()) {
    logger.fatal({ error: concordance.error }, 'Failed to load concordance');
    return 1;
  }
  const { id, version, map } = concordance.value;
  logger.info({ id, version, labels: map.size }, 'Concordance loaded');

  const catalog = await createCatalogRepo({ filePath: config.paths.catalog }).load();
  if (catalog.isErr()) {
    logger.fatal({ error: catalog.error }, 'Failed to load metric catalog');
    return 1;
  }

  const summary = await runMetricCatalog(
    {
      sourceRepo: createCsvSourceRepo({ rootDir: config.paths.sourcesDir }),
      writer: createCsvMetricWriter({ outputDir: config.paths.outputDir }),
      logger,
    },
    {
      catalog: catalog.value,
      concordance: map,
      context: { tolerance: config.engine.tolerance },
      only: config.engine.onlyMetrics,
    }
  );

  console.log(formatRunSummary(summary));
  return summary.failed > 0 ? 1 : 0;
};

// Run (top-level await); the exit code reflects failed metrics
process.exitCode = await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  return 1;
});

import { parseEnv, createConfig } from '../src/infra/config/index.js';
import { createConcordanceRepo } from '../src/modules/concordance/index.js';
import { createCatalogRepo, type CatalogError } from '../src/modules/metric-catalog/index.js';

const formatError = (label: string, error: CatalogError): string => {
  const details = error.type === 'ValidationError' ? (error.details ?? []) : [];
  if (details.length > 0) {
    return `${label}: ${error.message}\n  - ${details.join('\n  - ')}`;
  }
  return `${label}: ${error.message}`;
};

const main = async (): Promise<void> => {
  const config = createConfig(parseEnv(process.env));
  const errors: string[] = [];

  const concordance = await createConcordanceRepo({ filePath: config.paths.concordance }).load();
  if (concordance.isErr()) {
    errors.push(formatError(config.paths.concordance, concordance.error));
  }

  const catalog = await createCatalogRepo({ filePath: config.paths.catalog }).load();
  if (catalog.isErr()) {
    errors.push(formatError(config.paths.catalog, catalog.error));
  }

  if (errors.length > 0) {
    console.error('Catalog validation failed:\n');
    for (const error of errors) {
      console.error(`- ${error}`);
    }
    process.exit(1);
  }

  if (concordance.isOk()) {
    const { id, version, regions, map } = concordance.value;
    console.log(
      `Concordance ${id}@${version}: ${String(regions.length)} region(s), ${String(map.size)} label(s).`
    );
  }
  if (catalog.isOk()) {
    const { version, sources, metrics } = catalog.value;
    console.log(
      `Catalog ${version}: ${String(sources.size)} source(s), ${String(metrics.length)} metric(s).`
    );
  }
};

await main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});

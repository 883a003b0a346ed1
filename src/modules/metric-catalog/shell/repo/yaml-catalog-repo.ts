import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { formatSchemaErrors } from '@/common/schemas/format-errors.js';
import { readYamlFile } from '@/infra/files/yaml.js';

import { createMetricCatalog } from '../../core/catalog.js';
import { CatalogFileSchema, type MetricCatalog } from '../../core/types.js';

import type { CatalogError } from '../../core/errors.js';
import type { CatalogRepo } from '../../core/ports.js';

const validator = TypeCompiler.Compile(CatalogFileSchema);

export interface CatalogRepoOptions {
  filePath: string;
}

export const createCatalogRepo = (options: CatalogRepoOptions): CatalogRepo => {
  let cached: MetricCatalog | null = null;

  return {
    async load(): Promise<Result<MetricCatalog, CatalogError>> {
      if (cached !== null) {
        return ok(cached);
      }

      const parsed = await readYamlFile(options.filePath, 'Metric catalog');
      if (parsed.isErr()) {
        return err(parsed.error);
      }

      if (!validator.Check(parsed.value)) {
        return err({
          type: 'ValidationError',
          message: `Schema validation failed for ${options.filePath}`,
          details: formatSchemaErrors(validator.Errors(parsed.value)),
        });
      }

      const catalog = createMetricCatalog(parsed.value);
      if (catalog.isErr()) {
        return err(catalog.error);
      }

      cached = catalog.value;
      return ok(cached);
    },
  };
};

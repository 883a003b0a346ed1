import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { formatSchemaErrors } from '@/common/schemas/format-errors.js';
import { readYamlFile } from '@/infra/files/yaml.js';

import { buildConcordance } from '../../core/build-concordance.js';
import { ConcordanceFileSchema, type Concordance } from '../../core/types.js';

import type { ConcordanceRepoError } from '../../core/errors.js';

const validator = TypeCompiler.Compile(ConcordanceFileSchema);

export interface ConcordanceRepoOptions {
  filePath: string;
}

export interface ConcordanceRepo {
  /**
   * Loads and validates the concordance. The file is read once; later calls
   * return the same immutable map.
   */
  load(): Promise<Result<Concordance, ConcordanceRepoError>>;
}

export const createConcordanceRepo = (options: ConcordanceRepoOptions): ConcordanceRepo => {
  let cached: Concordance | null = null;

  return {
    async load(): Promise<Result<Concordance, ConcordanceRepoError>> {
      if (cached !== null) {
        return ok(cached);
      }

      const parsed = await readYamlFile(options.filePath, 'Concordance');
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

      const built = buildConcordance(parsed.value);
      if (built.isErr()) {
        return err(built.error);
      }

      cached = built.value;
      return ok(cached);
    },
  };
};

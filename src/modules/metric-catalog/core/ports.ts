import type { CatalogError, OutputWriteError } from './errors.js';
import type { MetricCatalog, MetricTable, SourceDefinition } from './types.js';
import type {
  InfraError,
  InvalidNumericValueError,
  MissingColumnError,
} from '@/common/types/errors.js';
import type { DataTable } from '@/common/types/table.js';
import type { Result } from 'neverthrow';

export interface CatalogRepo {
  /**
   * Load and validate the catalog. Repeated calls return the same catalog.
   */
  load(): Promise<Result<MetricCatalog, CatalogError>>;
}

export type SourceLoadError = InfraError | MissingColumnError | InvalidNumericValueError;

export interface SourceRepo {
  /**
   * Read a declared source table with its header renames and numeric
   * columns applied. No reclassification or concordance happens here.
   */
  load(source: SourceDefinition): Promise<Result<DataTable, SourceLoadError>>;
}

export interface MetricWriter {
  /**
   * Persist one metric artifact. An existing artifact with the same output
   * name is replaced only when the whole write succeeds.
   * Returns the written path.
   */
  write(table: MetricTable): Promise<Result<string, OutputWriteError>>;
}

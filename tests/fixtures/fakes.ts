/**
 * Test fakes
 */

import { err, ok, type Result } from 'neverthrow';
import pinoLogger from 'pino';

import type { DataTable } from '@/common/types/table.js';
import type {
  MetricTable,
  MetricWriter,
  OutputWriteError,
  SourceDefinition,
  SourceLoadError,
  SourceRepo,
} from '@/modules/metric-catalog/index.js';
import type { Logger } from 'pino';

/**
 * Silent logger for tests
 */
export const makeTestLogger = (): Logger => pinoLogger({ level: 'silent' });

export interface FakeSourceRepo extends SourceRepo {
  /** Source ids in the order they were loaded */
  readonly loads: string[];
}

/**
 * In-memory source repo keyed by source id. Unknown ids are NotFound.
 */
export const makeFakeSourceRepo = (
  tables: Record<string, DataTable | SourceLoadError>
): FakeSourceRepo => {
  const loads: string[] = [];

  return {
    loads,
    async load(source: SourceDefinition): Promise<Result<DataTable, SourceLoadError>> {
      loads.push(source.id);
      const entry = tables[source.id];
      if (entry === undefined) {
        return err({
          type: 'NotFound',
          message: `Source file not found at ${source.file}`,
          path: source.file,
        });
      }
      return 'type' in entry ? err(entry) : ok(entry);
    },
  };
};

export interface FakeMetricWriter extends MetricWriter {
  /** Tables written, keyed by output name; a rewrite replaces the entry */
  readonly written: Map<string, MetricTable>;
  /** Output names in write order */
  readonly writeOrder: string[];
}

/**
 * In-memory writer. Output names listed in `failFor` return OutputWrite errors.
 */
export const makeFakeMetricWriter = (failFor: readonly string[] = []): FakeMetricWriter => {
  const written = new Map<string, MetricTable>();
  const writeOrder: string[] = [];

  return {
    written,
    writeOrder,
    async write(table: MetricTable): Promise<Result<string, OutputWriteError>> {
      const path = `memory://${table.outputName}.csv`;
      if (failFor.includes(table.outputName)) {
        return err({ type: 'OutputWrite', message: `Disk full writing ${path}`, path });
      }
      written.set(table.outputName, table);
      writeOrder.push(table.outputName);
      return ok(path);
    },
  };
};

/**
 * YAML file reader returning typed infrastructure errors.
 */

import { err, ok, type Result } from 'neverthrow';
import { parse as parseYaml } from 'yaml';

import { errorMessage, type InfraError } from '@/common/types/errors.js';

import { readTextFile } from './text.js';

/**
 * Reads and parses a YAML file. The parsed value is untyped; callers
 * validate it against their own schema.
 *
 * @param filePath - Absolute or cwd-relative path
 * @param label - Human name of the file used in messages (e.g. "Metric catalog")
 */
export const readYamlFile = async (
  filePath: string,
  label: string
): Promise<Result<unknown, InfraError>> => {
  const contents = await readTextFile(filePath, label);
  if (contents.isErr()) {
    return err(contents.error);
  }

  try {
    return ok(parseYaml(contents.value));
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse YAML at ${filePath}: ${errorMessage(error)}`,
      path: filePath,
      cause: error,
    });
  }
};

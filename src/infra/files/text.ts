/**
 * Text file access returning typed infrastructure errors.
 */

import fs from 'node:fs/promises';
import path from 'node:path';

import { err, ok, type Result } from 'neverthrow';

import { errorMessage, type InfraError } from '@/common/types/errors.js';

/**
 * Reads a UTF-8 file.
 *
 * @param label - Human name of the file used in messages (e.g. "Metric catalog")
 */
export const readTextFile = async (
  filePath: string,
  label: string
): Promise<Result<string, InfraError>> => {
  try {
    return ok(await fs.readFile(filePath, 'utf8'));
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') {
      return err({
        type: 'NotFound',
        message: `${label} file not found at ${filePath}`,
        path: filePath,
      });
    }

    return err({
      type: 'ReadError',
      message: `Failed to read ${label.toLowerCase()} file at ${filePath}: ${errorMessage(error)}`,
      path: filePath,
      cause: error,
    });
  }
};

/**
 * Replaces a file's contents in one step: the data goes to a temporary
 * sibling first and is renamed over the target once fully written.
 * Readers see either the old file or the new one.
 */
export const writeFileAtomic = async (
  filePath: string,
  contents: string
): Promise<Result<string, InfraError>> => {
  const tempPath = `${filePath}.${String(process.pid)}.tmp`;

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, contents, 'utf8');
    await fs.rename(tempPath, filePath);
    return ok(filePath);
  } catch (error) {
    const leftover = await fs.rm(tempPath, { force: true }).then(
      () => '',
      (rmError: unknown) => ` (temporary file ${tempPath} left behind: ${errorMessage(rmError)})`
    );
    return err({
      type: 'WriteError',
      message: `Failed to write ${filePath}: ${errorMessage(error)}${leftover}`,
      path: filePath,
      cause: error,
    });
  }
};

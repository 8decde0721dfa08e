import { promises as fsPromises } from 'node:fs';

import { BundleStageError, describeError } from '../errors.js';

/**
 * Removes `distDir` when present and recreates it empty. A missing
 * directory is not an error; every other failure propagates.
 */
export async function prepareDistDirectory(distDir: string): Promise<void> {
  try {
    await fsPromises.rm(distDir, { recursive: true, force: true });
  } catch (error) {
    throw new BundleStageError(
      `Failed to clear old dist directory (${distDir}): ${describeError(error)}`,
      'stage-output',
      distDir,
      { cause: error },
    );
  }

  try {
    await fsPromises.mkdir(distDir, { recursive: true });
  } catch (error) {
    throw new BundleStageError(
      `Failed to create the dist directory (${distDir}): ${describeError(error)}`,
      'stage-output',
      distDir,
      { cause: error },
    );
  }
}

import { promises as fsPromises } from 'node:fs';
import path from 'node:path';

import { BundleStageError, describeError, isNodeError } from '../errors.js';
import type { BundleStage } from '../types.js';

export const STATIC_DIRECTORY = 'static';

export interface CopyDirectoryInput {
  readonly stage: BundleStage;
  readonly label: string;
  readonly sourceDir: string;
  readonly destinationRoot: string;
}

/**
 * Copies `sourceDir` into `destinationRoot`, keeping its directory name, so
 * `<src>/static/logo.svg` lands at `<dist>/static/logo.svg`.
 *
 * @returns the destination directory, or `undefined` when the source is absent
 */
export async function copyDirectoryIfPresent(
  input: CopyDirectoryInput,
): Promise<string | undefined> {
  const { stage, label, sourceDir, destinationRoot } = input;
  if (!(await directoryExists(sourceDir))) {
    return undefined;
  }

  const destination = path.join(destinationRoot, path.basename(sourceDir));
  try {
    await fsPromises.cp(sourceDir, destination, {
      recursive: true,
      errorOnExist: false,
      force: true,
    });
  } catch (error) {
    throw new BundleStageError(
      `Failed to copy ${label} from ${sourceDir} to ${destinationRoot}: ${describeError(error)}`,
      stage,
      sourceDir,
      { cause: error },
    );
  }
  return destination;
}

export function bundleStaticAssets(
  srcDir: string,
  distDir: string,
): Promise<string | undefined> {
  return copyDirectoryIfPresent({
    stage: 'copy-static',
    label: 'static files',
    sourceDir: path.join(srcDir, STATIC_DIRECTORY),
    destinationRoot: distDir,
  });
}

/** `snippetsDir` is the `snippets/` directory wasm-pack writes next to `package.js`. */
export function bundleScriptSnippets(
  snippetsDir: string,
  distDir: string,
): Promise<string | undefined> {
  return copyDirectoryIfPresent({
    stage: 'copy-snippets',
    label: 'js snippets',
    sourceDir: snippetsDir,
    destinationRoot: distDir,
  });
}

async function directoryExists(targetPath: string): Promise<boolean> {
  try {
    const stats = await fsPromises.stat(targetPath);
    return stats.isDirectory();
  } catch (error) {
    if (isNodeError(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return false;
    }
    throw error;
  }
}

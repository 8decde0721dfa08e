import { promises as fsPromises } from 'node:fs';
import path from 'node:path';

import { BundleStageError, describeError } from '../errors.js';
import type { CompiledModuleArtifact } from '../types.js';

/** Shared by the module copy and the loader markup so both name the same file. */
export function versionedWasmFileName(wasmVersion: string): string {
  return `app-${wasmVersion}.wasm`;
}

/**
 * Copies the compiled module into `distDir` under its versioned name.
 *
 * @returns the versioned file name
 */
export async function bundleAppWasm(
  artifact: CompiledModuleArtifact,
  distDir: string,
  wasmVersion: string,
): Promise<string> {
  const fileName = versionedWasmFileName(wasmVersion);
  const destination = path.join(distDir, fileName);
  try {
    await fsPromises.copyFile(artifact.wasmPath, destination);
  } catch (error) {
    throw new BundleStageError(
      `Failed to copy application wasm from ${artifact.wasmPath} to ${destination}: ${describeError(error)}`,
      'place-wasm',
      artifact.wasmPath,
      { cause: error },
    );
  }
  return fileName;
}

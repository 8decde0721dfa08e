import { promises as fs } from 'node:fs';
import path from 'node:path';

import JSON5 from 'json5';

import { BundleConfigError } from '@wasm-spa/bundler';

import type { ConfigValues } from './cli-utils.js';

const DIRECTORY_KEYS = ['srcDir', 'distDir', 'tmpDir', 'workspaceRoot'] as const;

/**
 * Reads a JSON or JSON5 build config. Directory fields are resolved against
 * the file's own directory; `stylesheet.path` stays relative to `srcDir`.
 */
export async function loadConfigFile(configPath: string): Promise<ConfigValues> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new BundleConfigError(`Failed to read config file ${configPath}: ${message}`, [
      message,
    ]);
  }

  let parsed: unknown;
  try {
    parsed = JSON5.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new BundleConfigError(`Failed to parse config file ${configPath}: ${message}`, [
      message,
    ]);
  }

  if (!isRecord(parsed)) {
    throw new BundleConfigError(`Config file ${configPath} must contain an object.`, [
      '(root): Expected an object.',
    ]);
  }

  return resolveConfigPaths(parsed, path.dirname(configPath));
}

export function resolveConfigPaths(values: ConfigValues, baseDirectory: string): ConfigValues {
  const resolved: ConfigValues = { ...values };

  for (const key of DIRECTORY_KEYS) {
    const value = resolved[key];
    if (typeof value === 'string' && value.trim().length > 0) {
      resolved[key] = path.resolve(baseDirectory, value);
    }
  }

  const watchDirs = resolved.additionalWatchDirs;
  if (Array.isArray(watchDirs)) {
    resolved.additionalWatchDirs = watchDirs.map((entry: unknown) =>
      typeof entry === 'string' && entry.trim().length > 0
        ? path.resolve(baseDirectory, entry)
        : entry,
    );
  }

  return resolved;
}

function isRecord(value: unknown): value is ConfigValues {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

import {
  BundleConfigError,
  createLogger,
  parseBuildConfig,
  runBundle,
} from '@wasm-spa/bundler';
import type { BuildConfig } from '@wasm-spa/bundler';

import type { CliOptions, ConfigValues } from './cli-utils.js';
import { USAGE, formatFailure, mergeConfigValues, parseArgs, resolveCliPath } from './cli-utils.js';
import { loadConfigFile } from './config-file.js';

export interface RunDependencies {
  runBundle: typeof runBundle;
  loadConfigFile: typeof loadConfigFile;
  createLogger: typeof createLogger;
  cwd: () => string;
  log: (message: string) => void;
  error: (message: string) => void;
}

/**
 * Parses the command line, bundles the application and resolves to the exit
 * code: 0 on success, 1 on invalid arguments or a failed build.
 */
export async function run(
  argv: readonly string[] = process.argv.slice(2),
  dependencies: Partial<RunDependencies> = {},
): Promise<number> {
  const deps: RunDependencies = {
    runBundle,
    loadConfigFile,
    createLogger,
    cwd: () => process.cwd(),
    log: (message) => console.log(message),
    error: (message) => console.error(message),
    ...dependencies,
  };
  const cwd = deps.cwd();

  let options: CliOptions;
  try {
    options = parseArgs(argv, (value) => resolveCliPath(value, cwd));
  } catch (error) {
    deps.error(error instanceof Error ? error.message : String(error));
    deps.log(USAGE);
    return 1;
  }

  if (options.help) {
    deps.log(USAGE);
    return 0;
  }

  let config: BuildConfig;
  try {
    const fileValues: ConfigValues =
      options.config !== undefined ? await deps.loadConfigFile(options.config) : {};
    config = parseBuildConfig(mergeConfigValues(fileValues, options), { cwd });
  } catch (error) {
    if (error instanceof BundleConfigError) {
      deps.error(error.message);
      deps.log(USAGE);
      return 1;
    }
    throw error;
  }

  const logger = deps.createLogger({ pretty: options.pretty });
  try {
    await deps.runBundle(config, {
      logger,
      toolchain: options.maxRetries !== undefined ? { maxRetries: options.maxRetries } : {},
    });
    return 0;
  } catch (error) {
    deps.error(formatFailure(error));
    return 1;
  }
}

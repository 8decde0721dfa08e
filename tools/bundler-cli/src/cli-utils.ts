import path from 'node:path';

// ============================================================================
// Types
// ============================================================================

export interface CliOptions {
  config: string | undefined;
  src: string | undefined;
  dist: string | undefined;
  tmp: string | undefined;
  outDir: string | undefined;
  baseUrl: string | undefined;
  wasmVersion: string | undefined;
  workspaceRoot: string | undefined;
  watchDirs: string[];
  release: boolean | undefined;
  maxRetries: number | undefined;
  pretty: boolean;
  help: boolean;
}

export interface ParsedValueArg {
  value: string;
  skip: number;
}

export type ConfigValues = Record<string, unknown>;

// ============================================================================
// Constants
// ============================================================================

export const OUT_DIR_DIST_SUBDIRECTORY = 'ui';
export const OUT_DIR_TMP_SUBDIRECTORY = 'tmp';

const PATH_FLAGS = {
  '--src': 'src',
  '--dist': 'dist',
  '--tmp': 'tmp',
  '--out-dir': 'outDir',
  '--workspace-root': 'workspaceRoot',
  '--config': 'config',
} as const satisfies Record<string, keyof CliOptions>;

const STRING_FLAGS = {
  '--base-url': 'baseUrl',
  '--wasm-version': 'wasmVersion',
} as const satisfies Record<string, keyof CliOptions>;

export const USAGE = [
  'Usage: wasm-spa-bundle [options]',
  '',
  'Options:',
  '  --config <file>          Read build settings from a JSON or JSON5 file.',
  '  --src <dir>              Web application crate containing index.html.',
  '  --dist <dir>             Output directory (cleared on every run).',
  '  --tmp <dir>              Scratch directory for wasm-pack output.',
  '  --out-dir <dir>          Shorthand for --dist <dir>/ui --tmp <dir>/tmp.',
  '  --base-url <url>         Value of base_url in the template (default "/").',
  '  --wasm-version <version> Version embedded in app-<version>.wasm.',
  '  --workspace-root <dir>   Where web-target/ is placed (default: cwd).',
  '  --watch-dir <dir>        Extra directory to declare for rebuilds (repeatable).',
  '  --release | --dev        Select the wasm-pack profile (default --dev).',
  '  --max-retries <n>        Retries after cache contention failures (default 3).',
  '  --pretty                 Pretty-print JSON log events.',
  '  -h, --help               Show this help text.',
].join('\n');

// ============================================================================
// Pure Helper Functions
// ============================================================================

export function parseValueArg(
  arg: string,
  argv: readonly string[],
  index: number,
  flagName: string,
): ParsedValueArg {
  if (arg.startsWith(`${flagName}=`)) {
    return { value: arg.slice(flagName.length + 1), skip: 0 };
  }
  const nextValue = argv[index + 1];
  if (!nextValue) {
    throw new Error(`Missing value for ${flagName}`);
  }
  return { value: nextValue, skip: 1 };
}

function matchFlag<T extends string>(arg: string, flags: readonly T[]): T | undefined {
  return flags.find((flag) => arg === flag || arg.startsWith(`${flag}=`));
}

function keysOf<T extends object>(value: T): Array<keyof T & string> {
  return Object.keys(value).filter((key): key is keyof T & string => key in value);
}

export function parseArgs(
  argv: readonly string[],
  resolvePath: (value: string) => string,
): CliOptions {
  const options: CliOptions = {
    config: undefined,
    src: undefined,
    dist: undefined,
    tmp: undefined,
    outDir: undefined,
    baseUrl: undefined,
    wasmVersion: undefined,
    workspaceRoot: undefined,
    watchDirs: [],
    release: undefined,
    maxRetries: undefined,
    pretty: false,
    help: false,
  };

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];

    if (arg === '--release') {
      options.release = true;
      continue;
    }
    if (arg === '--dev') {
      options.release = false;
      continue;
    }
    if (arg === '--pretty') {
      options.pretty = true;
      continue;
    }
    if (arg === '--help' || arg === '-h') {
      options.help = true;
      continue;
    }

    const pathFlag = matchFlag(arg, keysOf(PATH_FLAGS));
    if (pathFlag !== undefined) {
      const parsed = parseValueArg(arg, argv, index, pathFlag);
      options[PATH_FLAGS[pathFlag]] = resolvePath(parsed.value);
      index += parsed.skip;
      continue;
    }

    const stringFlag = matchFlag(arg, keysOf(STRING_FLAGS));
    if (stringFlag !== undefined) {
      const parsed = parseValueArg(arg, argv, index, stringFlag);
      options[STRING_FLAGS[stringFlag]] = parsed.value;
      index += parsed.skip;
      continue;
    }

    if (arg === '--watch-dir' || arg.startsWith('--watch-dir=')) {
      const parsed = parseValueArg(arg, argv, index, '--watch-dir');
      options.watchDirs.push(resolvePath(parsed.value));
      index += parsed.skip;
      continue;
    }

    if (arg === '--max-retries' || arg.startsWith('--max-retries=')) {
      const parsed = parseValueArg(arg, argv, index, '--max-retries');
      options.maxRetries = parseRetryCount(parsed.value);
      index += parsed.skip;
      continue;
    }

    throw new Error(`Unknown option: ${arg}`);
  }

  return options;
}

export function parseRetryCount(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new Error(`--max-retries expects a non-negative integer (received "${value}").`);
  }
  return Number.parseInt(value, 10);
}

/**
 * Layers command line flags over config file values. Flag paths are already
 * absolute; `--out-dir` only fills `distDir` and `tmpDir` when no explicit
 * flag sets them.
 */
export function mergeConfigValues(
  fileValues: ConfigValues,
  options: CliOptions,
): ConfigValues {
  const merged: ConfigValues = { ...fileValues };

  if (options.outDir !== undefined) {
    merged.distDir = path.join(options.outDir, OUT_DIR_DIST_SUBDIRECTORY);
    merged.tmpDir = path.join(options.outDir, OUT_DIR_TMP_SUBDIRECTORY);
  }

  assignIfDefined(merged, 'srcDir', options.src);
  assignIfDefined(merged, 'distDir', options.dist);
  assignIfDefined(merged, 'tmpDir', options.tmp);
  assignIfDefined(merged, 'baseUrl', options.baseUrl);
  assignIfDefined(merged, 'wasmVersion', options.wasmVersion);
  assignIfDefined(merged, 'workspaceRoot', options.workspaceRoot);
  assignIfDefined(merged, 'release', options.release);
  if (options.watchDirs.length > 0) {
    merged.additionalWatchDirs = [...options.watchDirs];
  }

  return merged;
}

function assignIfDefined(target: ConfigValues, key: string, value: unknown): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

export function resolveCliPath(inputPath: string, cwd: string = process.cwd()): string {
  return path.isAbsolute(inputPath) ? inputPath : path.resolve(cwd, inputPath);
}

export function formatFailure(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return `Failed to build frontend. Error: ${message}`;
}

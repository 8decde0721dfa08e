import { performance } from 'node:perf_hooks';

import { bundleAppWasm } from './artifacts/wasm.js';
import { bundleIndexHtml } from './artifacts/entry-document.js';
import { BundleStageError, ToolchainError } from './errors.js';
import { bundleScriptSnippets, bundleStaticAssets } from './fs/copy.js';
import { prepareDistDirectory } from './fs/stage.js';
import type { DirectiveSink } from './fs/watch-list.js';
import { declareWatchedEntries, stdoutDirectiveSink } from './fs/watch-list.js';
import type { Logger } from './logging.js';
import { silentLogger } from './logging.js';
import type { RunToolchainOptions } from './toolchain/invoker.js';
import { runToolchain } from './toolchain/invoker.js';
import type { BuildConfig, BundleReport, BundleStage } from './types.js';

export interface BundleDependencies {
  readonly declareWatchedEntries: typeof declareWatchedEntries;
  readonly runToolchain: typeof runToolchain;
  readonly prepareDistDirectory: typeof prepareDistDirectory;
  readonly bundleStaticAssets: typeof bundleStaticAssets;
  readonly bundleScriptSnippets: typeof bundleScriptSnippets;
  readonly bundleIndexHtml: typeof bundleIndexHtml;
  readonly bundleAppWasm: typeof bundleAppWasm;
  readonly now: () => Date;
}

export interface RunBundleOptions {
  readonly logger?: Logger;
  readonly directiveSink?: DirectiveSink;
  readonly toolchain?: Omit<RunToolchainOptions, 'logger' | 'now'>;
  readonly dependencies?: Partial<BundleDependencies>;
}

/**
 * Bundles a single-page WebAssembly application for publishing.
 *
 * - Every file under `srcDir` and `additionalWatchDirs` is declared to the
 *   host build system before anything else runs.
 * - wasm-pack builds the crate into `tmpDir`.
 * - `distDir` is cleared, then receives `static/`, the wasm-pack
 *   `snippets/`, a rendered `index.html` and `app-<wasmVersion>.wasm`.
 *
 * Stages run strictly in that order. The first failure is logged as
 * `bundle.failed` and rethrown; `distDir` is not rolled back.
 */
export async function runBundle(
  config: BuildConfig,
  options: RunBundleOptions = {},
): Promise<BundleReport> {
  const deps: BundleDependencies = {
    declareWatchedEntries,
    runToolchain,
    prepareDistDirectory,
    bundleStaticAssets,
    bundleScriptSnippets,
    bundleIndexHtml,
    bundleAppWasm,
    now: () => new Date(),
    ...options.dependencies,
  };
  const logger = options.logger ?? silentLogger;
  const start = performance.now();
  let currentStage: BundleStage = 'watch-list';

  const runStage = async <T>(stage: BundleStage, action: () => Promise<T>): Promise<T> => {
    currentStage = stage;
    const stageStart = performance.now();
    const result = await action();
    logger({
      name: 'bundle.stage_completed',
      timestamp: deps.now().toISOString(),
      stage,
      durationMs: performance.now() - stageStart,
    });
    return result;
  };

  logger({
    name: 'bundle.started',
    timestamp: deps.now().toISOString(),
    srcDir: config.srcDir,
    distDir: config.distDir,
    wasmVersion: config.wasmVersion,
    release: config.release,
  });

  try {
    const watchDirectives = await runStage('watch-list', () =>
      deps.declareWatchedEntries(
        [config.srcDir, ...config.additionalWatchDirs],
        options.directiveSink ?? stdoutDirectiveSink,
      ),
    );

    const toolchainResult = await runStage('toolchain', () =>
      deps.runToolchain(config, {
        ...options.toolchain,
        logger,
        now: deps.now,
      }),
    );
    const { artifact } = toolchainResult;

    await runStage('stage-output', () => deps.prepareDistDirectory(config.distDir));

    const copiedDirectories: string[] = [];
    const staticDir = await runStage('copy-static', () =>
      deps.bundleStaticAssets(config.srcDir, config.distDir),
    );
    if (staticDir !== undefined) {
      copiedDirectories.push(staticDir);
    }
    const snippetsDir = await runStage('copy-snippets', () =>
      deps.bundleScriptSnippets(artifact.snippetsDir, config.distDir),
    );
    if (snippetsDir !== undefined) {
      copiedDirectories.push(snippetsDir);
    }

    const indexHtmlPath = await runStage('entry-document', () =>
      deps.bundleIndexHtml(config, artifact),
    );
    const wasmFileName = await runStage('place-wasm', () =>
      deps.bundleAppWasm(artifact, config.distDir, config.wasmVersion),
    );

    const durationMs = performance.now() - start;
    logger({
      name: 'bundle.completed',
      timestamp: deps.now().toISOString(),
      distDir: config.distDir,
      wasmFileName,
      durationMs,
    });

    return {
      distDir: config.distDir,
      indexHtmlPath,
      wasmFileName,
      copiedDirectories,
      toolchainAttempts: toolchainResult.attempts,
      watchDirectives,
      durationMs,
    };
  } catch (error) {
    logger({
      name: 'bundle.failed',
      timestamp: deps.now().toISOString(),
      stage: resolveFailedStage(error, currentStage),
      message: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
      durationMs: performance.now() - start,
    });
    throw error;
  }
}

function resolveFailedStage(error: unknown, fallback: BundleStage): BundleStage {
  if (error instanceof BundleStageError) {
    return error.stage;
  }
  if (error instanceof ToolchainError) {
    return 'toolchain';
  }
  return fallback;
}

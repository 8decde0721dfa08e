export { runBundle } from './pipeline.js';
export type { BundleDependencies, RunBundleOptions } from './pipeline.js';
export { buildConfigSchema, parseBuildConfig, DEFAULT_STYLESHEET_PATH } from './config.js';
export type { BuildConfigInput, ParseBuildConfigOptions } from './config.js';
export { createLogger, formatLogEvent, silentLogger } from './logging.js';
export type { Logger, LoggerOptions } from './logging.js';
export {
  declareWatchedEntries,
  formatRerunDirective,
  stdoutDirectiveSink,
} from './fs/watch-list.js';
export type { DirectiveSink } from './fs/watch-list.js';
export { prepareDistDirectory } from './fs/stage.js';
export { bundleScriptSnippets, bundleStaticAssets, copyDirectoryIfPresent } from './fs/copy.js';
export {
  DEFAULT_MAX_RETRIES,
  createToolchainInvocation,
  resolveCompiledModuleArtifact,
  runToolchain,
} from './toolchain/invoker.js';
export type {
  RunToolchainOptions,
  ToolchainInvocation,
  ToolchainRunResult,
} from './toolchain/invoker.js';
export { classifyToolchainFailure, CACHE_CONTENTION_SIGNATURES } from './toolchain/classify.js';
export type { ToolchainFailureKind } from './toolchain/classify.js';
export { computeRetryDelay } from './toolchain/backoff.js';
export { spawnProcess } from './toolchain/spawn.js';
export type { SpawnProcessFn, SpawnProcessOptions, SpawnProcessResult } from './toolchain/spawn.js';
export {
  bundleIndexHtml,
  createLoaderMarkup,
  renderEntryDocument,
} from './artifacts/entry-document.js';
export { compileStylesheet, createStyleBlock } from './artifacts/stylesheet.js';
export { bundleAppWasm, versionedWasmFileName } from './artifacts/wasm.js';
export {
  BundleConfigError,
  BundleStageError,
  StylesheetCompileError,
  TemplateRenderError,
  ToolchainError,
} from './errors.js';
export type {
  BuildConfig,
  BundleLogEvent,
  BundleReport,
  BundleStage,
  CompiledModuleArtifact,
  RenderContext,
  StylesheetOptions,
  StylesheetSyntax,
} from './types.js';

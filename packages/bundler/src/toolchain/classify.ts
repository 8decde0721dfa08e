export type ToolchainFailureKind = 'transient' | 'fatal';

/**
 * stderr fragments wasm-pack prints when two invocations collide on its
 * global cache: one finds a cache directory already populated, the other
 * reads a cached binary that was removed underneath it.
 */
export const CACHE_CONTENTION_SIGNATURES: readonly string[] = [
  'Error: Directory not empty',
  'binary does not exist',
];

/**
 * Classifies a failed toolchain run from its stderr.
 *
 * This matches human-readable diagnostics and breaks if wasm-pack rewords
 * them. Keep every textual check here so it can be replaced by a structured
 * signal if the toolchain ever exposes one.
 */
export function classifyToolchainFailure(stderr: string): ToolchainFailureKind {
  return CACHE_CONTENTION_SIGNATURES.some((signature) => stderr.includes(signature))
    ? 'transient'
    : 'fatal';
}

import path from 'node:path';
import { performance } from 'node:perf_hooks';
import { setTimeout as delay } from 'node:timers/promises';

import { ToolchainError, describeError } from '../errors.js';
import type { Logger } from '../logging.js';
import { silentLogger } from '../logging.js';
import type { BuildConfig, CompiledModuleArtifact } from '../types.js';
import { computeRetryDelay } from './backoff.js';
import { classifyToolchainFailure } from './classify.js';
import type { SpawnProcessFn, SpawnProcessResult } from './spawn.js';
import { spawnProcess as defaultSpawnProcess } from './spawn.js';

export const TOOLCHAIN_COMMAND = 'wasm-pack';
export const TOOLCHAIN_OUT_NAME = 'package';
export const TARGET_DIRECTORY_NAME = 'web-target';
export const DEFAULT_MAX_RETRIES = 3;

export interface ToolchainInvocation {
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd: string;
  readonly env: NodeJS.ProcessEnv;
}

export interface RunToolchainOptions {
  /** Retries after the first attempt, so at most `maxRetries + 1` runs. */
  readonly maxRetries?: number;
  readonly logger?: Logger;
  readonly now?: () => Date;
  readonly spawnProcess?: SpawnProcessFn;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly random?: () => number;
  /** Base environment for the subprocess. Defaults to `process.env`. */
  readonly env?: NodeJS.ProcessEnv;
}

export interface ToolchainRunResult {
  readonly attempts: number;
  readonly artifact: CompiledModuleArtifact;
  readonly durationMs: number;
}

export function createToolchainInvocation(
  config: BuildConfig,
  baseEnv: NodeJS.ProcessEnv = process.env,
): ToolchainInvocation {
  return {
    command: TOOLCHAIN_COMMAND,
    args: [
      'build',
      '--target',
      'web',
      config.release ? '--release' : '--dev',
      '--no-typescript',
      '--out-name',
      TOOLCHAIN_OUT_NAME,
      '--out-dir',
      config.tmpDir,
    ],
    cwd: config.srcDir,
    env: {
      ...baseEnv,
      CARGO_TARGET_DIR: path.join(config.workspaceRoot, TARGET_DIRECTORY_NAME),
    },
  };
}

export function resolveCompiledModuleArtifact(tmpDir: string): CompiledModuleArtifact {
  return {
    wasmPath: path.join(tmpDir, `${TOOLCHAIN_OUT_NAME}_bg.wasm`),
    bootstrapScriptPath: path.join(tmpDir, `${TOOLCHAIN_OUT_NAME}.js`),
    snippetsDir: path.join(tmpDir, 'snippets'),
  };
}

/**
 * Builds the web application crate with wasm-pack, retrying runs that failed
 * on shared-cache contention after a random wait.
 */
export async function runToolchain(
  config: BuildConfig,
  options: RunToolchainOptions = {},
): Promise<ToolchainRunResult> {
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  if (!Number.isInteger(maxRetries) || maxRetries < 0) {
    throw new RangeError(`maxRetries must be a non-negative integer (received ${maxRetries}).`);
  }

  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date());
  const spawnProcess = options.spawnProcess ?? defaultSpawnProcess;
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  const invocation = createToolchainInvocation(config, options.env);
  const start = performance.now();

  for (let attempt = 1; ; attempt += 1) {
    let result: SpawnProcessResult;
    try {
      result = await spawnProcess(invocation.command, invocation.args, {
        cwd: invocation.cwd,
        env: invocation.env,
      });
    } catch (error) {
      throw new ToolchainError(
        `Failed to run ${TOOLCHAIN_COMMAND}: ${describeError(error)}`,
        { exitCode: null, stdout: '', stderr: '', attempts: attempt, transient: false },
        { cause: error },
      );
    }

    if (result.code === 0) {
      const durationMs = performance.now() - start;
      logger({
        name: 'toolchain.completed',
        timestamp: now().toISOString(),
        attempts: attempt,
        durationMs,
      });
      return {
        attempts: attempt,
        artifact: resolveCompiledModuleArtifact(config.tmpDir),
        durationMs,
      };
    }

    const transient = classifyToolchainFailure(result.stderr) === 'transient';
    const retriesUsed = attempt - 1;
    if (transient && retriesUsed < maxRetries) {
      const waitMs = computeRetryDelay(options.random);
      logger({
        name: 'toolchain.retry_scheduled',
        timestamp: now().toISOString(),
        attempt,
        maxRetries,
        waitMs,
      });
      await sleep(waitMs);
      continue;
    }

    throw new ToolchainError(formatFailureMessage(result, attempt, transient), {
      exitCode: result.code,
      stdout: result.stdout,
      stderr: result.stderr,
      attempts: attempt,
      transient,
    });
  }
}

function formatFailureMessage(
  result: SpawnProcessResult,
  attempts: number,
  transient: boolean,
): string {
  const headline = transient
    ? `${TOOLCHAIN_COMMAND} failed to build the package; cache contention persisted after ${attempts} attempts.`
    : `${TOOLCHAIN_COMMAND} failed to build the package.`;
  return [headline, 'stdout:', result.stdout, 'stderr:', result.stderr].join('\n');
}

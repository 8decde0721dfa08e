import path from 'node:path';

import { describe, expect, it, vi } from 'vitest';

import { ToolchainError } from '@wasm-spa/bundler';
import type { BundleReport } from '@wasm-spa/bundler';

import { run } from './bundle.js';
import type { RunDependencies } from './bundle.js';
import { USAGE } from './cli-utils.js';

const CWD = path.resolve('/repo/backend');

const REPORT: BundleReport = {
  distDir: '/repo/backend/out/ui',
  indexHtmlPath: '/repo/backend/out/ui/index.html',
  wasmFileName: 'app-0.1.0.wasm',
  copiedDirectories: [],
  toolchainAttempts: 1,
  watchDirectives: 3,
  durationMs: 12,
};

function createDependencies(overrides: Partial<RunDependencies> = {}) {
  const log = vi.fn();
  const error = vi.fn();
  const runBundle = vi.fn().mockResolvedValue(REPORT);
  const logger = vi.fn();
  const createLogger = vi.fn().mockReturnValue(logger);
  const dependencies: Partial<RunDependencies> = {
    runBundle,
    createLogger,
    cwd: () => CWD,
    log,
    error,
    ...overrides,
  };
  return { dependencies, log, error, runBundle, createLogger, logger };
}

describe('run', () => {
  it('bundles with a config assembled from flags', async () => {
    const { dependencies, runBundle, logger, createLogger } = createDependencies();

    const exitCode = await run(
      [
        '--src',
        '../frontend',
        '--out-dir',
        'target/out',
        '--wasm-version',
        '0.1.0',
        '--release',
        '--max-retries',
        '1',
      ],
      dependencies,
    );

    expect(exitCode).toBe(0);
    expect(createLogger).toHaveBeenCalledWith({ pretty: false });
    expect(runBundle).toHaveBeenCalledTimes(1);
    expect(runBundle).toHaveBeenCalledWith(
      {
        srcDir: path.resolve('/repo/frontend'),
        distDir: path.resolve('/repo/backend/target/out/ui'),
        tmpDir: path.resolve('/repo/backend/target/out/tmp'),
        wasmVersion: '0.1.0',
        release: true,
        workspaceRoot: CWD,
        additionalWatchDirs: [],
        stylesheet: {
          path: path.resolve('/repo/frontend/css/style.scss'),
          syntax: 'indented',
        },
      },
      { logger, toolchain: { maxRetries: 1 } },
    );
  });

  it('merges values from a config file', async () => {
    const loadConfigFile = vi.fn().mockResolvedValue({
      srcDir: '/repo/frontend',
      distDir: '/repo/dist',
      tmpDir: '/repo/tmp',
      wasmVersion: '0.0.9',
      baseUrl: '/shop/',
    });
    const { dependencies, runBundle } = createDependencies({ loadConfigFile });

    const exitCode = await run(['--config', 'bundler.json5', '--wasm-version', '1.0.0'], dependencies);

    expect(exitCode).toBe(0);
    expect(loadConfigFile).toHaveBeenCalledWith(path.resolve('/repo/backend/bundler.json5'));
    expect(runBundle).toHaveBeenCalledWith(
      expect.objectContaining({ wasmVersion: '1.0.0', baseUrl: '/shop/' }),
      expect.anything(),
    );
  });

  it('prints usage and exits 1 for unknown options', async () => {
    const { dependencies, error, log, runBundle } = createDependencies();

    const exitCode = await run(['--unknown'], dependencies);

    expect(exitCode).toBe(1);
    expect(error).toHaveBeenCalledWith('Unknown option: --unknown');
    expect(log).toHaveBeenCalledWith(USAGE);
    expect(runBundle).not.toHaveBeenCalled();
  });

  it('prints usage and exits 0 for --help', async () => {
    const { dependencies, log, runBundle } = createDependencies();

    await expect(run(['--help'], dependencies)).resolves.toBe(0);
    expect(log).toHaveBeenCalledWith(USAGE);
    expect(runBundle).not.toHaveBeenCalled();
  });

  it('exits 1 when the configuration is incomplete', async () => {
    const { dependencies, error, runBundle } = createDependencies();

    const exitCode = await run(['--src', 'frontend'], dependencies);

    expect(exitCode).toBe(1);
    expect(error).toHaveBeenCalledWith(expect.stringContaining('distDir: Required'));
    expect(runBundle).not.toHaveBeenCalled();
  });

  it('reports build failures and exits 1', async () => {
    const failure = new ToolchainError('wasm-pack failed to build the package.', {
      exitCode: 101,
      stdout: '',
      stderr: 'error: could not compile',
      attempts: 1,
      transient: false,
    });
    const runBundle = vi.fn().mockRejectedValue(failure);
    const { dependencies, error } = createDependencies({ runBundle });

    const exitCode = await run(
      ['--src', 'frontend', '--out-dir', 'out', '--wasm-version', '0.1.0'],
      dependencies,
    );

    expect(exitCode).toBe(1);
    expect(error).toHaveBeenCalledWith(
      'Failed to build frontend. Error: wasm-pack failed to build the package.',
    );
  });
});

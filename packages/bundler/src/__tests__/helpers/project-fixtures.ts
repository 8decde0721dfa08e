import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { parseBuildConfig } from '../../config.js';
import type { SpawnProcessFn, SpawnProcessResult } from '../../toolchain/spawn.js';
import type { BuildConfig } from '../../types.js';

const TMP_PREFIX = 'wasm-spa-bundler-';

export const ENTRY_TEMPLATE = [
  '<!DOCTYPE html>',
  '<html lang="en">',
  '  <head>',
  '    <base href="{{ base_url }}">',
  '    {{ stylesheet | safe }}',
  '  </head>',
  '  <body>',
  '    {{ javascript | safe }}',
  '  </body>',
  '</html>',
  '',
].join('\n');

export const INDENTED_STYLESHEET = ['$gap: 4px', 'body', '  margin: 0', '  padding: $gap', ''].join(
  '\n',
);
export const COMPILED_STYLESHEET = 'body{margin:0;padding:4px}';

export const BOOTSTRAP_SCRIPT = 'export default function init(input) { return input; }';
export const WASM_BYTES = Uint8Array.from([0x00, 0x61, 0x73, 0x6d, 0x01, 0x00, 0x00, 0x00]);

export const CACHE_CONTENTION_STDERR =
  'Error: Directory not empty (os error 39)\nCaused by: failed to install wasm-bindgen';

export interface ProjectFixture {
  readonly rootDirectory: string;
  readonly srcDir: string;
  readonly outDir: string;
  readonly config: BuildConfig;
  writeSource(relativePath: string, content: string | Uint8Array): Promise<void>;
}

export interface CreateProjectOptions {
  readonly wasmVersion?: string;
  readonly baseUrl?: string;
  readonly release?: boolean;
  readonly template?: string;
  readonly stylesheet?: string;
}

export async function createProject(options: CreateProjectOptions = {}): Promise<ProjectFixture> {
  const rootDirectory = await fs.mkdtemp(path.join(os.tmpdir(), TMP_PREFIX));
  const srcDir = path.join(rootDirectory, 'frontend');
  const outDir = path.join(rootDirectory, 'out');

  const writeSource = async (relativePath: string, content: string | Uint8Array) => {
    const target = path.join(srcDir, relativePath);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
  };

  await writeSource('index.html', options.template ?? ENTRY_TEMPLATE);
  await writeSource('css/style.scss', options.stylesheet ?? INDENTED_STYLESHEET);
  await writeSource('src/lib.rs', 'pub fn start() {}\n');

  const config = parseBuildConfig({
    srcDir,
    distDir: path.join(outDir, 'ui'),
    tmpDir: path.join(outDir, 'tmp'),
    wasmVersion: options.wasmVersion ?? '1.2.3',
    release: options.release ?? false,
    workspaceRoot: rootDirectory,
    ...(options.baseUrl !== undefined ? { baseUrl: options.baseUrl } : {}),
  });

  return { rootDirectory, srcDir, outDir, config, writeSource };
}

export const SUCCESS_RESULT: SpawnProcessResult = {
  code: 0,
  stdout: '[INFO]: :-) Done in 1.00s',
  stderr: '',
};

export const TRANSIENT_FAILURE: SpawnProcessResult = {
  code: 1,
  stdout: '[INFO]: Installing wasm-bindgen...',
  stderr: CACHE_CONTENTION_STDERR,
};

export interface FakeToolchainOptions {
  /** Results returned per attempt; attempts past the end succeed. */
  readonly outcomes?: readonly SpawnProcessResult[];
  readonly emitBootstrapScript?: boolean;
  readonly snippets?: Readonly<Record<string, string>>;
}

/**
 * Stands in for wasm-pack: on a successful attempt it writes `package.js`,
 * `package_bg.wasm` and any snippets to the `--out-dir` argument.
 */
export function createFakeToolchain(options: FakeToolchainOptions = {}): SpawnProcessFn {
  let attempt = 0;

  return async (_command, args) => {
    const outcome = options.outcomes?.[attempt] ?? SUCCESS_RESULT;
    attempt += 1;
    if (outcome.code !== 0) {
      return outcome;
    }

    const outDir = args[args.indexOf('--out-dir') + 1];
    if (outDir === undefined) {
      throw new Error('Fake toolchain expected an --out-dir argument.');
    }
    await fs.mkdir(outDir, { recursive: true });
    if (options.emitBootstrapScript !== false) {
      await fs.writeFile(path.join(outDir, 'package.js'), BOOTSTRAP_SCRIPT, 'utf8');
    }
    await fs.writeFile(path.join(outDir, 'package_bg.wasm'), WASM_BYTES);
    for (const [relativePath, content] of Object.entries(options.snippets ?? {})) {
      const target = path.join(outDir, 'snippets', relativePath);
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, content, 'utf8');
    }
    return outcome;
  };
}

export async function listFiles(rootDirectory: string): Promise<string[]> {
  const files: string[] = [];
  const pending: string[] = [rootDirectory];

  while (pending.length > 0) {
    const currentDir = pending.pop();
    if (currentDir === undefined) {
      continue;
    }
    const entries = await fs.readdir(currentDir, { withFileTypes: true });
    for (const entry of entries) {
      const entryPath = path.join(currentDir, entry.name);
      if (entry.isDirectory()) {
        pending.push(entryPath);
        continue;
      }
      files.push(path.relative(rootDirectory, entryPath).split(path.sep).join('/'));
    }
  }

  return files.sort();
}

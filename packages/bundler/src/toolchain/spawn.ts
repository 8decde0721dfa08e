import type { SpawnOptions } from 'node:child_process';
import { spawn } from 'node:child_process';

export interface SpawnProcessOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
}

export interface SpawnProcessResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

export type SpawnProcessFn = (
  command: string,
  args: readonly string[],
  options: SpawnProcessOptions,
) => Promise<SpawnProcessResult>;

/**
 * Runs `command` to completion and captures both output streams. Rejects only
 * when the process cannot be started; a non-zero exit resolves with its code.
 */
export const spawnProcess: SpawnProcessFn = (command, args, options) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, [...args], {
      cwd: options.cwd,
      env: options.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    } satisfies SpawnOptions);

    let stdout = '';
    let stderr = '';

    child.stdout?.setEncoding('utf8');
    child.stderr?.setEncoding('utf8');
    child.stdout?.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr?.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('error', reject);
    child.on('close', (code: number | null) => {
      resolve({ code, stdout, stderr });
    });
  });

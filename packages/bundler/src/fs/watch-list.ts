import type { Dirent } from 'node:fs';
import { promises as fsPromises } from 'node:fs';
import path from 'node:path';

export type DirectiveSink = (entryPath: string) => void;

export function formatRerunDirective(entryPath: string): string {
  return `cargo:rerun-if-changed=${entryPath}`;
}

export const stdoutDirectiveSink: DirectiveSink = (entryPath) => {
  process.stdout.write(`${formatRerunDirective(entryPath)}\n`);
};

/**
 * Emits one directive for every entry reachable from `roots`, the roots
 * included. Entries that cannot be read are skipped. A root that is a
 * symbolic link to a directory is walked; links below a root are reported
 * but not followed.
 *
 * @returns the number of directives emitted
 */
export async function declareWatchedEntries(
  roots: readonly string[],
  sink: DirectiveSink,
): Promise<number> {
  let emitted = 0;

  for (const root of roots) {
    const rootStats = await fsPromises.stat(root).catch(() => undefined);
    if (rootStats === undefined) {
      continue;
    }

    sink(root);
    emitted += 1;
    if (!rootStats.isDirectory()) {
      continue;
    }

    const pending: string[] = [root];
    while (pending.length > 0) {
      const currentDir = pending.pop();
      if (currentDir === undefined) {
        continue;
      }

      const entries = await readDirSorted(currentDir);
      const subdirectories: string[] = [];
      for (const entry of entries) {
        const entryPath = path.join(currentDir, entry.name);
        sink(entryPath);
        emitted += 1;
        if (entry.isDirectory()) {
          subdirectories.push(entryPath);
        }
      }

      // Reversed so the stack pops directories in name order.
      for (let index = subdirectories.length - 1; index >= 0; index -= 1) {
        pending.push(subdirectories[index]);
      }
    }
  }

  return emitted;
}

async function readDirSorted(directory: string): Promise<Dirent[]> {
  try {
    const entries = await fsPromises.readdir(directory, { withFileTypes: true });
    return entries.sort((left, right) =>
      left.name < right.name ? -1 : left.name > right.name ? 1 : 0,
    );
  } catch {
    return [];
  }
}

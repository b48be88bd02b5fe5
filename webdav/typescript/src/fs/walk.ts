/**
 * Local directory traversal for directory uploads.
 * @module fs/walk
 */

import { readdir, stat } from 'fs/promises';
import { join } from 'path';

function byName(a: { name: string }, b: { name: string }): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

async function isDirectoryTarget(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    // Dangling link
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Lazily yields the regular files below `root`, top-down: a directory's files
 * come before the contents of its subdirectories, each level in name order.
 * Links are yielded unless they point at a directory, which is not followed;
 * a dangling link is yielded too, and fails when it is opened.
 */
export async function* walkFiles(root: string): AsyncGenerator<string, void, undefined> {
  const entries = await readdir(root, { withFileTypes: true });
  entries.sort(byName);

  const directories: string[] = [];
  for (const entry of entries) {
    const entryPath = join(root, entry.name);
    if (entry.isFile()) {
      yield entryPath;
    } else if (entry.isDirectory()) {
      directories.push(entryPath);
    } else if (entry.isSymbolicLink() && !(await isDirectoryTarget(entryPath))) {
      yield entryPath;
    }
  }

  for (const directory of directories) {
    yield* walkFiles(directory);
  }
}

/**
 * Size estimation for devstrip
 *
 * Sums the apparent size (byte length) of every regular file below a
 * directory. Walks iteratively with a running total so memory stays flat
 * on trees like node_modules with hundreds of thousands of files.
 */

import type { Dirent } from 'fs';
import { join } from 'path';
import { errorCode, errorMessage } from './errors.js';
import type { ScanWarning } from './types.js';
import { nodeReader } from './utils.js';
import type { FileSystemReader } from './utils.js';

export interface SizeOptions {
  /** Receives every unreadable entry below the root */
  onWarning?: (warning: ScanWarning) => void;
  reader?: FileSystemReader;
}

/**
 * Calculate the apparent size of `path` in bytes.
 *
 * Symlinks are neither followed nor counted. Unreadable directories and
 * files are reported through `onWarning` and left out of the sum.
 * Rejects only when `path` itself cannot be stat'ed.
 */
export async function estimateSize(path: string, options: SizeOptions = {}): Promise<number> {
  const reader = options.reader ?? nodeReader;
  const warn = (entryPath: string, error: unknown) =>
    options.onWarning?.({ path: entryPath, message: errorMessage(error), code: errorCode(error) });

  const rootStats = await reader.lstat(path);
  if (rootStats.isSymbolicLink()) return 0;
  if (!rootStats.isDirectory()) return rootStats.isFile() ? rootStats.size : 0;

  let total = 0;
  const pending: string[] = [path];

  while (pending.length > 0) {
    const current = pending.pop();
    if (current === undefined) break;

    let entries: Dirent[];
    try {
      entries = await reader.readdir(current);
    } catch (error) {
      warn(current, error);
      continue;
    }

    for (const entry of entries) {
      const entryPath = join(current, entry.name);
      if (entry.isDirectory()) {
        pending.push(entryPath);
      } else if (entry.isFile()) {
        try {
          total += (await reader.lstat(entryPath)).size;
        } catch (error) {
          warn(entryPath, error);
        }
      }
    }
  }

  return total;
}

/**
 * Tree walker for devstrip
 *
 * Breadth-first, depth-limited traversal that yields one Candidate per
 * matched directory and never enters a matched directory. Sizes are not
 * computed here; the pipeline sizes each candidate as it arrives.
 *
 * Walk order:
 * 1. well-known cache locations under the home directory (location rules only)
 * 2. configured roots, ancestors first (all rules)
 */

import { promises as fs } from 'fs';
import type { Dirent } from 'fs';
import { dirname, join, resolve } from 'path';
import { classify, SKIP_DIR_NAMES, wellKnownRoots } from './catalog.js';
import type { RuleScope } from './catalog.js';
import { errorCode, errorMessage } from './errors.js';
import { isExcluded } from './filters.js';
import type { Candidate, ScanWarning } from './types.js';
import { compareStrings, nodeReader } from './utils.js';
import type { FileSystemReader } from './utils.js';

/**
 * Options for a walk.
 */
export interface WalkOptions {
  /** Directories to walk with every rule */
  roots: readonly string[];

  /** Subtrees never entered */
  excludes: readonly string[];

  /** Maximum depth below each root */
  maxDepth: number;

  /** Home directory; enables the well-known location pass */
  home?: string;

  /** Checked between directory visits */
  signal?: AbortSignal;

  /** Receives every unreadable path */
  onWarning?: (warning: ScanWarning) => void;

  /** Called before a directory's entries are listed */
  onDirectory?: (path: string) => void;

  reader?: FileSystemReader;
}

interface WalkSeed {
  path: string;
  maxDepth: number;
  scope: RuleScope;
  /** Missing well-known locations are normal; missing roots are not */
  warnIfMissing: boolean;
}

/**
 * Resolve a path through symlinks, falling back to a plain absolute path
 * when it does not exist.
 */
export async function canonicalize(path: string): Promise<string> {
  try {
    return await fs.realpath(path);
  } catch {
    return resolve(path);
  }
}

function warningFor(path: string, error: unknown): ScanWarning {
  return { path, message: errorMessage(error), code: errorCode(error) };
}

/**
 * Walk roots and well-known locations, yielding unsized candidates.
 *
 * The sequence is lazy and single-pass. Guarantees:
 * - no two candidates share a canonical path
 * - no candidate lies inside another
 * - no candidate lies at or below an excluded path
 */
export async function* walkCandidates(options: WalkOptions): AsyncGenerator<Candidate> {
  const reader = options.reader ?? nodeReader;
  const warn = (warning: ScanWarning) => options.onWarning?.(warning);

  const excludes = await Promise.all(options.excludes.map(canonicalize));
  const home = options.home !== undefined ? await canonicalize(options.home) : undefined;

  const seeds: WalkSeed[] = [];
  if (home !== undefined) {
    for (const path of wellKnownRoots(home)) {
      seeds.push({ path, maxDepth: 0, scope: 'locations', warnIfMissing: false });
    }
  }
  const roots = await Promise.all(options.roots.map(canonicalize));
  for (const path of [...new Set(roots)].sort(compareStrings)) {
    seeds.push({ path, maxDepth: options.maxDepth, scope: 'all', warnIfMissing: true });
  }

  const emitted = new Set<string>();
  // Every proper ancestor of an emitted path; such directories are only descended.
  const emittedAncestors = new Set<string>();

  const insideEmitted = (path: string): boolean => {
    let current = path;
    for (;;) {
      if (emitted.has(current)) return true;
      const parent = dirname(current);
      if (parent === current) return false;
      current = parent;
    }
  };

  const recordEmitted = (path: string) => {
    emitted.add(path);
    let current = dirname(path);
    while (!emittedAncestors.has(current)) {
      emittedAncestors.add(current);
      const parent = dirname(current);
      if (parent === current) break;
      current = parent;
    }
  };

  for (const seed of seeds) {
    if (isExcluded(seed.path, excludes) || insideEmitted(seed.path)) continue;

    try {
      const stats = await reader.lstat(seed.path);
      if (!stats.isDirectory()) {
        if (seed.warnIfMissing) {
          warn({ path: seed.path, message: 'Not a directory', code: 'ENOTDIR' });
        }
        continue;
      }
    } catch (error) {
      if (seed.warnIfMissing) warn(warningFor(seed.path, error));
      continue;
    }

    const queue: Array<{ dir: string; depth: number }> = [{ dir: seed.path, depth: 0 }];

    while (queue.length > 0) {
      options.signal?.throwIfAborted();

      const next = queue.shift();
      if (!next) break;
      const { dir, depth } = next;
      options.onDirectory?.(dir);

      let entries: Dirent[];
      try {
        entries = await reader.readdir(dir);
      } catch (error) {
        warn(warningFor(dir, error));
        continue;
      }

      entries.sort((a, b) => compareStrings(a.name, b.name));

      for (const entry of entries) {
        // Dirent types come from lstat semantics: symlinks are never directories here
        if (!entry.isDirectory()) continue;
        if (SKIP_DIR_NAMES.has(entry.name)) continue;

        const path = join(dir, entry.name);
        if (emitted.has(path)) continue;
        if (isExcluded(path, excludes)) continue;

        const match = emittedAncestors.has(path)
          ? undefined
          : classify({ path, name: entry.name, parent: dir, home }, seed.scope);

        if (match) {
          let modifiedAt: Date;
          try {
            modifiedAt = (await reader.lstat(path)).mtime;
          } catch (error) {
            warn(warningFor(path, error));
            continue;
          }
          recordEmitted(path);
          yield { path, category: match.category, reason: match.reason, modifiedAt };
          continue;
        }

        if (depth < seed.maxDepth) {
          queue.push({ dir: path, depth: depth + 1 });
        }
      }
    }
  }
}

/**
 * Drain a walk into an array. Convenience for callers that do not stream.
 */
export async function collectCandidates(options: WalkOptions): Promise<Candidate[]> {
  const candidates: Candidate[] = [];
  for await (const candidate of walkCandidates(options)) {
    candidates.push(candidate);
  }
  return candidates;
}

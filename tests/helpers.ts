/**
 * Shared fixtures for the test suites.
 *
 * Temporary trees live under os.tmpdir() and are resolved through
 * realpath, since the walker reports canonical paths.
 */

import { mkdirSync, mkdtempSync, realpathSync, rmSync, utimesSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { CATEGORIES } from '../src/catalog.js';
import type { CategoryId, SizedCandidate } from '../src/types.js';
import { nodeReader } from '../src/utils.js';
import type { FileSystemReader } from '../src/utils.js';

export const DAY_MS = 24 * 60 * 60 * 1000;

export function createTestDir(prefix = 'devstrip-test-'): string {
  return realpathSync(mkdtempSync(join(tmpdir(), prefix)));
}

export function cleanupTestDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Write a file of `bytes` zero bytes, creating parent directories. */
export function writeBytes(path: string, bytes: number): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, Buffer.alloc(bytes));
}

/** Set a path's access and modification times. */
export function setModified(path: string, date: Date): void {
  utimesSync(path, date, date);
}

export function daysAgo(days: number, now: Date = new Date()): Date {
  return new Date(now.getTime() - days * DAY_MS);
}

export function makeCandidate(
  path: string,
  overrides: { category?: CategoryId; sizeBytes?: number; modifiedAt?: Date; reason?: string } = {},
): SizedCandidate {
  return {
    path,
    category: CATEGORIES[overrides.category ?? 'project-artifact'],
    reason: overrides.reason ?? 'Stale build or cache (build)',
    modifiedAt: overrides.modifiedAt ?? new Date(2024, 0, 1),
    sizeBytes: overrides.sizeBytes ?? 1024,
  };
}

function permissionDenied(path: string): Error {
  return Object.assign(new Error(`EACCES: permission denied, scandir '${path}'`), { code: 'EACCES' });
}

/**
 * A reader that fails to list the given directories, as if their
 * permissions forbade it.
 */
export function lockedReader(locked: readonly string[]): FileSystemReader {
  return {
    readdir: (path) => (locked.includes(path) ? Promise.reject(permissionDenied(path)) : nodeReader.readdir(path)),
    lstat: (path) => nodeReader.lstat(path),
  };
}

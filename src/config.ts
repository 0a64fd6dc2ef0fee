/**
 * Configuration for devstrip
 *
 * Validates scan settings, resolves roots and excludes, and reads
 * `.devstripignore` files. Validation failures are fatal and raised as
 * ConfigError before any traversal starts.
 */

import { promises as fs } from 'fs';
import { dirname, isAbsolute, join, resolve } from 'path';
import { z } from 'zod';
import { defaultRoots } from './catalog.js';
import { ConfigError } from './errors.js';
import { isExcluded } from './filters.js';
import type { CliArgs, ScanConfig } from './types.js';
import { fileExists } from './utils.js';
import { canonicalize } from './walker.js';

/** Name of the per-user / per-directory exclude file. */
export const EXCLUDE_FILE_NAME = '.devstripignore';

const absolutePath = z
  .string()
  .min(1, 'must not be empty')
  .refine(isAbsolute, { message: 'must be an absolute path' });

const count = z.number().int().min(0).max(Number.MAX_SAFE_INTEGER);

export const scanConfigSchema = z
  .object({
    roots: z.array(absolutePath),
    excludes: z.array(absolutePath),
    minAgeDays: count,
    maxDepth: count,
    keepLatestDerived: count,
    keepLatestCache: count,
    home: absolutePath.optional(),
  })
  .superRefine((data, ctx) => {
    if (data.roots.length === 0 && data.home === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['roots'],
        message: 'at least one root (or a home directory) is required',
      });
    }
  });

/**
 * Validate a scan configuration. Throws ConfigError on invalid input,
 * naming every offending field.
 */
export function validateScanConfig(config: unknown): ScanConfig {
  const result = scanConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    const field = result.error.issues[0]?.path.join('.');
    throw new ConfigError(`Invalid configuration: ${issues}`, field);
  }
  return result.data;
}

/**
 * Expand a leading `~` to the home directory.
 */
export function expandHome(path: string, home: string | undefined): string {
  if (home === undefined) return path;
  if (path === '~') return home;
  if (path.startsWith('~/')) return join(home, path.slice(2));
  return path;
}

/**
 * Canonicalize paths, falling back to absolute paths for missing ones.
 */
export async function resolvePaths(paths: readonly string[]): Promise<string[]> {
  return Promise.all(paths.map(canonicalize));
}

/**
 * Canonicalize roots, then drop duplicates, missing directories and
 * anything under an exclude. Order of first appearance is kept.
 */
export async function resolveRoots(
  paths: readonly string[],
  excludes: readonly string[],
): Promise<string[]> {
  const unique: string[] = [];
  const seen = new Set<string>();

  for (const resolved of await resolvePaths(paths)) {
    if (seen.has(resolved)) continue;
    seen.add(resolved);
    if (!(await fileExists(resolved))) continue;
    if (isExcluded(resolved, excludes)) continue;
    unique.push(resolved);
  }

  return unique;
}

/**
 * Read exclude paths from `.devstripignore` files.
 *
 * One path per line; blank lines and `#` comments are ignored; `~` is
 * expanded and relative paths resolve against the file's directory.
 * Missing files are skipped.
 */
export async function loadExcludeFile(
  files: readonly string[],
  home: string | undefined,
): Promise<string[]> {
  const paths: string[] = [];

  for (const file of files) {
    if (!(await fileExists(file))) continue;
    const content = await fs.readFile(file, 'utf-8');
    const lines = content
      .split('\n')
      .map(line => line.trim())
      .filter(line => line && !line.startsWith('#'));

    for (const line of lines) {
      paths.push(resolve(dirname(file), expandHome(line, home)));
    }
  }

  return paths;
}

/**
 * Process context the CLI builds its configuration from.
 */
export interface CliEnvironment {
  cwd: string;
  home: string | undefined;
}

/**
 * Turn parsed CLI arguments into a validated ScanConfig.
 *
 * Roots are the working directory, the existing default project folders
 * under home, and any extra paths given. `--all` widens the scan: no age
 * filter, unbounded depth and nothing kept.
 */
export async function buildScanConfig(args: CliArgs, env: CliEnvironment): Promise<ScanConfig> {
  const home = env.home;
  const absolute = (path: string) => resolve(env.cwd, expandHome(path, home));

  const ignoreFiles = [join(env.cwd, EXCLUDE_FILE_NAME)];
  if (home !== undefined) ignoreFiles.push(join(home, EXCLUDE_FILE_NAME));

  const excludes = await resolvePaths([
    ...args.excludes.map(absolute),
    ...(await loadExcludeFile(ignoreFiles, home)),
  ]);

  const requested = [env.cwd, ...(home !== undefined ? defaultRoots(home) : []), ...args.roots.map(absolute)];
  const roots = await resolveRoots(requested, excludes);

  const settings = args.all
    ? { minAgeDays: 0, maxDepth: Number.MAX_SAFE_INTEGER, keepLatestDerived: 0, keepLatestCache: 0 }
    : {
        minAgeDays: args.minAgeDays,
        maxDepth: args.maxDepth,
        keepLatestDerived: args.keepLatestDerived,
        keepLatestCache: args.keepLatestCache,
      };

  return validateScanConfig({
    roots,
    excludes: [...new Set(excludes)],
    home: home !== undefined ? await canonicalize(home) : undefined,
    ...settings,
  });
}

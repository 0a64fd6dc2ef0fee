/**
 * Plan building for devstrip
 *
 * Turns a scan configuration into a ranked, totalled deletion plan:
 *
 *   walk → size (parallel, as discovered) → exclusion recheck →
 *   retention → age filter → drop empty → sort and total
 *
 * The resulting Plan is frozen and is the single source of truth handed
 * to confirmation and deletion.
 */

import { dirname } from 'path';
import pLimit from 'p-limit';
import { validateScanConfig } from './config.js';
import { errorCode, errorMessage, InvariantError } from './errors.js';
import { applyRetention, isEligible, isExcluded } from './filters.js';
import { estimateSize } from './size.js';
import type {
  Candidate,
  Plan,
  ScanConfig,
  ScanProgress,
  ScanResult,
  ScanWarning,
  SizedCandidate,
} from './types.js';
import { compareStrings, sumBytes } from './utils.js';
import type { FileSystemReader } from './utils.js';
import { canonicalize, walkCandidates } from './walker.js';

// Sizing is I/O bound; a handful of concurrent trees keeps the disk busy
const SIZE_CALCULATION_CONCURRENCY = 4;

/**
 * Options for a scan-and-plan pass.
 */
export interface ScanOptions {
  /** Reference time for the age filter (default: now) */
  now?: Date;

  /** Candidates sized at once */
  concurrency?: number;

  /** Cancels the walk between directory visits */
  signal?: AbortSignal;

  onProgress?: (progress: ScanProgress) => void;

  reader?: FileSystemReader;
}

/**
 * Return the first pair (ancestor, descendant) found among `paths`.
 */
export function findNestedPath(paths: readonly string[]): [string, string] | undefined {
  const all = new Set(paths);
  for (const path of paths) {
    let current = dirname(path);
    for (;;) {
      if (all.has(current)) return [current, path];
      const parent = dirname(current);
      if (parent === current) break;
      current = parent;
    }
  }
  return undefined;
}

/**
 * Largest first; equal sizes by path so the order is stable across runs.
 */
export function compareBySize(a: SizedCandidate, b: SizedCandidate): number {
  return b.sizeBytes - a.sizeBytes || compareStrings(a.path, b.path);
}

/**
 * Sort candidates by size, total them, and freeze the result.
 *
 * @throws InvariantError if one candidate lies inside another
 */
export function buildPlan(candidates: readonly SizedCandidate[]): Plan {
  const nested = findNestedPath(candidates.map(candidate => candidate.path));
  if (nested) {
    throw new InvariantError(`Candidate ${nested[1]} lies inside candidate ${nested[0]}`);
  }

  const sorted = [...candidates].sort(compareBySize);
  return Object.freeze({
    candidates: Object.freeze(sorted),
    totalBytes: sumBytes(sorted),
  });
}

/**
 * Attach a size to a candidate, producing a new immutable value.
 */
export function withSize(candidate: Candidate, sizeBytes: number): SizedCandidate {
  return Object.freeze({ ...candidate, sizeBytes });
}

/**
 * Scan the configured roots and build the deletion plan.
 *
 * Never touches the filesystem beyond reading it.
 *
 * @throws ConfigError before any traversal when the config is invalid
 */
export async function scanAndPlan(
  input: ScanConfig,
  options: ScanOptions = {},
): Promise<ScanResult> {
  const config = validateScanConfig(input);
  const now = options.now ?? new Date();
  const warnings: ScanWarning[] = [];
  const onWarning = (warning: ScanWarning) => {
    warnings.push(warning);
  };

  const progress: ScanProgress = {
    directoriesScanned: 0,
    candidatesFound: 0,
    candidatesSized: 0,
  };
  const report = () => options.onProgress?.({ ...progress });

  // Size each candidate as soon as the walker yields it
  const limit = pLimit(options.concurrency ?? SIZE_CALCULATION_CONCURRENCY);
  const sizing: Array<Promise<SizedCandidate | undefined>> = [];

  try {
    const walk = walkCandidates({
      roots: config.roots,
      excludes: config.excludes,
      maxDepth: config.maxDepth,
      home: config.home,
      signal: options.signal,
      reader: options.reader,
      onWarning,
      onDirectory: (path) => {
        progress.directoriesScanned++;
        progress.currentPath = path;
        report();
      },
    });

    for await (const candidate of walk) {
      progress.candidatesFound++;
      report();

      sizing.push(
        limit(async () => {
          try {
            const size = await estimateSize(candidate.path, { onWarning, reader: options.reader });
            return withSize(candidate, size);
          } catch (error) {
            onWarning({ path: candidate.path, message: errorMessage(error), code: errorCode(error) });
            return undefined;
          } finally {
            progress.candidatesSized++;
            report();
          }
        }),
      );
    }
  } finally {
    // Let in-flight sizing settle even when the walk is aborted
    await Promise.allSettled(sizing);
  }

  const sized = (await Promise.all(sizing)).filter(
    (candidate): candidate is SizedCandidate => candidate !== undefined,
  );

  const excludes = await Promise.all(config.excludes.map(canonicalize));
  const inScope = sized.filter(candidate => !isExcluded(candidate.path, excludes));

  const { retained, kept } = applyRetention(inScope, config);

  const eligibility = { minAgeDays: config.minAgeDays, excludes };
  const planned: SizedCandidate[] = [];
  const skipped: SizedCandidate[] = [];
  for (const candidate of retained) {
    if (candidate.sizeBytes > 0 && isEligible(candidate, eligibility, now)) {
      planned.push(candidate);
    } else {
      skipped.push(candidate);
    }
  }

  return {
    plan: buildPlan(planned),
    kept,
    skipped,
    warnings,
    directoriesScanned: progress.directoriesScanned,
  };
}

/**
 * Age, exclusion and retention filters for devstrip
 *
 * All functions here are pure: they take candidates and settings and
 * return new arrays, never touching the filesystem.
 */

import type { Candidate, RetentionPolicy, ScanConfig } from './types.js';
import { compareStrings, daysToMs, isSameOrWithin } from './utils.js';

/**
 * Whether a path equals or lies below any excluded path.
 */
export function isExcluded(path: string, excludes: readonly string[]): boolean {
  return excludes.some(exclude => isSameOrWithin(path, exclude));
}

/**
 * Whether a candidate may be proposed for deletion.
 *
 * Eligible when it is outside every exclude and its own modification time
 * is at least `minAgeDays` old. The threshold is inclusive; 0 disables
 * the age check, including for timestamps in the future.
 */
export function isEligible(
  candidate: Candidate,
  config: Pick<ScanConfig, 'minAgeDays' | 'excludes'>,
  now: Date = new Date(),
): boolean {
  if (isExcluded(candidate.path, config.excludes)) return false;
  if (config.minAgeDays === 0) return true;
  return now.getTime() - candidate.modifiedAt.getTime() >= daysToMs(config.minAgeDays);
}

/**
 * How many entries each keep-latest policy protects.
 */
export interface RetentionCounts {
  keepLatestDerived: number;
  keepLatestCache: number;
}

/**
 * Candidates split by the retention filter.
 */
export interface RetentionResult<T extends Candidate> {
  /** Candidates still proposed for deletion, in input order */
  retained: T[];
  /** The newest N of each keep-latest category */
  kept: T[];
}

function keepCount(policy: RetentionPolicy, counts: RetentionCounts): number {
  switch (policy) {
    case 'keep-latest-derived': return counts.keepLatestDerived;
    case 'keep-latest-cache': return counts.keepLatestCache;
    default: return 0;
  }
}

/**
 * Newest first; equal times fall back to path order so the result is
 * reproducible on the same tree.
 */
export function compareByRecency(a: Candidate, b: Candidate): number {
  return b.modifiedAt.getTime() - a.modifiedAt.getTime() || compareStrings(a.path, b.path);
}

/**
 * Protect the newest entries of each keep-latest category.
 *
 * Candidates are grouped by category across all roots. Within a group
 * under a keep-latest policy, the N most recently modified are moved to
 * `kept`; a group with N or fewer entries is kept entirely.
 */
export function applyRetention<T extends Candidate>(
  candidates: readonly T[],
  counts: RetentionCounts,
): RetentionResult<T> {
  const groups = new Map<string, T[]>();
  for (const candidate of candidates) {
    if (candidate.category.retention === 'none') continue;
    const group = groups.get(candidate.category.id) ?? [];
    group.push(candidate);
    groups.set(candidate.category.id, group);
  }

  const protectedPaths = new Set<string>();
  for (const group of groups.values()) {
    const keep = keepCount(group[0].category.retention, counts);
    for (const candidate of [...group].sort(compareByRecency).slice(0, keep)) {
      protectedPaths.add(candidate.path);
    }
  }

  const retained: T[] = [];
  const kept: T[] = [];
  for (const candidate of candidates) {
    if (protectedPaths.has(candidate.path)) {
      kept.push(candidate);
    } else {
      retained.push(candidate);
    }
  }
  return { retained, kept };
}

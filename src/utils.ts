/**
 * Utility functions for devstrip
 *
 * This module provides pure functions for common operations like
 * formatting bytes, comparing paths and managing a selection.
 * Pure functions make testing easier and reduce side effects.
 */

import { promises as fs } from 'fs';
import type { Dirent, Stats } from 'fs';
import { sep } from 'path';
import type {
  CategoryGroup,
  GroupSummary,
  PlanStatistics,
  SizeCategory,
  SizedCandidate,
} from './types.js';
import { SIZE_THRESHOLDS } from './types.js';

// Re-export for convenience
export { SIZE_THRESHOLDS };

const DAY_MS = 1000 * 60 * 60 * 24;

/**
 * Filesystem access used by the walker and the size estimator.
 * Tests swap it to simulate unreadable directories.
 */
export interface FileSystemReader {
  readdir(path: string): Promise<Dirent[]>;
  lstat(path: string): Promise<Stats>;
}

/** Reader backed by the real filesystem. */
export const nodeReader: FileSystemReader = {
  readdir: (path) => fs.readdir(path, { withFileTypes: true }),
  lstat: (path) => fs.lstat(path),
};

/**
 * Format bytes into human-readable string.
 * Uses binary units (1 KB = 1024 B).
 *
 * @returns Formatted string like "1.2 GB" or "456 KB"
 */
export function formatBytes(bytes: number): string {
  if (bytes <= 0) return '0 B';

  const units = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'];
  const base = 1024;
  const exponent = Math.min(Math.floor(Math.log(bytes) / Math.log(base)), units.length - 1);
  const value = bytes / Math.pow(base, exponent);

  // Show 1 decimal place for MB and above, 0 for smaller
  const decimals = exponent >= 2 ? 1 : 0;
  return `${value.toFixed(decimals)} ${units[exponent]}`;
}

/**
 * Format a date into "X days ago" string.
 *
 * @returns Formatted string like "30d ago" or "2h ago"
 */
export function formatRelativeTime(date: Date, now: Date = new Date()): string {
  // Future mtimes read as just now
  const diffMs = Math.max(0, now.getTime() - date.getTime());
  const diffDays = Math.floor(diffMs / DAY_MS);

  if (diffDays === 0) {
    const diffHours = Math.floor(diffMs / (1000 * 60 * 60));
    if (diffHours === 0) {
      const diffMinutes = Math.floor(diffMs / (1000 * 60));
      return diffMinutes <= 1 ? 'just now' : `${diffMinutes}m ago`;
    }
    return `${diffHours}h ago`;
  }

  if (diffDays < 30) return `${diffDays}d ago`;
  if (diffDays < 365) return `${Math.floor(diffDays / 30)}mo ago`;
  return `${Math.floor(diffDays / 365)}y ago`;
}

/**
 * Format a date as local "YYYY-MM-DD HH:MM".
 */
export function formatTimestamp(date: Date): string {
  if (Number.isNaN(date.getTime()) || date.getTime() < 0) return '-';
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

/**
 * Convert a day count to milliseconds.
 */
export function daysToMs(days: number): number {
  return days * DAY_MS;
}

/**
 * Determine size band based on bytes.
 */
export function getSizeCategory(bytes: number): SizeCategory {
  if (bytes >= SIZE_THRESHOLDS.TB) return 'huge';
  if (bytes >= SIZE_THRESHOLDS.GB) return 'large';
  if (bytes >= SIZE_THRESHOLDS.MB) return 'medium';
  if (bytes >= SIZE_THRESHOLDS.KB) return 'small';
  return 'tiny';
}

/**
 * Get an Ink color for a size band.
 */
export function getSizeColor(category: SizeCategory): string {
  switch (category) {
    case 'huge': return 'cyan';
    case 'large': return 'yellow';
    case 'medium': return 'blue';
    case 'small': return 'green';
    default: return 'gray';
  }
}

/**
 * Shorten a string by cutting out its middle, keeping both ends.
 * Used for long paths and reasons where the tail matters.
 */
export function truncateMiddle(str: string, maxLength: number): string {
  if (maxLength <= 0) return '';
  const chars = Array.from(str);
  if (chars.length <= maxLength) return str;
  if (maxLength === 1) return '…';

  const headLength = Math.floor((maxLength - 1) / 2);
  const tailLength = maxLength - 1 - headLength;
  return chars.slice(0, headLength).join('') + '…' + chars.slice(chars.length - tailLength).join('');
}

/**
 * Whether `path` equals `parent` or lies below it.
 * Compares whole path components: /a/foo is not within /a/fo.
 */
export function isSameOrWithin(path: string, parent: string): boolean {
  if (path === parent) return true;
  const prefix = parent.endsWith(sep) ? parent : parent + sep;
  return path.startsWith(prefix);
}

/**
 * Compare two strings by code unit, for orderings that must not
 * depend on the user's locale.
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Sum candidate sizes.
 */
export function sumBytes(items: readonly SizedCandidate[]): number {
  return items.reduce((sum, item) => sum + item.sizeBytes, 0);
}

/**
 * Summarise candidates per category group, largest group first.
 */
export function summarizeGroups(items: readonly SizedCandidate[]): GroupSummary[] {
  const groups = new Map<CategoryGroup, GroupSummary>();
  for (const item of items) {
    const group = item.category.group;
    const summary = groups.get(group) ?? { group, count: 0, totalBytes: 0 };
    summary.count++;
    summary.totalBytes += item.sizeBytes;
    groups.set(group, summary);
  }
  return [...groups.values()].sort(
    (a, b) => b.totalBytes - a.totalBytes || compareStrings(a.group, b.group),
  );
}

/**
 * Calculate statistics from candidates and the current selection.
 */
export function calculateStatistics(
  items: readonly SizedCandidate[],
  selected: ReadonlySet<string>,
): PlanStatistics {
  const selectedItems = items.filter(item => selected.has(item.path));
  const totalSize = sumBytes(items);
  const selectedSize = sumBytes(selectedItems);

  return {
    totalCandidates: items.length,
    totalSizeBytes: totalSize,
    totalSizeFormatted: formatBytes(totalSize),
    selectedCount: selectedItems.length,
    selectedSizeBytes: selectedSize,
    selectedSizeFormatted: formatBytes(selectedSize),
    groups: summarizeGroups(items),
  };
}

/**
 * Toggle one path in a selection (immutable update).
 */
export function toggleSelection(selected: ReadonlySet<string>, path: string): Set<string> {
  const next = new Set(selected);
  if (next.has(path)) {
    next.delete(path);
  } else {
    next.add(path);
  }
  return next;
}

/**
 * Select or deselect every listed item, leaving others untouched.
 */
export function selectAll(
  selected: ReadonlySet<string>,
  items: readonly SizedCandidate[],
  value: boolean,
): Set<string> {
  const next = new Set(selected);
  for (const item of items) {
    if (value) {
      next.add(item.path);
    } else {
      next.delete(item.path);
    }
  }
  return next;
}

/**
 * Invert the selection of every listed item.
 */
export function invertSelection(
  selected: ReadonlySet<string>,
  items: readonly SizedCandidate[],
): Set<string> {
  let next = new Set(selected);
  for (const item of items) {
    next = toggleSelection(next, item.path);
  }
  return next;
}

/**
 * Category groups present in a list, in first-seen order.
 */
export function availableGroups(items: readonly SizedCandidate[]): CategoryGroup[] {
  return [...new Set(items.map(item => item.category.group))];
}

/**
 * Keep only items of one group (undefined = no filter).
 */
export function filterByGroup(
  items: readonly SizedCandidate[],
  group: CategoryGroup | undefined,
): readonly SizedCandidate[] {
  if (!group) return items;
  return items.filter(item => item.category.group === group);
}

/**
 * Safe file existence check that doesn't throw.
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await fs.access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Rule catalog for devstrip
 *
 * A static, ordered table of (predicate, category) rules evaluated
 * first-match-wins. Rules anchored at well-known locations under the home
 * directory come first, so a generic name rule such as `.cache` or `build`
 * never shadows a system cache classification.
 *
 * The catalog is plain data: safe to share between concurrent walkers.
 */

import { basename, dirname, join } from 'path';
import type { Category, CategoryId } from './types.js';

/** Every category the catalog can produce. */
export const CATEGORIES: Readonly<Record<CategoryId, Category>> = {
  'xcode-derived-data': { id: 'xcode-derived-data', label: 'DerivedData', group: 'Xcode', retention: 'keep-latest-derived' },
  'xcode-archives': { id: 'xcode-archives', label: 'Archives', group: 'Xcode', retention: 'keep-latest-derived' },
  'core-simulator-caches': { id: 'core-simulator-caches', label: 'CoreSimulator', group: 'Xcode', retention: 'none' },
  'homebrew-cache': { id: 'homebrew-cache', label: 'Homebrew', group: 'Homebrew', retention: 'keep-latest-cache' },
  'python-cache': { id: 'python-cache', label: 'Python cache', group: 'Python', retention: 'none' },
  'node-cache': { id: 'node-cache', label: 'Node cache', group: 'Node', retention: 'none' },
  'cocoapods-cache': { id: 'cocoapods-cache', label: 'CocoaPods cache', group: 'CocoaPods', retention: 'none' },
  'gradle-cache': { id: 'gradle-cache', label: 'Gradle cache', group: 'Gradle', retention: 'none' },
  'jetbrains-cache': { id: 'jetbrains-cache', label: 'JetBrains cache', group: 'JetBrains', retention: 'none' },
  'vscode-cache': { id: 'vscode-cache', label: 'VSCode cache', group: 'VSCode', retention: 'none' },
  'slack-cache': { id: 'slack-cache', label: 'Slack cache', group: 'Slack', retention: 'none' },
  'project-artifact': { id: 'project-artifact', label: 'Project artifact', group: 'Project', retention: 'none' },
};

/** Project folders under the home directory scanned by default. */
export const DEFAULT_HOME_PROJECT_DIRS = ['Projects', 'workspace', 'Work', 'Developer'] as const;

/** Metadata directories the walker never enters nor reports. */
export const SKIP_DIR_NAMES: ReadonlySet<string> = new Set([
  '.git',
  '.hg',
  '.svn',
  '.idea',
  '.vscode',
  '.gradle',
]);

/** Directory names that mark a project build output or tool cache. */
export const PROJECT_ARTIFACT_NAMES: ReadonlySet<string> = new Set([
  'build',
  'dist',
  'out',
  '_build',
  'target',
  'node_modules',
  '.pytest_cache',
  '.mypy_cache',
  '.ruff_cache',
  '.tox',
  '.eggs',
  'coverage',
  '__pycache__',
  '.parcel-cache',
  '.sass-cache',
  '.cache',
]);

const PROJECT_ARTIFACT_SUFFIXES = ['.egg-info'] as const;

/**
 * The directory being classified.
 */
export interface MatchContext {
  /** Absolute path of the directory */
  path: string;
  /** Last path component */
  name: string;
  /** Absolute path of the parent directory */
  parent: string;
  /** Home directory, when well-known locations are in play */
  home?: string;
}

/**
 * `location` rules are anchored under the home directory,
 * `pattern` rules match anywhere.
 */
export type RuleKind = 'location' | 'pattern';

/** One row of the catalog. */
export interface Rule {
  kind: RuleKind;
  category: CategoryId;
  matches(context: MatchContext): boolean;
  reason(context: MatchContext): string;
  /**
   * Directory whose immediate children this rule can match,
   * relative to home. Only set on location rules.
   */
  anchor?: string;
}

/** A successful classification. */
export interface RuleMatch {
  category: Category;
  reason: string;
}

/** Which rules a walk consults. */
export type RuleScope = 'all' | 'locations';

/** The location itself is the candidate. */
function location(relative: string, category: CategoryId, reason: string): Rule {
  return {
    kind: 'location',
    category,
    anchor: dirname(relative),
    matches: ({ path, home }) => home !== undefined && path === join(home, relative),
    reason: () => reason,
  };
}

/** Every directory directly inside the location is a candidate. */
function locationChildren(relative: string, category: CategoryId, reason: string): Rule {
  return {
    kind: 'location',
    category,
    anchor: relative,
    matches: ({ parent, home }) => home !== undefined && parent === join(home, relative),
    reason: () => reason,
  };
}

/** Any directory whose parent has the given name. */
function childOf(parentName: string, category: CategoryId, reason: string): Rule {
  return {
    kind: 'pattern',
    category,
    matches: ({ parent }) => basename(parent) === parentName,
    reason: () => reason,
  };
}

/** Directories named exactly one of `names`, or ending with one of `suffixes`. */
function named(
  names: ReadonlySet<string>,
  suffixes: readonly string[],
  category: CategoryId,
  reason: string,
): Rule {
  return {
    kind: 'pattern',
    category,
    matches: ({ name }) => names.has(name) || suffixes.some(suffix => name.endsWith(suffix)),
    reason: ({ name }) => `${reason} (${name})`,
  };
}

/**
 * The catalog, in precedence order.
 */
export const RULES: readonly Rule[] = [
  locationChildren('Library/Developer/Xcode/DerivedData', 'xcode-derived-data', 'Old DerivedData projects'),
  locationChildren('Library/Developer/Xcode/Archives', 'xcode-archives', 'Old Xcode archives'),
  location('Library/Developer/CoreSimulator/Caches', 'core-simulator-caches', 'CoreSimulator caches'),
  locationChildren('Library/Caches/Homebrew', 'homebrew-cache', 'Homebrew download cache'),

  location('Library/Caches/pip', 'python-cache', 'pip cache'),
  location('.cache/pip', 'python-cache', 'pip cache'),
  location('.cache/pip-tools', 'python-cache', 'pip-tools cache'),
  location('.cache/pipenv', 'python-cache', 'pipenv cache'),
  location('.cache/pre-commit', 'python-cache', 'pre-commit cache'),
  location('.cache/matplotlib', 'python-cache', 'matplotlib cache'),
  location('.cache/pytest', 'python-cache', 'pytest cache'),
  location('.cache/ruff', 'python-cache', 'ruff cache'),
  location('.cache/uv', 'python-cache', 'uv cache'),
  location('.npm', 'node-cache', 'npm cache'),
  location('Library/Caches/npm', 'node-cache', 'npm cache'),
  location('Library/Caches/Yarn', 'node-cache', 'Yarn cache'),
  location('.cache/yarn', 'node-cache', 'Yarn cache'),
  location('Library/Caches/CocoaPods', 'cocoapods-cache', 'CocoaPods cache'),
  location('.gradle/caches', 'gradle-cache', 'Gradle caches'),
  location('.gradle/daemon', 'gradle-cache', 'Gradle daemons'),
  location('.gradle/native', 'gradle-cache', 'Gradle native cache'),
  location('Library/Caches/JetBrains', 'jetbrains-cache', 'JetBrains IDE caches'),
  location('Library/Application Support/Code/Cache', 'vscode-cache', 'VSCode cache'),
  location('Library/Application Support/Code/CachedData', 'vscode-cache', 'VSCode cached data'),
  location('Library/Application Support/Slack/Service Worker/CacheStorage', 'slack-cache', 'Slack cache'),

  childOf('DerivedData', 'xcode-derived-data', 'Old DerivedData projects'),
  named(PROJECT_ARTIFACT_NAMES, PROJECT_ARTIFACT_SUFFIXES, 'project-artifact', 'Stale build or cache'),
];

/**
 * Classify a directory against the catalog. First match wins.
 */
export function classify(
  context: MatchContext,
  scope: RuleScope = 'all',
  rules: readonly Rule[] = RULES,
): RuleMatch | undefined {
  for (const rule of rules) {
    if (scope === 'locations' && rule.kind !== 'location') continue;
    if (rule.matches(context)) {
      return { category: CATEGORIES[rule.category], reason: rule.reason(context) };
    }
  }
  return undefined;
}

/**
 * Home project folders scanned when the user gives no roots.
 * Pure: existence is checked later by the caller.
 */
export function defaultRoots(home: string): string[] {
  return DEFAULT_HOME_PROJECT_DIRS.map(name => join(home, name));
}

/**
 * Directories whose immediate children the location rules can match,
 * sorted and without duplicates.
 */
export function wellKnownRoots(home: string, rules: readonly Rule[] = RULES): string[] {
  const anchors = new Set<string>();
  for (const rule of rules) {
    if (rule.kind === 'location' && rule.anchor !== undefined) {
      anchors.add(rule.anchor === '.' ? home : join(home, rule.anchor));
    }
  }
  return [...anchors].sort();
}

/**
 * Core type definitions for devstrip
 *
 * These types represent the domain model for developer artifact cleanup.
 * Each interface answers a specific question about the data structure.
 */

/**
 * Retention policy class attached to a category.
 * Keep-latest policies protect the N most recently modified entries.
 */
export type RetentionPolicy = 'none' | 'keep-latest-derived' | 'keep-latest-cache';

/**
 * Closed set of reasons a directory can be flagged.
 */
export type CategoryId =
  | 'xcode-derived-data'
  | 'xcode-archives'
  | 'core-simulator-caches'
  | 'homebrew-cache'
  | 'python-cache'
  | 'node-cache'
  | 'cocoapods-cache'
  | 'gradle-cache'
  | 'jetbrains-cache'
  | 'vscode-cache'
  | 'slack-cache'
  | 'project-artifact';

/**
 * Display group used for filtering and summaries.
 */
export type CategoryGroup =
  | 'Xcode'
  | 'Homebrew'
  | 'Python'
  | 'Node'
  | 'CocoaPods'
  | 'Gradle'
  | 'JetBrains'
  | 'VSCode'
  | 'Slack'
  | 'Project';

/** A fixed catalog entry describing why a directory was matched. */
export interface Category {
  id: CategoryId;
  /** Human label, e.g. "DerivedData" */
  label: string;
  group: CategoryGroup;
  retention: RetentionPolicy;
}

/**
 * A directory identified as a deletion target.
 * Created by the walker without a size; sizing produces a SizedCandidate.
 */
export interface Candidate {
  /** Absolute, canonical path to the directory */
  readonly path: string;

  readonly category: Category;

  /** Why the rule matched, e.g. "Stale build or cache (node_modules)" */
  readonly reason: string;

  /** Modification time of the directory itself */
  readonly modifiedAt: Date;
}

/**
 * Candidate annotated with its reclaimable size. Never mutated.
 */
export interface SizedCandidate extends Candidate {
  /** Apparent size in bytes (sum of regular file lengths) */
  readonly sizeBytes: number;
}

/**
 * Scan parameters owned by the caller.
 * Passed into every core operation and never mutated by it.
 */
export interface ScanConfig {
  /** Absolute directories to walk */
  roots: string[];

  /** Absolute paths whose subtrees are never reported */
  excludes: string[];

  /** Minimum age in days (0 = no age filter) */
  minAgeDays: number;

  /** Maximum depth below each root to descend */
  maxDepth: number;

  /** Newest DerivedData/Archives entries to keep */
  keepLatestDerived: number;

  /** Newest Homebrew download entries to keep */
  keepLatestCache: number;

  /** Home directory used to resolve well-known cache locations */
  home?: string;
}

/**
 * The deletion plan: size-descending candidates plus their exact total.
 * Produced once per scan and frozen.
 */
export interface Plan {
  readonly candidates: readonly SizedCandidate[];
  readonly totalBytes: number;
}

/**
 * Non-fatal problem met while walking or sizing.
 */
export interface ScanWarning {
  /** Path that could not be read */
  path: string;

  /** Error message from the filesystem */
  message: string;

  /** Node error code (EACCES, ENOENT, ...) when available */
  code?: string;
}

/**
 * Progress snapshot reported while a scan runs.
 */
export interface ScanProgress {
  /** Directories whose entries have been listed */
  directoriesScanned: number;

  /** Candidates emitted by the walker */
  candidatesFound: number;

  /** Candidates whose size has been computed */
  candidatesSized: number;

  /** Directory most recently visited */
  currentPath?: string;
}

/**
 * Result of a full scan-and-plan pass.
 */
export interface ScanResult {
  /** Candidates proposed for deletion */
  plan: Plan;

  /** Candidates protected by a keep-latest policy */
  kept: SizedCandidate[];

  /** Candidates dropped by the age/exclusion filter or for being empty */
  skipped: SizedCandidate[];

  /** Unreadable paths encountered, in discovery order */
  warnings: ScanWarning[];

  /** Number of directories listed by the walker */
  directoriesScanned: number;
}

/**
 * Configuration options for the deletion operation.
 */
export interface DeleteOptions {
  /** Retry failed removals after making the tree writable */
  force?: boolean;

  /** Number of removals running at once */
  concurrency?: number;

  /** Directories that must never be removed (defaults to the home directory) */
  protectedPaths?: string[];
}

/**
 * Results of a deletion operation.
 * Provides detailed feedback about what was deleted and any errors.
 */
export interface DeletionResult {
  /** Total number of candidates attempted */
  totalAttempted: number;

  /** Number successfully deleted */
  successful: number;

  /** Number that failed to delete */
  failed: number;

  /** Total bytes freed by successful removals */
  bytesFreed: number;

  /** Human-readable formatted version of bytes freed */
  formattedBytesFreed: string;

  /** Detailed results for each deletion attempt, in input order */
  details: DeletionDetail[];
}

/**
 * Result of a single removal attempt.
 */
export interface DeletionDetail {
  candidate: SizedCandidate;

  success: boolean;

  /** Error message if deletion failed */
  error?: string;

  /** Time taken to delete in milliseconds */
  durationMs: number;
}

/**
 * CLI arguments after commander has parsed them.
 */
export interface CliArgs {
  /** Positional and --roots paths, unexpanded */
  roots: string[];

  /** -x/--exclude paths, unexpanded */
  excludes: string[];

  minAgeDays: number;
  maxDepth: number;
  keepLatestDerived: number;
  keepLatestCache: number;

  /** Deep scan: no age filter, unbounded depth, keep nothing */
  all: boolean;

  /** Skip the confirmation prompt */
  yes: boolean;

  /** Report only, never delete */
  dryRun: boolean;

  /** Output as JSON */
  json: boolean;

  /** Open the interactive review screen */
  interactive: boolean;
}

/**
 * Per-group summary shown in headers and reports.
 */
export interface GroupSummary {
  group: CategoryGroup;
  count: number;
  totalBytes: number;
}

/**
 * Statistics calculated from a list of candidates and a selection.
 */
export interface PlanStatistics {
  /** Number of candidates listed */
  totalCandidates: number;

  /** Total size of listed candidates */
  totalSizeBytes: number;

  totalSizeFormatted: string;

  /** Number of selected candidates */
  selectedCount: number;

  selectedSizeBytes: number;

  selectedSizeFormatted: string;

  /** Groups sorted by total size, largest first */
  groups: GroupSummary[];
}

/**
 * Size bands used for colouring sizes in reports and the TUI.
 */
export type SizeCategory = 'tiny' | 'small' | 'medium' | 'large' | 'huge';

/**
 * Thresholds for size categorization in bytes.
 */
export const SIZE_THRESHOLDS = {
  /** 1 KB - below is "tiny" */
  KB: 1024,
  /** 1 MB - below is "small" */
  MB: 1024 * 1024,
  /** 1 GB - below is "medium" */
  GB: 1024 * 1024 * 1024,
  /** 1 TB - below is "large" */
  TB: 1024 * 1024 * 1024 * 1024,
} as const;

/**
 * Default scan settings shared by the CLI and the TUI.
 */
export const DEFAULT_SCAN_SETTINGS = {
  minAgeDays: 2,
  maxDepth: 5,
  keepLatestDerived: 1,
  keepLatestCache: 1,
} as const;

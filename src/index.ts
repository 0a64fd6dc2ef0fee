/**
 * devstrip - Public API
 *
 * Most users will use the CLI, but the scan and cleanup pipeline is
 * available for integration with other tools.
 *
 * @example
 * ```typescript
 * import { runCleanup, validateScanConfig } from 'devstrip';
 *
 * const config = validateScanConfig({
 *   roots: ['/path/to/projects'],
 *   excludes: [],
 *   minAgeDays: 7,
 *   maxDepth: 5,
 *   keepLatestDerived: 1,
 *   keepLatestCache: 1,
 * });
 *
 * const report = await runCleanup(config, { dryRun: true, confirm: () => false });
 * console.log(report.scan.plan.totalBytes);
 * ```
 */

// Core types
export type {
  Candidate,
  Category,
  CategoryGroup,
  CategoryId,
  DeleteOptions,
  DeletionDetail,
  DeletionResult,
  Plan,
  PlanStatistics,
  RetentionPolicy,
  ScanConfig,
  ScanProgress,
  ScanResult,
  ScanWarning,
  SizedCandidate,
} from './types.js';
export type { CleanupOptions, CleanupReport, ConfirmDecision, ConfirmFn } from './cleanup.js';
export type { ScanOptions } from './plan.js';
export type { WalkOptions } from './walker.js';
export type { FileSystemReader } from './utils.js';

// Core functions
export { CATEGORIES, RULES, classify, defaultRoots, wellKnownRoots } from './catalog.js';
export { walkCandidates, collectCandidates, canonicalize } from './walker.js';
export { estimateSize } from './size.js';
export { applyRetention, isEligible, isExcluded } from './filters.js';
export { buildPlan, scanAndPlan } from './plan.js';
export { deleteCandidates, generateDeletionPreview } from './deletion.js';
export { exitCodeFor, runCleanup } from './cleanup.js';
export {
  buildScanConfig,
  expandHome,
  loadExcludeFile,
  resolveRoots,
  scanConfigSchema,
  validateScanConfig,
} from './config.js';
export { ConfigError, InvariantError } from './errors.js';
export { formatJSONReport, formatPlanReport } from './report.js';
export { formatBytes, formatRelativeTime, calculateStatistics } from './utils.js';

// Constants
export { DEFAULT_SCAN_SETTINGS, SIZE_THRESHOLDS } from './types.js';

export { VERSION } from './version.js';

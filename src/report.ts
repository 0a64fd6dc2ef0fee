/**
 * Terminal and JSON reports for devstrip
 *
 * Every formatter takes a picocolors instance so callers decide whether
 * output is styled (`--no-color`, NO_COLOR, non-TTY) and tests can pass
 * `pc.createColors(false)` to assert plain text.
 */

import pc from 'picocolors';
import type { CleanupReport } from './cleanup.js';
import type { DeletionResult, Plan, ScanWarning, SizedCandidate } from './types.js';
import { formatBytes, formatTimestamp, truncateMiddle } from './utils.js';

export type Colors = ReturnType<typeof pc.createColors>;

const CATEGORY_WIDTH = 16;
const SIZE_WIDTH = 9;
const REASON_WIDTH = 48;

/**
 * Render the plan as an indexed table followed by the reclaimable total.
 *
 * ```
 * [01] DerivedData         1.2 GB  2024-03-01 09:30  Old DerivedData projects
 *      -> /Users/me/Library/Developer/Xcode/DerivedData/App-abc
 * ```
 */
export function formatPlanReport(plan: Plan, colors: Colors = pc): string {
  if (plan.candidates.length === 0) {
    return colors.green('Nothing to clean up.');
  }

  const indexWidth = Math.max(2, String(plan.candidates.length).length);
  const lines: string[] = [];

  plan.candidates.forEach((candidate, i) => {
    const index = colors.gray(`[${String(i + 1).padStart(indexWidth, '0')}]`);
    const category = candidate.category.label.padEnd(CATEGORY_WIDTH);
    const size = colors.cyan(formatBytes(candidate.sizeBytes).padStart(SIZE_WIDTH));
    const lastUsed = formatTimestamp(candidate.modifiedAt);
    const reason = truncateMiddle(candidate.reason, REASON_WIDTH);

    lines.push(`${index} ${category} ${size}  ${lastUsed}  ${reason}`);
    lines.push(`${' '.repeat(indexWidth + 3)}${colors.gray('->')} ${candidate.path}`);
  });

  lines.push('');
  lines.push(`Reclaimable space: ${colors.bold(formatBytes(plan.totalBytes))}`);
  return lines.join('\n');
}

/**
 * One line per entry protected by a keep-latest policy.
 */
export function formatKeptReport(kept: readonly SizedCandidate[], colors: Colors = pc): string {
  if (kept.length === 0) return '';
  const lines = [colors.gray(`Kept ${kept.length} most recent:`)];
  for (const candidate of kept) {
    lines.push(colors.gray(`  ${candidate.category.label}: ${candidate.path}`));
  }
  return lines.join('\n');
}

/**
 * Batch of unreadable paths, printed once at the end of a run.
 */
export function formatWarnings(warnings: readonly ScanWarning[], colors: Colors = pc): string {
  if (warnings.length === 0) return '';
  const noun = warnings.length === 1 ? 'path' : 'paths';
  const lines = [colors.yellow(`Skipped ${warnings.length} unreadable ${noun}:`)];
  for (const warning of warnings) {
    const code = warning.code ? ` (${warning.code})` : '';
    lines.push(`  ${warning.path}${colors.gray(code)}`);
  }
  return lines.join('\n');
}

/**
 * Outcome of a deletion run, failures listed individually.
 */
export function formatDeletionSummary(result: DeletionResult, colors: Colors = pc): string {
  const lines = [
    `Deleted ${result.successful}/${result.totalAttempted} directories, freed ${colors.green(result.formattedBytesFreed)}`,
  ];
  for (const detail of result.details) {
    if (!detail.success) {
      lines.push(colors.red(`  ✗ ${detail.candidate.path}: ${detail.error ?? 'Unknown error'}`));
    }
  }
  return lines.join('\n');
}

function candidateToJSON(candidate: SizedCandidate) {
  return {
    path: candidate.path,
    category: candidate.category.id,
    label: candidate.category.label,
    reason: candidate.reason,
    sizeBytes: candidate.sizeBytes,
    modifiedAt: candidate.modifiedAt.toISOString(),
  };
}

/**
 * Machine-readable report for `--json`.
 */
export function formatJSONReport(report: CleanupReport): string {
  const { scan, deletion } = report;
  return JSON.stringify({
    dryRun: report.dryRun,
    totalBytes: scan.plan.totalBytes,
    candidates: scan.plan.candidates.map(candidateToJSON),
    kept: scan.kept.map(candidateToJSON),
    warnings: scan.warnings,
    directoriesScanned: scan.directoriesScanned,
    deletion: deletion && {
      successful: deletion.successful,
      failed: deletion.failed,
      bytesFreed: deletion.bytesFreed,
      failures: deletion.details
        .filter(detail => !detail.success)
        .map(detail => ({ path: detail.candidate.path, error: detail.error })),
    },
  }, null, 2);
}

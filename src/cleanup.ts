/**
 * Cleanup session: scan, confirm, delete.
 *
 * Confirmation is a capability passed in by the caller (a prompt in the
 * CLI, a dialog in the TUI, a stub in tests). Nothing is removed unless
 * it approves.
 */

import type { EventEmitter } from 'events';
import { deleteCandidates } from './deletion.js';
import { scanAndPlan } from './plan.js';
import type { ScanOptions } from './plan.js';
import type {
  DeleteOptions,
  DeletionResult,
  Plan,
  ScanConfig,
  ScanResult,
  SizedCandidate,
} from './types.js';

/**
 * `true` approves the whole plan, `false` nothing, an array approves
 * those candidates only.
 */
export type ConfirmDecision = boolean | readonly SizedCandidate[];

export type ConfirmFn = (plan: Plan) => Promise<ConfirmDecision> | ConfirmDecision;

export interface CleanupOptions extends ScanOptions {
  /** Asked once per run when there is something to delete */
  confirm: ConfirmFn;

  /** Report only; neither `confirm` nor the executor is called */
  dryRun?: boolean;

  deleteOptions?: DeleteOptions;

  /** Called when the scan is done, before confirmation */
  onPlan?: (scan: ScanResult) => void;

  onDeleteProgress?: (completed: number, total: number, currentPath: string) => void;
}

export interface CleanupReport {
  scan: ScanResult;

  /** Candidates handed to the executor */
  approved: SizedCandidate[];

  /** Undefined when nothing was deleted (dry-run, empty plan or declined) */
  deletion?: DeletionResult;

  dryRun: boolean;
}

/**
 * Keep only approved candidates that belong to the plan, in plan order.
 */
export function resolveApproval(plan: Plan, decision: ConfirmDecision): SizedCandidate[] {
  if (decision === true) return [...plan.candidates];
  if (decision === false) return [];
  const approved = new Set(decision.map(candidate => candidate.path));
  return plan.candidates.filter(candidate => approved.has(candidate.path));
}

/**
 * Run one cleanup: build the plan, ask for confirmation, delete.
 */
export async function runCleanup(
  config: ScanConfig,
  options: CleanupOptions,
): Promise<CleanupReport> {
  const scan = await scanAndPlan(config, options);
  options.onPlan?.(scan);

  const dryRun = options.dryRun ?? false;
  if (dryRun || scan.plan.candidates.length === 0) {
    return { scan, approved: [], dryRun };
  }

  const approved = resolveApproval(scan.plan, await options.confirm(scan.plan));
  if (approved.length === 0) {
    return { scan, approved, dryRun };
  }

  const deletion = await deleteCandidates(approved, options.deleteOptions, options.onDeleteProgress);
  return { scan, approved, deletion, dryRun };
}

/**
 * Process exit code for a finished session: 1 when any removal failed.
 */
export function exitCodeFor(report: CleanupReport): number {
  return report.deletion !== undefined && report.deletion.failed > 0 ? 1 : 0;
}

/**
 * Abort `controller` on the first SIGINT from `target`.
 *
 * @returns A function that stops listening; safe to call more than once
 */
export function abortOnInterrupt(
  controller: AbortController,
  target: EventEmitter = process,
): () => void {
  const onInterrupt = () => controller.abort();
  target.once('SIGINT', onInterrupt);
  return () => {
    target.off('SIGINT', onInterrupt);
  };
}

/**
 * Deletion module for devstrip
 *
 * Removes approved candidates. Each removal is independent: a failure is
 * recorded against its own candidate and never stops the others.
 *
 * Nothing here decides *what* to delete. Callers pass the plan (or the
 * subset the user approved) after confirmation.
 */

import { promises as fs } from 'fs';
import { homedir } from 'os';
import { dirname, join } from 'path';
import pLimit from 'p-limit';
import { errorCode, errorMessage } from './errors.js';
import type { DeleteOptions, DeletionDetail, DeletionResult, SizedCandidate } from './types.js';
import { fileExists, formatBytes, isSameOrWithin } from './utils.js';

const DELETE_CONCURRENCY = 4;

/**
 * Delete the given candidates.
 *
 * Details come back in the same order as `candidates`; `bytesFreed`
 * counts successful removals only.
 *
 * @param onProgress - Called after each removal with the number completed
 */
export async function deleteCandidates(
  candidates: readonly SizedCandidate[],
  options: DeleteOptions = {},
  onProgress?: (completed: number, total: number, currentPath: string) => void,
): Promise<DeletionResult> {
  const protectedPaths = options.protectedPaths ?? [homedir()];
  const limit = pLimit(options.concurrency ?? DELETE_CONCURRENCY);
  let completed = 0;

  const details = await Promise.all(
    candidates.map(candidate =>
      limit(async () => {
        const detail = await deleteCandidate(candidate, options.force ?? false, protectedPaths);
        completed++;
        onProgress?.(completed, candidates.length, candidate.path);
        return detail;
      }),
    ),
  );

  const successful = details.filter(detail => detail.success);
  const bytesFreed = successful.reduce((sum, detail) => sum + detail.candidate.sizeBytes, 0);

  return {
    totalAttempted: candidates.length,
    successful: successful.length,
    failed: details.length - successful.length,
    bytesFreed,
    formattedBytesFreed: formatBytes(bytesFreed),
    details,
  };
}

/**
 * Reason a path must never be removed, if any.
 */
export function refusalReason(path: string, protectedPaths: readonly string[]): string | undefined {
  if (dirname(path) === path) {
    return 'Refusing to delete the filesystem root';
  }
  const guarded = protectedPaths.find(protectedPath => isSameOrWithin(protectedPath, path));
  if (guarded !== undefined) {
    return `Refusing to delete ${guarded}`;
  }
  return undefined;
}

async function deleteCandidate(
  candidate: SizedCandidate,
  force: boolean,
  protectedPaths: readonly string[],
): Promise<DeletionDetail> {
  const startTime = Date.now();
  const finish = (error?: string): DeletionDetail => ({
    candidate,
    success: error === undefined,
    error,
    durationMs: Date.now() - startTime,
  });

  const refusal = refusalReason(candidate.path, protectedPaths);
  if (refusal) return finish(refusal);

  if (!(await fileExists(candidate.path))) {
    return finish('Directory does not exist');
  }

  try {
    await fs.rm(candidate.path, { recursive: true });
    return finish();
  } catch (error) {
    if (!force) return finish(describeRemovalError(error));
  }

  // Read-only entries block removal on some platforms; clear them and retry once
  try {
    await makeWritableRecursive(candidate.path);
    await fs.rm(candidate.path, { recursive: true });
    return finish();
  } catch (error) {
    return finish(describeRemovalError(error));
  }
}

/**
 * Map a removal failure to a message the user can act on.
 */
export function describeRemovalError(error: unknown): string {
  switch (errorCode(error)) {
    case 'EPERM':
    case 'EACCES':
      return 'Permission denied - check file permissions';
    case 'EBUSY':
      return 'Directory in use - close any programs using these files';
    case 'ENOTEMPTY':
      return 'Directory not empty - may contain read-only files. Try using --force';
    case 'ENOENT':
      return 'Directory does not exist';
    default:
      return errorMessage(error) || 'Unknown error during deletion';
  }
}

/**
 * Recursively make a tree writable by its owner.
 */
async function makeWritableRecursive(dirPath: string): Promise<void> {
  await fs.chmod(dirPath, 0o755);
  const entries = await fs.readdir(dirPath, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = join(dirPath, entry.name);
    if (entry.isDirectory()) {
      await makeWritableRecursive(fullPath);
    } else if (entry.isFile()) {
      await fs.chmod(fullPath, 0o644);
    }
  }
}

/**
 * Summarize candidates about to be removed, for the confirmation prompt.
 */
export function generateDeletionPreview(candidates: readonly SizedCandidate[]): string {
  if (candidates.length === 0) {
    return 'Nothing selected for deletion.';
  }

  const totalBytes = candidates.reduce((sum, candidate) => sum + candidate.sizeBytes, 0);
  const noun = candidates.length === 1 ? 'directory' : 'directories';
  const lines = candidates.map(
    candidate => `   • ${candidate.path} (${formatBytes(candidate.sizeBytes)})`,
  );

  return [
    `You are about to delete ${candidates.length} ${noun}:`,
    '',
    ...lines,
    '',
    `   Total space to reclaim: ${formatBytes(totalBytes)}`,
  ].join('\n');
}

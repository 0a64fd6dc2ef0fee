import { describe, it, expect } from 'vitest';
import pc from 'picocolors';
import { buildPlan } from '../src/plan.js';
import {
  formatDeletionSummary,
  formatJSONReport,
  formatKeptReport,
  formatPlanReport,
  formatWarnings,
} from '../src/report.js';
import type { DeletionResult } from '../src/types.js';
import { makeCandidate } from './helpers.js';

const plain = pc.createColors(false);

describe('formatPlanReport', () => {
  it('prints an indexed table and the reclaimable total', () => {
    const plan = buildPlan([
      makeCandidate('/work/app/node_modules', {
        sizeBytes: 1024 * 1024,
        modifiedAt: new Date(2024, 2, 1, 9, 30),
        reason: 'Stale build or cache (node_modules)',
      }),
    ]);

    expect(formatPlanReport(plan, plain).split('\n')).toEqual([
      '[01] Project artifact    1.0 MB  2024-03-01 09:30  Stale build or cache (node_modules)',
      '     -> /work/app/node_modules',
      '',
      'Reclaimable space: 1.0 MB',
    ]);
  });

  it('shortens long reasons in the middle', () => {
    const reason = `Stale build or cache (${'x'.repeat(60)})`;
    const plan = buildPlan([makeCandidate('/w/x', { reason })]);

    const [row] = formatPlanReport(plan, plain).split('\n');
    const printed = row.slice(row.lastIndexOf('  ') + 2);

    expect(Array.from(printed)).toHaveLength(48);
    expect(printed.startsWith('Stale build or cache')).toBe(true);
    expect(printed).toContain('…');
    expect(printed.endsWith('x)')).toBe(true);
  });

  it('pads indexes to the width of the count', () => {
    const plan = buildPlan(
      Array.from({ length: 100 }, (_, i) => makeCandidate(`/w/p${String(i).padStart(3, '0')}/build`, { sizeBytes: 100 })),
    );

    const lines = formatPlanReport(plan, plain).split('\n');

    expect(lines[0].startsWith('[001] ')).toBe(true);
    expect(lines[1].startsWith('      -> /w/p000/build')).toBe(true);
    expect(lines[198].startsWith('[100] ')).toBe(true);
  });

  it('says when there is nothing to do', () => {
    expect(formatPlanReport(buildPlan([]), plain)).toBe('Nothing to clean up.');
  });
});

describe('formatKeptReport', () => {
  it('lists protected entries', () => {
    const kept = [makeCandidate('/dd/AppB', { category: 'xcode-derived-data' })];

    expect(formatKeptReport(kept, plain)).toBe('Kept 1 most recent:\n  DerivedData: /dd/AppB');
    expect(formatKeptReport([], plain)).toBe('');
  });
});

describe('formatWarnings', () => {
  it('prints the batch with error codes', () => {
    const text = formatWarnings([
      { path: '/w/locked', message: 'EACCES: permission denied', code: 'EACCES' },
      { path: '/w/odd', message: 'something failed' },
    ], plain);

    expect(text).toBe('Skipped 2 unreadable paths:\n  /w/locked (EACCES)\n  /w/odd');
  });

  it('is empty without warnings', () => {
    expect(formatWarnings([], plain)).toBe('');
  });
});

describe('formatDeletionSummary', () => {
  it('lists failures under the totals', () => {
    const result: DeletionResult = {
      totalAttempted: 2,
      successful: 1,
      failed: 1,
      bytesFreed: 2048,
      formattedBytesFreed: '2 KB',
      details: [
        { candidate: makeCandidate('/w/a/build'), success: true, durationMs: 3 },
        { candidate: makeCandidate('/w/b/build'), success: false, error: 'Directory does not exist', durationMs: 1 },
      ],
    };

    expect(formatDeletionSummary(result, plain)).toBe(
      'Deleted 1/2 directories, freed 2 KB\n  ✗ /w/b/build: Directory does not exist',
    );
  });
});

describe('formatJSONReport', () => {
  it('serializes the plan and the outcome', () => {
    const candidate = makeCandidate('/w/a/build', {
      sizeBytes: 4096,
      modifiedAt: new Date(Date.UTC(2024, 0, 2, 3, 4, 5)),
    });
    const plan = buildPlan([candidate]);

    const parsed: unknown = JSON.parse(formatJSONReport({
      scan: { plan, kept: [], skipped: [], warnings: [], directoriesScanned: 7 },
      approved: [],
      dryRun: true,
    }));

    expect(parsed).toEqual({
      dryRun: true,
      totalBytes: 4096,
      candidates: [
        {
          path: '/w/a/build',
          category: 'project-artifact',
          label: 'Project artifact',
          reason: 'Stale build or cache (build)',
          sizeBytes: 4096,
          modifiedAt: '2024-01-02T03:04:05.000Z',
        },
      ],
      kept: [],
      warnings: [],
      directoriesScanned: 7,
    });
  });
});

/**
 * Test suite for plan building and the scan pipeline
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync } from 'fs';
import { join } from 'path';
import { ConfigError, InvariantError } from '../src/errors.js';
import { buildPlan, findNestedPath, scanAndPlan } from '../src/plan.js';
import type { ScanConfig, ScanProgress } from '../src/types.js';
import { nodeReader } from '../src/utils.js';
import {
  cleanupTestDir,
  createTestDir,
  daysAgo,
  lockedReader,
  makeCandidate,
  setModified,
  writeBytes,
} from './helpers.js';

describe('buildPlan', () => {
  it('orders by size, largest first, ties by path', () => {
    const plan = buildPlan([
      makeCandidate('/w/b/build', { sizeBytes: 100 }),
      makeCandidate('/w/c/build', { sizeBytes: 900 }),
      makeCandidate('/w/a/build', { sizeBytes: 100 }),
    ]);

    expect(plan.candidates.map(c => c.path)).toEqual(['/w/c/build', '/w/a/build', '/w/b/build']);
  });

  it('totals sizes exactly', () => {
    const plan = buildPlan([
      makeCandidate('/w/a/build', { sizeBytes: 1 }),
      makeCandidate('/w/b/build', { sizeBytes: 2 ** 40 }),
      makeCandidate('/w/c/build', { sizeBytes: 12345 }),
    ]);

    expect(plan.totalBytes).toBe(1 + 2 ** 40 + 12345);
  });

  it('returns a frozen plan', () => {
    const plan = buildPlan([makeCandidate('/w/a/build')]);

    expect(Object.isFrozen(plan)).toBe(true);
    expect(Object.isFrozen(plan.candidates)).toBe(true);
  });

  it('builds an empty plan', () => {
    expect(buildPlan([])).toEqual({ candidates: [], totalBytes: 0 });
  });

  it('refuses nested candidates', () => {
    const build = () => buildPlan([
      makeCandidate('/w/app/node_modules'),
      makeCandidate('/w/app/node_modules/pkg/dist'),
    ]);

    expect(build).toThrow(InvariantError);
    expect(build).toThrow('Candidate /w/app/node_modules/pkg/dist lies inside candidate /w/app/node_modules');
  });
});

describe('findNestedPath', () => {
  it('finds an ancestor and descendant pair', () => {
    expect(findNestedPath(['/a/b', '/c', '/a/b/c/d'])).toEqual(['/a/b', '/a/b/c/d']);
    expect(findNestedPath(['/a/b', '/a/bc'])).toBeUndefined();
  });
});

describe('scanAndPlan', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = createTestDir('devstrip-plan-');
  });

  afterEach(() => {
    cleanupTestDir(testDir);
  });

  function config(overrides: Partial<ScanConfig> = {}): ScanConfig {
    return {
      roots: [testDir],
      excludes: [],
      minAgeDays: 2,
      maxDepth: 5,
      keepLatestDerived: 1,
      keepLatestCache: 1,
      ...overrides,
    };
  }

  it('keeps the newest DerivedData project and proposes the older one', async () => {
    const home = join(testDir, 'home');
    const derived = join(home, 'Library/Developer/Xcode/DerivedData');
    writeBytes(join(derived, 'AppA/Build/app.o'), 5000);
    writeBytes(join(derived, 'AppB/Build/app.o'), 3000);
    setModified(join(derived, 'AppA'), daysAgo(10));
    setModified(join(derived, 'AppB'), daysAgo(1));

    const result = await scanAndPlan(config({ roots: [], home }));

    expect(result.plan.candidates.map(c => c.path)).toEqual([join(derived, 'AppA')]);
    expect(result.plan.totalBytes).toBe(5000);
    expect(result.kept.map(c => c.path)).toEqual([join(derived, 'AppB')]);
    expect(result.skipped).toEqual([]);
  });

  it('applies retention to DerivedData found under a configured root', async () => {
    const derived = join(testDir, 'DerivedData');
    writeBytes(join(derived, 'AppA/Build/app.o'), 500);
    writeBytes(join(derived, 'AppB/Build/app.o'), 300);
    setModified(join(derived, 'AppA'), daysAgo(10));
    setModified(join(derived, 'AppB'), daysAgo(1));

    const result = await scanAndPlan(config());

    expect(result.plan.candidates.map(c => [c.path, c.sizeBytes])).toEqual([[join(derived, 'AppA'), 500]]);
    expect(result.plan.totalBytes).toBe(500);
    expect(result.kept.map(c => c.path)).toEqual([join(derived, 'AppB')]);
    expect(result.plan.candidates[0].category.id).toBe('xcode-derived-data');
  });

  it('keeps exactly the N newest and proposes the rest by size', async () => {
    const derived = join(testDir, 'DerivedData');
    const entries: Array<[string, number, number]> = [
      ['A0', 100, 1],
      ['A1', 400, 3],
      ['A2', 200, 20],
      ['A3', 300, 30],
    ];
    for (const [name, bytes] of entries) {
      writeBytes(join(derived, name, 'data.bin'), bytes);
    }
    for (const [name, , age] of entries) {
      setModified(join(derived, name), daysAgo(age));
    }

    const result = await scanAndPlan(config({ keepLatestDerived: 2 }));

    expect(result.plan.candidates.map(c => [c.path, c.sizeBytes])).toEqual([
      [join(derived, 'A3'), 300],
      [join(derived, 'A2'), 200],
    ]);
    expect(result.kept.map(c => c.path)).toEqual([join(derived, 'A0'), join(derived, 'A1')]);
    expect(result.skipped).toEqual([]);
  });

  it('skips candidates younger than the age threshold', async () => {
    writeBytes(join(testDir, 'app/node_modules/x/index.js'), 100);
    setModified(join(testDir, 'app/node_modules'), daysAgo(0.5));

    const result = await scanAndPlan(config());

    expect(result.plan.candidates).toEqual([]);
    expect(result.skipped.map(c => c.path)).toEqual([join(testDir, 'app/node_modules')]);
  });

  it('drops candidates with nothing to reclaim', async () => {
    mkdirSync(join(testDir, 'app/build'), { recursive: true });
    setModified(join(testDir, 'app/build'), daysAgo(30));

    const result = await scanAndPlan(config());

    expect(result.plan.candidates).toEqual([]);
    expect(result.skipped.map(c => c.sizeBytes)).toEqual([0]);
  });

  it('sorts the plan by size and totals it', async () => {
    writeBytes(join(testDir, 'small/dist/a.js'), 200);
    writeBytes(join(testDir, 'large/target/b.bin'), 900);
    writeBytes(join(testDir, 'large/target/c.bin'), 100);
    setModified(join(testDir, 'small/dist'), daysAgo(5));
    setModified(join(testDir, 'large/target'), daysAgo(5));

    const { plan } = await scanAndPlan(config());

    expect(plan.candidates.map(c => [c.path, c.sizeBytes])).toEqual([
      [join(testDir, 'large/target'), 1000],
      [join(testDir, 'small/dist'), 200],
    ]);
    expect(plan.totalBytes).toBe(1200);
  });

  it('never proposes anything under an exclude', async () => {
    writeBytes(join(testDir, 'secret/build/a.bin'), 100);
    setModified(join(testDir, 'secret/build'), daysAgo(5));

    const result = await scanAndPlan(config({ excludes: [join(testDir, 'secret')] }));

    expect(result.plan.candidates).toEqual([]);
    expect(result.skipped).toEqual([]);
  });

  it('surfaces unreadable paths as warnings', async () => {
    writeBytes(join(testDir, 'app/build/ok/a.bin'), 100);
    writeBytes(join(testDir, 'app/build/locked/b.bin'), 100);
    setModified(join(testDir, 'app/build'), daysAgo(5));

    const result = await scanAndPlan(config(), {
      reader: lockedReader([join(testDir, 'app/build/locked')]),
    });

    expect(result.plan.totalBytes).toBe(100);
    expect(result.warnings.map(w => [w.path, w.code])).toEqual([[join(testDir, 'app/build/locked'), 'EACCES']]);
  });

  it('reports progress while scanning', async () => {
    writeBytes(join(testDir, 'a/build/x.bin'), 10);
    writeBytes(join(testDir, 'b/build/x.bin'), 10);
    const updates: ScanProgress[] = [];

    const result = await scanAndPlan(config(), { onProgress: (progress) => updates.push(progress) });

    const last = updates[updates.length - 1];
    expect(last.candidatesFound).toBe(2);
    expect(last.candidatesSized).toBe(2);
    expect(result.directoriesScanned).toBe(3);
  });

  it('validates the configuration before touching the filesystem', async () => {
    const readdir = vi.fn(nodeReader.readdir);

    await expect(
      scanAndPlan(config({ minAgeDays: -1 }), { reader: { readdir, lstat: nodeReader.lstat } }),
    ).rejects.toThrow(ConfigError);
    expect(readdir).not.toHaveBeenCalled();
  });
});

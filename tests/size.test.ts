import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, symlinkSync } from 'fs';
import { join } from 'path';
import { estimateSize } from '../src/size.js';
import type { ScanWarning } from '../src/types.js';
import { cleanupTestDir, createTestDir, lockedReader, writeBytes } from './helpers.js';

let testDir: string;

beforeEach(() => {
  testDir = createTestDir('devstrip-size-');
});

afterEach(() => {
  cleanupTestDir(testDir);
});

describe('estimateSize', () => {
  it('sums the length of every file below the directory', async () => {
    writeBytes(join(testDir, 'target/a.bin'), 100);
    writeBytes(join(testDir, 'target/deep/er/b.bin'), 250);

    expect(await estimateSize(join(testDir, 'target'))).toBe(350);
  });

  it('returns 0 for a tree of empty directories', async () => {
    mkdirSync(join(testDir, 'build/x/y'), { recursive: true });

    expect(await estimateSize(join(testDir, 'build'))).toBe(0);
  });

  it('neither follows nor counts symbolic links', async () => {
    writeBytes(join(testDir, 'outside/huge.bin'), 1000);
    writeBytes(join(testDir, 'build/small.bin'), 100);
    symlinkSync(join(testDir, 'outside/huge.bin'), join(testDir, 'build/link.bin'));
    symlinkSync(join(testDir, 'outside'), join(testDir, 'build/linkdir'));

    expect(await estimateSize(join(testDir, 'build'))).toBe(100);
    expect(await estimateSize(join(testDir, 'build/linkdir'))).toBe(0);
  });

  it('returns the length of a plain file', async () => {
    writeBytes(join(testDir, 'file.bin'), 42);

    expect(await estimateSize(join(testDir, 'file.bin'))).toBe(42);
  });

  it('rejects when the path itself cannot be read', async () => {
    await expect(estimateSize(join(testDir, 'missing'))).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('counts what it can read and warns about the rest', async () => {
    writeBytes(join(testDir, 'cache/ok/a.bin'), 300);
    writeBytes(join(testDir, 'cache/locked/b.bin'), 700);
    const warnings: ScanWarning[] = [];

    const size = await estimateSize(join(testDir, 'cache'), {
      reader: lockedReader([join(testDir, 'cache/locked')]),
      onWarning: (warning) => warnings.push(warning),
    });

    expect(size).toBe(300);
    expect(warnings).toEqual([
      {
        path: join(testDir, 'cache/locked'),
        message: `EACCES: permission denied, scandir '${join(testDir, 'cache/locked')}'`,
        code: 'EACCES',
      },
    ]);
  });
});

import { describe, it, expect } from 'vitest';
import { createProgram, parseCliArgs } from '../src/args.js';

function quietProgram() {
  return createProgram()
    .exitOverride()
    .configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
}

describe('parseCliArgs', () => {
  it('applies defaults', () => {
    expect(parseCliArgs([], quietProgram())).toEqual({
      roots: [],
      excludes: [],
      minAgeDays: 2,
      maxDepth: 5,
      keepLatestDerived: 1,
      keepLatestCache: 1,
      all: false,
      yes: false,
      dryRun: false,
      json: false,
      interactive: false,
      force: false,
      color: true,
    });
  });

  it('collects positional paths, --roots and repeated excludes', () => {
    const args = parseCliArgs(
      ['~/code', '--roots', '/srv/a', '/srv/b', '-x', 'vendor', '--exclude', '/tmp/keep'],
      quietProgram(),
    );

    expect(args.roots).toEqual(['~/code', '/srv/a', '/srv/b']);
    expect(args.excludes).toEqual(['vendor', '/tmp/keep']);
  });

  it('parses numeric options and flags', () => {
    const args = parseCliArgs(
      ['--min-age-days', '0', '--max-depth', '8', '--keep-latest-derived', '3', '--keep-latest-cache', '0', '-a', '-y', '--dry-run', '--json', '-i', '-f', '--no-color'],
      quietProgram(),
    );

    expect(args).toMatchObject({
      minAgeDays: 0,
      maxDepth: 8,
      keepLatestDerived: 3,
      keepLatestCache: 0,
      all: true,
      yes: true,
      dryRun: true,
      json: true,
      interactive: true,
      force: true,
      color: false,
    });
  });

  it('raises a zero depth to one', () => {
    expect(parseCliArgs(['--max-depth', '0'], quietProgram()).maxDepth).toBe(1);
  });

  it('rejects values that are not non-negative integers', () => {
    expect(() => parseCliArgs(['--min-age-days', '-1'], quietProgram())).toThrow();
    expect(() => parseCliArgs(['--max-depth', 'deep'], quietProgram())).toThrow(/Expected a non-negative integer/);
    expect(() => parseCliArgs(['--keep-latest-cache', '1.5'], quietProgram())).toThrow(/Expected a non-negative integer/);
  });
});

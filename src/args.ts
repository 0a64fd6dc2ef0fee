/**
 * Command-line argument parsing for devstrip
 *
 * Kept apart from the entry point so the option table can be exercised
 * without running a scan.
 */

import { Command, InvalidArgumentError } from 'commander';
import type { CliArgs } from './types.js';
import { DEFAULT_SCAN_SETTINGS } from './types.js';
import { VERSION } from './version.js';

interface RawOptions {
  roots?: string[];
  exclude: string[];
  minAgeDays: number;
  maxDepth: number;
  keepLatestDerived: number;
  keepLatestCache: number;
  all?: boolean;
  yes?: boolean;
  dryRun?: boolean;
  json?: boolean;
  interactive?: boolean;
  force?: boolean;
  color: boolean;
}

/**
 * Parsed arguments plus flags that do not reach the scan.
 */
export interface ParsedArgs extends CliArgs {
  /** Retry failed removals after making read-only entries writable */
  force: boolean;
  color: boolean;
}

function parseCount(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Build the commander program. Errors throw instead of exiting when
 * `exitOverride` is set, which tests rely on.
 */
export function createProgram(): Command {
  return new Command()
    .name('devstrip')
    .description('Find and remove stale build outputs, IDE caches and package-manager caches')
    .version(VERSION)
    .argument('[paths...]', 'extra directories to scan (cwd and ~/Projects, ~/workspace, ~/Work, ~/Developer are always included)')
    .option('--roots <paths...>', 'extra directories to scan')
    .option('-x, --exclude <path>', 'never report anything at or below this path (repeatable)', collect, [])
    .option('--min-age-days <n>', 'only propose entries unused for at least n days', parseCount, DEFAULT_SCAN_SETTINGS.minAgeDays)
    .option('--max-depth <n>', 'how deep to search below each root', parseCount, DEFAULT_SCAN_SETTINGS.maxDepth)
    .option('--keep-latest-derived <n>', 'newest DerivedData/Archives entries to keep', parseCount, DEFAULT_SCAN_SETTINGS.keepLatestDerived)
    .option('--keep-latest-cache <n>', 'newest Homebrew downloads to keep', parseCount, DEFAULT_SCAN_SETTINGS.keepLatestCache)
    .option('-a, --all', 'deep scan: no age filter, unlimited depth, keep nothing')
    .option('-y, --yes', 'skip the confirmation prompt')
    .option('--dry-run', 'show the plan without deleting anything')
    .option('--json', 'print a JSON report')
    .option('-i, --interactive', 'review the plan in an interactive screen')
    .option('-f, --force', 'retry failed removals after making read-only entries writable')
    .option('--no-color', 'disable colored output');
}

/**
 * Parse user arguments (without the node and script entries).
 */
export function parseCliArgs(argv: readonly string[], program: Command = createProgram()): ParsedArgs {
  program.parse([...argv], { from: 'user' });
  const options = program.opts<RawOptions>();

  return {
    roots: [...program.args, ...(options.roots ?? [])],
    excludes: options.exclude,
    minAgeDays: options.minAgeDays,
    maxDepth: Math.max(1, options.maxDepth),
    keepLatestDerived: options.keepLatestDerived,
    keepLatestCache: options.keepLatestCache,
    all: options.all ?? false,
    yes: options.yes ?? false,
    dryRun: options.dryRun ?? false,
    json: options.json ?? false,
    interactive: options.interactive ?? false,
    force: options.force ?? false,
    color: options.color,
  };
}

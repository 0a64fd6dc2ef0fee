#!/usr/bin/env node
/**
 * CLI entry point for devstrip
 *
 * Builds the scan configuration from the command line, then either opens
 * the interactive review screen or runs a prompt-driven cleanup:
 *
 *   scan (spinner) → plan report → confirm → delete → summary
 *
 * Exit status is 1 on configuration errors and when any removal fails.
 */

import { homedir } from 'os';
import { cancel, confirm, intro, isCancel, outro, spinner } from '@clack/prompts';
import { render } from 'ink';
import pc from 'picocolors';
import React from 'react';
import { App } from './app.js';
import { parseCliArgs } from './args.js';
import type { ParsedArgs } from './args.js';
import { abortOnInterrupt, exitCodeFor, runCleanup } from './cleanup.js';
import type { ConfirmDecision } from './cleanup.js';
import { buildScanConfig } from './config.js';
import { ConfigError, errorMessage } from './errors.js';
import {
  formatDeletionSummary,
  formatJSONReport,
  formatKeptReport,
  formatPlanReport,
  formatWarnings,
} from './report.js';
import type { Colors } from './report.js';
import type { DeletionResult, Plan, ScanConfig } from './types.js';
import { formatBytes } from './utils.js';

async function runInteractive(config: ScanConfig, args: ParsedArgs): Promise<number> {
  const outcome: { deletion?: DeletionResult; failure?: string } = {};
  const { waitUntilExit } = render(
    <App
      config={config}
      dryRun={args.dryRun}
      deleteOptions={{ force: args.force }}
      onExit={(deletion, failure) => {
        outcome.deletion = deletion;
        outcome.failure = failure;
      }}
    />,
  );
  await waitUntilExit();
  if (outcome.failure !== undefined) return 1;
  return outcome.deletion !== undefined && outcome.deletion.failed > 0 ? 1 : 0;
}

async function runPrompted(config: ScanConfig, args: ParsedArgs, colors: Colors): Promise<number> {
  const quiet = args.json;
  const controller = new AbortController();
  // Only the scan is cancellable; once the plan is out Ctrl-C behaves normally
  const stopListening = abortOnInterrupt(controller);

  if (!quiet) intro(colors.cyan('devstrip'));

  // Spinner output would corrupt --json, and clack's spinner must be started before it is stopped
  const s = spinner();
  let spinning = false;
  const startSpinner = (message: string) => {
    if (quiet) return;
    s.start(message);
    spinning = true;
  };
  const updateSpinner = (message: string) => {
    if (spinning) s.message(message);
  };
  const stopSpinner = (message: string) => {
    if (!spinning) return;
    s.stop(message);
    spinning = false;
  };

  const askToDelete = async (plan: Plan): Promise<ConfirmDecision> => {
    // JSON output is for scripts: without --yes it only reports
    if (quiet && !args.yes) return false;
    const answer = args.yes || await confirm({
      message: `Delete ${plan.candidates.length} directories (${formatBytes(plan.totalBytes)})?`,
      initialValue: false,
    });
    if (isCancel(answer)) {
      cancel('Cancelled');
      return false;
    }
    if (answer) startSpinner('Deleting...');
    return answer;
  };

  startSpinner('Scanning...');

  try {
    const report = await runCleanup(config, {
      dryRun: args.dryRun,
      deleteOptions: { force: args.force },
      signal: controller.signal,
      confirm: askToDelete,
      onProgress: (progress) => {
        updateSpinner(`Scanning... ${progress.directoriesScanned} dirs, ${progress.candidatesFound} found`);
      },
      onPlan: (scan) => {
        stopListening();
        stopSpinner(`Scanned ${scan.directoriesScanned} directories`);
        if (quiet) return;
        console.log(formatPlanReport(scan.plan, colors));
        const kept = formatKeptReport(scan.kept, colors);
        if (kept) console.log(`\n${kept}`);
      },
      onDeleteProgress: (completed, total) => {
        updateSpinner(`Deleting... ${completed}/${total}`);
      },
    });

    if (quiet) {
      console.log(formatJSONReport(report));
      return exitCodeFor(report);
    }

    if (report.deletion) {
      stopSpinner(`Deleted ${report.deletion.successful}/${report.deletion.totalAttempted}`);
      console.log(formatDeletionSummary(report.deletion, colors));
    }

    const warnings = formatWarnings(report.scan.warnings, colors);
    if (warnings) console.log(`\n${warnings}`);

    if (report.dryRun) {
      outro(colors.yellow('Dry run - nothing was deleted.'));
    } else if (!report.deletion) {
      outro('Nothing deleted.');
    } else {
      outro(colors.green(`Freed ${report.deletion.formattedBytesFreed}`));
    }
    return exitCodeFor(report);
  } catch (error) {
    if (controller.signal.aborted) {
      stopSpinner('Cancelled');
      return 130;
    }
    stopSpinner('Failed');
    throw error;
  } finally {
    stopListening();
  }
}

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));
  const colors = pc.createColors(args.color && pc.isColorSupported);
  const config = await buildScanConfig(args, { cwd: process.cwd(), home: homedir() });

  if (args.interactive) {
    return runInteractive(config, args);
  }
  return runPrompted(config, args, colors);
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    const prefix = error instanceof ConfigError ? 'Configuration error' : 'Error';
    console.error(pc.red(`${prefix}: ${errorMessage(error)}`));
    process.exitCode = 1;
  },
);

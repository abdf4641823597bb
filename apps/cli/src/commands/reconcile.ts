/**
 * Reconcile Command
 * 
 * Delete files from the targets that no longer exist locally.
 */

import chalk from 'chalk';
import ora from 'ora';
import { DeletionReconciler, type ReconcileReport } from '@dashsync/sync';
import type { TargetChoice, TargetName } from '@dashsync/core';
import { loadCommandConfig } from './shared.js';
import { createRuntime } from '../lib/runtime.js';
import { confirm } from '../lib/prompt.js';
import {
  printError,
  printHeader,
  printInfo,
  printJson,
  printPathList,
  printSuccess,
  printWarning,
} from '../lib/output.js';

interface ReconcileCommandOptions {
  target: TargetChoice;
  dryRun?: boolean;
  yes?: boolean;
  password?: string;
  json?: boolean;
}

// Candidates shown before asking for confirmation
const PREVIEW_LIMIT = 10;

export async function reconcileCommand(options: ReconcileCommandOptions): Promise<void> {
  const config = loadCommandConfig();
  const runtime = createRuntime(config, options);

  const reconciler = new DeletionReconciler({
    router: runtime.router,
    pathMapper: runtime.pathMapper,
    watchedDirs: config.watchedDirs,
    extensions: config.extensions,
  });

  if (!options.json) {
    printHeader(options.dryRun ? 'Reconcile (dry run)' : 'Reconcile');
  }

  const spinner = options.json ? null : ora('Comparing local files with targets...').start();

  const askToDelete = async (candidates: string[], target: TargetName): Promise<boolean> => {
    spinner?.stop();
    console.log();
    printWarning(`${candidates.length} file(s) on ${chalk.bold(target)} no longer exist locally:`);
    printPathList(candidates, PREVIEW_LIMIT);
    const answer = await confirm(`Delete ${candidates.length} file(s) from ${target}?`);
    spinner?.start('Deleting...');
    return answer;
  };

  let reports: ReconcileReport[];
  try {
    reports = await reconciler.reconcile({
      dryRun: options.dryRun,
      assumeYes: options.yes,
      confirm: askToDelete,
    });
    spinner?.stop();
  } catch (error) {
    spinner?.fail('Reconciliation failed');
    printError(error instanceof Error ? error.message : 'Unknown error');
    process.exit(1);
  }

  if (options.json) {
    printJson(reports);
  } else {
    for (const report of reports) {
      printReport(report);
    }
  }

  if (reports.some(r => r.failed > 0)) {
    process.exit(1);
  }
}

function printReport(report: ReconcileReport): void {
  const label = `${chalk.bold(report.target)} ${chalk.gray(report.url)}`;

  switch (report.status) {
    case 'unavailable':
      printWarning(`${label}: no files listed (empty or unreachable), skipped`);
      break;
    case 'in-sync':
      printSuccess(`${label}: in sync (${report.remoteCount} files)`);
      break;
    case 'dry-run':
      printInfo(`${label}: would delete ${report.candidates.length} file(s)`);
      printPathList(report.candidates);
      break;
    case 'cancelled':
      printInfo(`${label}: deletion cancelled`);
      break;
    case 'completed':
      if (report.failed === 0) {
        printSuccess(`${label}: deleted ${report.deleted}/${report.candidates.length} file(s)`);
      } else {
        printError(`${label}: deleted ${report.deleted}/${report.candidates.length} file(s), ${report.failed} failed`);
      }
      break;
  }
}

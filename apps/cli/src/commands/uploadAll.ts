/**
 * Upload-All Command
 * 
 * One-time upload of every file already in the watched directories.
 */

import chalk from 'chalk';
import ora from 'ora';
import { uploadAll } from '@dashsync/sync';
import type { TargetChoice } from '@dashsync/core';
import { formatDuration } from '@dashsync/utils';
import { loadCommandConfig } from './shared.js';
import { createRuntime } from '../lib/runtime.js';
import { printError, printHeader, printKeyValue, printSuccess, printWarning } from '../lib/output.js';

interface UploadAllOptions {
  target: TargetChoice;
  password?: string;
}

export async function uploadAllCommand(options: UploadAllOptions): Promise<void> {
  const config = loadCommandConfig();
  const runtime = createRuntime(config, options);

  printHeader('Upload all files');
  printKeyValue('Project root', config.projectRoot);
  for (const target of runtime.targets) {
    printKeyValue(`Target (${target.name})`, target.url);
  }
  console.log();

  const started = Date.now();
  const spinner = ora('Scanning watched directories...').start();

  const summary = await uploadAll({
    router: runtime.router,
    watchedDirs: runtime.watchedDirs,
    filter: runtime.filter,
    onProgress: (done, total) => {
      spinner.text = `Uploading ${done}/${total}`;
    },
  });

  spinner.stop();

  for (const path of summary.failures) {
    printError(`Failed: ${path}`);
  }
  if (summary.skipped > 0) {
    printWarning(`${summary.skipped} file(s) skipped by filters`);
  }

  const line = `Uploaded ${summary.uploaded}/${summary.total} files ${chalk.gray(`in ${formatDuration(Date.now() - started)}`)}`;
  if (summary.failed === 0) {
    printSuccess(line);
  } else {
    printError(line);
    process.exit(1);
  }
}

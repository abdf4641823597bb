/**
 * Watch Command
 * 
 * Watch the project directories and mirror changes to the targets
 * until interrupted.
 */

import chalk from 'chalk';
import { FolderWatcher, WatchService } from '@dashsync/sync';
import type { TargetChoice } from '@dashsync/core';
import { loadCommandConfig } from './shared.js';
import { createRuntime } from '../lib/runtime.js';
import { printHeader, printInfo, printKeyValue, printSuccess } from '../lib/output.js';

interface WatchOptions {
  target: TargetChoice;
  password?: string;
}

export async function watchCommand(options: WatchOptions): Promise<void> {
  const config = loadCommandConfig();
  const runtime = createRuntime(config, options);

  printHeader('dashsync watcher');
  printKeyValue('Project root', config.projectRoot);
  printKeyValue('Watching', config.watchedDirs.join(', '));
  for (const target of runtime.targets) {
    printKeyValue(`Target (${target.name})`, target.url);
  }
  console.log();

  const watcher = new FolderWatcher({
    paths: runtime.watchedDirs,
    filter: runtime.filter,
  });

  const service = new WatchService({
    router: runtime.router,
    watcher,
    debounceMs: config.debounceMs,
  });

  await service.start();
  printSuccess(`Watching for changes ${chalk.gray('(Ctrl+C to stop)')}`);

  // Graceful shutdown
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  for (const signal of signals) {
    process.once(signal, async () => {
      printInfo('Stopping watcher...');
      await service.stop();
      printSuccess('Watcher stopped');
      process.exit(0);
    });
  }
}

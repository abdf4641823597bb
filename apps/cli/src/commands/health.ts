/**
 * Health Command
 * 
 * Probe each target's /health endpoint.
 */

import ora from 'ora';
import type { TargetChoice } from '@dashsync/core';
import { loadCommandConfig } from './shared.js';
import { createRuntime } from '../lib/runtime.js';
import { printError, printHeader, printJson, printStatus, printSuccess } from '../lib/output.js';

interface HealthOptions {
  target: TargetChoice;
  json?: boolean;
}

export async function healthCommand(options: HealthOptions): Promise<void> {
  const config = loadCommandConfig();
  const runtime = createRuntime(config, options);

  const spinner = options.json ? null : ora('Checking targets...').start();
  const results = await runtime.router.healthCheck();
  spinner?.stop();

  const rows = runtime.targets.map(target => ({
    target: target.name,
    url: target.url,
    healthy: results[target.name] === true,
  }));

  if (options.json) {
    printJson(rows);
  } else {
    printHeader('Target Health');
    for (const row of rows) {
      printStatus(row.healthy, row.target, row.url);
    }
    console.log();
  }

  if (rows.every(r => r.healthy)) {
    if (!options.json) printSuccess('All targets reachable');
  } else {
    if (!options.json) printError('Some targets are unreachable');
    process.exit(1);
  }
}

#!/usr/bin/env node
/**
 * CLI Entry Point
 * 
 * Command-line interface for dashsync.
 * Watches project directories and mirrors them to dashboard targets.
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';

// Commands
import { watchCommand } from './commands/watch.js';
import { reconcileCommand } from './commands/reconcile.js';
import { uploadAllCommand } from './commands/uploadAll.js';
import { healthCommand } from './commands/health.js';
import { hashPasswordCommand } from './commands/hashPassword.js';
import { parseTargetChoice } from './lib/runtime.js';

const program = new Command();

const targetOption = (): Option =>
  new Option('-t, --target <target>', 'Target to sync with (local, server, both)')
    .argParser(parseTargetChoice)
    .makeOptionMandatory();

const passwordOption = (): Option =>
  new Option('-p, --password <password>', 'Password for protected content (prompted when needed if omitted)');

program
  .name('dashsync')
  .description('Mirror local research outputs to dashboard storage')
  .version('0.1.0');

// ============================================
// SYNC COMMANDS
// ============================================

program
  .command('watch')
  .description('Watch directories and upload/delete changes as they happen')
  .addOption(targetOption())
  .addOption(passwordOption())
  .action(watchCommand);

program
  .command('reconcile')
  .description('Delete files from targets that no longer exist locally')
  .addOption(targetOption())
  .addOption(passwordOption())
  .option('--dry-run', 'Show what would be deleted without deleting')
  .option('-y, --yes', 'Delete without asking for confirmation')
  .option('--json', 'Output in JSON format')
  .action(reconcileCommand);

program
  .command('upload-all')
  .description('Upload every existing file in the watched directories')
  .addOption(targetOption())
  .addOption(passwordOption())
  .action(uploadAllCommand);

// ============================================
// SYSTEM COMMANDS
// ============================================

program
  .command('health')
  .description('Check that targets are reachable')
  .addOption(targetOption())
  .option('--json', 'Output in JSON format')
  .action(healthCommand);

program
  .command('hash-password')
  .description('Generate a bcrypt hash for protected content')
  .option('-u, --username <username>', 'Username to print alongside the hash', 'researcher')
  .action(hashPasswordCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.log('Run', chalk.cyan('dashsync --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

// Parse and execute
program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('✗'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});

/**
 * Shared command helpers
 */

import { ConfigError } from '@dashsync/core';
import { loadSyncConfig, type SyncConfig } from '../config/index.js';
import { printError } from '../lib/output.js';

/**
 * Load config or exit with the validation problems
 */
export function loadCommandConfig(): SyncConfig {
  try {
    return loadSyncConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      printError(error.message);
      for (const [field, issues] of Object.entries(error.details ?? {})) {
        console.error(`  ${field}: ${String(issues)}`);
      }
      process.exit(1);
    }
    throw error;
  }
}

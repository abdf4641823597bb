/**
 * CLI Configuration
 * 
 * Watcher settings from environment variables (.env at the monorepo root
 * is loaded first).
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError, type TargetName } from '@dashsync/core';
import { splitList } from '@dashsync/utils';

// Get monorepo root
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../..');

// Load .env from monorepo root
dotenvConfig({ path: resolve(monorepoRoot, '.env') });

const numeric = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().nonnegative());

// Environment schema
export const syncEnvSchema = z.object({
  SYNC_PROJECT_ROOT: z.string().optional(),
  SYNC_WATCHED_DIRS: z.string().default('outputs/chunks,outputs/summaries,prompts'),
  
  // Targets
  SYNC_LOCAL_URL: z.string().url().default('http://localhost:3000'),
  SYNC_SERVER_URL: z.string().url().default('http://localhost:8000'),
  
  // Timing
  SYNC_DEBOUNCE_MS: numeric('2000'),
  SYNC_DELETE_DELAY_MS: numeric('1000'),
  SYNC_REQUEST_TIMEOUT_MS: numeric('30000'),
  
  // Filtering
  SYNC_MAX_FILE_SIZE: numeric('52428800'),
  SYNC_WATCH_PATTERNS: z.string().default(''),
  SYNC_IGNORE_PATTERNS: z.string().default('*.tmp,*.temp,.DS_Store,*.swp,*.lock'),
  SYNC_EXTENSIONS: z.string().default('.json,.txt'),
  
  // Protected content
  SYNC_AUTH_HOSTS: z.string().default('localhost:3000,localhost:8000'),
  PROTECTED_CONTENT_USERNAME: z.string().min(1).default('researcher'),
  PROTECTED_DATASETS: z.string().default(''),
});

export interface SyncConfig {
  projectRoot: string;
  // Relative to projectRoot
  watchedDirs: string[];
  targetUrls: Record<TargetName, string>;
  debounceMs: number;
  deleteDelayMs: number;
  requestTimeoutMs: number;
  maxFileSize: number;
  watchPatterns: string[];
  ignorePatterns: string[];
  extensions: string[];
  authHosts: string[];
  protectedContent: {
    username: string;
    datasets: string[];
  };
}

function normalizeExtension(ext: string): string {
  const lower = ext.toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

/**
 * Parse and validate environment into a typed config
 */
export function loadSyncConfig(source: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): SyncConfig {
  const parsed = syncEnvSchema.safeParse(source);

  if (!parsed.success) {
    throw new ConfigError('Invalid environment configuration', parsed.error.flatten().fieldErrors);
  }

  const env = parsed.data;
  const watchedDirs = splitList(env.SYNC_WATCHED_DIRS);

  if (watchedDirs.length === 0) {
    throw new ConfigError('SYNC_WATCHED_DIRS must name at least one directory');
  }

  return {
    projectRoot: resolve(cwd, env.SYNC_PROJECT_ROOT ?? '.'),
    watchedDirs,
    targetUrls: {
      local: env.SYNC_LOCAL_URL,
      server: env.SYNC_SERVER_URL,
    },
    debounceMs: env.SYNC_DEBOUNCE_MS,
    deleteDelayMs: env.SYNC_DELETE_DELAY_MS,
    requestTimeoutMs: env.SYNC_REQUEST_TIMEOUT_MS,
    maxFileSize: env.SYNC_MAX_FILE_SIZE,
    watchPatterns: splitList(env.SYNC_WATCH_PATTERNS),
    ignorePatterns: splitList(env.SYNC_IGNORE_PATTERNS),
    extensions: splitList(env.SYNC_EXTENSIONS).map(normalizeExtension),
    authHosts: splitList(env.SYNC_AUTH_HOSTS),
    protectedContent: {
      username: env.PROTECTED_CONTENT_USERNAME,
      datasets: splitList(env.PROTECTED_DATASETS),
    },
  };
}

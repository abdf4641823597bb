/**
 * API Configuration
 * 
 * All configuration loaded from environment variables.
 * Uses sensible defaults for development.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError } from '@dashsync/core';
import { splitList } from '@dashsync/utils';

// Get monorepo root
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../..');

// Load .env from monorepo root
dotenvConfig({ path: resolve(monorepoRoot, '.env') });

// Helper to resolve relative paths from monorepo root
function resolvePath(p: string): string {
  if (p.startsWith('./') || p.startsWith('../')) {
    return resolve(monorepoRoot, p);
  }
  return p;
}

const numeric = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  API_HOST: z.string().default('0.0.0.0'),
  API_PORT: numeric('8000'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  
  // Storage (relative to monorepo root)
  STORAGE_PATH: z.string().default('./data'),
  BODY_LIMIT: numeric('52428800'),
  
  // Security
  CORS_ORIGINS: z.string().default('*'),
  
  // Protected content
  PROTECTED_CONTENT_USERNAME: z.string().min(1).default('researcher'),
  PROTECTED_CONTENT_PASSWORD_HASH: z.string().optional(),
  PROTECTED_DATASETS: z.string().default(''),
});

export interface ApiConfig {
  nodeEnv: 'development' | 'production' | 'test';
  host: string;
  port: number;
  logLevel: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
  storagePath: string;
  bodyLimit: number;
  // `true` reflects any origin
  corsOrigins: string[] | true;
  protectedContent: {
    username: string;
    passwordHash: string | null;
    datasets: string[];
  };
}

/**
 * Parse and validate environment into a typed config
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): ApiConfig {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    throw new ConfigError('Invalid environment configuration', parseResult.error.flatten().fieldErrors);
  }

  const env = parseResult.data;
  const datasets = splitList(env.PROTECTED_DATASETS);
  const passwordHash = env.PROTECTED_CONTENT_PASSWORD_HASH?.trim() || null;

  if (datasets.length > 0 && !passwordHash) {
    throw new ConfigError(
      'PROTECTED_CONTENT_PASSWORD_HASH is required when PROTECTED_DATASETS is set; generate one with `dashsync hash-password`'
    );
  }

  const origins = splitList(env.CORS_ORIGINS);

  return {
    nodeEnv: env.NODE_ENV,
    host: env.API_HOST,
    port: env.API_PORT,
    logLevel: env.LOG_LEVEL,
    storagePath: resolvePath(env.STORAGE_PATH),
    bodyLimit: env.BODY_LIMIT,
    corsOrigins: origins.length === 0 || origins.includes('*') ? true : origins,
    protectedContent: {
      username: env.PROTECTED_CONTENT_USERNAME,
      passwordHash,
      datasets,
    },
  };
}

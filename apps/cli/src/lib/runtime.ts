/**
 * Runtime Wiring
 * 
 * Builds the upload router and its collaborators from config and
 * command-line options.
 */

import { join } from 'node:path';
import { InvalidArgumentError } from 'commander';
import type { Target, TargetChoice } from '@dashsync/core';
import {
  AuthGate,
  PathMapper,
  PromptCredentialSource,
  UploadRouter,
  type PasswordPrompt,
} from '@dashsync/upload';
import { FileFilter } from '@dashsync/sync';
import type { SyncConfig } from '../config/index.js';
import { printWarning } from './output.js';
import { promptHidden } from './prompt.js';

const TARGET_CHOICES: readonly TargetChoice[] = ['local', 'server', 'both'];

export interface RuntimeOptions {
  target: TargetChoice;
  password?: string;
}

export interface Runtime {
  targets: Target[];
  pathMapper: PathMapper;
  auth: AuthGate;
  router: UploadRouter;
  filter: FileFilter;
  // Absolute watched directories
  watchedDirs: string[];
}

/**
 * Commander argument parser for --target
 */
export function parseTargetChoice(value: string): TargetChoice {
  const choice = TARGET_CHOICES.find(c => c === value);
  if (!choice) {
    throw new InvalidArgumentError(`Expected one of: ${TARGET_CHOICES.join(', ')}`);
  }
  return choice;
}

export function resolveTargets(choice: TargetChoice, config: SyncConfig): Target[] {
  const local: Target = { name: 'local', url: config.targetUrls.local };
  const server: Target = { name: 'server', url: config.targetUrls.server };

  switch (choice) {
    case 'local':
      return [local];
    case 'server':
      return [server];
    case 'both':
      return [local, server];
  }
}

const askPassword: PasswordPrompt = async (message) => {
  printWarning(message);
  return promptHidden('Password: ');
};

export function createRuntime(
  config: SyncConfig,
  options: RuntimeOptions,
  passwordPrompt: PasswordPrompt = askPassword
): Runtime {
  const targets = resolveTargets(options.target, config);
  const pathMapper = new PathMapper(config.projectRoot);

  const auth = new AuthGate(
    {
      proxyHosts: config.authHosts,
      protectedDatasets: config.protectedContent.datasets,
    },
    new PromptCredentialSource({
      username: config.protectedContent.username,
      password: options.password,
      prompt: passwordPrompt,
    })
  );

  const router = new UploadRouter({
    targets,
    pathMapper,
    auth,
    deleteDelayMs: config.deleteDelayMs,
    http: { timeoutMs: config.requestTimeoutMs },
  });

  const filter = new FileFilter({
    maxFileSize: config.maxFileSize,
    ignorePatterns: config.ignorePatterns,
    watchPatterns: config.watchPatterns,
  });

  return {
    targets,
    pathMapper,
    auth,
    router,
    filter,
    watchedDirs: config.watchedDirs.map(dir => join(config.projectRoot, ...dir.split('/'))),
  };
}

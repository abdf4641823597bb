/**
 * Deletion Reconciler
 * 
 * Diffs the local file set against each target's listing and deletes
 * remote files that no longer exist locally. Targets, listings and
 * deletes are all handled one at a time.
 */

import { resolve } from 'node:path';
import type { FileTreeNode, TargetName } from '@dashsync/core';
import type { PathMapper, TargetClient, UploadRouter } from '@dashsync/upload';
import { createLogger, getExtension, walkFiles, type Logger } from '@dashsync/utils';

export const DEFAULT_EXTENSIONS = ['.json', '.txt'];

export type ReconcileStatus = 'in-sync' | 'dry-run' | 'cancelled' | 'completed' | 'unavailable';

export interface ReconcileReport {
  target: TargetName;
  url: string;
  remoteCount: number;
  candidates: string[];
  deleted: number;
  failed: number;
  status: ReconcileStatus;
}

export interface ReconcileOptions {
  dryRun?: boolean;
  // Skip confirmation
  assumeYes?: boolean;
  // Asked before deleting; resolving false cancels that target
  confirm?: (candidates: string[], target: TargetName) => Promise<boolean>;
}

export interface ReconcilerConfig {
  router: UploadRouter;
  pathMapper: PathMapper;
  watchedDirs: string[];
  extensions?: string[];
  logger?: Logger;
}

/**
 * Flatten a listing into relative file paths, depth first, starting from
 * the root's children so the root name never prefixes a path.
 */
export function flattenFileTree(root: FileTreeNode): string[] {
  const files: string[] = [];

  const visit = (node: FileTreeNode, prefix: string): void => {
    const path = prefix ? `${prefix}/${node.name}` : node.name;
    if (node.type === 'file') {
      files.push(path);
      return;
    }
    for (const child of node.children ?? []) {
      visit(child, path);
    }
  };

  for (const child of root.children ?? []) {
    visit(child, '');
  }

  return files;
}

/**
 * Remote paths with no local counterpart, sorted
 */
export function findOrphans(remote: Iterable<string>, local: ReadonlySet<string>): string[] {
  return [...new Set(remote)].filter(path => !local.has(path)).sort();
}

export class DeletionReconciler {
  private readonly router: UploadRouter;
  private readonly pathMapper: PathMapper;
  private readonly watchedDirs: string[];
  private readonly extensions: Set<string>;
  private readonly log: Logger;

  constructor(config: ReconcilerConfig) {
    this.router = config.router;
    this.pathMapper = config.pathMapper;
    this.watchedDirs = config.watchedDirs;
    this.extensions = new Set((config.extensions ?? DEFAULT_EXTENSIONS).map(ext => ext.toLowerCase()));
    this.log = config.logger ?? createLogger({ component: 'reconciler' });
  }

  /**
   * Relative paths of every local file with a recognized extension
   */
  async collectLocalFiles(): Promise<Set<string>> {
    const local = new Set<string>();

    for (const dir of this.watchedDirs) {
      const absolute = resolve(this.pathMapper.root, dir);
      for (const file of await walkFiles(absolute)) {
        if (this.extensions.has(getExtension(file))) {
          local.add(this.pathMapper.getRelativePath(file));
        }
      }
    }

    this.log.info({ count: local.size }, 'Collected local files');
    return local;
  }

  /**
   * Fetch a target's listing as a flat set. Any failure yields an empty set.
   */
  async fetchRemoteFiles(client: TargetClient): Promise<Set<string>> {
    try {
      const tree = await this.router.listTarget(client);
      return new Set(flattenFileTree(tree));
    } catch (error) {
      this.log.error(
        { target: client.target.url, err: error instanceof Error ? error.message : String(error) },
        'Could not list files on target'
      );
      return new Set();
    }
  }

  async reconcile(options: ReconcileOptions = {}): Promise<ReconcileReport[]> {
    const local = await this.collectLocalFiles();
    const reports: ReconcileReport[] = [];

    for (const client of this.router.targets) {
      reports.push(await this.reconcileTarget(client, local, options));
    }

    return reports;
  }

  private async reconcileTarget(
    client: TargetClient,
    local: ReadonlySet<string>,
    options: ReconcileOptions
  ): Promise<ReconcileReport> {
    const { target } = client;
    const report: ReconcileReport = {
      target: target.name,
      url: target.url,
      remoteCount: 0,
      candidates: [],
      deleted: 0,
      failed: 0,
      status: 'unavailable',
    };

    const remote = await this.fetchRemoteFiles(client);
    if (remote.size === 0) {
      this.log.warn({ target: target.url }, 'No files found on target or target unavailable, skipping');
      return report;
    }

    report.remoteCount = remote.size;
    report.candidates = findOrphans(remote, local);

    if (report.candidates.length === 0) {
      this.log.info({ target: target.url, remote: remote.size }, 'Target is in sync');
      return { ...report, status: 'in-sync' };
    }

    this.log.info(
      { target: target.url, candidates: report.candidates.length },
      'Found files to delete'
    );

    if (options.dryRun) {
      return { ...report, status: 'dry-run' };
    }

    if (!options.assumeYes) {
      const confirmed = options.confirm ? await options.confirm(report.candidates, target.name) : false;
      if (!confirmed) {
        this.log.info({ target: target.url }, 'Deletion cancelled');
        return { ...report, status: 'cancelled' };
      }
    }

    for (const path of report.candidates) {
      const outcome = await this.router.deleteFromTarget(client, path);
      if (outcome.ok) {
        report.deleted++;
      } else {
        report.failed++;
      }
    }

    this.log.info(
      { target: target.url, deleted: report.deleted, total: report.candidates.length },
      `Deleted ${report.deleted}/${report.candidates.length} files`
    );

    return { ...report, status: 'completed' };
  }
}

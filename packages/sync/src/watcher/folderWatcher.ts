/**
 * Folder Watcher
 * 
 * Monitors directories for file changes using native fs.watch.
 * 
 * Features:
 * - Recursive directory watching
 * - Missing watch directories are created on start
 * - Known-file tracking to tell created from modified, and to expand a
 *   removed directory into deletes for the files it held
 * - Size/glob filter on created and modified files
 */

import { EventEmitter } from 'node:events';
import { watch, type FSWatcher } from 'node:fs';
import { join, resolve, sep } from 'node:path';
import { createLogger, ensureDir, safeStat, walkFiles, type Logger } from '@dashsync/utils';
import { FileFilter, type RejectReason } from './fileFilter.js';

export type ChangeKind = 'created' | 'modified' | 'deleted';

export interface ChangeEvent {
  kind: ChangeKind;
  path: string;
  timestamp: Date;
  size?: number;
}

export interface RejectedEvent {
  path: string;
  reason: RejectReason;
  detail?: string;
}

export interface WatcherErrorEvent {
  path: string;
  error: unknown;
}

export interface WatcherConfig {
  // Directories to watch
  paths: string[];
  
  // Recursive watching
  recursive?: boolean;
  
  // Filter applied to created/modified files
  filter?: FileFilter;
  
  logger?: Logger;
}

export class FolderWatcher extends EventEmitter {
  private readonly paths: string[];
  private readonly recursive: boolean;
  private readonly filter: FileFilter;
  private readonly log: Logger;
  private watchers: Map<string, FSWatcher> = new Map();
  private knownFiles: Set<string> = new Set();
  private isRunning = false;

  constructor(config: WatcherConfig) {
    super();
    
    this.paths = config.paths.map(path => resolve(path));
    this.recursive = config.recursive ?? true;
    this.filter = config.filter ?? new FileFilter();
    this.log = config.logger ?? createLogger({ component: 'folder-watcher' });
  }

  /**
   * Start watching configured directories
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      throw new Error('Watcher is already running');
    }

    this.isRunning = true;

    for (const watchPath of this.paths) {
      await this.watchDirectory(watchPath);
    }

    this.emit('ready', { paths: this.getWatchedPaths() });
  }

  /**
   * Stop watching all directories
   */
  stop(): void {
    this.isRunning = false;

    for (const [path, watcher] of this.watchers) {
      watcher.close();
      this.watchers.delete(path);
    }

    this.emit('close');
  }

  /**
   * Get currently watched paths
   */
  getWatchedPaths(): string[] {
    return Array.from(this.watchers.keys());
  }

  get running(): boolean {
    return this.isRunning;
  }

  get knownFileCount(): number {
    return this.knownFiles.size;
  }

  /**
   * Classify a raw notification for `fullPath` and emit the result.
   * Never throws; failures are emitted as 'error'.
   */
  async handleFileEvent(fullPath: string): Promise<void> {
    try {
      const stats = await safeStat(fullPath);

      if (!stats) {
        this.handleRemoval(fullPath);
        return;
      }

      if (stats.isDirectory()) {
        // Files moved in with their directory arrive as one event
        for (const file of await walkFiles(fullPath)) {
          await this.handleFile(file);
        }
        return;
      }

      await this.handleFile(fullPath);
    } catch (error) {
      this.emitError(fullPath, error);
    }
  }

  // Private methods

  private async watchDirectory(dirPath: string): Promise<void> {
    if (this.watchers.has(dirPath)) {
      return;
    }

    try {
      const stats = await safeStat(dirPath);
      if (!stats) {
        this.log.warn({ path: dirPath }, 'Watch directory does not exist, creating it');
        await ensureDir(dirPath);
      }

      const watcher = watch(
        dirPath,
        { recursive: this.recursive },
        (_eventType, filename) => {
          if (filename) {
            void this.handleFileEvent(join(dirPath, filename));
          }
        }
      );

      watcher.on('error', (error) => {
        this.emitError(dirPath, error);
      });

      this.watchers.set(dirPath, watcher);
      this.log.info({ path: dirPath }, 'Watching directory');

      // Initial scan only records what exists; nothing is emitted
      for (const file of await walkFiles(dirPath)) {
        this.knownFiles.add(file);
      }
    } catch (error) {
      this.emitError(dirPath, error);
    }
  }

  private async handleFile(fullPath: string): Promise<void> {
    const kind: ChangeKind = this.knownFiles.has(fullPath) ? 'modified' : 'created';
    this.knownFiles.add(fullPath);

    const verdict = await this.filter.check(fullPath);
    if (!verdict.accepted) {
      if (verdict.reason === 'too-large') {
        this.log.warn({ path: fullPath, detail: verdict.detail }, 'File too large, skipping');
      } else {
        this.log.debug({ path: fullPath, reason: verdict.reason, detail: verdict.detail }, 'File filtered out');
      }
      const rejected: RejectedEvent = { path: fullPath, reason: verdict.reason, detail: verdict.detail };
      this.emit('rejected', rejected);
      return;
    }

    this.emitChange(kind, fullPath, verdict.size);
  }

  private handleRemoval(fullPath: string): void {
    if (this.knownFiles.delete(fullPath)) {
      this.emitChange('deleted', fullPath);
      return;
    }

    // A removed directory: report every file known beneath it
    const prefix = fullPath.endsWith(sep) ? fullPath : fullPath + sep;
    const removed = [...this.knownFiles].filter(file => file.startsWith(prefix)).sort();

    if (removed.length === 0) {
      this.log.debug({ path: fullPath }, 'Removal of untracked path ignored');
      return;
    }

    for (const file of removed) {
      this.knownFiles.delete(file);
      this.emitChange('deleted', file);
    }
  }

  private emitError(path: string, error: unknown): void {
    // Listeners are gone after stop(); an unheard 'error' would throw
    if (this.listenerCount('error') === 0) {
      this.log.error({ path, err: error instanceof Error ? error.message : String(error) }, 'Watcher error');
      return;
    }
    const event: WatcherErrorEvent = { path, error };
    this.emit('error', event);
  }

  private emitChange(kind: ChangeKind, path: string, size?: number): void {
    const event: ChangeEvent = { kind, path, timestamp: new Date(), size };
    this.emit('change', event);
  }
}

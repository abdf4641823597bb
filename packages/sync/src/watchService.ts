/**
 * Watch Service
 * 
 * Connects the folder watcher to the upload router:
 * created/modified -> debounce -> upload, deleted -> cancel pending upload -> delete.
 */

import { resolve } from 'node:path';
import type { UploadRouter } from '@dashsync/upload';
import { createLogger, type Logger } from '@dashsync/utils';
import { Debouncer } from './watcher/debouncer.js';
import type {
  ChangeEvent,
  FolderWatcher,
  RejectedEvent,
  WatcherErrorEvent,
} from './watcher/folderWatcher.js';

export const DEFAULT_DEBOUNCE_MS = 2000;

export interface WatchServiceConfig {
  router: UploadRouter;
  watcher: FolderWatcher;
  debounceMs?: number;
  // Probe target health on start
  healthCheck?: boolean;
  logger?: Logger;
}

export class WatchService {
  private readonly router: UploadRouter;
  private readonly watcher: FolderWatcher;
  private readonly debouncer: Debouncer<string>;
  private readonly healthCheck: boolean;
  private readonly log: Logger;
  private inFlight: Set<Promise<unknown>> = new Set();
  private started = false;

  constructor(config: WatchServiceConfig) {
    this.router = config.router;
    this.watcher = config.watcher;
    this.healthCheck = config.healthCheck ?? true;
    this.log = config.logger ?? createLogger({ component: 'watch-service' });
    this.debouncer = new Debouncer<string>(
      (path) => this.track(this.router.upload(path)),
      config.debounceMs ?? DEFAULT_DEBOUNCE_MS,
      this.log
    );
  }

  async start(): Promise<void> {
    if (this.started) {
      throw new Error('Watch service is already running');
    }
    this.started = true;

    if (this.healthCheck) {
      await this.router.healthCheck();
    }

    this.watcher.on('change', (event: ChangeEvent) => this.handleChange(event));
    this.watcher.on('rejected', (event: RejectedEvent) => {
      this.log.debug({ path: event.path, reason: event.reason }, 'Change rejected by filter');
    });
    this.watcher.on('error', ({ path, error }: WatcherErrorEvent) => {
      this.log.error(
        { path, err: error instanceof Error ? error.message : String(error) },
        'Watcher error'
      );
    });

    await this.watcher.start();
    this.log.info({ paths: this.watcher.getWatchedPaths() }, 'Watching for changes');
  }

  /**
   * Route one change event
   */
  handleChange(event: ChangeEvent): void {
    const key = resolve(event.path);

    if (event.kind === 'deleted') {
      if (this.debouncer.cancel(key)) {
        this.log.debug({ path: key }, 'Cancelled pending upload for deleted file');
      }
      this.log.info({ path: key }, 'File deleted');
      void this.track(this.router.delete(key));
      return;
    }

    this.log.info({ path: key, kind: event.kind }, 'File changed');
    this.debouncer.trigger(key, key);
  }

  get pendingCount(): number {
    return this.debouncer.pendingCount;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  /**
   * Wait for every upload/delete already started
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  /**
   * Stop watching, drop pending timers, and wait for in-flight work
   */
  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    this.started = false;

    this.watcher.stop();
    this.watcher.removeAllListeners();
    this.debouncer.clear();
    await this.drain();
    this.log.info('Watch service stopped');
  }

  private async track<T>(operation: Promise<T>): Promise<void> {
    this.inFlight.add(operation);
    try {
      await operation;
    } catch (error) {
      this.log.error(
        { err: error instanceof Error ? error.message : String(error) },
        'Sync operation failed'
      );
    } finally {
      this.inFlight.delete(operation);
    }
  }
}

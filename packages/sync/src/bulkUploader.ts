/**
 * Bulk Uploader
 * 
 * One-shot pass that uploads every accepted file under the watched
 * directories, one file at a time.
 */

import { resolve } from 'node:path';
import type { UploadRouter } from '@dashsync/upload';
import { createLogger, walkFiles, type Logger } from '@dashsync/utils';
import { FileFilter } from './watcher/fileFilter.js';

export interface BulkUploadConfig {
  router: UploadRouter;
  watchedDirs: string[];
  filter?: FileFilter;
  logger?: Logger;
  onProgress?: (done: number, total: number, path: string) => void;
}

export interface BulkUploadSummary {
  total: number;
  uploaded: number;
  failed: number;
  // Rejected by the filter
  skipped: number;
  failures: string[];
}

export async function uploadAll(config: BulkUploadConfig): Promise<BulkUploadSummary> {
  const log = config.logger ?? createLogger({ component: 'bulk-uploader' });
  const filter = config.filter ?? new FileFilter();

  const files: string[] = [];
  for (const dir of config.watchedDirs) {
    files.push(...await walkFiles(resolve(dir)));
  }

  const summary: BulkUploadSummary = {
    total: files.length,
    uploaded: 0,
    failed: 0,
    skipped: 0,
    failures: [],
  };

  log.info({ total: files.length, dirs: config.watchedDirs }, 'Starting bulk upload');

  let done = 0;
  for (const file of files) {
    const verdict = await filter.check(file);

    if (!verdict.accepted) {
      summary.skipped++;
      log.debug({ path: file, reason: verdict.reason }, 'Skipping file');
    } else {
      try {
        const record = await config.router.upload(file);
        if (record.success) {
          summary.uploaded++;
        } else {
          summary.failed++;
          summary.failures.push(record.relativePath);
        }
      } catch (error) {
        summary.failed++;
        summary.failures.push(file);
        log.error({ path: file, err: error instanceof Error ? error.message : String(error) }, 'Upload threw, continuing');
      }
    }

    done++;
    config.onProgress?.(done, files.length, file);
  }

  log.info(
    { uploaded: summary.uploaded, failed: summary.failed, skipped: summary.skipped },
    `Bulk upload finished (${summary.uploaded}/${summary.total} uploaded)`
  );

  return summary;
}

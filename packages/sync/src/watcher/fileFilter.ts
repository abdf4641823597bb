/**
 * File Filter
 * 
 * Decides whether a created/modified file is forwarded for upload.
 * Checks run in order: size, ignore patterns, allow patterns.
 */

import type { Stats } from 'node:fs';
import { stat } from 'node:fs/promises';
import { minimatch } from 'minimatch';
import { toPosixPath } from '@dashsync/utils';

export const DEFAULT_MAX_FILE_SIZE = 50 * 1024 * 1024;

export const DEFAULT_IGNORE_PATTERNS = ['*.tmp', '*.temp', '.DS_Store', '*.swp', '*.lock'];

export interface FileFilterConfig {
  // Maximum file size in bytes
  maxFileSize?: number;
  
  // Patterns that drop a file
  ignorePatterns?: string[];
  
  // When non-empty, a file must match one of these
  watchPatterns?: string[];
}

export type RejectReason = 'too-large' | 'ignored' | 'not-watched' | 'not-a-file' | 'stat-error';

export type FilterVerdict =
  | { accepted: true; size: number }
  | { accepted: false; reason: RejectReason; detail?: string };

export class FileFilter {
  private readonly maxFileSize: number;
  private readonly ignorePatterns: string[];
  private readonly watchPatterns: string[];

  constructor(config: FileFilterConfig = {}) {
    this.maxFileSize = config.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    this.ignorePatterns = config.ignorePatterns ?? DEFAULT_IGNORE_PATTERNS;
    this.watchPatterns = config.watchPatterns ?? [];
  }

  /**
   * Check a file, statting it unless stats are supplied
   */
  async check(filePath: string, stats?: Stats): Promise<FilterVerdict> {
    let info = stats;
    if (!info) {
      try {
        info = await stat(filePath);
      } catch (error) {
        return {
          accepted: false,
          reason: 'stat-error',
          detail: error instanceof Error ? error.message : String(error),
        };
      }
    }

    if (!info.isFile()) {
      return { accepted: false, reason: 'not-a-file' };
    }

    if (info.size > this.maxFileSize) {
      return {
        accepted: false,
        reason: 'too-large',
        detail: `${info.size} bytes exceeds ${this.maxFileSize}`,
      };
    }

    const posixPath = toPosixPath(filePath);

    const ignoredBy = this.ignorePatterns.find(pattern => FileFilter.matchesPattern(posixPath, pattern));
    if (ignoredBy) {
      return { accepted: false, reason: 'ignored', detail: ignoredBy };
    }

    if (
      this.watchPatterns.length > 0 &&
      !this.watchPatterns.some(pattern => FileFilter.matchesPattern(posixPath, pattern))
    ) {
      return { accepted: false, reason: 'not-watched' };
    }

    return { accepted: true, size: info.size };
  }

  /**
   * Match a glob against a path from the right, one segment at a time.
   * `*.json` matches any file name; `items/*.json` matches the last two
   * segments; a leading `/` anchors the pattern to the whole path.
   */
  static matchesPattern(path: string, pattern: string): boolean {
    const anchored = pattern.startsWith('/');
    const patternParts = pattern.split('/').filter(part => part.length > 0);
    const pathParts = toPosixPath(path).split('/').filter(part => part.length > 0);

    if (patternParts.length === 0 || patternParts.length > pathParts.length) {
      return false;
    }
    if (anchored && patternParts.length !== pathParts.length) {
      return false;
    }

    const tail = pathParts.slice(pathParts.length - patternParts.length);
    return patternParts.every((part, index) => minimatch(tail[index] ?? '', part, { dot: true }));
  }
}

/**
 * File Store
 * 
 * Path-preserving file storage under one root directory.
 * Every relative path is checked against the root before use.
 */

import { mkdir, readFile, readdir, rmdir, stat, unlink, writeFile } from 'node:fs/promises';
import { basename, dirname, join, normalize, relative, resolve } from 'node:path';
import { NotFoundError, ValidationError, type FileTreeNode } from '@dashsync/core';
import {
  createLogger,
  getExtension,
  isErrnoException,
  isWithin,
  safeStat,
  toPosixPath,
  type Logger,
} from '@dashsync/utils';

export interface StoredFile {
  path: string;
  size: number;
}

export class FileStore {
  private readonly basePath: string;
  private readonly log: Logger;

  constructor(root: string, logger?: Logger) {
    this.basePath = resolve(root);
    this.log = logger ?? createLogger({ component: 'file-store' });
  }

  get root(): string {
    return this.basePath;
  }

  /**
   * Normalize a client path to a slash-separated key under the root
   */
  normalizeKey(relativePath: string): string {
    const cleaned = toPosixPath(normalize(relativePath.replace(/\\/g, '/'))).replace(/^\/+/, '');
    const absolute = resolve(this.basePath, cleaned);

    if (!cleaned || cleaned === '.' || absolute === this.basePath || !isWithin(this.basePath, absolute)) {
      throw new ValidationError('path', `invalid storage path: ${relativePath}`);
    }

    return toPosixPath(relative(this.basePath, absolute));
  }

  resolvePath(relativePath: string): string {
    return join(this.basePath, ...this.normalizeKey(relativePath).split('/'));
  }

  async save(relativePath: string, content: Buffer): Promise<StoredFile> {
    const key = this.normalizeKey(relativePath);
    const target = this.resolvePath(key);

    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content);

    return { path: key, size: content.length };
  }

  async read(relativePath: string): Promise<string> {
    const target = this.resolvePath(relativePath);
    const stats = await safeStat(target);

    if (!stats || !stats.isFile()) {
      throw new NotFoundError('File', relativePath);
    }

    return readFile(target, 'utf8');
  }

  /**
   * Delete a file and prune parent directories left empty
   */
  async remove(relativePath: string): Promise<string> {
    const key = this.normalizeKey(relativePath);
    const target = this.resolvePath(key);
    const stats = await safeStat(target);

    if (!stats || !stats.isFile()) {
      throw new NotFoundError('File', relativePath);
    }

    await unlink(target);
    await this.pruneEmptyParents(dirname(target));

    return key;
  }

  /**
   * Listing tree rooted at the storage directory. The root path is ''.
   */
  async buildTree(): Promise<FileTreeNode> {
    const root: FileTreeNode = {
      name: basename(this.basePath),
      type: 'directory',
      path: '',
      children: [],
    };

    if (await safeStat(this.basePath)) {
      root.children = await this.listDirectory(this.basePath);
    }

    return root;
  }

  private async listDirectory(dirPath: string): Promise<FileTreeNode[]> {
    let entries;
    try {
      entries = await readdir(dirPath, { withFileTypes: true });
    } catch (error) {
      // Unreadable directories are listed empty
      if (isErrnoException(error) && (error.code === 'EACCES' || error.code === 'EPERM')) {
        this.log.warn({ path: dirPath }, 'Permission denied reading directory');
        return [];
      }
      throw error;
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const nodes: FileTreeNode[] = [];
    for (const entry of entries) {
      const fullPath = join(dirPath, entry.name);
      const path = toPosixPath(relative(this.basePath, fullPath));

      if (entry.isDirectory()) {
        nodes.push({
          name: entry.name,
          type: 'directory',
          path,
          children: await this.listDirectory(fullPath),
        });
      } else if (entry.isFile()) {
        const stats = await stat(fullPath);
        nodes.push({
          name: entry.name,
          type: 'file',
          path,
          size: stats.size,
          modified: stats.mtime.toISOString(),
          extension: getExtension(entry.name),
        });
      }
    }

    return nodes;
  }

  private async pruneEmptyParents(dirPath: string): Promise<void> {
    let current = dirPath;

    while (current !== this.basePath && isWithin(this.basePath, current)) {
      try {
        await rmdir(current);
      } catch (error) {
        if (isErrnoException(error) && (error.code === 'ENOTEMPTY' || error.code === 'EEXIST' || error.code === 'ENOENT')) {
          return;
        }
        throw error;
      }
      current = dirname(current);
    }
  }
}

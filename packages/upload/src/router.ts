/**
 * Upload Router
 * 
 * Fans uploads and deletes for one local file out to every configured
 * target, one target after another, and reports the per-target outcome.
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import {
  ListingFormatError,
  fileTreeNodeSchema,
  type FileTreeNode,
  type Target,
  type TargetName,
} from '@dashsync/core';
import {
  createLogger,
  isErrnoException,
  safeStat,
  sleep,
  utcTimestamp,
  type Logger,
} from '@dashsync/utils';
import { detectCollection } from './collection.js';
import { AuthGate } from './credentials.js';
import { PathMapper } from './pathMapper.js';
import { HttpTarget, type HttpTargetOptions, type TargetClient } from './targets/httpTarget.js';

export interface TargetOutcome {
  target: TargetName;
  ok: boolean;
  statusCode?: number;
  error?: string;
}

export interface UploadRecord {
  path: string;
  relativePath: string;
  collection: string;
  timestamp: string;
  // File vanished between the event and the upload
  skipped: boolean;
  success: boolean;
  outcomes: TargetOutcome[];
}

export interface DeleteRecord {
  path: string;
  relativePath: string;
  success: boolean;
  outcomes: TargetOutcome[];
}

export interface UploadRouterConfig {
  targets: Target[];
  pathMapper: PathMapper;
  auth?: AuthGate;
  // Pause before issuing deletes so the filesystem settles
  deleteDelayMs?: number;
  http?: HttpTargetOptions;
  // Pre-built clients; replaces `targets` + `http` when given
  clients?: TargetClient[];
  logger?: Logger;
}

export const DEFAULT_DELETE_DELAY_MS = 1000;

export class UploadRouter {
  private readonly clients: TargetClient[];
  private readonly pathMapper: PathMapper;
  private readonly auth: AuthGate;
  private readonly deleteDelayMs: number;
  private readonly log: Logger;

  constructor(config: UploadRouterConfig) {
    this.clients = config.clients
      ?? config.targets.map(target => new HttpTarget(target, config.http));
    this.pathMapper = config.pathMapper;
    this.auth = config.auth ?? new AuthGate({ proxyHosts: [], protectedDatasets: [] });
    this.deleteDelayMs = config.deleteDelayMs ?? DEFAULT_DELETE_DELAY_MS;
    this.log = config.logger ?? createLogger({ component: 'upload-router' });
  }

  get targets(): TargetClient[] {
    return [...this.clients];
  }

  /**
   * Upload a local file to every target
   */
  async upload(filePath: string): Promise<UploadRecord> {
    const relativePath = this.pathMapper.getRelativePath(filePath);
    const record: UploadRecord = {
      path: filePath,
      relativePath,
      collection: detectCollection(relativePath),
      timestamp: utcTimestamp(),
      skipped: false,
      success: false,
      outcomes: [],
    };

    let content: Buffer | null;
    try {
      content = await this.readIfPresent(filePath);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.error({ path: relativePath, err: message }, 'Cannot read file, upload failed');
      return {
        ...record,
        outcomes: this.clients.map(client => ({ target: client.target.name, ok: false, error: message })),
      };
    }

    if (!content) {
      this.log.warn({ path: filePath }, 'File no longer exists, skipping upload');
      return { ...record, skipped: true, success: true };
    }

    for (const client of this.clients) {
      record.outcomes.push(await this.uploadToTarget(client, content, record));
    }

    const succeeded = record.outcomes.filter(o => o.ok).length;
    record.success = succeeded === this.clients.length;

    if (record.success) {
      this.log.info({ path: relativePath, collection: record.collection }, 'Uploaded to all targets');
    } else {
      this.log.error(
        { path: relativePath, succeeded, total: this.clients.length },
        `Failed to upload to some targets (${succeeded}/${this.clients.length} succeeded)`
      );
    }

    return record;
  }

  /**
   * Remove a deleted local file from every target
   */
  async delete(filePath: string): Promise<DeleteRecord> {
    const relativePath = this.pathMapper.getRelativePath(filePath);

    if (this.deleteDelayMs > 0) {
      await sleep(this.deleteDelayMs);
    }

    const outcomes: TargetOutcome[] = [];
    for (const client of this.clients) {
      outcomes.push(await this.deleteFromTarget(client, relativePath));
    }

    const succeeded = outcomes.filter(o => o.ok).length;
    const success = succeeded === this.clients.length;

    if (success) {
      this.log.info({ path: relativePath }, 'Deleted from all targets');
    } else {
      this.log.error(
        { path: relativePath, succeeded, total: this.clients.length },
        `Failed to delete from some targets (${succeeded}/${this.clients.length} succeeded)`
      );
    }

    return { path: filePath, relativePath, success, outcomes };
  }

  /**
   * Delete one stored file from one target. 404 counts as deleted.
   */
  async deleteFromTarget(client: TargetClient, relativePath: string): Promise<TargetOutcome> {
    const { target } = client;

    try {
      const auth = await this.auth.forPath(target, relativePath);
      const response = await client.deleteFile(relativePath, auth);

      if (response.statusCode === 200) {
        this.log.debug({ target: target.name, path: relativePath }, 'Deleted');
        return { target: target.name, ok: true, statusCode: 200 };
      }
      if (response.statusCode === 404) {
        this.log.info({ target: target.name, path: relativePath }, 'File not found on target (already deleted)');
        return { target: target.name, ok: true, statusCode: 404 };
      }

      this.log.error(
        { target: target.name, path: relativePath, statusCode: response.statusCode, body: response.text },
        'Delete failed'
      );
      return { target: target.name, ok: false, statusCode: response.statusCode };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.error({ target: target.name, path: relativePath, err: message }, 'Delete request failed');
      return { target: target.name, ok: false, error: message };
    }
  }

  /**
   * Fetch and validate a target's file tree. Retries once with
   * credentials when the listing is behind the auth proxy.
   */
  async listTarget(client: TargetClient): Promise<FileTreeNode> {
    const { target } = client;

    let response = await client.listFiles(null);
    if (response.statusCode === 401) {
      this.log.info({ target: target.name }, 'File listing requires authentication, retrying with credentials');
      response = await client.listFiles(await this.auth.forTarget(target));
    }

    if (response.statusCode !== 200) {
      throw new ListingFormatError(target.url, `status ${response.statusCode}`);
    }

    let data: unknown;
    try {
      data = JSON.parse(response.text);
    } catch {
      throw new ListingFormatError(target.url, 'body is not JSON');
    }

    const parsed = fileTreeNodeSchema.safeParse(data);
    if (!parsed.success) {
      throw new ListingFormatError(target.url, parsed.error.issues[0]?.message ?? 'invalid tree');
    }
    return parsed.data;
  }

  /**
   * Check health of all targets. Failures are logged, never thrown.
   */
  async healthCheck(): Promise<Partial<Record<TargetName, boolean>>> {
    const results: Partial<Record<TargetName, boolean>> = {};

    for (const client of this.clients) {
      const { target } = client;
      try {
        const response = await client.health();
        results[target.name] = response.statusCode === 200;

        if (response.statusCode === 200) {
          this.log.info({ target: target.url }, 'Connected to target');
        } else {
          this.log.warn({ target: target.url, statusCode: response.statusCode }, 'Target health check failed');
        }
      } catch (error) {
        results[target.name] = false;
        this.log.error(
          { target: target.url, err: error instanceof Error ? error.message : String(error) },
          'Cannot connect to target; uploads to it will fail until it is available'
        );
      }
    }

    return results;
  }

  private async uploadToTarget(
    client: TargetClient,
    content: Buffer,
    record: UploadRecord
  ): Promise<TargetOutcome> {
    const { target } = client;
    const { relativePath, collection, timestamp } = record;

    this.log.info({ target: target.url, path: relativePath, collection }, 'Uploading');

    try {
      const auth = await this.auth.forPath(target, relativePath);
      const response = await client.upload(
        content,
        basename(record.path),
        { path: relativePath, collection, timestamp },
        auth
      );

      if (response.statusCode === 200) {
        return { target: target.name, ok: true, statusCode: 200 };
      }

      if (response.statusCode === 401) {
        this.log.error({ target: target.url, path: relativePath }, 'Authentication failed for protected content');
      } else {
        this.log.error(
          { target: target.url, path: relativePath, statusCode: response.statusCode, body: response.text },
          'Upload failed'
        );
      }
      return { target: target.name, ok: false, statusCode: response.statusCode };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.error({ target: target.url, path: relativePath, err: message }, 'Upload request failed');
      return { target: target.name, ok: false, error: message };
    }
  }

  private async readIfPresent(filePath: string): Promise<Buffer | null> {
    const stats = await safeStat(filePath);
    if (!stats || !stats.isFile()) {
      return null;
    }

    try {
      return await readFile(filePath);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }
}

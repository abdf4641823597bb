/**
 * HTTP Target
 * 
 * Thin wrapper around undici for talking to one dashboard storage service.
 * Returns status codes to the caller; only transport failures throw.
 */

import { request, FormData, type Dispatcher } from 'undici';
import { Blob } from 'node:buffer';
import { TargetRequestError, type Target, type UploadFields } from '@dashsync/core';
import type { Credential } from '../credentials.js';

export interface HttpTargetOptions {
  // Per-request timeout in ms
  timeoutMs?: number;
  // Timeout for the startup health probe
  healthTimeoutMs?: number;
  // Custom dispatcher (connection pool, proxy, or a mock in tests)
  dispatcher?: Dispatcher;
}

export interface TargetResponse {
  statusCode: number;
  text: string;
}

/**
 * Operations the upload router needs from a target
 */
export interface TargetClient {
  readonly target: Target;
  health(): Promise<TargetResponse>;
  upload(content: Buffer, filename: string, fields: UploadFields, auth: Credential | null): Promise<TargetResponse>;
  deleteFile(relativePath: string, auth: Credential | null): Promise<TargetResponse>;
  listFiles(auth: Credential | null): Promise<TargetResponse>;
}

export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;
export const DEFAULT_HEALTH_TIMEOUT_MS = 5000;

/**
 * Encode a relative storage path for use in a URL, keeping `/` separators
 */
export function encodeStoragePath(relativePath: string): string {
  return relativePath
    .split('/')
    .filter(segment => segment.length > 0)
    .map(segment => encodeURIComponent(segment))
    .join('/');
}

export function basicAuthHeader(auth: Credential): string {
  const token = Buffer.from(`${auth.username}:${auth.password}`).toString('base64');
  return `Basic ${token}`;
}

export class HttpTarget implements TargetClient {
  readonly target: Target;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly healthTimeoutMs: number;
  private readonly dispatcher?: Dispatcher;

  constructor(target: Target, options: HttpTargetOptions = {}) {
    this.target = target;
    this.baseUrl = target.url.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.healthTimeoutMs = options.healthTimeoutMs ?? DEFAULT_HEALTH_TIMEOUT_MS;
    this.dispatcher = options.dispatcher;
  }

  async health(): Promise<TargetResponse> {
    return this.send('health', '/health', { method: 'GET' }, this.healthTimeoutMs);
  }

  async upload(
    content: Buffer,
    filename: string,
    fields: UploadFields,
    auth: Credential | null
  ): Promise<TargetResponse> {
    const form = new FormData();
    form.append('path', fields.path);
    form.append('collection', fields.collection);
    form.append('timestamp', fields.timestamp);
    form.append('file', new Blob([content]), filename);

    return this.send('upload', '/upload', {
      method: 'POST',
      headers: this.authHeaders(auth),
      body: form,
    });
  }

  async deleteFile(relativePath: string, auth: Credential | null): Promise<TargetResponse> {
    return this.send('delete', `/api/files/${encodeStoragePath(relativePath)}`, {
      method: 'DELETE',
      headers: this.authHeaders(auth),
    });
  }

  async listFiles(auth: Credential | null): Promise<TargetResponse> {
    return this.send('list', '/api/files', {
      method: 'GET',
      headers: this.authHeaders(auth),
    });
  }

  private authHeaders(auth: Credential | null): Record<string, string> {
    return auth ? { authorization: basicAuthHeader(auth) } : {};
  }

  private async send(
    operation: string,
    path: string,
    options: {
      method: Dispatcher.HttpMethod;
      headers?: Record<string, string>;
      body?: FormData;
    },
    timeoutMs: number = this.timeoutMs
  ): Promise<TargetResponse> {
    try {
      const { statusCode, body } = await request(`${this.baseUrl}${path}`, {
        method: options.method,
        headers: options.headers,
        body: options.body,
        dispatcher: this.dispatcher,
        signal: AbortSignal.timeout(timeoutMs),
      });

      return { statusCode, text: await body.text() };
    } catch (error) {
      throw new TargetRequestError(this.target.url, operation, error);
    }
  }
}

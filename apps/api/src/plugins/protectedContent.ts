/**
 * Protected Content Plugin
 * 
 * HTTP basic auth in front of datasets listed in PROTECTED_DATASETS.
 * Content and delete URLs are checked in an onRequest hook; uploads carry
 * the path in the form body, so the upload route checks it after parsing.
 */

import { timingSafeEqual } from 'node:crypto';
import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import bcrypt from 'bcryptjs';

export const AUTH_REALM = 'Protected Research Content';

export interface ProtectedContentOptions {
  username: string;
  passwordHash: string | null;
  datasets: string[];
}

export class ProtectedContentGate {
  private readonly username: string;
  private readonly passwordHash: string | null;
  private readonly datasets: string[];

  constructor(options: ProtectedContentOptions) {
    this.username = options.username;
    this.passwordHash = options.passwordHash;
    this.datasets = options.datasets;
  }

  get enabled(): boolean {
    return this.datasets.length > 0;
  }

  isProtected(relativePath: string): boolean {
    return this.datasets.some(dataset => relativePath.includes(dataset));
  }

  /**
   * Check a basic-auth header against the configured username and hash
   */
  async verify(authorization: string | undefined): Promise<boolean> {
    if (!authorization || !this.passwordHash) {
      return false;
    }

    const match = /^Basic\s+(.+)$/i.exec(authorization.trim());
    if (!match?.[1]) {
      return false;
    }

    const decoded = Buffer.from(match[1], 'base64').toString('utf8');
    const separator = decoded.indexOf(':');
    if (separator === -1) {
      return false;
    }

    const username = Buffer.from(decoded.slice(0, separator));
    const expected = Buffer.from(this.username);
    if (username.length !== expected.length || !timingSafeEqual(username, expected)) {
      return false;
    }

    return bcrypt.compare(decoded.slice(separator + 1), this.passwordHash);
  }

  async authorize(request: FastifyRequest, reply: FastifyReply, relativePath: string): Promise<boolean> {
    if (!this.isProtected(relativePath)) {
      return true;
    }
    if (await this.verify(request.headers.authorization)) {
      return true;
    }

    request.log.warn({ path: relativePath }, 'Rejected unauthenticated request for protected content');
    reply
      .status(401)
      .header('WWW-Authenticate', `Basic realm="${AUTH_REALM}"`)
      .send({ statusCode: 401, error: 'Unauthorized', message: 'Authentication required' });
    return false;
  }
}

declare module 'fastify' {
  interface FastifyInstance {
    protectedContent: ProtectedContentGate;
  }
}

// URL prefixes whose remainder is a storage path; the bare listing stays open
const PATH_ROUTES = ['/api/content/', '/api/files/'];

/**
 * Storage path named by a content/delete URL, or null for other routes
 */
export function storagePathFromUrl(url: string): string | null {
  const pathname = url.split('?')[0] ?? '';
  const prefix = PATH_ROUTES.find(route => pathname.startsWith(route));
  if (!prefix) {
    return null;
  }

  const raw = pathname.slice(prefix.length);
  try {
    return decodeURIComponent(raw);
  } catch {
    return raw;
  }
}

const protectedContentPlugin: FastifyPluginAsync<ProtectedContentOptions> = async (fastify, options) => {
  const gate = new ProtectedContentGate(options);
  fastify.decorate('protectedContent', gate);

  if (!gate.enabled) {
    return;
  }

  fastify.addHook('onRequest', async (request, reply) => {
    const path = storagePathFromUrl(request.url);
    if (path === null) {
      return;
    }

    if (!(await gate.authorize(request, reply, path))) {
      return reply;
    }
  });
};

export const protectedContent = fp(protectedContentPlugin, {
  name: 'protected-content',
});

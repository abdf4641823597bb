/**
 * Fastify Server Factory
 * 
 * Creates and configures the Fastify instance with all plugins.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import multipart from '@fastify/multipart';

import type { ApiConfig } from './config/index.js';
import { loggerOptions } from './lib/logger.js';
import { errorHandler } from './plugins/errorHandler.js';
import { protectedContent } from './plugins/protectedContent.js';
import { FileStore } from './storage/fileStore.js';

// Routes
import { healthRoutes, uploadRoutes, fileRoutes } from './routes/index.js';

export async function createServer(config: ApiConfig): Promise<FastifyInstance> {
  const server = Fastify({
    logger: loggerOptions(config),
    requestTimeout: 30000,
    bodyLimit: config.bodyLimit,
  });

  const store = new FileStore(config.storagePath);

  // ============================================
  // Security plugins
  // ============================================
  
  await server.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        imgSrc: ["'self'", 'data:', 'https:'],
        scriptSrc: ["'self'"],
      },
    },
  });

  await server.register(cors, {
    origin: config.corsOrigins,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
  });

  await server.register(protectedContent, config.protectedContent);

  // ============================================
  // Uploads
  // ============================================

  await server.register(multipart, {
    limits: {
      fileSize: config.bodyLimit,
      files: 1,
    },
  });

  // ============================================
  // Error handling
  // ============================================
  
  await server.register(errorHandler);

  // ============================================
  // Routes
  // ============================================
  
  // Root route - service info
  server.get('/', async () => ({
    name: 'dashsync-api',
    version: '0.1.0',
    status: 'running',
    health: '/health',
    files: '/api/files',
  }));
  
  await server.register(healthRoutes, { prefix: '/health' });
  await server.register(uploadRoutes, { store });
  await server.register(fileRoutes, { prefix: '/api', store });

  server.log.info({ storagePath: store.root }, 'Storage ready');

  return server;
}

/**
 * API Server Entry Point
 * 
 * Storage service for synced dashboard files:
 * - Multipart uploads into a path-preserving tree
 * - JSON file-tree listing, content and delete endpoints
 * - Basic auth for protected datasets
 */

import { pathToFileURL } from 'node:url';
import { ConfigError } from '@dashsync/core';
import { createServer } from './server.js';
import { loadConfig, type ApiConfig } from './config/index.js';
import { createApiLogger } from './lib/logger.js';

async function main(): Promise<void> {
  let config: ApiConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      if (err.details) {
        console.error(err.details);
      }
      process.exit(1);
    }
    throw err;
  }

  const logger = createApiLogger(config);

  try {
    const server = await createServer(config);

    // Graceful shutdown
    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
    
    for (const signal of signals) {
      process.on(signal, async () => {
        logger.info({ signal }, 'Received shutdown signal');
        
        try {
          await server.close();
          logger.info('Server closed gracefully');
          process.exit(0);
        } catch (err) {
          logger.error({ err }, 'Error during shutdown');
          process.exit(1);
        }
      });
    }

    // Start server
    await server.listen({
      host: config.host,
      port: config.port,
    });

    logger.info({
      port: config.port,
      env: config.nodeEnv,
      storagePath: config.storagePath,
    }, 'API server started');

  } catch (err) {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
  }
}

// Only start when run directly, not when imported
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  void main();
}

// Re-export server factory for testing
export { createServer } from './server.js';
export { loadConfig, type ApiConfig } from './config/index.js';

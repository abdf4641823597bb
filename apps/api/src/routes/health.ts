/**
 * Health Routes
 * 
 * Liveness probe used by the watcher at startup.
 */

import type { FastifyPluginAsync } from 'fastify';
import type { HealthResponse } from '@dashsync/core';
import { utcTimestamp } from '@dashsync/utils';

export const healthRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.get('/', {
    schema: {
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string' },
            timestamp: { type: 'string' },
          },
        },
      },
    },
  }, async (_request, reply) => {
    const health: HealthResponse = {
      status: 'ok',
      timestamp: utcTimestamp(),
    };
    return reply.send(health);
  });
};

/**
 * File Routes
 * 
 * Listing, content and delete endpoints over the file store.
 */

import type { FastifyPluginAsync } from 'fastify';
import type { StorageRouteOptions } from './upload.js';

interface WildcardParams {
  '*': string;
}

export const fileRoutes: FastifyPluginAsync<StorageRouteOptions> = async (fastify, { store }) => {
  /**
   * Full storage tree
   */
  fastify.get('/files', async () => {
    return store.buildTree();
  });

  /**
   * File content: JSON files are returned as JSON, anything else as text
   */
  fastify.get<{ Params: WildcardParams }>('/content/*', async (request, reply) => {
    const path = request.params['*'];
    const content = await store.read(path);

    try {
      JSON.parse(content);
      return reply.type('application/json').send(content);
    } catch {
      return reply.send({ content, type: 'text' });
    }
  });

  fastify.delete<{ Params: WildcardParams }>('/files/*', async (request, reply) => {
    const path = await store.remove(request.params['*']);
    request.log.info({ path }, 'Deleted file');

    return reply.send({ status: 'success', path, message: 'File deleted' });
  });
};

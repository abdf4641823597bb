/**
 * Upload Routes
 * 
 * Multipart upload of one file with its storage path, collection and
 * timestamp.
 */

import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { ValidationError, type UploadResponse } from '@dashsync/core';
import type { FileStore } from '../storage/fileStore.js';

export interface StorageRouteOptions {
  store: FileStore;
}

const uploadFieldsSchema = z.object({
  path: z.string().min(1),
  collection: z.string().min(1),
  timestamp: z.string().min(1),
});

export const uploadRoutes: FastifyPluginAsync<StorageRouteOptions> = async (fastify, { store }) => {
  fastify.post('/upload', async (request, reply) => {
    const fields: Record<string, string> = {};
    let content: Buffer | null = null;

    for await (const part of request.parts()) {
      if (part.type === 'file') {
        if (part.fieldname === 'file') {
          content = await part.toBuffer();
        } else {
          // Drain unexpected file parts so the stream completes
          part.file.resume();
        }
      } else if (typeof part.value === 'string') {
        fields[part.fieldname] = part.value;
      }
    }

    const body = uploadFieldsSchema.parse(fields);
    if (!content) {
      throw new ValidationError('file', 'file part is required');
    }

    if (!(await fastify.protectedContent.authorize(request, reply, body.path))) {
      return reply;
    }

    const stored = await store.save(body.path, content);
    request.log.info({ path: stored.path, size: stored.size, collection: body.collection }, 'Stored upload');

    const response: UploadResponse = {
      status: 'success',
      path: stored.path,
      size: stored.size,
      collection: body.collection,
      timestamp: body.timestamp,
    };
    return reply.send(response);
  });
};

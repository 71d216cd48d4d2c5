import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import fastifyStatic from '@fastify/static';
import { z } from 'zod';

import { NotFoundError } from '../utils/errors.js';
import type { LocalImageStorage } from '../services/local-storage.service.js';

const filenameParamsSchema = z.object({
  filename: z.string(),
});

export interface FinalImageRoutesOptions {
  storage: Pick<LocalImageStorage, 'finalDir' | 'hasFinalImage'>;
}

/**
 * Serves images stored in the final-images root
 */
export async function finalImageRoutes(
  fastify: FastifyInstance,
  options: FinalImageRoutesOptions
): Promise<void> {
  const { storage } = options;

  // Only decorates reply.sendFile; no wildcard route is added
  await fastify.register(fastifyStatic, {
    root: storage.finalDir,
    serve: false,
  });

  fastify.get(
    '/final_image/:filename',
    {
      schema: {
        description: 'Download a final image by filename',
        tags: ['Images'],
        params: {
          type: 'object',
          required: ['filename'],
          properties: {
            filename: { type: 'string' },
          },
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { filename } = filenameParamsSchema.parse(request.params);

      if (!(await storage.hasFinalImage(filename))) {
        throw new NotFoundError('File not found.');
      }

      return reply.sendFile(filename);
    }
  );
}

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

import { toHttpResult } from '../controllers/merge.controller.js';
import { MergeFailedError, ValidationError } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';
import type { MergeOutcome, MergePipeline } from '../services/merge-pipeline.service.js';
import type { ImageInput } from '../services/compositor.service.js';

const logger = createChildLogger({ service: 'merge-routes' });

const FOREGROUND_FIELD = 'foreground_file';
const BACKGROUND_FIELD = 'background_file';

export interface MergeRoutesOptions {
  pipeline: Pick<MergePipeline, 'run'>;
  /** Aborted when the server shuts down */
  shutdownSignal?: AbortSignal;
}

/**
 * Collect the two image uploads; the first part of each field wins.
 * A file input submitted with nothing selected may arrive as a plain field.
 */
async function readImageParts(request: FastifyRequest): Promise<Map<string, ImageInput>> {
  const images = new Map<string, ImageInput>();

  for await (const part of request.parts()) {
    const wanted = part.fieldname === FOREGROUND_FIELD || part.fieldname === BACKGROUND_FIELD;

    if (part.type === 'field') {
      if (wanted && part.value === '' && !images.has(part.fieldname)) {
        images.set(part.fieldname, { filename: '', data: Buffer.alloc(0) });
      }
      continue;
    }

    if (!wanted || images.has(part.fieldname)) {
      part.file.resume();
      logger.debug({ field: part.fieldname, filename: part.filename }, 'Ignoring extra upload');
      continue;
    }

    images.set(part.fieldname, { filename: part.filename, data: await part.toBuffer() });
  }

  return images;
}

/**
 * Merge routes
 */
export async function mergeRoutes(fastify: FastifyInstance, options: MergeRoutesOptions): Promise<void> {
  const { pipeline, shutdownSignal } = options;

  /**
   * Composite, refine through the generation service, publish
   */
  fastify.post(
    '/merge_images',
    {
      schema: {
        description:
          'Remove the foreground background, paste it onto the background, run the generation workflow and publish the result',
        tags: ['Merge'],
        consumes: ['multipart/form-data'],
        response: {
          200: {
            type: 'object',
            properties: {
              message: { type: 'string' },
              final_image_url: { type: 'string' },
            },
          },
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      if (!request.isMultipart()) {
        throw new ValidationError('Missing one or both files in the request');
      }

      const images = await readImageParts(request);
      const foreground = images.get(FOREGROUND_FIELD);
      const background = images.get(BACKGROUND_FIELD);

      if (!foreground || !background) {
        throw new ValidationError('Missing one or both files in the request');
      }
      if (!foreground.filename || !background.filename) {
        throw new ValidationError('One or both files are not selected');
      }

      logger.info(
        {
          requestId: request.id,
          foreground: { filename: foreground.filename, size: foreground.data.length },
          background: { filename: background.filename, size: background.data.length },
        },
        'Merge requested'
      );

      let outcome: MergeOutcome;
      try {
        outcome = await pipeline.run(
          { foreground, background },
          { signal: shutdownSignal, requestId: request.id }
        );
      } catch (error) {
        throw new MergeFailedError(error);
      }
      const { statusCode, body } = toHttpResult(outcome);

      return reply.status(statusCode).send(body);
    }
  );
}

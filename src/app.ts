import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import multipart from '@fastify/multipart';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';

import { getConfig } from './config/index.js';
import { getLogger } from './utils/logger.js';
import { errorHandler } from './middleware/error.middleware.js';
import { healthRoutes } from './routes/health.routes.js';
import { mergeRoutes } from './routes/merge.routes.js';
import { finalImageRoutes } from './routes/final-image.routes.js';
import { createMergeServices, type MergeServices } from './services/merge-services.js';

export type AppServices = Pick<MergeServices, 'pipeline' | 'storage'>;

/**
 * Build and configure Fastify application
 */
export async function buildApp(services?: AppServices): Promise<FastifyInstance> {
  const config = getConfig();
  const logger = getLogger();
  const { pipeline, storage } = services ?? createMergeServices(config);

  // Aborted on close so in-flight completion waits end promptly
  const shutdown = new AbortController();

  const app = Fastify({
    logger: false, // We use our own Pino logger
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'requestId',
  });

  // Security plugins
  await app.register(helmet, {
    contentSecurityPolicy: false, // Disable for API
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  });

  await app.register(cors, {
    origin: (origin, callback) => {
      // Allow requests with no origin (e.g., curl)
      if (!origin) {
        callback(null, true);
        return;
      }

      // No list configured: any origin
      if (config.cors.allowedOrigins.length === 0 || config.cors.allowedOrigins.includes(origin)) {
        callback(null, true);
        return;
      }

      callback(new Error('Not allowed by CORS'), false);
    },
  });

  await app.register(multipart, {
    limits: {
      fileSize: config.upload.maxFileSizeBytes,
    },
  });

  // Swagger documentation
  await app.register(swagger, {
    openapi: {
      info: {
        title: 'Image Merge API',
        description: 'Composite a subject onto a background, refine it with a generation workflow and publish it',
        version: '1.0.0',
      },
      servers: [
        {
          url: `http://localhost:${config.server.port}`,
          description: 'Development server',
        },
      ],
    },
  });

  await app.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: false,
    },
  });

  // Request logging
  app.addHook('onRequest', async (request) => {
    logger.info(
      {
        requestId: request.id,
        method: request.method,
        url: request.url,
      },
      'Incoming request'
    );
  });

  app.addHook('onResponse', async (request, reply) => {
    logger.info(
      {
        requestId: request.id,
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      'Request completed'
    );
  });

  app.addHook('preClose', async () => {
    shutdown.abort();
  });

  // Error handler
  app.setErrorHandler(errorHandler);

  // Register routes
  await app.register(healthRoutes);
  await app.register(mergeRoutes, { pipeline, shutdownSignal: shutdown.signal });
  await app.register(finalImageRoutes, { storage });

  return app;
}

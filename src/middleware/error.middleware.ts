import type { FastifyError, FastifyRequest, FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { AppError, MergeFailedError, ValidationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export interface ErrorResponse {
  error: string;
  details?: unknown;
}

/**
 * Global error handler for Fastify
 */
export function errorHandler(
  error: FastifyError | Error,
  request: FastifyRequest,
  reply: FastifyReply
): void {
  const logger = getLogger();

  // Handle Zod validation errors (route params)
  if (error instanceof ZodError) {
    const validationError = new ValidationError('Validation failed', error.format());
    reply.status(validationError.statusCode).send({
      error: validationError.message,
      details: validationError.details,
    } satisfies ErrorResponse);
    return;
  }

  // Pipeline failures keep their own status out of the response
  if (error instanceof MergeFailedError) {
    logger.error({ err: error.failure, requestId: request.id }, 'Unhandled error occurred');
    reply.status(500).send({
      error: 'An internal server error occurred',
      details: error.message,
    } satisfies ErrorResponse);
    return;
  }

  // Handle custom application errors
  if (error instanceof AppError) {
    if (!error.isOperational) {
      logger.error({ err: error, requestId: request.id }, 'Non-operational error occurred');
    } else {
      logger.warn({ err: error, requestId: request.id }, 'Operational error occurred');
    }

    const response: ErrorResponse = { error: error.message };

    if (error instanceof ValidationError && error.details) {
      response.details = error.details;
    }

    reply.status(error.statusCode).send(response);
    return;
  }

  // Client errors raised by Fastify or its plugins (body limits, multipart limits, ...)
  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode >= 400 && error.statusCode < 500) {
    logger.warn({ err: error, requestId: request.id }, 'Client error occurred');
    reply.status(error.statusCode).send({ error: error.message } satisfies ErrorResponse);
    return;
  }

  // Unknown errors: full stack goes to the log, the message goes to the caller
  logger.error({ err: error, requestId: request.id }, 'Unhandled error occurred');

  reply.status(500).send({
    error: 'An internal server error occurred',
    details: error.message,
  } satisfies ErrorResponse);
}

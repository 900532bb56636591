import type { FastifyInstance, FastifyError } from 'fastify';
import { AppError, NotFoundError, RateLimitError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export function registerErrorHandler(fastify: FastifyInstance) {
  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    const requestId = request.id;

    if (error instanceof RateLimitError) {
      logger.warn(
        { err: error, requestId, code: error.code, retryAfter: error.retryAfter },
        `Rate limit exceeded: ${error.message}`,
      );
      return reply
        .status(429)
        .header('Retry-After', String(error.retryAfter))
        .send(error.toJSON());
    }

    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        const cause = error.cause instanceof Error ? error.cause.message : undefined;
        logger.error(
          { err: error, requestId, code: error.code, cause },
          `Report error: ${error.message}`,
        );
      } else {
        logger.warn({ err: error, requestId, code: error.code }, `Operational error: ${error.message}`);
      }
      return reply.status(error.statusCode).send(error.toJSON());
    }

    // Fastify validation errors
    if (error.validation) {
      logger.warn({ err: error, requestId }, 'Validation error');
      return reply.status(400).send({
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: error.message,
        },
      });
    }

    logger.error({ err: error, requestId }, `Unexpected error: ${error.message}`);
    return reply.status(500).send({
      success: false,
      error: {
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
      },
    });
  });

  fastify.setNotFoundHandler((request, reply) => {
    const error = new NotFoundError('Route not found');
    logger.warn({ requestId: request.id, method: request.method, url: request.url }, 'Route not found');
    return reply.status(error.statusCode).send(error.toJSON());
  });
}

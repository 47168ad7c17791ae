/**
 * @file packages/gateway/src/api/middleware/error.middleware.ts
 * @description Translates thrown errors into JSON error responses.
 */

import { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { container } from 'tsyringe';
import { ZodError } from 'zod';
import { AppError } from '../../domain/errors/app-error.js';
import { Logger } from '../../logger.js';

/**
 * Executes error handler.
 * @param error - Error.
 * @param request - Request.
 * @param reply - Reply.
 */
export function errorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply
) {
  const logger = container.resolve(Logger);

  if (error instanceof AppError) {
    if (!error.isOperational) {
      logger.error({ err: error, url: request.url }, `Programming error: ${error.message}`);
    }
    return reply.status(error.statusCode).send({
      error: error.message,
      statusCode: error.statusCode,
    });
  }

  if (error instanceof ZodError) {
    return reply.status(400).send({
      error: 'Validation failed',
      details: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      statusCode: 400,
    });
  }

  // Fastify validation errors
  if (error.validation) {
    return reply.status(400).send({
      error: 'Validation failed',
      details: error.validation,
      statusCode: 400,
    });
  }

  // Malformed bodies and other client errors raised by fastify itself
  if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
    return reply.status(error.statusCode).send({
      error: error.message,
      statusCode: error.statusCode,
    });
  }

  logger.error({ err: error, url: request.url }, `Unhandled error: ${error.message}`);

  return reply.status(500).send({
    error: 'Internal Server Error',
    message: process.env.NODE_ENV === 'development' ? error.message : undefined,
    statusCode: 500,
  });
}

import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { DomainError, ValidationError } from './domain-errors.js';
import { ERROR_CODES, HTTP_STATUS } from '@agentic-retail/shared';
import type { Logger } from '@agentic-retail/logger';

export interface ErrorHandlerOptions {
  /** Send the message and stack of unexpected errors to the client. */
  exposeErrors?: boolean;
}

export function createErrorHandler(logger: Logger, options: ErrorHandlerOptions = {}) {
  const { exposeErrors = false } = options;

  return async (error: FastifyError, request: FastifyRequest, reply: FastifyReply): Promise<void> => {
    // Handle Zod validation errors
    if (error instanceof ZodError) {
      logger.warn({ error: error.issues, path: request.url }, 'Validation error');
      await reply.code(HTTP_STATUS.BAD_REQUEST).send({
        error: 'Validation failed',
        code: ERROR_CODES.VALIDATION_ERROR,
        details: error.issues,
      });
      return;
    }

    // Handle domain errors
    if (error instanceof DomainError) {
      logger.warn(
        { code: error.code, message: error.message, path: request.url, requestId: request.id },
        'Domain error'
      );
      await reply.code(error.statusCode).send({
        error: error.message,
        code: error.code,
        ...(error.details ? { details: error.details } : {}),
      });
      return;
    }

    // Handle Fastify validation errors
    if (error.validation) {
      const validationError = new ValidationError('Request validation failed', error.validation);
      logger.warn({ error: error.validation, path: request.url }, 'Fastify validation error');
      await reply.code(validationError.statusCode).send({
        error: validationError.message,
        code: validationError.code,
        details: validationError.details,
      });
      return;
    }

    // Log unexpected errors
    logger.error(
      {
        err: error,
        path: request.url,
        method: request.method,
        requestId: request.id,
      },
      'Unexpected error'
    );

    // Send generic error response
    await reply.code(error.statusCode ?? HTTP_STATUS.INTERNAL_SERVER_ERROR).send({
      error: exposeErrors ? error.message : 'Internal server error',
      ...(exposeErrors && { stack: error.stack }),
    });
  };
}

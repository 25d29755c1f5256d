import type { FastifyRequest } from 'fastify';
import type { Logger } from '@agentic-retail/logger';

export function createRequestLogger(logger: Logger, request: FastifyRequest): Logger {
  return logger.child({
    requestId: request.id,
    method: request.method,
    url: request.url,
  });
}

export function logRequestComplete(
  logger: Logger,
  request: FastifyRequest,
  statusCode: number,
  responseTime: number
): void {
  logger.info({
    requestId: request.id,
    method: request.method,
    url: request.url,
    statusCode,
    responseTime,
  }, 'Request completed');
}

import { HTTP_STATUS, ERROR_CODES } from '@agentic-retail/shared';

export class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends DomainError {
  constructor(message: string, details?: unknown) {
    super(message, ERROR_CODES.VALIDATION_ERROR, HTTP_STATUS.BAD_REQUEST, details);
  }
}

export class NotFoundError extends DomainError {
  constructor(message: string, details?: unknown) {
    super(message, ERROR_CODES.NOT_FOUND, HTTP_STATUS.NOT_FOUND, details);
  }
}

/** The knowledge agent answered with an unexpected status or could not be reached. */
export class UpstreamError extends DomainError {
  constructor(message: string, details?: unknown) {
    super(message, ERROR_CODES.UPSTREAM_ERROR, HTTP_STATUS.BAD_GATEWAY, details);
  }
}

/**
 * The agent exists but rejects calls while its role assignments propagate.
 * Search and status turn this into a pending outcome rather than a failure.
 */
export class AgentPendingError extends DomainError {
  constructor(message: string, details?: unknown) {
    super(message, ERROR_CODES.AGENT_PENDING, HTTP_STATUS.SERVICE_UNAVAILABLE, details);
  }
}

export class ConfigurationError extends DomainError {
  constructor(message: string, details?: unknown) {
    super(message, ERROR_CODES.CONFIGURATION_ERROR, HTTP_STATUS.INTERNAL_SERVER_ERROR, details);
  }
}

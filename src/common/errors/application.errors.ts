import { HttpException, HttpStatus } from '@nestjs/common';

export type ErrorDetails = Record<string, unknown>;

/**
 * Base class for every error the bridge raises on purpose.
 *
 * Extends HttpException so Nest maps it to a status code; the global
 * ApplicationExceptionFilter renders it as `{ error, message, details }`.
 */
export class ApplicationError extends HttpException {
  readonly details: ErrorDetails;

  constructor(
    message: string,
    status: number = HttpStatus.INTERNAL_SERVER_ERROR,
    details: ErrorDetails = {},
    cause?: unknown,
  ) {
    super(message, status, cause === undefined ? undefined : { cause });
    this.details = details;
  }
}

export class ValidationError extends ApplicationError {
  constructor(
    message: string,
    details: ErrorDetails = {},
    status: number = HttpStatus.BAD_REQUEST,
  ) {
    super(message, status, details);
  }
}

export class AuthenticationError extends ApplicationError {
  constructor(message = 'Authentication failed', details: ErrorDetails = {}) {
    super(message, HttpStatus.UNAUTHORIZED, details);
  }
}

export class MessageProcessingError extends ApplicationError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, HttpStatus.UNPROCESSABLE_ENTITY, details);
  }
}

export class RateLimitExceededError extends ApplicationError {
  constructor(message = 'Too many requests. Please try again later.') {
    super(message, HttpStatus.TOO_MANY_REQUESTS);
  }
}

/** A downstream system failed or refused the call. */
export class ExternalApiError extends ApplicationError {
  constructor(
    message: string,
    readonly service: string,
    status: number = HttpStatus.BAD_GATEWAY,
    details: ErrorDetails = {},
    cause?: unknown,
  ) {
    super(message, status, { ...details, service }, cause);
  }
}

export class WeChatApiError extends ExternalApiError {
  constructor(
    message: string,
    status: number = HttpStatus.BAD_GATEWAY,
    details: ErrorDetails = {},
    cause?: unknown,
  ) {
    super(message, 'WeChat', status, details, cause);
  }
}

export class CxoneApiError extends ExternalApiError {
  constructor(
    message: string,
    status: number = HttpStatus.BAD_GATEWAY,
    details: ErrorDetails = {},
    cause?: unknown,
  ) {
    super(message, 'CXone', status, details, cause);
  }
}

/** Short, log-safe description of any thrown value. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function errorKind(error: unknown): string {
  if (error instanceof Error) return error.name;
  return typeof error;
}

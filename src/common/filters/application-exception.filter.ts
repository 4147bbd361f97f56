import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import {
  ApplicationError,
  ValidationError,
} from '../errors/application.errors';

/** Shape of the errors body-parser raises before a route runs. */
interface BodyParserError extends Error {
  type: string;
  status: number;
  limit?: number;
  length?: number;
}

function isBodyParserError(exception: unknown): exception is BodyParserError {
  return (
    exception instanceof Error &&
    'type' in exception &&
    typeof exception.type === 'string' &&
    'status' in exception &&
    typeof exception.status === 'number'
  );
}

function fromBodyParser(error: BodyParserError): ValidationError {
  if (error.type === 'entity.too.large') {
    return new ValidationError('Request body too large', {
      bytes: error.length,
      max: error.limit,
    });
  }
  return new ValidationError('Malformed request body', { type: error.type });
}

export interface ErrorBody {
  error: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Renders every error leaving a controller as structured JSON.
 * Body-parser rejections become 400s; anything else that is not an
 * HttpException becomes a generic 500.
 */
@Catch()
export class ApplicationExceptionFilter implements ExceptionFilter {
  private readonly log = new Logger(ApplicationExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const req = ctx.getRequest<Request>();
    const res = ctx.getResponse<Response>();

    const [status, body] = this.render(exception);

    if (status >= 500) {
      this.log.error(
        `[${req.method} ${req.path}] ${body.error}: ${body.message}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    } else {
      this.log.warn(
        `[${req.method} ${req.path}] ${status} ${body.error}: ${body.message}`,
      );
    }

    res.status(status).json(body);
  }

  private render(exception: unknown): [number, ErrorBody] {
    if (isBodyParserError(exception)) {
      return this.render(fromBodyParser(exception));
    }

    if (exception instanceof ApplicationError) {
      return [
        exception.getStatus(),
        {
          error: exception.name,
          message: exception.message,
          details: exception.details,
        },
      ];
    }

    if (exception instanceof HttpException) {
      return [
        exception.getStatus(),
        { error: exception.name, message: exception.message },
      ];
    }

    return [
      HttpStatus.INTERNAL_SERVER_ERROR,
      {
        error: 'InternalServerError',
        message: 'An unexpected error occurred',
      },
    ];
  }
}

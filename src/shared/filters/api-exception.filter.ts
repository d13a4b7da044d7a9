import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { STATUS_CODES } from 'http';

export interface ApiErrorBody {
  status: number;
  error: string;
  message: string;
  path: string;
  timestamp: string;
}

/**
 * Renders every failure as an `ApiErrorBody`. Details of unexpected errors
 * stay in the logs.
 */
@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();

    const body = toErrorBody(exception, request.originalUrl || request.url);

    if (body.status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `${request.method} ${body.path} failed with ${body.status}: ${describe(exception)}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    } else {
      this.logger.warn(`${request.method} ${body.path} -> ${body.status}: ${body.message}`);
    }

    response.status(body.status).json(body);
  }
}

export function toErrorBody(exception: unknown, path: string): ApiErrorBody {
  if (!(exception instanceof HttpException)) {
    return errorBody(HttpStatus.INTERNAL_SERVER_ERROR, 'Internal server error', path);
  }

  const status = exception.getStatus();
  const message =
    status >= HttpStatus.INTERNAL_SERVER_ERROR && status !== HttpStatus.SERVICE_UNAVAILABLE
      ? 'Internal server error'
      : extractMessage(exception.getResponse(), exception.message);
  return errorBody(status, message, path);
}

function errorBody(status: number, message: string, path: string): ApiErrorBody {
  return {
    status,
    error: STATUS_CODES[status] ?? 'Error',
    message,
    path,
    timestamp: new Date().toISOString(),
  };
}

// Validation failures carry an array of constraint messages
function extractMessage(response: string | object, fallback: string): string {
  if (typeof response === 'string') {
    return response;
  }
  if ('message' in response) {
    const { message } = response;
    if (Array.isArray(message)) {
      return message.map(String).join('; ');
    }
    if (typeof message === 'string') {
      return message;
    }
  }
  return fallback;
}

function describe(exception: unknown): string {
  return exception instanceof Error ? exception.message : String(exception);
}

import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { AppException } from '../exceptions/app.exception';
import { ApiError, fail } from '../utils/api-response';

const STATUS_CODES: Record<number, string> = {
  400: 'BAD_REQUEST',
  401: 'UNAUTHORIZED',
  403: 'FORBIDDEN',
  404: 'NOT_FOUND',
  405: 'METHOD_NOT_ALLOWED',
  408: 'REQUEST_TIMEOUT',
  409: 'CONFLICT',
  422: 'UNPROCESSABLE_ENTITY',
  500: 'INTERNAL_SERVER_ERROR',
  503: 'SERVICE_UNAVAILABLE',
};

export function errorCodeForStatus(status: number): string {
  return STATUS_CODES[status] ?? 'HTTP_ERROR';
}

// Nest puts either a string or { message: string | string[] } into the response.
function messageOf(exception: HttpException): string {
  const body = exception.getResponse();
  if (typeof body === 'string') {
    return body;
  }
  if ('message' in body) {
    const { message } = body;
    if (Array.isArray(message)) {
      return message.join(', ');
    }
    if (typeof message === 'string') {
      return message;
    }
  }
  return exception.message;
}

/**
 * Renders every failure as the standard envelope with success=false.
 */
@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let error: ApiError;

    if (exception instanceof AppException) {
      status = exception.getStatus();
      error = { code: exception.code, message: exception.message };
      if (exception.details) {
        error.details = exception.details;
      }
      this.logger.warn(`${request.method} ${request.url} ${status} ${exception.code}: ${exception.message}`);
    } else if (exception instanceof HttpException) {
      status = exception.getStatus();
      error = { code: errorCodeForStatus(status), message: messageOf(exception) };
      this.logger.warn(`${request.method} ${request.url} ${status}: ${error.message}`);
    } else {
      error = {
        code: 'INTERNAL_SERVER_ERROR',
        message: '예상치 못한 오류가 발생했습니다.',
      };
      const stack = exception instanceof Error ? exception.stack : String(exception);
      this.logger.error(`${request.method} ${request.url} unexpected error`, stack);
    }

    response.status(status).json(fail(error));
  }
}

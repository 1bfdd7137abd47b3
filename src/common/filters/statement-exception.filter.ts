import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { HttpExceptionResponse } from '../interfaces/http-exception.interface';
import { SchemaError, SourceNotFoundError } from '../errors/statement.errors';

// Turns pipeline errors into the API's error body.
// Schema problems are the operator's input (422), missing files are 404.
@Catch()
export class StatementExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(StatementExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();

    const body = toErrorResponse(exception, request.url);
    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(`${request.method} ${request.url} failed`, exception instanceof Error ? exception.stack : String(exception));
    }
    response.status(body.statusCode).json(body);
  }
}

export function toErrorResponse(exception: unknown, path: string, now = new Date()): HttpExceptionResponse {
  const timestamp = now.toISOString();

  if (exception instanceof SchemaError) {
    return {
      statusCode: HttpStatus.UNPROCESSABLE_ENTITY,
      message: exception.message,
      error: exception.name,
      timestamp,
      path,
    };
  }

  if (exception instanceof SourceNotFoundError) {
    return {
      statusCode: HttpStatus.NOT_FOUND,
      message: exception.message,
      error: exception.name,
      timestamp,
      path,
    };
  }

  if (exception instanceof HttpException) {
    const payload = exception.getResponse();
    const message = typeof payload === 'object' && 'message' in payload && (typeof payload.message === 'string' || Array.isArray(payload.message))
      ? payload.message
      : exception.message;
    return {
      statusCode: exception.getStatus(),
      message,
      error: exception.name,
      timestamp,
      path,
    };
  }

  return {
    statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
    message: 'Internal server error',
    timestamp,
    path,
  };
}

import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common';
import { Request, Response } from 'express';
import { CORRELATION_ID_HEADER } from '../api-key.constants';
import { AppLogger } from '../utils/logger.util';

const INTERNAL_ERROR_BODY = {
  statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
  message: 'Internal server error',
  error: 'Internal Server Error',
};

/**
 * Renders every error as JSON carrying the request's correlation id. Errors
 * that are not HTTP exceptions are logged and answered with a bare 500.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  catch(exception: unknown, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();
    const correlationId = request.headers[CORRELATION_ID_HEADER];

    let status: number;
    let body: Record<string, unknown>;
    if (exception instanceof HttpException) {
      status = exception.getStatus();
      const payload = exception.getResponse();
      body = typeof payload === 'string' ? { statusCode: status, message: payload } : { ...payload };
    } else {
      AppLogger.error(
        `Unhandled error on ${request.method} ${request.originalUrl}`,
        exception,
        'HttpExceptionFilter',
      );
      status = HttpStatus.INTERNAL_SERVER_ERROR;
      body = { ...INTERNAL_ERROR_BODY };
    }

    if (typeof correlationId === 'string') {
      body.correlationId = correlationId;
    }
    response.status(status).json(body);
  }
}

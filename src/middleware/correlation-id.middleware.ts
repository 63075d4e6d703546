import { Injectable, NestMiddleware } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { Request, Response, NextFunction } from 'express';
import { CORRELATION_ID_HEADER } from '../api-key.constants';

// Client ids end up in log lines.
const CORRELATION_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

export function resolveCorrelationId(incoming: string | string[] | undefined): string {
  return typeof incoming === 'string' && CORRELATION_ID_PATTERN.test(incoming)
    ? incoming
    : randomUUID();
}

/**
 * Ensures every request carries an `X-Correlation-ID`, reusing the caller's
 * value when it is well formed, and echoes it on the response.
 */
@Injectable()
export class CorrelationIdMiddleware implements NestMiddleware {
  use(req: Request, res: Response, next: NextFunction): void {
    const correlationId = resolveCorrelationId(req.headers[CORRELATION_ID_HEADER]);

    req.headers[CORRELATION_ID_HEADER] = correlationId;
    res.setHeader(CORRELATION_ID_HEADER, correlationId);
    next();
  }
}

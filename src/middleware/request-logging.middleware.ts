import { Inject, Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import onHeaders from 'on-headers';
import { performance } from 'perf_hooks';
import { APP_CONFIG, CORRELATION_ID_HEADER, PROCESS_TIME_HEADER } from '../api-key.constants';
import { AppConfig } from '../config/config';
import { AppLogger } from '../utils/logger.util';

function formatDuration(startedAt: number): string {
  return `${(performance.now() - startedAt).toFixed(2)}ms`;
}

/**
 * Logs every request once its response has finished. With
 * `exposeTimingHeader` the handling time is also sent as `X-Process-Time`,
 * measured when the headers go out.
 */
@Injectable()
export class RequestLoggingMiddleware implements NestMiddleware {
  constructor(
    @Inject(APP_CONFIG) private readonly config: Pick<AppConfig, 'exposeTimingHeader'>,
  ) {}

  use(req: Request, res: Response, next: NextFunction): void {
    const startedAt = performance.now();

    if (this.config.exposeTimingHeader) {
      onHeaders(res, () => {
        res.setHeader(PROCESS_TIME_HEADER, formatDuration(startedAt));
      });
    }

    res.on('finish', () => {
      const correlationId = req.headers[CORRELATION_ID_HEADER];
      AppLogger.log(
        `${req.method} ${req.originalUrl} ${res.statusCode} ${formatDuration(startedAt)}` +
          (typeof correlationId === 'string' ? ` [correlation ${correlationId}]` : ''),
        'HTTP',
      );
    });
    next();
  }
}

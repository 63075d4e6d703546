import {
  BadRequestException,
  Inject,
  Injectable,
  NestMiddleware,
  PayloadTooLargeException,
} from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { APP_CONFIG } from '../api-key.constants';
import { AppConfig } from '../config/config';

/**
 * Refuses requests whose declared `Content-Length` exceeds `maxRequestSize`
 * before anything reads the body.
 *
 * @throws {PayloadTooLargeException} If the declared length is over the limit
 * @throws {BadRequestException} If the header is not a byte count
 */
@Injectable()
export class RequestSizeLimitMiddleware implements NestMiddleware {
  constructor(@Inject(APP_CONFIG) private readonly config: Pick<AppConfig, 'maxRequestSize'>) {}

  use(req: Request, _res: Response, next: NextFunction): void {
    const declared = req.headers['content-length'];
    if (declared !== undefined) {
      if (!/^\d+$/.test(declared)) {
        throw new BadRequestException('Invalid Content-Length header');
      }
      if (Number(declared) > this.config.maxRequestSize) {
        throw new PayloadTooLargeException('Request body too large');
      }
    }
    next();
  }
}

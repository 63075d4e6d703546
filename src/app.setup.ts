import { NestExpressApplication } from '@nestjs/platform-express';
import { API_PREFIX, CORRELATION_ID_HEADER, PROCESS_TIME_HEADER } from './api-key.constants';
import { AppConfig } from './config/config';

type ConfigurableApp = Pick<
  NestExpressApplication,
  'setGlobalPrefix' | 'enableCors' | 'useBodyParser'
>;

/**
 * Application-level HTTP settings that cannot be expressed as module
 * providers. Health endpoints stay outside the versioned prefix.
 */
export function configureApp(
  app: ConfigurableApp,
  config: Pick<AppConfig, 'corsOrigins' | 'headerName' | 'maxRequestSize'>,
): void {
  app.setGlobalPrefix(API_PREFIX, { exclude: ['health/(.*)'] });

  if (config.corsOrigins.length > 0) {
    app.enableCors({
      origin: config.corsOrigins,
      credentials: true,
      methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Authorization', 'Content-Type', config.headerName, CORRELATION_ID_HEADER],
      exposedHeaders: [CORRELATION_ID_HEADER, PROCESS_TIME_HEADER],
    });
  }

  app.useBodyParser('json', { limit: config.maxRequestSize });
  app.useBodyParser<{ limit: number; extended: boolean }>('urlencoded', {
    limit: config.maxRequestSize,
    extended: true,
  });
}

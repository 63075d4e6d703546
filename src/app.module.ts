import {
  DynamicModule,
  Inject,
  MiddlewareConsumer,
  Module,
  NestModule,
  OnApplicationShutdown,
} from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { DataSource } from 'typeorm';
import { APP_CONFIG } from './api-key.constants';
import { ApiKeyModule } from './api-key.module';
import { AppConfig } from './config/config';
import { HttpExceptionFilter } from './filters/http-exception.filter';
import { CorrelationIdMiddleware } from './middleware/correlation-id.middleware';
import { RequestLoggingMiddleware } from './middleware/request-logging.middleware';
import { RequestSizeLimitMiddleware } from './middleware/request-size-limit.middleware';
import { SecurityHeadersMiddleware } from './middleware/security-headers.middleware';
import { AppLogger } from './utils/logger.util';

export const APP_DATA_SOURCE = 'APP_DATA_SOURCE';

/**
 * Root module of the HTTP service: API key authentication plus the item
 * endpoints, on an already initialized data source.
 */
@Module({})
export class AppModule implements NestModule, OnApplicationShutdown {
  constructor(@Inject(APP_DATA_SOURCE) private readonly dataSource: DataSource) {}

  static forRoot(config: AppConfig, dataSource: DataSource): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ApiKeyModule.register({
          adapter: 'typeorm',
          dataSource,
          headerName: config.headerName,
          apiKeyMinLength: config.apiKeyMinLength,
          hashAlgorithm: config.hashAlgorithm,
          bcryptRounds: config.bcryptRounds,
          statementTimeoutMs: config.statementTimeoutMs,
        }),
      ],
      providers: [
        { provide: APP_DATA_SOURCE, useValue: dataSource },
        { provide: APP_CONFIG, useValue: config },
        { provide: APP_FILTER, useClass: HttpExceptionFilter },
      ],
    };
  }

  configure(consumer: MiddlewareConsumer): void {
    // The correlation id must be in place before anything logs or fails.
    consumer
      .apply(
        CorrelationIdMiddleware,
        SecurityHeadersMiddleware,
        RequestLoggingMiddleware,
        RequestSizeLimitMiddleware,
      )
      .forRoutes('*');
  }

  async onApplicationShutdown(signal?: string): Promise<void> {
    if (this.dataSource.isInitialized) {
      await this.dataSource.destroy();
      AppLogger.log(`Database connections closed${signal ? ` (${signal})` : ''}`, 'AppModule');
    }
  }
}

import { DynamicModule, Module, Provider, BadRequestException } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { ApiKeyService } from './services/api-key.service';
import { ItemService } from './services/item.service';
import { HealthService } from './services/health.service';
import {
  TypeOrmApiKeyAdapter,
  TYPEORM_DATA_SOURCE_KEY,
  DEFAULT_STATEMENT_TIMEOUT_MS,
} from './adapters/typeorm.adapter';
import { TypeOrmItemAdapter } from './adapters/typeorm-item.adapter';
import { IApiKeyAdapter } from './adapters/base.adapter';
import { IItemAdapter } from './adapters/item.adapter';
import { ApiKeyGuard } from './guards/api-key.guard';
import { ItemsController } from './controllers/items.controller';
import { HealthController } from './controllers/health.controller';
import { ApiKeyModuleOptions } from './interfaces';
import { validateModuleOptions } from './utils/validation.util';
import { AppLogger } from './utils/logger.util';
import { SecretCodec } from './utils/secret.util';
import {
  API_KEY_ADAPTER,
  API_KEY_OPTIONS,
  DEFAULT_HEADER_NAME,
  ITEM_ADAPTER,
} from './api-key.constants';

export { API_KEY_ADAPTER, API_KEY_OPTIONS, ITEM_ADAPTER } from './api-key.constants';

@Module({})
export class ApiKeyModule {
  static register(options: ApiKeyModuleOptions = {}): DynamicModule {
    try {
      validateModuleOptions(options);
    } catch (error) {
      throw new BadRequestException(
        `Invalid module configuration: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }

    const resolvedOptions: ApiKeyModuleOptions = {
      adapter: 'typeorm',
      headerName: DEFAULT_HEADER_NAME,
      statementTimeoutMs: DEFAULT_STATEMENT_TIMEOUT_MS,
      ...options,
    };

    AppLogger.log(
      `Initializing ApiKeyModule with adapter: ${resolvedOptions.adapter}`,
      'ApiKeyModule',
    );

    const providers: Provider[] = [
      { provide: API_KEY_OPTIONS, useValue: resolvedOptions },
      ...ApiKeyModule.createAdapterProviders(resolvedOptions),
      {
        provide: SecretCodec,
        useFactory: () =>
          new SecretCodec({
            tag: resolvedOptions.secretTag,
            secretBytes: resolvedOptions.secretBytes,
            hashAlgorithm: resolvedOptions.hashAlgorithm,
            bcryptRounds: resolvedOptions.bcryptRounds,
          }),
      },
      {
        provide: ApiKeyService,
        useFactory: (adapter: IApiKeyAdapter, codec: SecretCodec) =>
          new ApiKeyService(
            adapter,
            codec,
            resolvedOptions.apiKeyMinLength,
            resolvedOptions.minPrefixSearchLength,
          ),
        inject: [API_KEY_ADAPTER, SecretCodec],
      },
      {
        provide: ItemService,
        useFactory: (adapter: IItemAdapter) => new ItemService(adapter),
        inject: [ITEM_ADAPTER],
      },
      {
        provide: HealthService,
        useFactory: (adapter: IApiKeyAdapter) =>
          new HealthService(adapter, resolvedOptions.healthCheckTimeoutMs),
        inject: [API_KEY_ADAPTER],
      },
      ApiKeyGuard,
    ];

    return {
      module: ApiKeyModule,
      controllers: [ItemsController, HealthController],
      providers,
      exports: [
        API_KEY_OPTIONS,
        API_KEY_ADAPTER,
        ITEM_ADAPTER,
        SecretCodec,
        ApiKeyService,
        ItemService,
        HealthService,
        ApiKeyGuard,
      ],
    };
  }

  private static createAdapterProviders(options: ApiKeyModuleOptions): Provider[] {
    if (options.adapter === 'custom') {
      const { customAdapter, customItemAdapter } = options;
      if (!customAdapter || !customItemAdapter) {
        throw new BadRequestException(
          'customAdapter and customItemAdapter must be provided when using the custom adapter',
        );
      }
      return [
        { provide: API_KEY_ADAPTER, useValue: customAdapter },
        { provide: ITEM_ADAPTER, useValue: customItemAdapter },
      ];
    }

    if (!options.dataSource) {
      throw new BadRequestException(
        'A TypeORM DataSource must be provided when using the TypeORM adapter',
      );
    }

    return [
      { provide: TYPEORM_DATA_SOURCE_KEY, useValue: options.dataSource },
      {
        provide: API_KEY_ADAPTER,
        useFactory: (dataSource: DataSource) =>
          new TypeOrmApiKeyAdapter(dataSource, options.statementTimeoutMs),
        inject: [TYPEORM_DATA_SOURCE_KEY],
      },
      {
        provide: ITEM_ADAPTER,
        useFactory: (dataSource: DataSource) => new TypeOrmItemAdapter(dataSource),
        inject: [TYPEORM_DATA_SOURCE_KEY],
      },
    ];
  }
}

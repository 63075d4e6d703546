import { DataSource } from 'typeorm';
import { ApiKeyEntity, ItemEntity } from '../entities';
import { InitialSchema1729000000000 } from '../migrations/1729000000000-InitialSchema';
import { AppConfig } from './config';

/**
 * PostgreSQL data source for the application. The schema is owned by the
 * migrations; `synchronize` stays off.
 */
export function createDataSource(
  config: Pick<AppConfig, 'databaseUrl' | 'poolSize' | 'poolTimeoutSeconds'>,
): DataSource {
  return new DataSource({
    type: 'postgres',
    url: config.databaseUrl,
    entities: [ApiKeyEntity, ItemEntity],
    migrations: [InitialSchema1729000000000],
    synchronize: false,
    logging: false,
    // Handed to pg's Pool.
    extra: {
      max: config.poolSize,
      connectionTimeoutMillis: config.poolTimeoutSeconds * 1000,
    },
  });
}

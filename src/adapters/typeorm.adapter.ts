import { DataSource, EntityManager } from 'typeorm';
import { ApiKey, ApiKeyPage } from '../interfaces';
import { ApiKeyEntity } from '../entities/api-key.entity';
import { ApiKeyConflictException, StoreUnavailableException } from '../exceptions';
import { AppLogger } from '../utils/logger.util';
import { isUniqueViolation, violatedConstraint } from '../utils/store-error.util';
import { IApiKeyAdapter, CreateApiKeyData, LockedKeyCheck } from './base.adapter';

export const TYPEORM_DATA_SOURCE_KEY = 'TYPEORM_DATA_SOURCE';
export const DEFAULT_STATEMENT_TIMEOUT_MS = 30000;

const CLIENT_NAME_CONSTRAINT = 'uq_api_keys_client_id_name';

/**
 * Escapes LIKE wildcards. Secrets are base64url, so `_` is common in prefixes.
 */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (match) => `\\${match}`);
}

/**
 * TypeORM (PostgreSQL) storage for API keys.
 * Every write runs in its own transaction bounded by `statement_timeout`.
 */
export class TypeOrmApiKeyAdapter implements IApiKeyAdapter {
  constructor(
    private readonly dataSource: DataSource,
    private readonly statementTimeoutMs: number = DEFAULT_STATEMENT_TIMEOUT_MS,
  ) {}

  async create(data: CreateApiKeyData): Promise<ApiKey> {
    try {
      return await this.inTransaction(async (manager) => {
        const repository = manager.getRepository(ApiKeyEntity);
        const entity = repository.create({
          name: data.name,
          clientId: data.clientId,
          keyHash: data.keyHash,
          keyPrefix: data.keyPrefix,
          isActive: true,
          expiresAt: data.expiresAt,
          lastUsedAt: null,
          revokedAt: null,
        });
        const saved = await repository.save(entity);
        return this.mapToApiKey(saved);
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw violatedConstraint(error) === CLIENT_NAME_CONSTRAINT
          ? new ApiKeyConflictException()
          : new ApiKeyConflictException('API key collides with an existing key');
      }
      AppLogger.error('Error creating API key in TypeORM', error, 'TypeOrmApiKeyAdapter');
      throw new StoreUnavailableException('Failed to create API key in database');
    }
  }

  async findById(id: string): Promise<ApiKey | null> {
    const entity = await this.dataSource.getRepository(ApiKeyEntity).findOne({ where: { id } });
    return entity ? this.mapToApiKey(entity) : null;
  }

  async findByPrefix(prefix: string): Promise<ApiKey | null> {
    const matches = await this.dataSource
      .getRepository(ApiKeyEntity)
      .createQueryBuilder('apiKey')
      .where("apiKey.keyPrefix LIKE :pattern ESCAPE '\\'", { pattern: `${escapeLike(prefix)}%` })
      .orderBy('apiKey.createdAt', 'DESC')
      .take(2)
      .getMany();

    if (matches.length !== 1) {
      if (matches.length > 1) {
        AppLogger.warn(`Prefix search is ambiguous: ${prefix}`, 'TypeOrmApiKeyAdapter');
      }
      return null;
    }
    return this.mapToApiKey(matches[0]);
  }

  async list(skip: number, limit: number): Promise<ApiKeyPage> {
    const repository = this.dataSource.getRepository(ApiKeyEntity);
    const total = await repository.count();
    const entities = await repository.find({
      order: { createdAt: 'DESC' },
      skip,
      take: limit,
    });
    return { keys: entities.map((entity) => this.mapToApiKey(entity)), total };
  }

  async validateAndTouch(
    keyPrefix: string,
    check: LockedKeyCheck,
    usedAt: Date,
  ): Promise<ApiKey | null> {
    return this.inTransaction(async (manager) => {
      const repository = manager.getRepository(ApiKeyEntity);
      // SKIP LOCKED: a concurrent validation holding the row makes it invisible here.
      const entity = await repository
        .createQueryBuilder('apiKey')
        .where('apiKey.keyPrefix = :keyPrefix', { keyPrefix })
        .andWhere('apiKey.isActive = :isActive', { isActive: true })
        .setLock('pessimistic_write')
        .setOnLocked('skip_locked')
        .getOne();

      if (!entity) {
        return null;
      }

      const apiKey = this.mapToApiKey(entity);
      if (!(await check(apiKey))) {
        return null;
      }

      await repository.update({ id: entity.id }, { lastUsedAt: usedAt });
      return { ...apiKey, lastUsedAt: usedAt };
    });
  }

  async revoke(id: string, revokedAt: Date): Promise<boolean> {
    return this.inTransaction(async (manager) => {
      const result = await manager
        .getRepository(ApiKeyEntity)
        .update({ id }, { isActive: false, revokedAt });
      return (result.affected ?? 0) > 0;
    });
  }

  async count(): Promise<number> {
    return this.dataSource.getRepository(ApiKeyEntity).count();
  }

  private async inTransaction<T>(work: (manager: EntityManager) => Promise<T>): Promise<T> {
    return this.dataSource.transaction(async (manager) => {
      // SET does not take bind parameters; the value is a validated integer.
      await manager.query(`SET LOCAL statement_timeout = ${Math.trunc(this.statementTimeoutMs)}`);
      return work(manager);
    });
  }

  private mapToApiKey(entity: ApiKeyEntity): ApiKey {
    return {
      id: entity.id,
      name: entity.name,
      clientId: entity.clientId,
      keyPrefix: entity.keyPrefix,
      keyHash: entity.keyHash,
      isActive: entity.isActive,
      expiresAt: entity.expiresAt ?? null,
      createdAt: entity.createdAt,
      lastUsedAt: entity.lastUsedAt ?? null,
      revokedAt: entity.revokedAt ?? null,
    };
  }
}

import { InvalidArgumentError } from 'commander';
import { DataSource } from 'typeorm';
import { IApiKeyAdapter } from '../adapters/base.adapter';
import { TypeOrmApiKeyAdapter } from '../adapters/typeorm.adapter';
import { AppConfig } from '../config/config';
import { createDataSource } from '../config/data-source';
import { ApiKeyNotFoundException, StoreUnavailableException } from '../exceptions';
import { ApiKey, ApiKeyPage, CreateApiKeyResponse } from '../interfaces';
import { ApiKeyService } from '../services/api-key.service';
import { AppLogger } from '../utils/logger.util';
import { SecretCodec } from '../utils/secret.util';
import { MAX_PAGE_LIMIT, isUuid } from '../utils/validation.util';

export type CliConfig = Pick<
  AppConfig,
  | 'databaseUrl'
  | 'poolSize'
  | 'poolTimeoutSeconds'
  | 'hashAlgorithm'
  | 'bcryptRounds'
  | 'statementTimeoutMs'
>;

export type RevokeOutcome = 'revoked' | 'already_revoked' | 'failed';

/**
 * The database could not be reached, or failed while the command ran.
 */
export class DatabaseUnavailableError extends Error {
  constructor(readonly details: string) {
    super('Unable to connect to database');
    this.name = 'DatabaseUnavailableError';
  }
}

export function isDatabaseError(error: unknown): boolean {
  return error instanceof DatabaseUnavailableError || error instanceof StoreUnavailableException;
}

/**
 * Option parser for `list --limit`.
 *
 * @throws {InvalidArgumentError} Unless the value is a whole number from 1 to 100
 */
export function parseListLimit(value: string): number {
  const limit = /^\d+$/.test(value) ? Number(value) : NaN;
  if (!Number.isSafeInteger(limit) || limit < 1 || limit > MAX_PAGE_LIMIT) {
    throw new InvalidArgumentError(`Limit must be a whole number between 1 and ${MAX_PAGE_LIMIT}.`);
  }
  return limit;
}

/**
 * Administrative operations behind the `api-keys` command. Pass an adapter to
 * run without opening a database connection.
 */
export class CliService {
  private dataSource: DataSource | null = null;
  private apiKeyService: ApiKeyService | null = null;

  constructor(
    private readonly config: CliConfig,
    private readonly adapter?: IApiKeyAdapter,
  ) {}

  async initialize(): Promise<void> {
    let adapter = this.adapter;
    if (!adapter) {
      const dataSource = await this.connect();
      this.dataSource = dataSource;
      adapter = new TypeOrmApiKeyAdapter(dataSource, this.config.statementTimeoutMs);
    }

    this.apiKeyService = new ApiKeyService(
      adapter,
      new SecretCodec({
        hashAlgorithm: this.config.hashAlgorithm,
        bcryptRounds: this.config.bcryptRounds,
      }),
    );
  }

  async disconnect(): Promise<void> {
    if (this.dataSource?.isInitialized) {
      await this.dataSource.destroy();
    }
    this.dataSource = null;
  }

  async createKey(options: {
    name: string;
    clientId: string;
    expiresAt?: string;
  }): Promise<CreateApiKeyResponse> {
    return this.service().create(options);
  }

  async listKeys(limit = 50): Promise<ApiKeyPage> {
    return this.service().list(0, limit);
  }

  /**
   * Finds a key by prefix first, then by id.
   */
  async resolveKey(prefixOrId: string): Promise<ApiKey | null> {
    const service = this.service();
    const byPrefix = await service.findByPrefix(prefixOrId);
    if (byPrefix) {
      return byPrefix;
    }
    if (!isUuid(prefixOrId)) {
      return null;
    }
    try {
      return await service.findById(prefixOrId);
    } catch (error) {
      if (error instanceof ApiKeyNotFoundException) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Revokes a resolved key. A key that is already inactive is left as it is.
   */
  async revokeKey(apiKey: ApiKey): Promise<RevokeOutcome> {
    if (!apiKey.isActive) {
      return 'already_revoked';
    }
    return (await this.service().revoke(apiKey.id)) ? 'revoked' : 'failed';
  }

  private async connect(): Promise<DataSource> {
    try {
      return await createDataSource(this.config).initialize();
    } catch (error) {
      AppLogger.error('Failed to connect to database', error, 'CliService');
      throw new DatabaseUnavailableError(error instanceof Error ? error.message : String(error));
    }
  }

  private service(): ApiKeyService {
    if (!this.apiKeyService) {
      throw new Error('CLI not initialized. Call initialize() first.');
    }
    return this.apiKeyService;
  }
}

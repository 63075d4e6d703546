import { Injectable } from '@nestjs/common';
import { IApiKeyAdapter } from '../adapters/base.adapter';
import { ApiKey, ApiKeyPage, CreateApiKeyResponse, ValidationContext } from '../interfaces';
import {
  ApiKeyConflictException,
  ApiKeyNotFoundException,
  StoreUnavailableException,
  ValidationFailedException,
} from '../exceptions';
import { AppLogger } from '../utils/logger.util';
import { SecretCodec } from '../utils/secret.util';
import { DEFAULT_PAGE_LIMIT, isUuid, validateCreateApiKey } from '../utils/validation.util';

export const DEFAULT_API_KEY_MIN_LENGTH = 32;
export const DEFAULT_MIN_PREFIX_SEARCH_LENGTH = 4;

type RejectionReason = 'not_found' | 'hash_mismatch' | 'expired';

/**
 * A key is expired once its expiry instant lies strictly before `now`.
 */
export function isExpired(apiKey: Pick<ApiKey, 'expiresAt'>, now: Date = new Date()): boolean {
  return apiKey.expiresAt !== null && apiKey.expiresAt.getTime() < now.getTime();
}

@Injectable()
export class ApiKeyService {
  constructor(
    private readonly adapter: IApiKeyAdapter,
    private readonly codec: SecretCodec,
    private readonly apiKeyMinLength: number = DEFAULT_API_KEY_MIN_LENGTH,
    private readonly minPrefixSearchLength: number = DEFAULT_MIN_PREFIX_SEARCH_LENGTH,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Issues a new key for a client. The plaintext secret is only ever part of
   * this return value.
   *
   * @throws {ValidationFailedException} If name, client id or expiry are invalid
   * @throws {ApiKeyConflictException} If the client already has a key with this name
   * @throws {StoreUnavailableException} If the key could not be persisted
   *
   * @example
   * ```typescript
   * const issued = await apiKeyService.create({ name: 'billing-worker', clientId: 'acme' });
   * console.log(issued.key); // hand this to the client now
   * ```
   */
  async create(input: unknown): Promise<CreateApiKeyResponse> {
    const dto = validateCreateApiKey(input, this.now());

    try {
      const key = this.codec.generateSecret();
      const keyPrefix = this.codec.extractPrefix(key);
      const keyHash = await this.codec.hashSecret(key);

      const apiKey = await this.adapter.create({
        name: dto.name,
        clientId: dto.clientId,
        keyHash,
        keyPrefix,
        expiresAt: dto.expiresAt ?? null,
      });

      AppLogger.log(`API key created: ${apiKey.id} (prefix ${apiKey.keyPrefix})`);

      return {
        id: apiKey.id,
        name: apiKey.name,
        clientId: apiKey.clientId,
        keyPrefix: apiKey.keyPrefix,
        key,
        expiresAt: apiKey.expiresAt,
        createdAt: apiKey.createdAt,
      };
    } catch (error) {
      if (
        error instanceof ApiKeyConflictException ||
        error instanceof StoreUnavailableException ||
        error instanceof ValidationFailedException
      ) {
        throw error;
      }
      AppLogger.error('Error creating API key', error);
      throw new StoreUnavailableException('Failed to create API key');
    }
  }

  /**
   * Authenticates a presented secret and records its use.
   *
   * Every failure, including store errors, yields `null`; the reason is
   * only written to the log.
   */
  async validate(key: string | undefined | null, context: ValidationContext = {}): Promise<ApiKey | null> {
    const tag = context.correlationId ? ` [correlation ${context.correlationId}]` : '';

    if (typeof key !== 'string' || key.length < this.apiKeyMinLength) {
      AppLogger.debug(`API key rejected: missing or too short${tag}`);
      return null;
    }

    const keyPrefix = this.codec.extractPrefix(key);
    const usedAt = this.now();
    let reason: RejectionReason = 'not_found';

    try {
      const apiKey = await this.adapter.validateAndTouch(
        keyPrefix,
        async (candidate) => {
          if (!(await this.codec.verifySecret(key, candidate.keyHash))) {
            reason = 'hash_mismatch';
            return false;
          }
          if (isExpired(candidate, usedAt)) {
            reason = 'expired';
            return false;
          }
          return true;
        },
        usedAt,
      );

      if (!apiKey) {
        AppLogger.warn(`API key rejected (${reason}): prefix ${keyPrefix}${tag}`);
        return null;
      }

      AppLogger.debug(`API key accepted: ${apiKey.id}${tag}`);
      return apiKey;
    } catch (error) {
      AppLogger.error(`Error validating API key with prefix ${keyPrefix}${tag}`, error);
      return null;
    }
  }

  /**
   * @throws {ApiKeyNotFoundException} If no key has this id
   */
  async findById(id: string): Promise<ApiKey> {
    const apiKey = isUuid(id) ? await this.guardStore(() => this.adapter.findById(id)) : null;
    if (!apiKey) {
      throw new ApiKeyNotFoundException(id);
    }
    return apiKey;
  }

  /**
   * Administrative lookup by (partial) prefix. Prefixes shorter than the
   * configured minimum never match.
   */
  async findByPrefix(prefix: string): Promise<ApiKey | null> {
    if (prefix.length < this.minPrefixSearchLength) {
      return null;
    }
    return this.guardStore(() => this.adapter.findByPrefix(prefix));
  }

  async list(skip = 0, limit = DEFAULT_PAGE_LIMIT): Promise<ApiKeyPage> {
    return this.guardStore(() => this.adapter.list(skip, limit));
  }

  /**
   * Deactivates a key. Revoking a key that is already revoked succeeds again
   * and moves `revokedAt` forward.
   *
   * @returns false if no key has this id
   */
  async revoke(id: string): Promise<boolean> {
    if (!isUuid(id)) {
      return false;
    }
    const revoked = await this.guardStore(() => this.adapter.revoke(id, this.now()));
    if (revoked) {
      AppLogger.log(`API key revoked: ${id}`);
    }
    return revoked;
  }

  private async guardStore<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof StoreUnavailableException) {
        throw error;
      }
      AppLogger.error('API key store operation failed', error);
      throw new StoreUnavailableException();
    }
  }
}

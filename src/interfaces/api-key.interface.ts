import type { Request } from 'express';
import type { DataSource } from 'typeorm';
import type { IApiKeyAdapter } from '../adapters/base.adapter';
import type { IItemAdapter } from '../adapters/item.adapter';
import type { HashAlgorithm } from '../utils/secret.util';

export type AdapterType = 'typeorm' | 'custom';

export interface ApiKey {
  id: string;
  name: string;
  clientId: string;
  keyPrefix: string;
  keyHash: string;
  isActive: boolean;
  expiresAt: Date | null;
  createdAt: Date;
  lastUsedAt: Date | null;
  revokedAt: Date | null;
}

export interface CreateApiKeyDto {
  name: string;
  clientId: string;
  expiresAt?: Date | null;
}

/**
 * Returned once, at issuance. `key` is the plaintext secret and cannot be
 * recovered afterwards.
 */
export interface CreateApiKeyResponse {
  id: string;
  name: string;
  clientId: string;
  keyPrefix: string;
  key: string;
  expiresAt: Date | null;
  createdAt: Date;
}

export interface ApiKeyPage {
  keys: ApiKey[];
  total: number;
}

export interface ValidationContext {
  correlationId?: string;
}

export interface ApiKeyModuleOptions {
  adapter?: AdapterType;
  dataSource?: DataSource;
  customAdapter?: IApiKeyAdapter;
  customItemAdapter?: IItemAdapter;
  headerName?: string;
  apiKeyMinLength?: number;
  secretBytes?: number;
  secretTag?: string;
  hashAlgorithm?: HashAlgorithm;
  bcryptRounds?: number;
  minPrefixSearchLength?: number;
  statementTimeoutMs?: number;
  healthCheckTimeoutMs?: number;
}

/**
 * An Express request after `ApiKeyGuard` has accepted it.
 */
export interface AuthenticatedRequest extends Request {
  apiKey?: ApiKey;
}

import { BadRequestException } from '@nestjs/common';
import { ApiKeyModuleOptions, AdapterType, CreateApiKeyDto } from '../interfaces/api-key.interface';
import { CreateItemDto, UpdateItemDto } from '../interfaces/item.interface';
import { FieldError, ValidationFailedException } from '../exceptions/api-key.exceptions';
import {
  BCRYPT_ROUNDS_MAX,
  BCRYPT_ROUNDS_MIN,
  KEY_PREFIX_LENGTH,
  MIN_SECRET_BYTES,
  generatedSecretLength,
  secretTagProblem,
} from './secret.util';

export const MAX_NAME_LENGTH = 255;
export const MAX_DESCRIPTION_LENGTH = 5000;
export const STATEMENT_TIMEOUT_MIN_MS = 1000;
export const STATEMENT_TIMEOUT_MAX_MS = 300000;
export const DEFAULT_PAGE_LIMIT = 50;
export const MAX_PAGE_LIMIT = 100;
export const MAX_PAGE_SKIP = 1000;

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const DIGITS_PATTERN = /^\d+$/;

export interface Pagination {
  skip: number;
  limit: number;
}

export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requiredText(
  source: Record<string, unknown>,
  field: string,
  errors: FieldError[],
): string | undefined {
  const value = source[field];
  if (typeof value !== 'string') {
    errors.push({ field, message: `${field} is required and must be a string` });
    return undefined;
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    errors.push({ field, message: `${field} cannot be empty or whitespace-only` });
    return undefined;
  }
  if (trimmed.length > MAX_NAME_LENGTH) {
    errors.push({ field, message: `${field} must not exceed ${MAX_NAME_LENGTH} characters` });
    return undefined;
  }
  return trimmed;
}

function optionalDescription(
  source: Record<string, unknown>,
  errors: FieldError[],
): string | null | undefined {
  const value = source.description;
  if (value === undefined || value === null) {
    return value;
  }
  if (typeof value !== 'string') {
    errors.push({ field: 'description', message: 'description must be a string or null' });
    return undefined;
  }
  if (value.length > MAX_DESCRIPTION_LENGTH) {
    errors.push({
      field: 'description',
      message: `description must not exceed ${MAX_DESCRIPTION_LENGTH} characters`,
    });
    return undefined;
  }
  return value;
}

function bodyOf(input: unknown): Record<string, unknown> {
  if (!isRecord(input)) {
    throw new ValidationFailedException([{ field: 'body', message: 'Request body must be an object' }]);
  }
  return input;
}

/**
 * Validates and normalizes an issuance request. Names and client ids are
 * trimmed; `expiresAt` must be a valid date after `now`.
 *
 * @throws {ValidationFailedException} With one entry per invalid field
 */
export function validateCreateApiKey(input: unknown, now: Date = new Date()): CreateApiKeyDto {
  const body = bodyOf(input);
  const errors: FieldError[] = [];

  const name = requiredText(body, 'name', errors);
  const clientId = requiredText(body, 'clientId', errors);

  let expiresAt: Date | null = null;
  const rawExpiry = body.expiresAt;
  if (rawExpiry !== undefined && rawExpiry !== null) {
    const parsed =
      rawExpiry instanceof Date
        ? rawExpiry
        : typeof rawExpiry === 'string'
          ? new Date(rawExpiry)
          : null;
    if (!parsed || Number.isNaN(parsed.getTime())) {
      errors.push({ field: 'expiresAt', message: 'expiresAt must be a valid date' });
    } else if (parsed <= now) {
      errors.push({ field: 'expiresAt', message: 'expiresAt must be in the future' });
    } else {
      expiresAt = parsed;
    }
  }

  if (errors.length > 0 || name === undefined || clientId === undefined) {
    throw new ValidationFailedException(errors);
  }

  return { name, clientId, expiresAt };
}

export function validateCreateItem(input: unknown): CreateItemDto {
  const body = bodyOf(input);
  const errors: FieldError[] = [];

  const name = requiredText(body, 'name', errors);
  const description = optionalDescription(body, errors);

  if (errors.length > 0 || name === undefined) {
    throw new ValidationFailedException(errors);
  }

  return { name, description: description ?? null };
}

/**
 * Builds a partial update from the allow-listed fields only. Fields that are
 * absent stay absent so the stored values are left untouched.
 */
export function validateUpdateItem(input: unknown): UpdateItemDto {
  const body = bodyOf(input);
  const errors: FieldError[] = [];
  const changes: UpdateItemDto = {};

  if (body.name !== undefined) {
    const name = requiredText(body, 'name', errors);
    if (name !== undefined) {
      changes.name = name;
    }
  }

  if (body.description !== undefined) {
    const description = optionalDescription(body, errors);
    if (description !== undefined) {
      changes.description = description;
    }
  }

  if (errors.length > 0) {
    throw new ValidationFailedException(errors);
  }

  return changes;
}

function parseBoundedInt(
  raw: string | undefined,
  field: string,
  fallback: number,
  min: number,
  max: number,
  errors: FieldError[],
): number {
  if (raw === undefined || raw === '') {
    return fallback;
  }
  // Plain decimal digits only: no sign, exponent, hex or padding.
  const value = DIGITS_PATTERN.test(raw) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(value) || value < min || value > max) {
    errors.push({ field, message: `${field} must be an integer between ${min} and ${max}` });
    return fallback;
  }
  return value;
}

/**
 * Copies only the fields of an item a client may change (`name`,
 * `description`). Anything else on `changes` is dropped.
 */
export function pickUpdatableFields(changes: UpdateItemDto): UpdateItemDto {
  const picked: UpdateItemDto = {};
  if (changes.name !== undefined) {
    picked.name = changes.name;
  }
  if (changes.description !== undefined) {
    picked.description = changes.description;
  }
  return picked;
}

export function parsePagination(skip?: string, limit?: string): Pagination {
  const errors: FieldError[] = [];
  const pagination = {
    skip: parseBoundedInt(skip, 'skip', 0, 0, MAX_PAGE_SKIP, errors),
    limit: parseBoundedInt(limit, 'limit', DEFAULT_PAGE_LIMIT, 1, MAX_PAGE_LIMIT, errors),
  };
  if (errors.length > 0) {
    throw new ValidationFailedException(errors);
  }
  return pagination;
}

export function assertUuid(value: string, field = 'id'): void {
  if (!isUuid(value)) {
    throw new ValidationFailedException([{ field, message: `${field} must be a valid UUID` }]);
  }
}

/**
 * Validates module configuration options.
 *
 * @throws {BadRequestException} If validation fails
 */
export function validateModuleOptions(options: ApiKeyModuleOptions): void {
  const adapterType: AdapterType = options.adapter || 'typeorm';
  if (!['typeorm', 'custom'].includes(adapterType)) {
    throw new BadRequestException(`Invalid adapter type: ${adapterType}`);
  }

  if (adapterType === 'typeorm' && !options.dataSource) {
    throw new BadRequestException('A TypeORM DataSource must be provided when using the TypeORM adapter');
  }

  if (adapterType === 'custom' && (!options.customAdapter || !options.customItemAdapter)) {
    throw new BadRequestException(
      'customAdapter and customItemAdapter must be provided when using the custom adapter',
    );
  }

  if (options.headerName !== undefined && options.headerName.trim().length === 0) {
    throw new BadRequestException('headerName must be a non-empty string');
  }

  if (options.secretTag !== undefined) {
    const tagProblem = secretTagProblem(options.secretTag);
    if (tagProblem) {
      throw new BadRequestException(tagProblem);
    }
  }

  if (
    options.secretBytes !== undefined &&
    (!Number.isInteger(options.secretBytes) || options.secretBytes < MIN_SECRET_BYTES)
  ) {
    throw new BadRequestException(`secretBytes must be an integer of at least ${MIN_SECRET_BYTES}`);
  }

  if (options.apiKeyMinLength !== undefined) {
    // Issued keys must pass the length check they are validated against.
    const issuedLength = generatedSecretLength(options.secretTag, options.secretBytes);
    if (
      !Number.isInteger(options.apiKeyMinLength) ||
      options.apiKeyMinLength < KEY_PREFIX_LENGTH ||
      options.apiKeyMinLength > issuedLength
    ) {
      throw new BadRequestException(
        `apiKeyMinLength must be an integer between ${KEY_PREFIX_LENGTH} and ${issuedLength}, the length of issued keys`,
      );
    }
  }

  if (
    options.hashAlgorithm !== undefined &&
    !['bcrypt', 'argon2'].includes(options.hashAlgorithm)
  ) {
    throw new BadRequestException('hashAlgorithm must be either "bcrypt" or "argon2"');
  }

  if (
    options.bcryptRounds !== undefined &&
    (!Number.isInteger(options.bcryptRounds) ||
      options.bcryptRounds < BCRYPT_ROUNDS_MIN ||
      options.bcryptRounds > BCRYPT_ROUNDS_MAX)
  ) {
    throw new BadRequestException(
      `bcryptRounds must be a number between ${BCRYPT_ROUNDS_MIN} and ${BCRYPT_ROUNDS_MAX}`,
    );
  }

  if (
    options.minPrefixSearchLength !== undefined &&
    (!Number.isInteger(options.minPrefixSearchLength) || options.minPrefixSearchLength < 1)
  ) {
    throw new BadRequestException('minPrefixSearchLength must be a positive integer');
  }

  if (
    options.statementTimeoutMs !== undefined &&
    (!Number.isInteger(options.statementTimeoutMs) ||
      options.statementTimeoutMs < STATEMENT_TIMEOUT_MIN_MS ||
      options.statementTimeoutMs > STATEMENT_TIMEOUT_MAX_MS)
  ) {
    throw new BadRequestException(
      `statementTimeoutMs must be between ${STATEMENT_TIMEOUT_MIN_MS} and ${STATEMENT_TIMEOUT_MAX_MS}`,
    );
  }

  if (
    options.healthCheckTimeoutMs !== undefined &&
    (typeof options.healthCheckTimeoutMs !== 'number' || options.healthCheckTimeoutMs <= 0)
  ) {
    throw new BadRequestException('healthCheckTimeoutMs must be a positive number');
  }
}

import { LogLevel } from '@nestjs/common';
import { z } from 'zod';
import {
  BCRYPT_ROUNDS_MAX,
  BCRYPT_ROUNDS_MIN,
  DEFAULT_BCRYPT_ROUNDS,
  HashAlgorithm,
  KEY_PREFIX_LENGTH,
  generatedSecretLength,
} from '../utils/secret.util';
import { STATEMENT_TIMEOUT_MAX_MS, STATEMENT_TIMEOUT_MIN_MS } from '../utils/validation.util';
import { DEFAULT_HEADER_NAME } from '../api-key.constants';

export interface AppConfig {
  databaseUrl: string;
  port: number;
  logLevel: LogLevel;
  headerName: string;
  apiKeyMinLength: number;
  bcryptRounds: number;
  hashAlgorithm: HashAlgorithm;
  poolSize: number;
  poolTimeoutSeconds: number;
  statementTimeoutMs: number;
  corsOrigins: string[];
  maxRequestSize: number;
  exposeTimingHeader: boolean;
}

/**
 * Raised once with every invalid or missing setting.
 */
export class ConfigurationError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigurationError';
  }
}

// Most verbose first.
const LOG_LEVELS = ['verbose', 'debug', 'log', 'warn', 'error', 'fatal'] as const satisfies readonly LogLevel[];

export const DEFAULT_MAX_REQUEST_SIZE = 10 * 1024 * 1024;

/**
 * Levels Nest should print for a minimum level, e.g. `warn` → warn, error, fatal.
 */
export function resolveLogLevels(minimum: LogLevel): LogLevel[] {
  return LOG_LEVELS.slice(LOG_LEVELS.indexOf(minimum));
}

function integer(name: string, fallback: number, min: number, max?: number) {
  const message =
    max === undefined
      ? `${name} must be an integer of at least ${min}`
      : `${name} must be an integer between ${min} and ${max}`;
  const bounded = z.coerce.number({ invalid_type_error: message }).int(message).min(min, message);
  return (max === undefined ? bounded : bounded.max(max, message)).default(fallback);
}

function mustBe(message: string): { errorMap: () => { message: string } } {
  return { errorMap: () => ({ message }) };
}

const POSTGRES_URL_MESSAGE = 'DATABASE_URL must be a postgres:// or postgresql:// URL';

const envSchema = z.object({
  DATABASE_URL: z
    .string({ required_error: 'DATABASE_URL is required' })
    .url(POSTGRES_URL_MESSAGE)
    .refine((url) => /^postgres(ql)?:\/\//.test(url), POSTGRES_URL_MESSAGE),
  LOG_LEVEL: z
    .enum(LOG_LEVELS, mustBe(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`))
    .default('log'),
  HASH_ALGORITHM: z
    .enum(['bcrypt', 'argon2'], mustBe('HASH_ALGORITHM must be either bcrypt or argon2'))
    .default('bcrypt'),
  API_KEY_HEADER: z
    .string()
    .regex(/^[A-Za-z0-9-]+$/, 'API_KEY_HEADER must be a valid HTTP header name')
    .default(DEFAULT_HEADER_NAME),
  PORT: integer('PORT', 8000, 1, 65535),
  // Never above the length of the keys this service issues.
  API_KEY_MIN_LENGTH: integer('API_KEY_MIN_LENGTH', 32, KEY_PREFIX_LENGTH, generatedSecretLength()),
  BCRYPT_ROUNDS: integer('BCRYPT_ROUNDS', DEFAULT_BCRYPT_ROUNDS, BCRYPT_ROUNDS_MIN, BCRYPT_ROUNDS_MAX),
  DATABASE_POOL_SIZE: integer('DATABASE_POOL_SIZE', 5, 1),
  DATABASE_POOL_TIMEOUT: integer('DATABASE_POOL_TIMEOUT', 30, 1, 300),
  DATABASE_STATEMENT_TIMEOUT: integer(
    'DATABASE_STATEMENT_TIMEOUT',
    30000,
    STATEMENT_TIMEOUT_MIN_MS,
    STATEMENT_TIMEOUT_MAX_MS,
  ),
  CORS_ORIGINS: z
    .string()
    .transform((value) =>
      value
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0),
    )
    // Credentials are allowed, which browsers refuse for a wildcard origin.
    .refine((origins) => !origins.includes('*'), 'CORS_ORIGINS must list origins explicitly, not *')
    .default(''),
  MAX_REQUEST_SIZE: integer('MAX_REQUEST_SIZE', DEFAULT_MAX_REQUEST_SIZE, 1024),
  EXPOSE_TIMING_HEADER: z
    .enum(['true', 'false'], mustBe('EXPOSE_TIMING_HEADER must be true or false'))
    .transform((value) => value === 'true')
    .default('true'),
});

type Env = Record<string, string | undefined>;

// Blank values count as unset.
function read(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Builds the application settings from environment variables. Call
 * `dotenv.config()` first to pick up a `.env` file.
 *
 * @throws {ConfigurationError} If any variable is missing or out of bounds
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const result = envSchema.safeParse({
    DATABASE_URL: read(env, 'DATABASE_URL'),
    LOG_LEVEL: read(env, 'LOG_LEVEL')?.toLowerCase(),
    HASH_ALGORITHM: read(env, 'HASH_ALGORITHM')?.toLowerCase(),
    API_KEY_HEADER: read(env, 'API_KEY_HEADER'),
    PORT: read(env, 'PORT'),
    API_KEY_MIN_LENGTH: read(env, 'API_KEY_MIN_LENGTH'),
    BCRYPT_ROUNDS: read(env, 'BCRYPT_ROUNDS'),
    DATABASE_POOL_SIZE: read(env, 'DATABASE_POOL_SIZE'),
    DATABASE_POOL_TIMEOUT: read(env, 'DATABASE_POOL_TIMEOUT'),
    DATABASE_STATEMENT_TIMEOUT: read(env, 'DATABASE_STATEMENT_TIMEOUT'),
    CORS_ORIGINS: read(env, 'CORS_ORIGINS'),
    MAX_REQUEST_SIZE: read(env, 'MAX_REQUEST_SIZE'),
    EXPOSE_TIMING_HEADER: read(env, 'EXPOSE_TIMING_HEADER')?.toLowerCase(),
  });

  if (!result.success) {
    throw new ConfigurationError([...new Set(result.error.issues.map((issue) => issue.message))]);
  }

  const settings = result.data;
  return {
    databaseUrl: settings.DATABASE_URL,
    port: settings.PORT,
    logLevel: settings.LOG_LEVEL,
    headerName: settings.API_KEY_HEADER,
    apiKeyMinLength: settings.API_KEY_MIN_LENGTH,
    bcryptRounds: settings.BCRYPT_ROUNDS,
    hashAlgorithm: settings.HASH_ALGORITHM,
    poolSize: settings.DATABASE_POOL_SIZE,
    poolTimeoutSeconds: settings.DATABASE_POOL_TIMEOUT,
    statementTimeoutMs: settings.DATABASE_STATEMENT_TIMEOUT,
    corsOrigins: settings.CORS_ORIGINS,
    maxRequestSize: settings.MAX_REQUEST_SIZE,
    exposeTimingHeader: settings.EXPOSE_TIMING_HEADER,
  };
}

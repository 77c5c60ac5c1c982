/**
 * Environment variable configuration loading
 * @module config/env
 */

import { ConfigError } from '../errors/categories.js';
import { isLogLevel } from '../observability/logging.js';
import type { NormalizedStoreConfig, StoreConfig } from './types.js';
import { normalizeConfig } from './validation.js';

/**
 * Environment variable names.
 */
export const ENV_VARS = {
  ENDPOINT: 'S3_ENDPOINT',
  REGION: 'S3_REGION',
  ACCESS_KEY: 'S3_ACCESS_KEY',
  SECRET_KEY: 'S3_SECRET_KEY',
  SESSION_TOKEN: 'S3_SESSION_TOKEN',
  URL_STYLE: 'S3_URL_STYLE',
  ACTIONS_EXPIRES_IN: 'S3_ACTIONS_EXPIRES_IN',
  TIMEOUT_MS: 'S3_TIMEOUT_MS',
  MULTIPART_CHUNK_SIZE: 'S3_MULTIPART_CHUNK_SIZE',
  MULTIPART_THRESHOLD: 'S3_MULTIPART_THRESHOLD',
  MULTIPART_CONCURRENCY: 'S3_MULTIPART_CONCURRENCY',
  LOG_LEVEL: 'S3_LOG_LEVEL',
} as const;

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Parses an integer variable. Anything but digits (with an optional sign) is
 * rejected, so `10MB` or `1e6` never silently become a number.
 *
 * @throws {ConfigError} If value is not a valid integer
 */
function parseIntEnv(env: Environment, name: string): number | undefined {
  const value = env[name]?.trim();
  if (!value) {
    return undefined;
  }
  if (!/^[+-]?\d+$/.test(value)) {
    throw ConfigError.invalidField(name, `must be an integer, got "${value}"`);
  }
  return Number.parseInt(value, 10);
}

function parseUrlStyleEnv(env: Environment): StoreConfig['urlStyle'] {
  const value = env[ENV_VARS.URL_STYLE]?.trim();
  if (!value) {
    return undefined;
  }
  if (value !== 'path' && value !== 'virtual-host') {
    throw ConfigError.invalidField(ENV_VARS.URL_STYLE, `must be "path" or "virtual-host", got "${value}"`);
  }
  return value;
}

function parseLogLevelEnv(env: Environment): StoreConfig['logLevel'] {
  const value = env[ENV_VARS.LOG_LEVEL]?.trim().toLowerCase();
  if (!value) {
    return undefined;
  }
  if (!isLogLevel(value)) {
    throw ConfigError.invalidField(ENV_VARS.LOG_LEVEL, `unknown log level "${value}"`);
  }
  return value;
}

/**
 * Reads the configuration from environment variables, without validating it.
 */
export function readConfigFromEnv(env: Environment = process.env): StoreConfig {
  return {
    endpoint: env[ENV_VARS.ENDPOINT],
    region: env[ENV_VARS.REGION],
    key: env[ENV_VARS.ACCESS_KEY],
    secret: env[ENV_VARS.SECRET_KEY],
    token: env[ENV_VARS.SESSION_TOKEN],
    urlStyle: parseUrlStyleEnv(env),
    actionsExpiresIn: parseIntEnv(env, ENV_VARS.ACTIONS_EXPIRES_IN),
    timeout: parseIntEnv(env, ENV_VARS.TIMEOUT_MS),
    multipartChunkSize: parseIntEnv(env, ENV_VARS.MULTIPART_CHUNK_SIZE),
    multipartThreshold: parseIntEnv(env, ENV_VARS.MULTIPART_THRESHOLD),
    multipartConcurrency: parseIntEnv(env, ENV_VARS.MULTIPART_CONCURRENCY),
    logLevel: parseLogLevelEnv(env),
  };
}

/**
 * Creates a validated configuration from environment variables.
 *
 * Environment variables:
 * - S3_ENDPOINT, S3_ACCESS_KEY, S3_SECRET_KEY (required)
 * - S3_SESSION_TOKEN, S3_REGION, S3_URL_STYLE
 * - S3_ACTIONS_EXPIRES_IN (seconds), S3_TIMEOUT_MS
 * - S3_MULTIPART_CHUNK_SIZE, S3_MULTIPART_THRESHOLD (bytes), S3_MULTIPART_CONCURRENCY
 * - S3_LOG_LEVEL
 *
 * @throws {ConfigError} If required variables are missing or invalid
 */
export function createConfigFromEnv(env: Environment = process.env): NormalizedStoreConfig {
  return normalizeConfig(readConfigFromEnv(env));
}

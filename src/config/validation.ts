/**
 * Configuration validation and normalization
 * @module config/validation
 */

import { z } from 'zod';
import { Credentials } from '../credentials/index.js';
import { ConfigError } from '../errors/categories.js';
import {
  DEFAULT_ACTIONS_EXPIRES_IN,
  DEFAULT_LOG_LEVEL,
  DEFAULT_MULTIPART_CHUNK_SIZE,
  DEFAULT_MULTIPART_CONCURRENCY,
  DEFAULT_MULTIPART_THRESHOLD,
  DEFAULT_REGION,
  DEFAULT_TIMEOUT,
  DEFAULT_URL_STYLE,
  MAX_ACTIONS_EXPIRES_IN,
  MAX_MULTIPART_CONCURRENCY,
  MAX_PART_SIZE,
  MIN_PART_SIZE,
} from './defaults.js';
import type { NormalizedStoreConfig, StoreConfig } from './types.js';

/**
 * Zod schema for configuration validation. Key order decides which problem
 * is reported first.
 */
const configSchema = z
  .object({
    endpoint: z
      .string()
      .url()
      .refine((value) => /^https?:\/\//i.test(value), 'must use http or https'),
    key: z.string(),
    secret: z.string(),
    token: z.string().optional(),
    region: z.string().min(1),
    urlStyle: z.enum(['path', 'virtual-host']),
    actionsExpiresIn: z.number().int().min(1).max(MAX_ACTIONS_EXPIRES_IN),
    timeout: z.number().int().positive(),
    multipartChunkSize: z.number().int().min(MIN_PART_SIZE).max(MAX_PART_SIZE),
    multipartThreshold: z.number().int().min(1),
    multipartConcurrency: z.number().int().min(1).max(MAX_MULTIPART_CONCURRENCY),
    logLevel: z.enum(['error', 'warn', 'info', 'debug', 'trace']),
  })
  .superRefine((config, ctx) => {
    if (config.multipartThreshold > config.multipartChunkSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['multipartThreshold'],
        message: `must not exceed multipartChunkSize (${config.multipartChunkSize})`,
      });
    }
  });

/**
 * Drops undefined and empty-string fields so that defaults apply and blank
 * values read as missing.
 */
function definedFields(config: StoreConfig): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(config).filter(([, value]) => value !== undefined && value !== '')
  );
}

/**
 * Validates a configuration, applies defaults and builds the credentials.
 *
 * @throws {ConfigError} naming the first offending field
 */
export function normalizeConfig(config: StoreConfig): NormalizedStoreConfig {
  const result = configSchema.safeParse({
    region: DEFAULT_REGION,
    urlStyle: DEFAULT_URL_STYLE,
    actionsExpiresIn: DEFAULT_ACTIONS_EXPIRES_IN,
    timeout: DEFAULT_TIMEOUT,
    multipartChunkSize: DEFAULT_MULTIPART_CHUNK_SIZE,
    multipartThreshold: DEFAULT_MULTIPART_THRESHOLD,
    multipartConcurrency: DEFAULT_MULTIPART_CONCURRENCY,
    logLevel: DEFAULT_LOG_LEVEL,
    ...definedFields(config),
  });

  if (!result.success) {
    throw toConfigError(result.error);
  }

  const value = result.data;
  return {
    endpoint: new URL(value.endpoint),
    credentials: new Credentials(value.key, value.secret, value.token),
    region: value.region,
    urlStyle: value.urlStyle,
    actionsExpiresIn: value.actionsExpiresIn,
    timeout: value.timeout,
    multipartChunkSize: value.multipartChunkSize,
    multipartThreshold: value.multipartThreshold,
    multipartConcurrency: value.multipartConcurrency,
    logLevel: value.logLevel,
  };
}

function toConfigError(error: z.ZodError): ConfigError {
  const [issue] = error.issues;
  if (issue === undefined) {
    return ConfigError.invalidField('config', 'validation failed');
  }
  const field = issue.path.map(String).join('.') || 'config';
  if (issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined') {
    return ConfigError.missingField(field);
  }
  return ConfigError.invalidField(field, issue.message);
}

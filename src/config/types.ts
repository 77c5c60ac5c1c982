/**
 * Configuration type definitions
 * @module config/types
 */

import type { Credentials } from '../credentials/index.js';
import type { LogLevel } from '../observability/logging.js';
import type { UrlStyle } from '../signing/actions.js';

/**
 * Client configuration as supplied by the caller. `endpoint`, `key` and
 * `secret` are required; everything else has a default.
 */
export interface StoreConfig {
  /**
   * Store endpoint, e.g. `https://s3.example.com` or `http://localhost:9000`.
   * A path on the endpoint is kept as a prefix of every request.
   */
  endpoint?: string;

  /**
   * Access key
   */
  key?: string;

  /**
   * Secret key
   */
  secret?: string;

  /**
   * Session token for temporary credentials
   */
  token?: string;

  /**
   * Signing region
   * @default 'us-east-1'
   */
  region?: string;

  /**
   * Bucket addressing style
   * @default 'path'
   */
  urlStyle?: UrlStyle;

  /**
   * Lifetime of each signed request, in seconds
   * @default 3600
   */
  actionsExpiresIn?: number;

  /**
   * Per-request timeout in milliseconds
   * @default 60000
   */
  timeout?: number;

  /**
   * Size of each multipart part, in bytes
   * @default 10485760 (10 MiB)
   */
  multipartChunkSize?: number;

  /**
   * Sources at least this large (or of unknown size) go through multipart upload
   * @default 5242880 (5 MiB)
   */
  multipartThreshold?: number;

  /**
   * Part uploads in flight at once
   * @default 1
   */
  multipartConcurrency?: number;

  /**
   * Minimum level of the default console logger
   * @default 'warn'
   */
  logLevel?: LogLevel;
}

/**
 * Configuration with every field validated and resolved.
 */
export interface NormalizedStoreConfig {
  readonly endpoint: URL;
  readonly credentials: Credentials;
  readonly region: string;
  readonly urlStyle: UrlStyle;
  readonly actionsExpiresIn: number;
  readonly timeout: number;
  readonly multipartChunkSize: number;
  readonly multipartThreshold: number;
  readonly multipartConcurrency: number;
  readonly logLevel: LogLevel;
}

/**
 * Default configuration values
 * @module config/defaults
 */

import type { LogLevel } from '../observability/logging.js';
import type { UrlStyle } from '../signing/actions.js';

export const MiB = 1024 * 1024;

export const DEFAULT_REGION = 'us-east-1';

export const DEFAULT_URL_STYLE: UrlStyle = 'path';

/**
 * Signed request lifetime (1 hour)
 */
export const DEFAULT_ACTIONS_EXPIRES_IN = 3600;

/**
 * Per-request timeout (60 seconds)
 */
export const DEFAULT_TIMEOUT = 60000;

export const DEFAULT_MULTIPART_CHUNK_SIZE = 10 * MiB;

export const DEFAULT_MULTIPART_THRESHOLD = 5 * MiB;

export const DEFAULT_MULTIPART_CONCURRENCY = 1;

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

/**
 * Smallest part the store accepts, except for the last one
 */
export const MIN_PART_SIZE = 5 * MiB;

/**
 * Largest part the store accepts
 */
export const MAX_PART_SIZE = 5 * 1024 * MiB;

export const MAX_ACTIONS_EXPIRES_IN = 604800;

export const MAX_MULTIPART_CONCURRENCY = 32;

/**
 * Logging
 *
 * @module observability
 */

export {
  ConsoleLogger,
  NoopLogger,
  LOG_LEVELS,
  isLogLevel,
  redactUrl,
  errorContext,
} from './logging.js';
export type { Logger, LogLevel, LogContext } from './logging.js';

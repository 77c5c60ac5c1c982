/**
 * Client configuration
 *
 * @module config
 */

export type { StoreConfig, NormalizedStoreConfig } from './types.js';
export * from './defaults.js';
export { normalizeConfig } from './validation.js';
export { createConfigFromEnv, readConfigFromEnv, ENV_VARS } from './env.js';
export type { Environment } from './env.js';

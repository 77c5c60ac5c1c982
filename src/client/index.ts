/**
 * Client and bucket operations
 *
 * @module client
 */

export { ObjectStoreClient } from './client.js';
export type { ClientDependencies } from './client.js';
export { ClientBuilder } from './builder.js';
export { Bucket } from './bucket.js';
export type {
  BucketContext,
  PutObjectOptions,
  PutObjectResult,
  UploadOptions,
  UploadResult,
  PresignMethod,
} from './bucket.js';
export { ActionExecutor } from './executor.js';
export type { ExecutorContext, ActionInit } from './executor.js';

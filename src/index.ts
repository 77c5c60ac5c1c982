/**
 * Client library for S3-compatible object stores: signed bucket and object
 * operations, multipart upload, lazy listing and a typed error taxonomy.
 *
 * @example
 * ```typescript
 * import { ObjectStoreClient, isStoreError } from 's3-bucket-client';
 *
 * const client = ObjectStoreClient.fromEnv();
 * const bucket = client.bucket('photos');
 *
 * try {
 *   await bucket.create();
 * } catch (error) {
 *   if (!isStoreError(error, 'BucketAlreadyExists', 'BucketAlreadyOwnedByYou')) throw error;
 * }
 *
 * await bucket.upload('big.bin', fs.createReadStream('big.bin'));
 * for await (const entry of bucket.listObjects('b')) {
 *   console.log(entry.key, entry.size);
 * }
 * ```
 *
 * @module s3-bucket-client
 */

export * from './client/index.js';
export * from './config/index.js';
export { Credentials } from './credentials/index.js';
export * from './errors/index.js';
export * from './listing/index.js';
export * from './multipart/index.js';
export * from './observability/index.js';
export * from './signing/index.js';
export * from './transport/index.js';
export type { ObjectEntry, ListingPage, CompletedPart, ParsedErrorDocument } from './xml/index.js';

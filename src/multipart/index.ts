/**
 * Multipart upload
 *
 * @module multipart
 */

export { MultipartUploader } from './uploader.js';
export type { MultipartUploadOptions, MultipartUploadResult } from './uploader.js';
export { MultipartSession } from './session.js';
export type { MultipartSessionState } from './session.js';
export { toByteSource, fillBuffer, sourceBytes, toWebStream } from './source.js';
export type { UploadSource, ByteSource } from './source.js';

/**
 * Bucket handle and its operations
 * @module client/bucket
 */

import { once } from 'node:events';
import type { Writable } from 'node:stream';
import { InternalError, UserError } from '../errors/categories.js';
import { ListObjectsIterator, type ListObjectsOptions } from '../listing/iterator.js';
import {
  MultipartUploader,
  type MultipartUploadOptions,
  type MultipartUploadResult,
} from '../multipart/uploader.js';
import { sourceBytes, toWebStream, type UploadSource } from '../multipart/source.js';
import { getETag, getRequestId, type HttpResponse } from '../transport/types.js';
import { parseListObjectsResponse, type ListingPage } from '../xml/list-objects.js';
import type { ActionExecutor } from './executor.js';

export interface PutObjectOptions {
  contentType?: string;
}

export interface PutObjectResult {
  readonly key: string;
  readonly eTag?: string;
}

export interface UploadOptions extends MultipartUploadOptions, PutObjectOptions {
  /**
   * Sources of at least this many bytes, and streams, go through multipart
   * upload (default: client configuration)
   */
  multipartThreshold?: number;
}

export type UploadResult =
  | ({ readonly method: 'single' } & PutObjectResult & { readonly size: number })
  | ({ readonly method: 'multipart' } & MultipartUploadResult);

/**
 * Methods a presigned URL can be handed out for
 */
export type PresignMethod = 'GET' | 'PUT';

/**
 * What a Bucket needs from the client that created it
 */
export interface BucketContext {
  readonly executorFor: (bucket: string) => ActionExecutor;
  readonly multipartChunkSize: number;
  readonly multipartThreshold: number;
  readonly multipartConcurrency: number;
}

/**
 * A named bucket on the store. Creating a handle does not create the bucket;
 * every call signs a fresh request.
 */
export class Bucket {
  private readonly executor: ActionExecutor;

  constructor(
    private readonly context: BucketContext,
    readonly name: string
  ) {
    this.executor = context.executorFor(name);
  }

  /**
   * A new handle on the same bucket, sharing the client
   */
  clone(): Bucket {
    return new Bucket(this.context, this.name);
  }

  /**
   * Creates the bucket on the store.
   *
   * @throws {StoreError} `BucketAlreadyExists` or `BucketAlreadyOwnedByYou` when it exists
   */
  async create(): Promise<this> {
    await this.executor.execute({ type: 'CreateBucket' });
    return this;
  }

  async delete(): Promise<void> {
    await this.executor.execute({ type: 'DeleteBucket' });
  }

  async putObject(key: string, body: Uint8Array | string, options: PutObjectOptions = {}): Promise<PutObjectResult> {
    const bytes = typeof body === 'string' ? new TextEncoder().encode(body) : body;
    const headers: Record<string, string> = { 'content-length': String(bytes.length) };
    if (options.contentType) {
      headers['content-type'] = options.contentType;
    }
    const response = await this.executor.execute({ type: 'PutObject', key }, { body: bytes, headers });
    return { key, eTag: getETag(response.headers) };
  }

  /**
   * Uploads a stream in a single request. The length must be known up front
   * and must match what the stream yields.
   */
  async putObjectStream(
    key: string,
    stream: ReadableStream<Uint8Array> | AsyncIterable<Uint8Array>,
    contentLength: number,
    options: PutObjectOptions = {}
  ): Promise<PutObjectResult> {
    if (!Number.isInteger(contentLength) || contentLength < 0) {
      throw UserError.invalidContentLength(contentLength);
    }
    const headers: Record<string, string> = { 'content-length': String(contentLength) };
    if (options.contentType) {
      headers['content-type'] = options.contentType;
    }
    const response = await this.executor.execute(
      { type: 'PutObject', key },
      { body: toWebStream(stream), headers }
    );
    return { key, eTag: getETag(response.headers) };
  }

  /**
   * Object content as raw bytes
   *
   * @throws {StoreError} `NoSuchKey` when the object does not exist
   */
  async getObjectBytes(key: string): Promise<Uint8Array> {
    const response = await this.executor.execute({ type: 'GetObject', key });
    return response.body;
  }

  /**
   * Object content decoded as UTF-8.
   *
   * @throws {UserError} when the content is not valid UTF-8; use getObjectBytes then
   */
  async getObjectString(key: string): Promise<string> {
    const bytes = await this.getObjectBytes(key);
    try {
      return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch (error) {
      throw UserError.payloadNotUtf8(key, error);
    }
  }

  /**
   * Object content parsed as JSON. The value is not validated against `T`.
   */
  async getObjectJson<T = unknown>(key: string): Promise<T> {
    const text = await this.getObjectString(key);
    try {
      const value: T = JSON.parse(text);
      return value;
    } catch (error) {
      throw UserError.payloadNotJson(key, error);
    }
  }

  /**
   * Object content as a stream. The request timeout stops applying once the
   * headers have arrived.
   */
  async getObjectStream(key: string): Promise<ReadableStream<Uint8Array>> {
    const response = await this.executor.executeStreaming({ type: 'GetObject', key });
    return response.body;
  }

  /**
   * Streams object content into a writable, waiting for `drain` whenever the
   * writable asks for it. The writable is left open. Resolves with the number
   * of bytes written; when the writable fails, the download is cancelled.
   */
  async getObjectToWriter(key: string, writable: Writable): Promise<number> {
    const stream = await this.getObjectStream(key);
    const reader = stream.getReader();
    let written = 0;
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          return written;
        }
        written += value.length;
        try {
          if (!writable.write(value)) {
            await once(writable, 'drain');
          }
        } catch (error) {
          await reader.cancel(error);
          throw error;
        }
      }
    } finally {
      reader.releaseLock();
    }
  }

  async deleteObject(key: string): Promise<void> {
    await this.executor.execute({ type: 'DeleteObject', key });
  }

  /**
   * Lists objects whose key starts with `prefix`, one page at a time.
   */
  listObjects(prefix = '', options: ListObjectsOptions = {}): ListObjectsIterator {
    if (options.maxKeys !== undefined && (!Number.isInteger(options.maxKeys) || options.maxKeys < 1 || options.maxKeys > 1000)) {
      throw new UserError({
        message: `maxKeys must be an integer between 1 and 1000, got ${options.maxKeys}`,
        code: 'InvalidMaxKeys',
        details: { maxKeys: options.maxKeys },
      });
    }
    return new ListObjectsIterator((continuationToken) =>
      this.fetchListingPage(prefix, options, continuationToken)
    );
  }

  /**
   * Uploads a source in parts. A failed upload is left on the store unless
   * `abortOnFailure` is set; the error carries its id in `details.uploadId`.
   */
  putObjectMultipart(
    key: string,
    source: UploadSource,
    options: MultipartUploadOptions = {}
  ): Promise<MultipartUploadResult> {
    const uploader = new MultipartUploader(this.executor, {
      chunkSize: this.context.multipartChunkSize,
      concurrency: this.context.multipartConcurrency,
    });
    return uploader.upload(key, source, options);
  }

  /**
   * Single request for small sources of known size, multipart otherwise.
   */
  async upload(key: string, source: UploadSource, options: UploadOptions = {}): Promise<UploadResult> {
    const threshold = options.multipartThreshold ?? this.context.multipartThreshold;
    const bytes = sourceBytes(source);
    if (bytes !== undefined && bytes.length < threshold) {
      const result = await this.putObject(key, bytes, { contentType: options.contentType });
      return { method: 'single', size: bytes.length, ...result };
    }
    const result = await this.putObjectMultipart(key, bytes ?? source, options);
    return { method: 'multipart', ...result };
  }

  async abortMultipartUpload(key: string, uploadId: string): Promise<void> {
    await this.executor.execute({ type: 'AbortMultipartUpload', key, uploadId });
  }

  /**
   * A URL a third party can GET or PUT without credentials, valid for
   * `expiresIn` seconds (default: client configuration).
   */
  presign(method: PresignMethod, key: string, expiresIn?: number): string {
    const action = method === 'GET' ? { type: 'GetObject' as const, key } : { type: 'PutObject' as const, key };
    return this.executor.sign(action, expiresIn).url;
  }

  private async fetchListingPage(
    prefix: string,
    options: ListObjectsOptions,
    continuationToken: string | undefined
  ): Promise<ListingPage> {
    const response = await this.executor.execute({
      type: 'ListObjectsV2',
      prefix,
      continuationToken,
      maxKeys: options.maxKeys,
      // start-after only matters for the first page
      startAfter: continuationToken === undefined ? options.startAfter : undefined,
    });
    return parsePage(response);
  }
}

function parsePage(response: HttpResponse): ListingPage {
  try {
    return parseListObjectsResponse(new TextDecoder().decode(response.body));
  } catch (error) {
    throw InternalError.badPayload('ListObjectsV2 response', error, response.status, getRequestId(response.headers));
  }
}

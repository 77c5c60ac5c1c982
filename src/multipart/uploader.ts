/**
 * Multipart upload engine
 * @module multipart/uploader
 */

import { InternalError, UserError } from '../errors/categories.js';
import { storeErrorFromBody } from '../errors/classify.js';
import { isObjectStoreError, type ObjectStoreError } from '../errors/error.js';
import type { ActionExecutor } from '../client/executor.js';
import { errorContext } from '../observability/logging.js';
import { getETag, getRequestId } from '../transport/types.js';
import { isErrorDocument } from '../xml/error.js';
import {
  buildCompleteMultipartXml,
  parseCompleteMultipartResponse,
  parseInitiateMultipartResponse,
  type CompletedPart,
} from '../xml/multipart.js';
import { MultipartSession } from './session.js';
import { fillBuffer, toByteSource, type ByteSource, type UploadSource } from './source.js';

/**
 * Per-call multipart options
 */
export interface MultipartUploadOptions {
  /**
   * Bytes per part (default: client configuration)
   */
  chunkSize?: number;

  /**
   * Part uploads in flight at once (default: client configuration)
   */
  concurrency?: number;

  /**
   * Content type of the assembled object, sent when the upload is created
   */
  contentType?: string;

  /**
   * Abort the upload on the store when the upload fails. Off by default: a
   * failed upload stays on the store and its id is reported in
   * `error.details.uploadId`.
   */
  abortOnFailure?: boolean;

  /**
   * Called after each part with the running total of uploaded bytes
   */
  onPartUploaded?: (part: CompletedPart, uploadedBytes: number) => void;
}

export interface MultipartUploadResult {
  readonly key: string;
  readonly uploadId: string;
  /**
   * ETag of the assembled object, when the store reports one
   */
  readonly eTag?: string;
  readonly location?: string;
  readonly parts: number;
  readonly size: number;
}

/**
 * Resolved options of one upload
 */
interface UploadPlan {
  readonly chunkSize: number;
  readonly concurrency: number;
  readonly abortOnFailure: boolean;
  readonly onPartUploaded?: (part: CompletedPart, uploadedBytes: number) => void;
}

/**
 * create, upload parts, complete.
 *
 * Nothing is retried. With a concurrency of 1 parts go out strictly one
 * after the other through a single reused buffer; above 1 each part gets
 * its own buffer and reading pauses while the pool is full.
 */
export class MultipartUploader {
  constructor(
    private readonly executor: ActionExecutor,
    private readonly defaults: { readonly chunkSize: number; readonly concurrency: number }
  ) {}

  async upload(key: string, source: UploadSource, options: MultipartUploadOptions = {}): Promise<MultipartUploadResult> {
    const plan = this.plan(options);
    const uploadId = await this.create(key, options.contentType);
    const session = new MultipartSession(key, uploadId);
    const logger = this.executor.logger;
    logger.debug('Multipart upload started', { key, uploadId, chunkSize: plan.chunkSize });

    try {
      await this.uploadParts(session, toByteSource(source), plan);
      const result = await this.complete(session);
      logger.debug('Multipart upload completed', { key, uploadId, parts: result.parts, size: result.size });
      return result;
    } catch (error) {
      session.markFailed();
      const failure = toUploadFailure(error).annotate({ key, uploadId });
      if (plan.abortOnFailure) {
        await this.abortAfterFailure(session, failure);
      }
      throw failure;
    }
  }

  private plan(options: MultipartUploadOptions): UploadPlan {
    const chunkSize = options.chunkSize ?? this.defaults.chunkSize;
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw UserError.invalidChunkSize(chunkSize);
    }
    const concurrency = options.concurrency ?? this.defaults.concurrency;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new UserError({
        message: `Concurrency must be a positive integer, got ${concurrency}`,
        code: 'InvalidConcurrency',
        details: { concurrency },
      });
    }
    return {
      chunkSize,
      concurrency,
      abortOnFailure: options.abortOnFailure ?? false,
      onPartUploaded: options.onPartUploaded,
    };
  }

  private async create(key: string, contentType: string | undefined): Promise<string> {
    const response = await this.executor.execute(
      { type: 'CreateMultipartUpload', key },
      contentType ? { headers: { 'content-type': contentType } } : {}
    );
    try {
      return parseInitiateMultipartResponse(new TextDecoder().decode(response.body));
    } catch (error) {
      throw InternalError.badPayload(
        'CreateMultipartUpload response',
        error,
        response.status,
        getRequestId(response.headers)
      );
    }
  }

  private async uploadParts(session: MultipartSession, source: ByteSource, plan: UploadPlan): Promise<void> {
    const inFlight = new Set<Promise<void>>();
    const failures: unknown[] = [];
    const shared = plan.concurrency === 1 ? new Uint8Array(plan.chunkSize) : undefined;

    try {
      while (failures.length === 0) {
        const buffer = shared ?? new Uint8Array(plan.chunkSize);
        const filled = await fillBuffer(source, buffer);
        // An empty source still gets one (empty) part so the completion is valid.
        if (filled === 0 && session.partsAssigned > 0) {
          break;
        }

        const partNumber = session.assignPartNumber();
        const task: Promise<void> = this.uploadPart(session, partNumber, buffer.subarray(0, filled), plan).then(
          () => {
            inFlight.delete(task);
          },
          (error: unknown) => {
            inFlight.delete(task);
            failures.push(error);
          }
        );
        inFlight.add(task);

        if (inFlight.size >= plan.concurrency) {
          await Promise.race(inFlight);
        }
        if (filled < plan.chunkSize) {
          break;
        }
      }
    } finally {
      await Promise.all(inFlight);
    }

    if (failures.length > 0) {
      throw failures[0];
    }
  }

  private async uploadPart(
    session: MultipartSession,
    partNumber: number,
    chunk: Uint8Array,
    plan: UploadPlan
  ): Promise<void> {
    const { key, uploadId } = session;
    const response = await this.executor.execute(
      { type: 'UploadPart', key, uploadId, partNumber },
      { body: chunk, headers: { 'content-length': String(chunk.length) } }
    );

    const eTag = getETag(response.headers);
    if (!eTag) {
      throw InternalError.missingETag(key, uploadId, partNumber, getRequestId(response.headers));
    }

    const part = { partNumber, eTag };
    session.recordPart(part, chunk.length);
    this.executor.logger.trace('Part uploaded', { key, uploadId, partNumber, size: chunk.length });
    try {
      plan.onPartUploaded?.(part, session.bytesUploaded);
    } catch (error) {
      throw UserError.progressCallbackFailed(partNumber, error);
    }
  }

  private async complete(session: MultipartSession): Promise<MultipartUploadResult> {
    const { key, uploadId } = session;
    const parts = session.completedParts();
    const response = await this.executor.execute(
      { type: 'CompleteMultipartUpload', key, uploadId },
      {
        body: new TextEncoder().encode(buildCompleteMultipartXml(parts)),
        headers: { 'content-type': 'application/xml' },
      }
    );

    const text = new TextDecoder().decode(response.body);
    if (isErrorDocument(text)) {
      throw storeErrorFromBody(response.status, response.headers, text);
    }

    let result: { location?: string; eTag?: string };
    try {
      result = parseCompleteMultipartResponse(text);
    } catch (error) {
      throw InternalError.badPayload(
        'CompleteMultipartUpload response',
        error,
        response.status,
        getRequestId(response.headers)
      );
    }

    session.markCompleted();
    return {
      key,
      uploadId,
      eTag: result.eTag,
      location: result.location,
      parts: parts.length,
      size: session.bytesUploaded,
    };
  }

  private async abortAfterFailure(session: MultipartSession, failure: ObjectStoreError): Promise<void> {
    const { key, uploadId } = session;
    this.executor.logger.warn('Aborting failed multipart upload', {
      key,
      uploadId,
      ...errorContext(failure),
    });
    try {
      await this.executor.execute({ type: 'AbortMultipartUpload', key, uploadId });
      session.markAborted();
      failure.annotate({ aborted: true });
    } catch (abortError) {
      this.executor.logger.warn('Abort of failed multipart upload failed', {
        key,
        uploadId,
        ...errorContext(abortError),
      });
      failure.annotate({ aborted: false, abortError: errorContext(abortError) });
    }
  }
}

/**
 * Errors thrown by the source itself are the caller's and surface as
 * UserError; everything else, the progress callback included, is already
 * classified.
 */
function toUploadFailure(error: unknown): ObjectStoreError {
  if (isObjectStoreError(error)) {
    return error;
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new UserError({
    message: `Reading the upload source failed: ${reason}`,
    code: 'SourceReadFailed',
    cause: error,
  });
}

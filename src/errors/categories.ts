/**
 * Error categories for the object store client
 * @module errors/categories
 */

import { ObjectStoreError, type ObjectStoreErrorParams } from './error.js';
import {
  storeErrorCodeText,
  type KnownStoreErrorCode,
  type StoreErrorCode,
} from './codes.js';

/**
 * Highest part number a multipart upload may use.
 */
export const MAX_PART_NUMBER = 10000;

/**
 * Caller-side misuse: the request is refused before (or instead of) reaching
 * the store.
 */
export class UserError extends ObjectStoreError {
  readonly kind = 'user' as const;

  constructor(params: ObjectStoreErrorParams) {
    super(params);
    this.name = 'UserError';
  }

  /**
   * The source needs more parts than a multipart upload can hold
   */
  static tooManyParts(key: string, uploadId: string): UserError {
    return new UserError({
      message: `Upload of "${key}" needs more than ${MAX_PART_NUMBER} parts; use a larger chunk size`,
      code: 'TooManyParts',
      details: { key, uploadId, maxParts: MAX_PART_NUMBER },
    });
  }

  /**
   * The caller's progress callback threw
   */
  static progressCallbackFailed(partNumber: number, cause: unknown): UserError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new UserError({
      message: `Progress callback failed after part ${partNumber}: ${reason}`,
      code: 'ProgressCallbackFailed',
      details: { partNumber },
      cause,
    });
  }

  /**
   * Chunk size is not a positive integer
   */
  static invalidChunkSize(chunkSize: number): UserError {
    return new UserError({
      message: `Chunk size must be a positive integer, got ${chunkSize}`,
      code: 'InvalidChunkSize',
      details: { chunkSize },
    });
  }

  /**
   * Object body requested as text is not valid UTF-8
   */
  static payloadNotUtf8(key: string, cause: unknown): UserError {
    return new UserError({
      message: `Object "${key}" contains non UTF-8 bytes; fetch it as bytes instead`,
      code: 'PayloadNotUtf8',
      details: { key },
      cause,
    });
  }

  /**
   * Object body requested as JSON does not parse
   */
  static payloadNotJson(key: string, cause: unknown): UserError {
    return new UserError({
      message: `Object "${key}" is not valid JSON`,
      code: 'PayloadNotJson',
      details: { key },
      cause,
    });
  }

  /**
   * Signature lifetime outside what the store accepts
   */
  static invalidExpiry(expiresIn: number, max: number): UserError {
    return new UserError({
      message: `Signature expiry must be an integer between 1 and ${max} seconds, got ${expiresIn}`,
      code: 'InvalidExpiry',
      details: { expiresIn, max },
    });
  }

  /**
   * Stream upload without a usable content length
   */
  static invalidContentLength(contentLength: number): UserError {
    return new UserError({
      message: `Content length must be a non-negative integer, got ${contentLength}`,
      code: 'InvalidContentLength',
      details: { contentLength },
    });
  }
}

/**
 * Invalid or incomplete client configuration
 */
export class ConfigError extends UserError {
  constructor(params: ObjectStoreErrorParams) {
    super(params);
    this.name = 'ConfigError';
  }

  /**
   * A required field was not provided
   */
  static missingField(field: string): ConfigError {
    return new ConfigError({
      message: `Missing required configuration field: ${field}`,
      code: 'MissingField',
      details: { field },
    });
  }

  /**
   * A field is present but invalid
   */
  static invalidField(field: string, reason: string): ConfigError {
    return new ConfigError({
      message: `Invalid configuration field ${field}: ${reason}`,
      code: 'InvalidField',
      details: { field, reason },
    });
  }
}

/**
 * Parameters for a structured store rejection
 */
export interface StoreErrorParams {
  readonly status: number;
  readonly errorCode: StoreErrorCode;
  readonly message: string;
  readonly bucketName?: string;
  readonly resource?: string;
  readonly requestId?: string;
  readonly hostId?: string;
  readonly details?: Record<string, unknown>;
}

/**
 * The store rejected the request with an `<Error>` document.
 *
 * Calling code matches on the code to build idempotent operations:
 *
 * @example
 * ```typescript
 * try {
 *   await bucket.create();
 * } catch (error) {
 *   if (!isStoreError(error, 'BucketAlreadyExists', 'BucketAlreadyOwnedByYou')) throw error;
 * }
 * ```
 */
export class StoreError extends ObjectStoreError {
  readonly kind = 'store' as const;

  /**
   * Parsed store error code (open union)
   */
  readonly errorCode: StoreErrorCode;

  /**
   * Message sent by the store
   */
  readonly storeMessage: string;

  readonly bucketName?: string;
  readonly resource?: string;
  readonly hostId?: string;

  constructor(params: StoreErrorParams) {
    const code = storeErrorCodeText(params.errorCode);
    const on = params.bucketName ?? params.resource;
    super({
      message: on ? `${code}: ${params.message} on ${on}` : `${code}: ${params.message}`,
      code,
      status: params.status,
      requestId: params.requestId,
      details: params.details,
    });
    this.name = 'StoreError';
    this.errorCode = params.errorCode;
    this.storeMessage = params.message;
    this.bucketName = params.bucketName;
    this.resource = params.resource;
    this.hostId = params.hostId;
  }

  /**
   * Whether the store answered with one of the given codes
   */
  is(...codes: KnownStoreErrorCode[]): boolean {
    const errorCode = this.errorCode;
    return errorCode.kind === 'known' && codes.includes(errorCode.code);
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      storeMessage: this.storeMessage,
      bucketName: this.bucketName,
      resource: this.resource,
      hostId: this.hostId,
    };
  }
}

/**
 * Reasons a request never produced a response
 */
export type TransportFailure = 'timeout' | 'connection';

/**
 * The HTTP exchange could not be completed
 */
export class TransportError extends ObjectStoreError {
  readonly kind = 'transport' as const;

  readonly reason: TransportFailure;

  constructor(params: ObjectStoreErrorParams & { reason: TransportFailure }) {
    super(params);
    this.name = 'TransportError';
    this.reason = params.reason;
  }

  /**
   * The request did not finish within the configured timeout
   */
  static timeout(timeoutMs: number, cause?: unknown): TransportError {
    return new TransportError({
      message: `Request timed out after ${timeoutMs}ms`,
      code: 'Timeout',
      reason: 'timeout',
      details: { timeoutMs },
      cause,
    });
  }

  /**
   * Connection could not be established or was dropped
   */
  static connectionFailed(message: string, cause?: unknown): TransportError {
    return new TransportError({
      message: `Connection failed: ${message}`,
      code: 'ConnectionFailed',
      reason: 'connection',
      cause,
    });
  }
}

/**
 * The store answered in a way its contract rules out
 */
export class InternalError extends ObjectStoreError {
  readonly kind = 'internal' as const;

  constructor(params: ObjectStoreErrorParams) {
    super(params);
    this.name = 'InternalError';
  }

  /**
   * A response body could not be parsed
   */
  static badPayload(
    what: string,
    cause: unknown,
    status?: number,
    requestId?: string
  ): InternalError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new InternalError({
      message: `Could not parse ${what}: ${reason}`,
      code: 'BadPayload',
      status,
      requestId,
      cause,
    });
  }

  /**
   * An upload-part response carried no ETag header
   */
  static missingETag(key: string, uploadId: string, partNumber: number, requestId?: string): InternalError {
    return new InternalError({
      message: `UploadPart response for part ${partNumber} of "${key}" has no ETag header`,
      code: 'MissingETag',
      requestId,
      details: { key, uploadId, partNumber },
    });
  }
}

/**
 * Checks whether an error is a StoreError, optionally with one of the given codes.
 */
export function isStoreError(error: unknown, ...codes: KnownStoreErrorCode[]): error is StoreError {
  if (!(error instanceof StoreError)) {
    return false;
  }
  return codes.length === 0 || error.is(...codes);
}

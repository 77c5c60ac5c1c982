/**
 * Maps HTTP outcomes onto the error taxonomy
 * @module errors/classify
 */

import { getHeader } from '../transport/types.js';
import { parseErrorDocument } from '../xml/error.js';
import { parseStoreErrorCode } from './codes.js';
import { InternalError, StoreError, TransportError } from './categories.js';
import { isObjectStoreError, type ObjectStoreError } from './error.js';

/**
 * Response headers as seen by the classifier
 */
export type ResponseHeaders = Readonly<Record<string, string>>;

/**
 * Builds a StoreError from an `<Error>` document.
 *
 * @throws Error if the body is not an `<Error>` document
 */
export function storeErrorFromBody(status: number, headers: ResponseHeaders, body: string): StoreError {
  const document = parseErrorDocument(body);
  return new StoreError({
    status,
    errorCode: parseStoreErrorCode(document.code),
    message: document.message,
    bucketName: document.bucketName,
    resource: document.resource,
    requestId: document.requestId ?? getHeader(headers, 'x-amz-request-id'),
    hostId: document.hostId ?? getHeader(headers, 'x-amz-id-2'),
  });
}

/**
 * Classifies a completed HTTP exchange.
 *
 * Returns undefined for 2xx statuses; the caller then owns the body. Any
 * other status becomes a StoreError when the body is an `<Error>` document,
 * and an InternalError otherwise.
 */
export function classifyResponse(
  status: number,
  headers: ResponseHeaders,
  body: Uint8Array
): ObjectStoreError | undefined {
  if (status >= 200 && status < 300) {
    return undefined;
  }

  const text = new TextDecoder().decode(body);
  try {
    return storeErrorFromBody(status, headers, text);
  } catch (error) {
    return InternalError.badPayload(
      `error response (HTTP ${status})`,
      error,
      status,
      getHeader(headers, 'x-amz-request-id')
    );
  }
}

/**
 * Classifies a failure thrown before any status arrived.
 *
 * Errors already in the taxonomy pass through unchanged.
 */
export function classifyTransportFailure(error: unknown, timeoutMs?: number): ObjectStoreError {
  if (isObjectStoreError(error)) {
    return error;
  }
  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return TransportError.timeout(timeoutMs ?? 0, error);
  }
  const message = error instanceof Error ? error.message : String(error);
  return TransportError.connectionFailed(message, error);
}

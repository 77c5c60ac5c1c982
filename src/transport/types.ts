/**
 * HTTP transport boundary
 */

import type { HttpMethod } from '../signing/actions.js';

/**
 * HTTP request
 */
export interface HttpRequest {
  method: HttpMethod;
  /** Full URL including protocol, host, path, and query string */
  url: string;
  headers: Record<string, string>;
  /**
   * Request body. A stream body needs an explicit `content-length` header.
   */
  body?: Uint8Array | ReadableStream<Uint8Array>;
}

/**
 * HTTP response with buffered body
 */
export interface HttpResponse {
  status: number;
  /** Header names are lowercase */
  headers: Record<string, string>;
  body: Uint8Array;
}

/**
 * HTTP response with streaming body
 */
export interface StreamingHttpResponse {
  status: number;
  headers: Record<string, string>;
  body: ReadableStream<Uint8Array>;
}

/**
 * Sends requests and returns whatever status the server answered with.
 * Implementations reject only when no status was received; mapping statuses
 * to errors belongs to the caller.
 */
export interface HttpTransport {
  /**
   * Sends a request and buffers the whole response body
   */
  send(request: HttpRequest): Promise<HttpResponse>;

  /**
   * Sends a request and hands back the body as a stream
   */
  sendStreaming(request: HttpRequest): Promise<StreamingHttpResponse>;
}

/**
 * Helper to get header value (case-insensitive)
 */
export function getHeader(headers: Readonly<Record<string, string>>, name: string): string | undefined {
  const lowerName = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lowerName) {
      return value;
    }
  }
  return undefined;
}

/**
 * ETag header without its surrounding quotes
 */
export function getETag(headers: Record<string, string>): string | undefined {
  return getHeader(headers, 'etag')?.replace(/^"+|"+$/g, '');
}

export function getRequestId(headers: Record<string, string>): string | undefined {
  return getHeader(headers, 'x-amz-request-id');
}

/**
 * Reads a stream to completion into one buffer.
 */
export async function readAll(stream: ReadableStream<Uint8Array>): Promise<Uint8Array> {
  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }
      chunks.push(value);
      total += value.length;
    }
  } finally {
    reader.releaseLock();
  }

  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

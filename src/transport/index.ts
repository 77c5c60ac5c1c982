/**
 * HTTP transport
 *
 * @module transport
 */

export type { HttpRequest, HttpResponse, StreamingHttpResponse, HttpTransport } from './types.js';
export { getHeader, getETag, getRequestId, readAll } from './types.js';
export { FetchTransport, createFetchTransport } from './fetch-transport.js';
export type { FetchTransportOptions } from './fetch-transport.js';

/**
 * Fetch-based HTTP transport
 */

import { classifyTransportFailure } from '../errors/classify.js';
import { TransportError } from '../errors/categories.js';
import type { HttpRequest, HttpResponse, HttpTransport, StreamingHttpResponse } from './types.js';

/**
 * Fetch transport options
 */
export interface FetchTransportOptions {
  /** Per-request timeout in milliseconds */
  timeout: number;
  /**
   * Fetch implementation
   * @default globalThis.fetch
   */
  fetch?: typeof fetch;
}

/**
 * Transport on top of the Fetch API.
 *
 * The timeout covers one HTTP call: for buffered responses until the body is
 * read, for streaming responses until the headers arrive.
 */
export class FetchTransport implements HttpTransport {
  private readonly timeout: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: FetchTransportOptions) {
    this.timeout = options.timeout;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await this.makeFetchRequest(request, controller.signal);
      const body = new Uint8Array(await response.arrayBuffer());
      return {
        status: response.status,
        headers: this.convertHeaders(response.headers),
        body,
      };
    } catch (error) {
      throw this.handleError(error, controller.signal);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async sendStreaming(request: HttpRequest): Promise<StreamingHttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await this.makeFetchRequest(request, controller.signal);
      const headers = this.convertHeaders(response.headers);
      const body =
        response.body ??
        new ReadableStream<Uint8Array>({
          start(streamController) {
            streamController.close();
          },
        });
      return { status: response.status, headers, body };
    } catch (error) {
      throw this.handleError(error, controller.signal);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private makeFetchRequest(request: HttpRequest, signal: AbortSignal): Promise<Response> {
    const init: RequestInit = {
      method: request.method,
      headers: request.headers,
      signal,
    };

    if (request.body instanceof Uint8Array) {
      init.body = request.body;
    } else if (request.body !== undefined) {
      init.body = request.body;
      init.duplex = 'half';
    }

    return this.fetchImpl(request.url, init);
  }

  private convertHeaders(headers: Headers): Record<string, string> {
    const result: Record<string, string> = {};
    headers.forEach((value, key) => {
      result[key.toLowerCase()] = value;
    });
    return result;
  }

  private handleError(error: unknown, signal: AbortSignal): Error {
    if (signal.aborted) {
      return TransportError.timeout(this.timeout, error);
    }
    return classifyTransportFailure(error, this.timeout);
  }
}

/**
 * Creates a fetch-based HTTP transport
 */
export function createFetchTransport(timeout: number): HttpTransport {
  return new FetchTransport({ timeout });
}

/**
 * Sign, send, classify: the one path every request takes
 * @module client/executor
 */

import type { Credentials } from '../credentials/index.js';
import { classifyResponse, classifyTransportFailure } from '../errors/classify.js';
import { redactUrl, type Logger } from '../observability/logging.js';
import type { BucketTarget, StoreAction } from '../signing/actions.js';
import type { SignedAction, Signer } from '../signing/types.js';
import {
  readAll,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
  type StreamingHttpResponse,
} from '../transport/types.js';

/**
 * Everything a request needs besides the action itself
 */
export interface ExecutorContext {
  readonly signer: Signer;
  readonly transport: HttpTransport;
  readonly credentials: Credentials;
  /**
   * Default signature lifetime in seconds
   */
  readonly expiresIn: number;
  /**
   * Per-request timeout in milliseconds, reported when the transport aborts
   */
  readonly timeout: number;
  readonly logger: Logger;
}

/**
 * Body and extra headers of a request
 */
export interface ActionInit {
  readonly body?: Uint8Array | ReadableStream<Uint8Array>;
  readonly headers?: Record<string, string>;
}

/**
 * Runs store actions against one bucket. A request resolves only with a 2xx
 * response; anything else rejects with a classified error.
 */
export class ActionExecutor {
  constructor(
    private readonly context: ExecutorContext,
    readonly target: BucketTarget
  ) {}

  get logger(): Logger {
    return this.context.logger;
  }

  /**
   * Signs an action without sending it
   */
  sign(action: StoreAction, expiresIn: number = this.context.expiresIn): SignedAction {
    return this.context.signer.sign(this.target, action, this.context.credentials, expiresIn);
  }

  /**
   * Sends an action and buffers the response body
   */
  async execute(action: StoreAction, init: ActionInit = {}): Promise<HttpResponse> {
    const request = this.buildRequest(action, init);
    const started = Date.now();

    let response: HttpResponse;
    try {
      response = await this.context.transport.send(request);
    } catch (error) {
      throw this.transportFailure(action, request, started, error);
    }

    this.logResponse(action, request, response.status, started);
    const failure = classifyResponse(response.status, response.headers, response.body);
    if (failure) {
      throw failure;
    }
    return response;
  }

  /**
   * Sends an action and hands back the response body as a stream. Error
   * bodies are read in full before classification.
   */
  async executeStreaming(action: StoreAction, init: ActionInit = {}): Promise<StreamingHttpResponse> {
    const request = this.buildRequest(action, init);
    const started = Date.now();

    let response: StreamingHttpResponse;
    let errorBody: Uint8Array | undefined;
    try {
      response = await this.context.transport.sendStreaming(request);
      if (response.status < 200 || response.status >= 300) {
        errorBody = await readAll(response.body);
      }
    } catch (error) {
      throw this.transportFailure(action, request, started, error);
    }

    this.logResponse(action, request, response.status, started);
    if (errorBody !== undefined) {
      const failure = classifyResponse(response.status, response.headers, errorBody);
      if (failure) {
        throw failure;
      }
    }
    return response;
  }

  private buildRequest(action: StoreAction, init: ActionInit): HttpRequest {
    const signed = this.sign(action);
    return {
      method: signed.method,
      url: signed.url,
      headers: { ...signed.headers, ...init.headers },
      body: init.body,
    };
  }

  private transportFailure(action: StoreAction, request: HttpRequest, started: number, error: unknown): Error {
    const failure = classifyTransportFailure(error, this.context.timeout);
    this.context.logger.debug('Request failed before a response', {
      action: action.type,
      method: request.method,
      url: redactUrl(request.url),
      durationMs: Date.now() - started,
      code: failure.code,
    });
    return failure;
  }

  private logResponse(action: StoreAction, request: HttpRequest, status: number, started: number): void {
    this.context.logger.debug('Request completed', {
      action: action.type,
      method: request.method,
      url: redactUrl(request.url),
      status,
      durationMs: Date.now() - started,
    });
  }
}

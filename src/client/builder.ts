/**
 * Fluent client builder
 * @module client/builder
 */

import type { StoreConfig } from '../config/types.js';
import type { Logger, LogLevel } from '../observability/logging.js';
import type { UrlStyle } from '../signing/actions.js';
import type { Signer } from '../signing/types.js';
import type { HttpTransport } from '../transport/types.js';
import { ObjectStoreClient, type ClientDependencies } from './client.js';

/**
 * Fluent builder for ObjectStoreClient. Nothing is checked until `build()`,
 * which validates exactly like the constructor does.
 *
 * @example
 * ```typescript
 * const client = new ClientBuilder()
 *   .endpoint('https://s3.example.com')
 *   .key('test-key')
 *   .secret('test-secret')
 *   .urlStyle('virtual-host')
 *   .build();
 * ```
 */
export class ClientBuilder {
  private config: StoreConfig = {};
  private dependencies: ClientDependencies = {};

  endpoint(url: string): this {
    this.config = { ...this.config, endpoint: url };
    return this;
  }

  key(accessKey: string): this {
    this.config = { ...this.config, key: accessKey };
    return this;
  }

  secret(secretKey: string): this {
    this.config = { ...this.config, secret: secretKey };
    return this;
  }

  token(sessionToken: string): this {
    this.config = { ...this.config, token: sessionToken };
    return this;
  }

  /**
   * Sets the session token when one is given, clears it otherwise
   */
  maybeToken(sessionToken: string | undefined): this {
    this.config = { ...this.config, token: sessionToken };
    return this;
  }

  region(region: string): this {
    this.config = { ...this.config, region };
    return this;
  }

  urlStyle(style: UrlStyle): this {
    this.config = { ...this.config, urlStyle: style };
    return this;
  }

  /**
   * Shorthand for `urlStyle('path')`
   */
  withUrlPathStyle(): this {
    return this.urlStyle('path');
  }

  /**
   * Lifetime of signed requests, in seconds
   */
  actionsExpiresIn(seconds: number): this {
    this.config = { ...this.config, actionsExpiresIn: seconds };
    return this;
  }

  /**
   * Per-request timeout, in milliseconds
   */
  timeout(ms: number): this {
    this.config = { ...this.config, timeout: ms };
    return this;
  }

  multipartChunkSize(bytes: number): this {
    this.config = { ...this.config, multipartChunkSize: bytes };
    return this;
  }

  multipartThreshold(bytes: number): this {
    this.config = { ...this.config, multipartThreshold: bytes };
    return this;
  }

  multipartConcurrency(n: number): this {
    this.config = { ...this.config, multipartConcurrency: n };
    return this;
  }

  logLevel(level: LogLevel): this {
    this.config = { ...this.config, logLevel: level };
    return this;
  }

  signer(signer: Signer): this {
    this.dependencies = { ...this.dependencies, signer };
    return this;
  }

  transport(transport: HttpTransport): this {
    this.dependencies = { ...this.dependencies, transport };
    return this;
  }

  logger(logger: Logger): this {
    this.dependencies = { ...this.dependencies, logger };
    return this;
  }

  /**
   * @throws {ConfigError} naming the first missing or invalid field
   */
  build(): ObjectStoreClient {
    return new ObjectStoreClient(this.config, this.dependencies);
  }
}

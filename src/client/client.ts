/**
 * Object store client
 * @module client/client
 */

import { readConfigFromEnv, type Environment } from '../config/env.js';
import type { NormalizedStoreConfig, StoreConfig } from '../config/types.js';
import { normalizeConfig } from '../config/validation.js';
import type { Credentials } from '../credentials/index.js';
import { ConsoleLogger, type Logger } from '../observability/logging.js';
import { SigV4Presigner } from '../signing/presigner.js';
import type { Signer } from '../signing/types.js';
import { FetchTransport } from '../transport/fetch-transport.js';
import type { HttpTransport } from '../transport/types.js';
import { Bucket } from './bucket.js';
import { ActionExecutor } from './executor.js';

/**
 * Collaborators a client can be given instead of the defaults
 */
export interface ClientDependencies {
  /**
   * Request signer (default: SigV4 query-string presigning)
   */
  signer?: Signer;
  /**
   * HTTP transport (default: fetch with the configured timeout)
   */
  transport?: HttpTransport;
  /**
   * Logger (default: console, at the configured level)
   */
  logger?: Logger;
}

/**
 * Entry point of the library. Holds validated configuration, credentials and
 * collaborators; immutable once built and safe to share between any number
 * of buckets and concurrent callers.
 *
 * @example
 * ```typescript
 * const client = new ObjectStoreClient({
 *   endpoint: 'http://localhost:9000',
 *   key: 'test-key',
 *   secret: 'test-secret',
 * });
 * const bucket = client.bucket('photos');
 * await bucket.putObject('hello.txt', 'kero');
 * ```
 */
export class ObjectStoreClient {
  readonly config: NormalizedStoreConfig;
  readonly signer: Signer;
  readonly transport: HttpTransport;
  readonly logger: Logger;

  /**
   * @throws {ConfigError} If the configuration is incomplete or invalid
   */
  constructor(config: StoreConfig, dependencies: ClientDependencies = {}) {
    this.config = normalizeConfig(config);
    this.signer = dependencies.signer ?? new SigV4Presigner();
    this.transport = dependencies.transport ?? new FetchTransport({ timeout: this.config.timeout });
    this.logger = dependencies.logger ?? new ConsoleLogger(this.config.logLevel);
  }

  /**
   * Client configured from `S3_*` environment variables
   *
   * @throws {ConfigError} If required variables are missing or invalid
   */
  static fromEnv(env?: Environment, dependencies: ClientDependencies = {}): ObjectStoreClient {
    return new ObjectStoreClient(readConfigFromEnv(env), dependencies);
  }

  get credentials(): Credentials {
    return this.config.credentials;
  }

  /**
   * Handle on a bucket. Nothing is sent to the store.
   */
  bucket(name: string): Bucket {
    return new Bucket(
      {
        executorFor: (bucket) => this.executor(bucket),
        multipartChunkSize: this.config.multipartChunkSize,
        multipartThreshold: this.config.multipartThreshold,
        multipartConcurrency: this.config.multipartConcurrency,
      },
      name
    );
  }

  private executor(bucket: string): ActionExecutor {
    return new ActionExecutor(
      {
        signer: this.signer,
        transport: this.transport,
        credentials: this.config.credentials,
        expiresIn: this.config.actionsExpiresIn,
        timeout: this.config.timeout,
        logger: this.logger,
      },
      {
        endpoint: this.config.endpoint,
        region: this.config.region,
        urlStyle: this.config.urlStyle,
        bucket,
      }
    );
  }
}

/**
 * Base error class for the object store client
 * @module errors/error
 */

/**
 * The four families every failure falls into.
 *
 * - `user`: the caller asked for something the client refuses to do
 * - `store`: the store answered with a structured rejection
 * - `transport`: the HTTP exchange never produced a status
 * - `internal`: the store answered in a way its contract rules out
 */
export type ErrorKind = 'user' | 'store' | 'transport' | 'internal';

/**
 * Parameters for creating an ObjectStoreError
 */
export interface ObjectStoreErrorParams {
  /**
   * Human-readable error message
   */
  readonly message: string;

  /**
   * Machine-readable code (store error code or client-side code)
   */
  readonly code: string;

  /**
   * HTTP status code, when a response was received
   */
  readonly status?: number;

  /**
   * Request ID reported by the store
   */
  readonly requestId?: string;

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;

  /**
   * Underlying error, if any
   */
  readonly cause?: unknown;
}

/**
 * Base error class for every failure surfaced by the client.
 *
 * Operations never retry and never swallow errors: each failure rejects the
 * call that caused it with one of the subclasses, discriminated by `kind`.
 */
export abstract class ObjectStoreError extends Error {
  /**
   * Error family
   */
  abstract readonly kind: ErrorKind;

  /**
   * Machine-readable code
   */
  readonly code: string;

  /**
   * HTTP status code (if applicable)
   */
  readonly status?: number;

  /**
   * Request ID for troubleshooting
   */
  readonly requestId?: string;

  private detailsValue?: Record<string, unknown>;

  constructor(params: ObjectStoreErrorParams) {
    super(params.message, params.cause !== undefined ? { cause: params.cause } : undefined);

    // Set the prototype explicitly to maintain instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = 'ObjectStoreError';
    this.code = params.code;
    this.status = params.status;
    this.requestId = params.requestId;
    this.detailsValue = params.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Additional error details
   */
  get details(): Readonly<Record<string, unknown>> | undefined {
    return this.detailsValue;
  }

  /**
   * Adds context gathered while the error travelled up, such as the upload
   * a failed part belonged to. Existing keys are kept.
   */
  annotate(details: Record<string, unknown>): this {
    this.detailsValue = { ...details, ...this.detailsValue };
    return this;
  }

  /**
   * Converts the error to a JSON representation
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      code: this.code,
      status: this.status,
      requestId: this.requestId,
      details: this.details,
    };
  }

  /**
   * Returns a string representation of the error
   */
  override toString(): string {
    const parts = [this.name, `[${this.code}]`];

    if (this.status !== undefined) {
      parts.push(`(${this.status})`);
    }

    parts.push(`- ${this.message}`);

    if (this.requestId) {
      parts.push(`(RequestId: ${this.requestId})`);
    }

    return parts.join(' ');
  }
}

/**
 * Type guard for errors raised by this client
 */
export function isObjectStoreError(error: unknown): error is ObjectStoreError {
  return error instanceof ObjectStoreError;
}

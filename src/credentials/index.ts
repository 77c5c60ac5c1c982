/**
 * Access credentials for the object store
 * @module credentials
 */

import { ConfigError } from '../errors/categories.js';

const REDACTED = '[REDACTED]';

/**
 * Immutable access key pair with an optional session token.
 *
 * The secret and the token never appear in `toString()`, `toJSON()` or
 * Node.js inspection output.
 */
export class Credentials {
  readonly accessKey: string;
  readonly secretKey: string;
  readonly sessionToken?: string;

  constructor(accessKey: string, secretKey: string, sessionToken?: string) {
    if (!accessKey) {
      throw ConfigError.missingField('key');
    }
    if (!secretKey) {
      throw ConfigError.missingField('secret');
    }
    this.accessKey = accessKey;
    this.secretKey = secretKey;
    this.sessionToken = sessionToken ? sessionToken : undefined;
    Object.freeze(this);
  }

  toJSON(): Record<string, string | undefined> {
    return {
      accessKey: this.accessKey,
      secretKey: REDACTED,
      sessionToken: this.sessionToken === undefined ? undefined : REDACTED,
    };
  }

  toString(): string {
    return `Credentials(${this.accessKey})`;
  }

  [Symbol.for('nodejs.util.inspect.custom')](): string {
    return this.toString();
  }
}

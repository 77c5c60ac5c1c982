/**
 * Signature V4 query-string presigning
 * @module signing/presigner
 */

import type { Credentials } from '../credentials/index.js';
import { UserError } from '../errors/categories.js';
import { resolveAction, type BucketTarget, type StoreAction } from './actions.js';
import { canonicalQueryString, canonicalUri, createCanonicalRequest } from './canonical.js';
import { hmacSha256, sha256Hex, toHex } from './crypto.js';
import { formatAmzDate, formatDateStamp } from './format.js';
import { SigningKeyCache } from './key-derivation.js';
import type { SignedAction, Signer } from './types.js';

export const ALGORITHM = 'AWS4-HMAC-SHA256';
export const UNSIGNED_PAYLOAD = 'UNSIGNED-PAYLOAD';

/**
 * Longest lifetime a presigned request may have, in seconds (7 days)
 */
export const MAX_PRESIGN_EXPIRY = 604800;

export interface SigV4PresignerOptions {
  /**
   * Signing service name
   * @default 's3'
   */
  readonly service?: string;
  /**
   * Clock used to stamp requests
   */
  readonly now?: () => Date;
}

/**
 * Default signer: every request carries its signature in the query string,
 * with only the `host` header signed and an unsigned payload. The resulting
 * URL can be handed to any HTTP client, so the same output serves presigned
 * links for third parties.
 */
export class SigV4Presigner implements Signer {
  private readonly service: string;
  private readonly now: () => Date;
  private readonly keyCache = new SigningKeyCache();

  constructor(options: SigV4PresignerOptions = {}) {
    this.service = options.service ?? 's3';
    this.now = options.now ?? (() => new Date());
  }

  sign(
    target: BucketTarget,
    action: StoreAction,
    credentials: Credentials,
    expiresIn: number
  ): SignedAction {
    if (!Number.isInteger(expiresIn) || expiresIn < 1 || expiresIn > MAX_PRESIGN_EXPIRY) {
      throw UserError.invalidExpiry(expiresIn, MAX_PRESIGN_EXPIRY);
    }

    const request = resolveAction(target, action);
    const date = this.now();
    const amzDate = formatAmzDate(date);
    const dateStamp = formatDateStamp(date);
    const scope = `${dateStamp}/${target.region}/${this.service}/aws4_request`;

    const query: Array<[string, string]> = [
      ...request.query,
      ['X-Amz-Algorithm', ALGORITHM],
      ['X-Amz-Credential', `${credentials.accessKey}/${scope}`],
      ['X-Amz-Date', amzDate],
      ['X-Amz-Expires', String(expiresIn)],
      ['X-Amz-SignedHeaders', 'host'],
    ];
    if (credentials.sessionToken !== undefined) {
      query.push(['X-Amz-Security-Token', credentials.sessionToken]);
    }

    const uri = canonicalUri(request.path);
    const canonicalQuery = canonicalQueryString(query);
    const canonicalRequest = createCanonicalRequest(
      request.method,
      uri,
      canonicalQuery,
      { host: request.host },
      UNSIGNED_PAYLOAD
    );
    const stringToSign = [ALGORITHM, amzDate, scope, sha256Hex(canonicalRequest)].join('\n');
    const signingKey = this.keyCache.getSigningKey(
      credentials.secretKey,
      dateStamp,
      target.region,
      this.service
    );
    const signature = toHex(hmacSha256(signingKey, stringToSign));

    return {
      method: request.method,
      url: `${request.protocol}//${request.host}${uri}?${canonicalQuery}&X-Amz-Signature=${signature}`,
      headers: {},
    };
  }
}

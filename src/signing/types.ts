/**
 * Signer boundary
 * @module signing/types
 */

import type { Credentials } from '../credentials/index.js';
import type { BucketTarget, HttpMethod, StoreAction } from './actions.js';

/**
 * A fully formed request, valid until its expiry
 */
export interface SignedAction {
  readonly method: HttpMethod;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * Turns an action into a signed request. The client only ever talks to the
 * signer through this interface; callers may supply their own.
 */
export interface Signer {
  sign(
    target: BucketTarget,
    action: StoreAction,
    credentials: Credentials,
    expiresIn: number
  ): SignedAction;
}

/**
 * Request signing
 *
 * @module signing
 */

export { resolveAction } from './actions.js';
export type {
  HttpMethod,
  UrlStyle,
  BucketTarget,
  StoreAction,
  StoreActionType,
  ActionRequest,
} from './actions.js';
export type { Signer, SignedAction } from './types.js';
export {
  SigV4Presigner,
  ALGORITHM,
  UNSIGNED_PAYLOAD,
  MAX_PRESIGN_EXPIRY,
} from './presigner.js';
export type { SigV4PresignerOptions } from './presigner.js';
export { uriEncode, canonicalUri, canonicalQueryString, createCanonicalRequest } from './canonical.js';
export { deriveSigningKey, SigningKeyCache } from './key-derivation.js';
export { formatAmzDate, formatDateStamp } from './format.js';

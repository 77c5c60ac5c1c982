/**
 * Error taxonomy for the object store client
 *
 * @module errors
 */

export { ObjectStoreError, isObjectStoreError } from './error.js';
export type { ErrorKind, ObjectStoreErrorParams } from './error.js';

export {
  UserError,
  ConfigError,
  StoreError,
  TransportError,
  InternalError,
  isStoreError,
  MAX_PART_NUMBER,
} from './categories.js';
export type { StoreErrorParams, TransportFailure } from './categories.js';

export {
  KNOWN_STORE_ERROR_CODES,
  isKnownStoreErrorCode,
  parseStoreErrorCode,
  storeErrorCodeText,
} from './codes.js';
export type { KnownStoreErrorCode, StoreErrorCode } from './codes.js';

export { classifyResponse, classifyTransportFailure, storeErrorFromBody } from './classify.js';
export type { ResponseHeaders } from './classify.js';

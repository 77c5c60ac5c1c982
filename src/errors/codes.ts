/**
 * Store error codes
 * @module errors/codes
 */

/**
 * Error codes documented by S3-compatible stores.
 */
export const KNOWN_STORE_ERROR_CODES = [
  'AccessDenied',
  'AccountProblem',
  'AllAccessDisabled',
  'AmbiguousGrantByEmailAddress',
  'AuthorizationHeaderMalformed',
  'BadDigest',
  'BucketAlreadyExists',
  'BucketAlreadyOwnedByYou',
  'BucketNotEmpty',
  'CredentialsNotSupported',
  'CrossLocationLoggingProhibited',
  'EntityTooSmall',
  'EntityTooLarge',
  'ExpiredToken',
  'IllegalVersioningConfigurationException',
  'IncompleteBody',
  'IncorrectNumberOfFilesInPostRequest',
  'InlineDataTooLarge',
  'InternalError',
  'InvalidAccessKeyId',
  'InvalidAddressingHeader',
  'InvalidArgument',
  'InvalidBucketName',
  'InvalidBucketState',
  'InvalidDigest',
  'InvalidLocationConstraint',
  'InvalidObjectState',
  'InvalidPart',
  'InvalidPartOrder',
  'InvalidPayer',
  'InvalidPolicyDocument',
  'InvalidRange',
  'InvalidRequest',
  'InvalidSecurity',
  'InvalidSOAPRequest',
  'InvalidStorageClass',
  'InvalidTargetBucketForLogging',
  'InvalidToken',
  'InvalidURI',
  'KeyTooLongError',
  'MalformedPOSTRequest',
  'MalformedXML',
  'MaxMessageLengthExceeded',
  'MetadataTooLarge',
  'MethodNotAllowed',
  'MissingAttachment',
  'MissingContentLength',
  'MissingSecurityElement',
  'MissingSecurityHeader',
  'NoLoggingStatusForKey',
  'NoSuchBucket',
  'NoSuchBucketPolicy',
  'NoSuchKey',
  'NoSuchLifecycleConfiguration',
  'NoSuchUpload',
  'NoSuchVersion',
  'NotImplemented',
  'NotSignedUp',
  'OperationAborted',
  'PermanentRedirect',
  'PreconditionFailed',
  'Redirect',
  'RestoreAlreadyInProgress',
  'RequestIsNotMultiPartContent',
  'RequestTimeout',
  'RequestTimeTooSkewed',
  'SignatureDoesNotMatch',
  'ServiceUnavailable',
  'SlowDown',
  'TemporaryRedirect',
  'TokenRefreshRequired',
  'TooManyBuckets',
  'UnexpectedContent',
  'UnresolvableGrantByEmailAddress',
  'UserKeyMustBeSpecified',
] as const;

export type KnownStoreErrorCode = (typeof KNOWN_STORE_ERROR_CODES)[number];

/**
 * Open union of store error codes. Codes the client does not know about are
 * kept verbatim so a newer store never turns into a parse failure.
 */
export type StoreErrorCode =
  | { readonly kind: 'known'; readonly code: KnownStoreErrorCode }
  | { readonly kind: 'unrecognized'; readonly raw: string };

const KNOWN_CODES: ReadonlySet<string> = new Set(KNOWN_STORE_ERROR_CODES);

export function isKnownStoreErrorCode(value: string): value is KnownStoreErrorCode {
  return KNOWN_CODES.has(value);
}

/**
 * Parses the text of a `<Code>` element.
 *
 * @example
 * ```typescript
 * parseStoreErrorCode('NoSuchKey'); // { kind: 'known', code: 'NoSuchKey' }
 * parseStoreErrorCode('Quota');     // { kind: 'unrecognized', raw: 'Quota' }
 * ```
 */
export function parseStoreErrorCode(raw: string): StoreErrorCode {
  if (isKnownStoreErrorCode(raw)) {
    return { kind: 'known', code: raw };
  }
  return { kind: 'unrecognized', raw };
}

/**
 * Text form of a code, as the store wrote it.
 */
export function storeErrorCodeText(code: StoreErrorCode): string {
  return code.kind === 'known' ? code.code : code.raw;
}

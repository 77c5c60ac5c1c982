/**
 * XML parsing for ListObjectsV2 responses
 * @module xml/list-objects
 */

import {
  parseXml,
  childElement,
  childElements,
  childText,
  childValue,
  cleanETag,
  parseDateSafe,
  parseIntSafe,
} from './parser.js';

/**
 * One object of a listing page
 */
export interface ObjectEntry {
  readonly key: string;
  /**
   * Size in bytes
   */
  readonly size: number;
  readonly lastModified?: Date;
  readonly eTag?: string;
  readonly storageClass?: string;
}

/**
 * One page of a ListObjectsV2 listing
 */
export interface ListingPage {
  readonly entries: ObjectEntry[];
  readonly commonPrefixes: string[];
  /**
   * Present when more pages follow
   */
  readonly nextContinuationToken?: string;
  readonly isTruncated: boolean;
  readonly keyCount?: number;
  readonly maxKeys?: number;
}

/**
 * Parses a `<ListBucketResult>` document.
 *
 * Single `Contents` elements parse to an object rather than an array; both
 * shapes are accepted. Keys and prefixes are returned verbatim. Only `Contents` and `NextContinuationToken` drive the
 * listing, the other fields are informative.
 *
 * @throws Error if the body is not a ListBucketResult document
 */
export function parseListObjectsResponse(xml: string): ListingPage {
  const parsed = parseXml(xml);
  const result = childElement(parsed, 'ListBucketResult');

  if (!result) {
    if (childText(parsed, 'ListBucketResult') !== undefined) {
      return { entries: [], commonPrefixes: [], isTruncated: false };
    }
    throw new Error('missing ListBucketResult element');
  }

  const entries = childElements(result, 'Contents').map((contents, index): ObjectEntry => {
    const key = childText(contents, 'Key');
    if (key === undefined) {
      throw new Error(`Contents element ${index} has no Key`);
    }
    const eTag = childValue(contents, 'ETag');
    return {
      key,
      size: parseIntSafe(childValue(contents, 'Size'), 0),
      lastModified: parseDateSafe(childValue(contents, 'LastModified')),
      eTag: eTag === undefined ? undefined : cleanETag(eTag),
      storageClass: childValue(contents, 'StorageClass'),
    };
  });

  const commonPrefixes = childElements(result, 'CommonPrefixes')
    .map((prefix) => childText(prefix, 'Prefix'))
    .filter((prefix): prefix is string => prefix !== undefined);

  const token = childValue(result, 'NextContinuationToken');
  const keyCount = childValue(result, 'KeyCount');
  const maxKeys = childValue(result, 'MaxKeys');

  return {
    entries,
    commonPrefixes,
    nextContinuationToken: token ? token : undefined,
    isTruncated: childValue(result, 'IsTruncated') === 'true',
    keyCount: keyCount === undefined ? undefined : parseIntSafe(keyCount, 0),
    maxKeys: maxKeys === undefined ? undefined : parseIntSafe(maxKeys, 0),
  };
}
